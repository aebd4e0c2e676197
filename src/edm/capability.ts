import { DEFAULT_DECIMAL_PRECISION, DEFAULT_DECIMAL_SCALE, MAX_STRING_LENGTH } from '../constants.js';
import type { RandomSource } from '../random.js';
import type { EntityProperty, FilterRestrictionKind } from '../schema/types.js';
import {
  BYTE_RANGE,
  INT16_RANGE,
  INT32_RANGE,
  SBYTE_RANGE,
  generateBinary,
  generateBoolean,
  generateByte,
  generateDateTime,
  generateDateTimeOffset,
  generateDecimal,
  generateDouble,
  generateGuid,
  generateInt16,
  generateInt32,
  generateInt64,
  generateSByte,
  generateSingle,
  generateString,
  generateTime,
} from './generators.js';
import { flipBoolean, mutateGuid, mutateInt64, mutateInteger, mutateString, shiftDateTime } from './mutators.js';
import { operatorTableFor } from './operators.js';
import { type EdmTypeName, type FilterProperty, type OperatorTable, isEdmTypeName } from './types.js';

export interface CapabilityOptions {
  /** Upper bound for string literals when the property declares no MaxLength. */
  maxStringLength?: number;
}

/**
 * A schema property bound to the literal generator, mutator and operator
 * table of its EDM type.
 */
export class EdmFilterProperty implements FilterProperty {
  readonly name: string;
  private readonly restriction: FilterRestrictionKind | undefined;
  private readonly maxLength: number;
  private readonly precision: number;
  private readonly scale: number;

  constructor(
    property: EntityProperty,
    readonly type: EdmTypeName,
    private readonly random: RandomSource,
    options: CapabilityOptions = {},
  ) {
    this.name = property.name;
    this.restriction = property.filterRestriction;
    this.maxLength = property.maxLength ?? options.maxStringLength ?? MAX_STRING_LENGTH;
    this.precision = property.precision ?? DEFAULT_DECIMAL_PRECISION;
    this.scale = Math.min(property.scale ?? DEFAULT_DECIMAL_SCALE, this.precision);
  }

  generate(): string {
    const random = this.random;
    switch (this.type) {
      case 'Edm.String':
        return generateString(random, this.maxLength);
      case 'Edm.Int16':
        return generateInt16(random);
      case 'Edm.Int32':
        return generateInt32(random);
      case 'Edm.Int64':
        return generateInt64(random);
      case 'Edm.Byte':
        return generateByte(random);
      case 'Edm.SByte':
        return generateSByte(random);
      case 'Edm.Single':
        return generateSingle(random);
      case 'Edm.Double':
        return generateDouble(random);
      case 'Edm.Decimal':
        return generateDecimal(random, this.precision, this.scale);
      case 'Edm.Boolean':
        return generateBoolean(random);
      case 'Edm.Guid':
        return generateGuid(random);
      case 'Edm.DateTime':
        return generateDateTime(random);
      case 'Edm.DateTimeOffset':
        return generateDateTimeOffset(random);
      case 'Edm.Time':
        return generateTime(random);
      case 'Edm.Binary':
        return generateBinary(random);
      default: {
        const unreachable: never = this.type;
        throw new Error(`No generator for ${String(unreachable)}`);
      }
    }
  }

  mutate(literal: string): string {
    const random = this.random;
    switch (this.type) {
      case 'Edm.String':
        return mutateString(random, literal, this.maxLength);
      case 'Edm.Int16':
        return mutateInteger(random, literal, INT16_RANGE);
      case 'Edm.Int32':
        return mutateInteger(random, literal, INT32_RANGE);
      case 'Edm.Byte':
        return mutateInteger(random, literal, BYTE_RANGE);
      case 'Edm.SByte':
        return mutateInteger(random, literal, SBYTE_RANGE);
      case 'Edm.Int64':
        return mutateInt64(random, literal);
      case 'Edm.Boolean':
        return flipBoolean(literal);
      case 'Edm.Guid':
        return mutateGuid(random, literal);
      case 'Edm.DateTime':
      case 'Edm.DateTimeOffset':
        return shiftDateTime(random, literal);
      case 'Edm.Single':
      case 'Edm.Double':
      case 'Edm.Decimal':
      case 'Edm.Time':
      case 'Edm.Binary':
        return literal;
      default: {
        const unreachable: never = this.type;
        throw new Error(`No mutator for ${String(unreachable)}`);
      }
    }
  }

  operators(): OperatorTable {
    return operatorTableFor(this.type, this.restriction, this.random);
  }
}

/**
 * Binds a schema property to its capability, or returns undefined when the
 * declared type has no literal support.
 */
export function createFilterProperty(
  property: EntityProperty,
  random: RandomSource,
  options: CapabilityOptions = {},
): FilterProperty | undefined {
  if (!isEdmTypeName(property.type)) {
    return undefined;
  }
  return new EdmFilterProperty(property, property.type, random, options);
}
