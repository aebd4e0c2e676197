import { type RandomSource, choice, randomInt } from '../random.js';
import { formatDateTime, quoteString, unquoteString } from './generators.js';

const INSERT_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789'%&";
const HEX_DIGITS = '0123456789abcdef';
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export interface IntegerRange {
  readonly min: number;
  readonly max: number;
}

type StringMutation = (random: RandomSource, value: string) => string;

const STRING_MUTATIONS: readonly StringMutation[] = [
  function insertCharacter(random, value) {
    const at = randomInt(random, 0, value.length);
    const char = INSERT_ALPHABET.charAt(randomInt(random, 0, INSERT_ALPHABET.length - 1));
    return value.slice(0, at) + char + value.slice(at);
  },
  function deleteCharacter(random, value) {
    if (value.length === 0) return value;
    const at = randomInt(random, 0, value.length - 1);
    return value.slice(0, at) + value.slice(at + 1);
  },
  function swapCase(random, value) {
    if (value.length === 0) return value;
    const at = randomInt(random, 0, value.length - 1);
    const char = value.charAt(at);
    const swapped = char === char.toUpperCase() ? char.toLowerCase() : char.toUpperCase();
    return value.slice(0, at) + swapped + value.slice(at + 1);
  },
  function duplicateCharacter(random, value) {
    if (value.length === 0) return value;
    const at = randomInt(random, 0, value.length - 1);
    return value.slice(0, at + 1) + value.charAt(at) + value.slice(at + 1);
  },
];

/**
 * Applies one random character-level edit to a quoted string literal and
 * truncates the result to maxLength. Non-string literals pass through.
 */
export function mutateString(random: RandomSource, literal: string, maxLength: number): string {
  const value = unquoteString(literal);
  if (value === null) {
    return literal;
  }
  const mutation = choice(random, STRING_MUTATIONS);
  return quoteString(mutation(random, value).slice(0, Math.max(maxLength, 0)));
}

export function mutateInteger(random: RandomSource, literal: string, range: IntegerRange): string {
  if (!/^-?\d+$/.test(literal)) {
    return literal;
  }
  const value = Number.parseInt(literal, 10);
  const candidates = [value + 1, value - 1, -value, range.min, range.max];
  const mutated = choice(random, candidates);
  return String(Math.min(Math.max(mutated, range.min), range.max));
}

export function mutateInt64(random: RandomSource, literal: string): string {
  const match = /^(-?\d+)L$/.exec(literal);
  const digits = match?.[1];
  if (digits === undefined) {
    return literal;
  }
  const value = BigInt(digits);
  const candidates = [value + 1n, value - 1n, -value, INT64_MIN, INT64_MAX];
  const mutated = choice(random, candidates);
  const clamped = mutated < INT64_MIN ? INT64_MIN : mutated > INT64_MAX ? INT64_MAX : mutated;
  return `${clamped}L`;
}

export function flipBoolean(literal: string): string {
  if (literal === 'true') return 'false';
  if (literal === 'false') return 'true';
  return literal;
}

/** Replaces one hex digit of a guid literal, keeping the dashes in place. */
export function mutateGuid(random: RandomSource, literal: string): string {
  const match = /^guid'([0-9a-fA-F-]{36})'$/.exec(literal);
  const body = match?.[1];
  if (body === undefined) {
    return literal;
  }
  const positions: number[] = [];
  for (let i = 0; i < body.length; i++) {
    if (body.charAt(i) !== '-') positions.push(i);
  }
  const at = choice(random, positions);
  const digit = HEX_DIGITS.charAt(randomInt(random, 0, HEX_DIGITS.length - 1));
  return `guid'${body.slice(0, at)}${digit}${body.slice(at + 1)}'`;
}

/**
 * Shifts a datetime or datetimeoffset literal by up to a year in either direction.
 */
export function shiftDateTime(random: RandomSource, literal: string): string {
  const match = /^(datetime|datetimeoffset)'(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(Z?)'$/.exec(literal);
  const prefix = match?.[1];
  const timestamp = match?.[2];
  if (prefix === undefined || timestamp === undefined) {
    return literal;
  }
  const ms = Date.parse(`${timestamp}Z`);
  if (Number.isNaN(ms)) {
    return literal;
  }
  const shifted = ms + randomInt(random, -365, 365) * 86_400_000;
  return `${prefix}'${formatDateTime(shifted)}${match?.[3] ?? ''}'`;
}
