import { type RandomSource, coin, randomInt } from '../random.js';

const STRING_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789 -_.~'";
const WORD_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
const HEX_DIGITS = '0123456789abcdef';

export const INT16_RANGE = { min: -32768, max: 32767 } as const;
export const INT32_RANGE = { min: -2147483648, max: 2147483647 } as const;
export const BYTE_RANGE = { min: 0, max: 255 } as const;
export const SBYTE_RANGE = { min: -128, max: 127 } as const;

const DATE_MIN_MS = Date.UTC(1900, 0, 1);
const DATE_MAX_MS = Date.UTC(2099, 11, 31, 23, 59, 59);

function randomChars(random: RandomSource, alphabet: string, length: number): string {
  let result = '';
  for (let i = 0; i < length; i++) {
    result += alphabet.charAt(randomInt(random, 0, alphabet.length - 1));
  }
  return result;
}

/** Wraps raw text as a string literal, doubling embedded quotes. */
export function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** Inverse of quoteString; returns null when the input is not a quoted literal. */
export function unquoteString(literal: string): string | null {
  if (literal.length < 2 || !literal.startsWith("'") || !literal.endsWith("'")) {
    return null;
  }
  return literal.slice(1, -1).replace(/''/g, "'");
}

export function generateString(random: RandomSource, maxLength: number): string {
  const length = randomInt(random, 0, Math.max(maxLength, 0));
  return quoteString(randomChars(random, STRING_ALPHABET, length));
}

/** Bare lowercase alphanumeric word, used as a search term. */
export function generateWord(random: RandomSource, maxLength: number): string {
  return randomChars(random, WORD_ALPHABET, randomInt(random, 1, Math.max(maxLength, 1)));
}

export function generateBoolean(random: RandomSource): string {
  return coin(random) ? 'true' : 'false';
}

export function generateByte(random: RandomSource): string {
  return String(randomInt(random, BYTE_RANGE.min, BYTE_RANGE.max));
}

export function generateSByte(random: RandomSource): string {
  return String(randomInt(random, SBYTE_RANGE.min, SBYTE_RANGE.max));
}

export function generateInt16(random: RandomSource): string {
  return String(randomInt(random, INT16_RANGE.min, INT16_RANGE.max));
}

export function generateInt32(random: RandomSource): string {
  return String(randomInt(random, INT32_RANGE.min, INT32_RANGE.max));
}

export function generateInt64(random: RandomSource): string {
  const high = BigInt(randomInt(random, INT32_RANGE.min, INT32_RANGE.max));
  const low = BigInt(randomInt(random, 0, 0xffffffff));
  return `${(high << 32n) + low}L`;
}

export function generateSingle(random: RandomSource): string {
  return `${(randomInt(random, -100_000_000, 100_000_000) / 100).toFixed(2)}f`;
}

export function generateDouble(random: RandomSource): string {
  return `${(randomInt(random, -1_000_000_000, 1_000_000_000) / 10_000).toFixed(4)}d`;
}

/**
 * Decimal literal honouring the declared precision and scale, e.g. `-123.45m`.
 */
export function generateDecimal(random: RandomSource, precision: number, scale: number): string {
  const integerDigits = Math.max(precision - scale, 1);
  const integerLength = randomInt(random, 1, integerDigits);
  let integerPart = randomChars(random, '0123456789', integerLength).replace(/^0+(?=\d)/, '');
  if (integerPart === '') {
    integerPart = '0';
  }
  const sign = coin(random) ? '-' : '';
  if (scale <= 0) {
    return `${sign}${integerPart}m`;
  }
  const fraction = randomChars(random, '0123456789', randomInt(random, 1, scale));
  return `${sign}${integerPart}.${fraction}m`;
}

export function generateGuid(random: RandomSource): string {
  const hex = randomChars(random, HEX_DIGITS, 32);
  const formatted = [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join('-');
  return `guid'${formatted}'`;
}

/** `YYYY-MM-DDThh:mm:ss` for the given epoch milliseconds. */
export function formatDateTime(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19);
}

export function generateDateTime(random: RandomSource): string {
  return `datetime'${formatDateTime(randomInt(random, DATE_MIN_MS, DATE_MAX_MS))}'`;
}

export function generateDateTimeOffset(random: RandomSource): string {
  return `datetimeoffset'${formatDateTime(randomInt(random, DATE_MIN_MS, DATE_MAX_MS))}Z'`;
}

export function generateTime(random: RandomSource): string {
  const hours = randomInt(random, 0, 23);
  const minutes = randomInt(random, 0, 59);
  const seconds = randomInt(random, 0, 59);
  return `time'PT${hours}H${minutes}M${seconds}S'`;
}

export function generateBinary(random: RandomSource): string {
  return `binary'${randomChars(random, HEX_DIGITS, 2 * randomInt(random, 1, 16)).toUpperCase()}'`;
}
