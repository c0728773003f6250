/**
 * Mutation strategies for fuzzing.
 *
 * Text mutators take valid DER ASCII and damage it to exercise assembler
 * error handling. Byte mutators take valid DER and damage it to exercise
 * the disassembler's fallbacks.
 */

import { Rng } from './der-ascii-generator';

/** A mutation function that transforms an input string. */
export type Mutator = (input: string, rng: Rng) => string;

/** A mutation function that transforms input bytes. */
export type ByteMutator = (input: Uint8Array, rng: Rng) => Uint8Array;

// -- Character-level mutations --

/** Flip a random bit in a random character. */
export function bitFlip(input: string, rng: Rng): string {
  if (input.length === 0) return input;
  const pos = rng.int(0, input.length - 1);
  const bit = 1 << rng.int(0, 6);
  return input.slice(0, pos) + String.fromCharCode(input.charCodeAt(pos) ^ bit) + input.slice(pos + 1);
}

/** Insert a random ASCII character at a random position. */
export function charInsert(input: string, rng: Rng): string {
  const pos = rng.int(0, input.length);
  return input.slice(0, pos) + String.fromCharCode(rng.int(0, 127)) + input.slice(pos);
}

/** Delete a random character. */
export function charDelete(input: string, rng: Rng): string {
  if (input.length === 0) return input;
  const pos = rng.int(0, input.length - 1);
  return input.slice(0, pos) + input.slice(pos + 1);
}

/** Insert a block of one repeated printable character. */
export function blockInsert(input: string, rng: Rng): string {
  const pos = rng.int(0, input.length);
  const ch = String.fromCharCode(rng.int(32, 126));
  return input.slice(0, pos) + ch.repeat(rng.int(1, 20)) + input.slice(pos);
}

// -- Token-level mutations --

const KEYWORDS = [
  'SEQUENCE', 'SET', 'INTEGER', 'OCTET_STRING', 'BIT_STRING', 'OBJECT_IDENTIFIER',
  'NULL', 'BOOLEAN', 'UTF8String', 'APPLICATION', 'PRIVATE', 'UNIVERSAL',
  'PRIMITIVE', 'CONSTRUCTED', 'sequence', 'INTEGR',
];

/** Replace a random keyword with another keyword. */
export function keywordSwap(input: string, rng: Rng): string {
  const present = KEYWORDS.filter(k => input.includes(k));
  if (present.length === 0) return input;
  const target = rng.pick(present);
  const idx = input.indexOf(target);
  return input.slice(0, idx) + rng.pick(KEYWORDS) + input.slice(idx + target.length);
}

const BOUNDARY_NUMBERS = [
  '0', '-0', '-1', '127', '128', '-128', '-129', '255', '256',
  '2147483648', '9223372036854775807', '-9223372036854775808',
  '18446744073709551616', '1.2', '3.1', '1.40', '0.39.0', '1..2',
];

/** Replace a number in the input with a boundary value. */
export function numberBoundary(input: string, rng: Rng): string {
  const matches = [...input.matchAll(/-?\d+/g)];
  if (matches.length === 0) return input;
  const match = rng.pick(matches);
  const idx = match.index ?? 0;
  return input.slice(0, idx) + rng.pick(BOUNDARY_NUMBERS) + input.slice(idx + match[0].length);
}

const DELIMITERS = ['{', '}', '[', ']', '`', '"', '#', '\\'];

/** Remove a random delimiter character. */
export function removeDelimiter(input: string, rng: Rng): string {
  const positions: number[] = [];
  for (let i = 0; i < input.length; i++) {
    if (DELIMITERS.includes(input[i])) positions.push(i);
  }
  if (positions.length === 0) return input;
  const pos = rng.pick(positions);
  return input.slice(0, pos) + input.slice(pos + 1);
}

/** Insert a random delimiter at a random position. */
export function insertDelimiter(input: string, rng: Rng): string {
  const pos = rng.int(0, input.length);
  return input.slice(0, pos) + rng.pick(DELIMITERS) + input.slice(pos);
}

const ESCAPES = ['\\n', '\\"', '\\\\', '\\x00', '\\xff', '\\x', '\\x4', '\\q', '\\'];

/** Insert an escape sequence, valid or not. */
export function insertEscape(input: string, rng: Rng): string {
  const pos = rng.int(0, input.length);
  return input.slice(0, pos) + rng.pick(ESCAPES) + input.slice(pos);
}

/** Duplicate a random line. */
export function duplicateLine(input: string, rng: Rng): string {
  const lines = input.split('\n');
  const idx = rng.int(0, lines.length - 1);
  lines.splice(idx, 0, lines[idx]);
  return lines.join('\n');
}

/** Truncate the input at a random position. */
export function truncate(input: string, rng: Rng): string {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

/** Insert null characters. */
export function insertNullBytes(input: string, rng: Rng): string {
  const pos = rng.int(0, input.length);
  return input.slice(0, pos) + '\0'.repeat(rng.int(1, 5)) + input.slice(pos);
}

/** Add non-ASCII characters. */
export function insertUnicode(input: string, rng: Rng): string {
  const pos = rng.int(0, input.length);
  const unicodeChars = ['🎉', '™', '©', '€', 'ñ', 'ü', '中', ' ', ' '];
  return input.slice(0, pos) + rng.pick(unicodeChars) + input.slice(pos);
}

/** All available text mutators. */
export const MUTATORS: Mutator[] = [
  bitFlip,
  charInsert,
  charDelete,
  blockInsert,
  keywordSwap,
  numberBoundary,
  removeDelimiter,
  insertDelimiter,
  insertEscape,
  duplicateLine,
  truncate,
  insertNullBytes,
  insertUnicode,
];

/**
 * Apply 1-N random mutations to an input string.
 * @param input - The seed input string
 * @param rng - Random number generator
 * @param count - Number of mutations to apply (default: 1-3)
 */
export function mutate(input: string, rng: Rng, count?: number): string {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    result = rng.pick(MUTATORS)(result, rng);
  }
  return result;
}

// -- Byte-level mutations --

/** Flip a random bit in a random byte. */
export function flipByteBit(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = input.slice();
  out[rng.int(0, out.length - 1)] ^= 1 << rng.int(0, 7);
  return out;
}

/** Insert a random byte. */
export function insertByte(input: Uint8Array, rng: Rng): Uint8Array {
  const pos = rng.int(0, input.length);
  const out = new Uint8Array(input.length + 1);
  out.set(input.subarray(0, pos));
  out[pos] = rng.int(0, 255);
  out.set(input.subarray(pos), pos + 1);
  return out;
}

/** Delete a random byte. */
export function deleteByte(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const pos = rng.int(0, input.length - 1);
  const out = new Uint8Array(input.length - 1);
  out.set(input.subarray(0, pos));
  out.set(input.subarray(pos + 1), pos);
  return out;
}

const HEADER_OCTETS = [0x00, 0x1f, 0x30, 0x80, 0x81, 0x82, 0x84, 0xa0, 0xff];

/** Overwrite a random byte with one that is significant in a header. */
export function overwriteHeaderOctet(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = input.slice();
  out[rng.int(0, out.length - 1)] = rng.pick(HEADER_OCTETS);
  return out;
}

/** Cut the bytes at a random position. */
export function truncateBytes(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

/** All available byte mutators. */
export const BYTE_MUTATORS: ByteMutator[] = [
  flipByteBit,
  insertByte,
  deleteByte,
  overwriteHeaderOctet,
  truncateBytes,
];

/** Apply 1-N random byte mutations. */
export function mutateBytes(input: Uint8Array, rng: Rng, count?: number): Uint8Array {
  const n = count ?? rng.int(1, 3);
  let result = input;
  for (let i = 0; i < n; i++) {
    result = rng.pick(BYTE_MUTATORS)(result, rng);
  }
  return result;
}
