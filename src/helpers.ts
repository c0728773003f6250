import { ByteBuffer } from './ByteBuffer';
import { type Tag, tagClassBits } from './tags';

/**
 * Encode a tag's identifier octets (X.690 §8.1.2).
 *   number <= 30: class | constructed | number in one octet
 *   number >= 31: low bits 0x1f, then base-128 big-endian number
 */
export function encodeTag(tag: Tag): Uint8Array {
  const { number } = tag;
  if (!Number.isSafeInteger(number) || number < 0) {
    throw new Error(`Invalid tag number: ${number}`);
  }
  let first = (tagClassBits(tag.tagClass) << 6) | (tag.constructed ? 0x20 : 0x00);

  if (number <= 30) {
    return new Uint8Array([first | number]);
  }

  first |= 0x1f;
  const buf = ByteBuffer.alloc(8);
  buf.writeByte(first);
  const groups: number[] = [];
  let n = number;
  do {
    groups.unshift(n % 128);
    n = Math.floor(n / 128); // beyond 32 bits, so no shifts
  } while (n > 0);
  for (let i = 0; i < groups.length - 1; i++) {
    buf.writeByte(groups[i] | 0x80);
  }
  buf.writeByte(groups[groups.length - 1]);
  return buf.toUint8Array();
}

/**
 * Encode a definite length in minimal form (X.690 §8.1.3).
 *   0..127: one octet
 *   >=128:  0x80 | count, then count big-endian octets
 */
export function encodeLength(length: number): Uint8Array {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new Error(`Length must be a non-negative integer, got ${length}`);
  }
  if (length < 128) {
    return new Uint8Array([length]);
  }
  const octets = unsignedIntToBytes(length);
  const result = new Uint8Array(octets.length + 1);
  result[0] = 0x80 | octets.length;
  result.set(octets, 1);
  return result;
}

/**
 * Encode INTEGER contents octets: minimum-width big-endian two's complement.
 * Zero encodes as a single 0x00 octet.
 */
export function encodeInteger(value: bigint): Uint8Array {
  // A negative value is the bitwise complement of -value - 1.
  const negative = value < 0n;
  let hex = (negative ? -value - 1n : value).toString(16);
  if (hex.length % 2 !== 0) hex = '0' + hex;
  // Room for the sign bit.
  if (parseInt(hex[0], 16) >= 8) hex = '00' + hex;
  const bytes = hexToBytes(hex);
  if (negative) {
    for (let i = 0; i < bytes.length; i++) bytes[i] ^= 0xff;
  }
  return bytes;
}

/**
 * Decode INTEGER contents octets.
 * Returns undefined for empty or non-minimal encodings (a redundant leading
 * 0x00 or 0xff octet).
 */
export function decodeInteger(octets: Uint8Array): bigint | undefined {
  if (octets.length === 0) return undefined;
  if (octets.length > 1) {
    const redundantZero = octets[0] === 0x00 && (octets[1] & 0x80) === 0;
    const redundantOnes = octets[0] === 0xff && (octets[1] & 0x80) !== 0;
    if (redundantZero || redundantOnes) return undefined;
  }
  let result = BigInt('0x' + toHex(octets));
  if (octets[0] & 0x80) {
    result -= 1n << BigInt(octets.length * 8);
  }
  return result;
}

/**
 * Convert a dot-notation OID string to contents octets (X.690 §8.19).
 * First two arcs are encoded as (arc1 * 40 + arc2), remaining arcs as base-128 VLQ.
 */
export function encodeObjectIdentifier(oid: string): Uint8Array {
  const parts = oid.split('.').map(s => {
    if (!/^[0-9]+$/.test(s)) {
      throw new Error(`Invalid OID component: "${s}"`);
    }
    return BigInt(s);
  });

  if (parts.length < 2) {
    throw new Error(`OID must have at least 2 components, got: "${oid}"`);
  }

  const [first, second] = parts;
  if (first > 2n) {
    throw new Error(`OID first arc must be 0, 1, or 2, got: ${first}`);
  }
  if (first < 2n && second > 39n) {
    throw new Error(`OID second arc must be 0..39 when first arc is ${first}, got: ${second}`);
  }

  const buf = ByteBuffer.alloc(parts.length * 2);
  writeBase128(buf, first * 40n + second);
  for (let i = 2; i < parts.length; i++) {
    writeBase128(buf, parts[i]);
  }
  return buf.toUint8Array();
}

/** Longest arc decoded, in octets. 19 octets hold a 128-bit UUID arc. */
export const MAX_OID_ARC_OCTETS = 19;

/**
 * Convert OID contents octets back to a dot-notation string.
 * Returns undefined if the octets are empty, end mid-arc, contain an arc
 * with a redundant leading 0x80 octet, or contain an arc longer than
 * {@link MAX_OID_ARC_OCTETS}.
 */
export function decodeObjectIdentifier(octets: Uint8Array): string | undefined {
  if (octets.length === 0) return undefined;
  if (octets[octets.length - 1] & 0x80) return undefined;

  const values: bigint[] = [];
  let value = 0n;
  let arcOctets = 0;
  for (let i = 0; i < octets.length; i++) {
    const byte = octets[i];
    if (arcOctets === 0 && byte === 0x80) return undefined;
    if (++arcOctets > MAX_OID_ARC_OCTETS) return undefined;
    value = (value << 7n) | BigInt(byte & 0x7f);
    if ((byte & 0x80) === 0) {
      values.push(value);
      value = 0n;
      arcOctets = 0;
    }
  }

  const [combined, ...rest] = values;
  let arcs: bigint[];
  if (combined < 40n) {
    arcs = [0n, combined];
  } else if (combined < 80n) {
    arcs = [1n, combined - 40n];
  } else {
    arcs = [2n, combined - 80n];
  }
  return [...arcs, ...rest].join('.');
}

/** Format bytes as a lowercase hex string. */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/** Parse an even-length hex string (either case). Throws on anything else. */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new Error(`Hex string must have an even length, got ${hex.length}`);
  }
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error(`Invalid hex string: "${hex}"`);
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/** Convert unsigned integer to minimum-width big-endian byte array. */
function unsignedIntToBytes(value: number): Uint8Array {
  if (value === 0) return new Uint8Array([0]);
  const bytes: number[] = [];
  let v = value;
  while (v > 0) {
    bytes.unshift(v & 0xff);
    v = Math.floor(v / 256);
  }
  return new Uint8Array(bytes);
}

/** Append a non-negative integer as base-128 VLQ, high bit set on all but the last octet. */
function writeBase128(buf: ByteBuffer, value: bigint): void {
  let bits = value.toString(2);
  bits = bits.padStart(Math.ceil(bits.length / 7) * 7, '0');
  for (let i = 0; i < bits.length; i += 7) {
    const group = parseInt(bits.slice(i, i + 7), 2);
    buf.writeByte(i + 7 < bits.length ? group | 0x80 : group);
  }
}
