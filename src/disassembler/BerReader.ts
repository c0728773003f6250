import { BerError } from '../errors';
import { encodeLength, encodeTag } from '../helpers';
import { type Tag, TAG_CLASSES } from '../tags';

interface ElementHeader {
  tag: Tag;
  /** Offset of the first identifier octet within the span. */
  offset: number;
  /** Raw identifier and length octets as read. */
  header: Uint8Array;
  /** Offset of the first contents octet within the span. */
  contentOffset: number;
}

export interface DefiniteElement extends ElementHeader {
  lengthForm: 'definite';
  length: number;
  /** Contents octets. */
  body: Uint8Array;
}

/** Contents run until an end-of-contents marker; their extent is not resolved here. */
export interface IndefiniteElement extends ElementHeader {
  lengthForm: 'indefinite';
}

/**
 * One BER element read from a byte span. `header` and `body` are views into
 * the caller's bytes; nothing is copied.
 */
export type BerElement = DefiniteElement | IndefiniteElement;

/**
 * Read identifier octets at `offset` (X.690 §8.1.2). High-tag-number form
 * of any length is accepted, including non-minimal encodings.
 * @throws BerError on truncated input or a number beyond 2^53 - 1
 */
export function readTag(bytes: Uint8Array, offset: number): { tag: Tag; nextOffset: number } {
  if (offset >= bytes.length) {
    throw new BerError(offset, 'unexpected end of input reading tag');
  }
  let pos = offset;
  const first = bytes[pos++];
  const tagClass = TAG_CLASSES[first >> 6];
  const constructed = (first & 0x20) !== 0;
  let number = first & 0x1f;

  if (number === 0x1f) {
    number = 0;
    let byte: number;
    do {
      if (pos >= bytes.length) {
        throw new BerError(offset, 'truncated high tag number');
      }
      byte = bytes[pos++];
      number = number * 128 + (byte & 0x7f);
      if (number > Number.MAX_SAFE_INTEGER) {
        throw new BerError(offset, 'tag number too large');
      }
    } while (byte & 0x80);
  }

  return { tag: { tagClass, number, constructed }, nextOffset: pos };
}

/**
 * Read one element header at `offset` and locate its contents.
 *   0x80:        indefinite length (constructed elements only)
 *   0x00..0x7f:  the length itself
 *   0x81..0xfe:  count of big-endian length octets that follow
 * @throws BerError on malformed or truncated headers, or a length running
 *         past the end of `bytes`
 */
export function readElement(bytes: Uint8Array, offset: number): BerElement {
  const { tag, nextOffset } = readTag(bytes, offset);
  let pos = nextOffset;

  if (pos >= bytes.length) {
    throw new BerError(offset, 'unexpected end of input reading length');
  }
  const lengthByte = bytes[pos++];

  if (lengthByte === 0x80) {
    if (!tag.constructed) {
      throw new BerError(offset, 'indefinite length on primitive element');
    }
    return {
      tag,
      lengthForm: 'indefinite',
      offset,
      header: bytes.subarray(offset, pos),
      contentOffset: pos,
    };
  }

  let length: number;
  if (lengthByte & 0x80) {
    if (lengthByte === 0xff) {
      throw new BerError(offset, 'reserved length octet 0xff');
    }
    const count = lengthByte & 0x7f;
    if (pos + count > bytes.length) {
      throw new BerError(offset, 'truncated length');
    }
    length = 0;
    for (let i = 0; i < count; i++) {
      length = length * 256 + bytes[pos++];
    }
  } else {
    length = lengthByte;
  }

  if (length > bytes.length - pos) {
    throw new BerError(offset, `length ${length} exceeds remaining ${bytes.length - pos} bytes`);
  }

  return {
    tag,
    lengthForm: 'definite',
    length,
    offset,
    header: bytes.subarray(offset, pos),
    contentOffset: pos,
    body: bytes.subarray(pos, pos + length),
  };
}

/** The end-of-contents marker is exactly the two octets `00 00`. */
export function isEndOfContents(element: BerElement): boolean {
  return element.header.length === 2 && element.header[0] === 0x00 && element.header[1] === 0x00;
}

/** Whether re-encoding the tag and length in minimal form reproduces the header octets. */
export function isCanonicalHeader(element: BerElement): boolean {
  const tag = encodeTag(element.tag);
  const length = element.lengthForm === 'definite'
    ? encodeLength(element.length)
    : new Uint8Array([0x80]);
  if (tag.length + length.length !== element.header.length) return false;
  for (let i = 0; i < tag.length; i++) {
    if (element.header[i] !== tag[i]) return false;
  }
  for (let i = 0; i < length.length; i++) {
    if (element.header[tag.length + i] !== length[i]) return false;
  }
  return true;
}
