import { toHex } from '../helpers';
import { type Tag, tagToName } from '../tags';

/**
 * Render a tag as DER ASCII: a bare type name when possible, otherwise a
 * bracketed tag expression that encodes back to the same identifier.
 */
export function tagToString(tag: Tag): string {
  const named = tagToName(tag);
  if (named) {
    if (!named.toggleConstructed) return named.name;
    return `[${named.name} ${tag.constructed ? 'CONSTRUCTED' : 'PRIMITIVE'}]`;
  }

  let out = '[';
  switch (tag.tagClass) {
    case 'APPLICATION':
      out += 'APPLICATION ';
      break;
    case 'PRIVATE':
      out += 'PRIVATE ';
      break;
    case 'UNIVERSAL':
      out += 'UNIVERSAL ';
      break;
    case 'CONTEXT_SPECIFIC':
      break;
  }
  out += String(tag.number);
  if (!tag.constructed) out += ' PRIMITIVE';
  return out + ']';
}

export function hexLiteral(bytes: Uint8Array): string {
  return '`' + toHex(bytes) + '`';
}

function isPrintable(byte: number): boolean {
  return byte >= 0x20 && byte <= 0x7e;
}

/** Whether the share of printable ASCII bytes reaches `threshold`. */
export function isMostlyPrintable(bytes: Uint8Array, threshold: number): boolean {
  if (bytes.length === 0) return false;
  let printable = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (isPrintable(bytes[i])) printable++;
  }
  return printable / bytes.length >= threshold;
}

/** Quote bytes as a DER ASCII string literal, escaping everything that is not printable ASCII. */
export function quotedString(bytes: Uint8Array): string {
  let out = '"';
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i];
    if (b === 0x22) {
      out += '\\"';
    } else if (b === 0x5c) {
      out += '\\\\';
    } else if (b === 0x0a) {
      out += '\\n';
    } else if (isPrintable(b)) {
      out += String.fromCharCode(b);
    } else {
      out += '\\x' + b.toString(16).padStart(2, '0');
    }
  }
  return out + '"';
}

/** Render bytes with no further structure: a string if mostly printable, else hex. */
export function bytesToString(bytes: Uint8Array, printableThreshold: number): string {
  return isMostlyPrintable(bytes, printableThreshold) ? quotedString(bytes) : hexLiteral(bytes);
}
