export { disassemble } from './Disassembler';
export type { DisassembleOptions } from './Disassembler';
export { readElement, readTag, isCanonicalHeader, isEndOfContents } from './BerReader';
export type { BerElement, DefiniteElement, IndefiniteElement } from './BerReader';
export { tagToString, bytesToString, quotedString, hexLiteral, isMostlyPrintable } from './format';
export { AsciiWriter } from './AsciiWriter';
