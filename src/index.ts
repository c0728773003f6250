export { assemble, scan, Scanner, parseTagExpression } from './parser';
export type {
  AssembleOptions,
  Position,
  Token,
  BytesToken,
  LeftCurlyToken,
  RightCurlyToken,
  EofToken,
  TagExpression,
} from './parser';
export {
  disassemble,
  readElement,
  readTag,
  isCanonicalHeader,
  isEndOfContents,
  tagToString,
} from './disassembler';
export type { DisassembleOptions, BerElement, DefiniteElement, IndefiniteElement } from './disassembler';
export { ByteBuffer } from './ByteBuffer';
export {
  encodeTag,
  encodeLength,
  encodeInteger,
  decodeInteger,
  encodeObjectIdentifier,
  decodeObjectIdentifier,
  toHex,
  hexToBytes,
} from './helpers';
export { TAG_CLASSES, tagByName, tagToName, isTypeName } from './tags';
export type { Tag, TagClass } from './tags';
export { ParseError, LexError, StructuralError, BerError } from './errors';
