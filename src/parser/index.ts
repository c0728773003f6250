export { assemble } from './Assembler';
export type { AssembleOptions } from './Assembler';
export { Scanner, scan } from './Scanner';
export { parseTagExpression } from './TagParser';
export type {
  Position,
  Token,
  BytesToken,
  LeftCurlyToken,
  RightCurlyToken,
  EofToken,
  TagExpression,
  NamedTagExpression,
  NumberedTagExpression,
} from './types';
