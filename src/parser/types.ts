/**
 * Token and AST types for DER ASCII source text.
 */

import type { TagClass } from '../tags';

/** A location in the source. Columns count bytes of the UTF-8 encoded text. */
export interface Position {
  /** Byte offset, starting at 0. */
  readonly offset: number;
  /** Line number, starting at 1. */
  readonly line: number;
  /** Column number, starting at 1. */
  readonly column: number;
}

/** Discriminated union of all DER ASCII tokens. */
export type Token =
  | BytesToken
  | LeftCurlyToken
  | RightCurlyToken
  | EofToken;

/** Any token that produces output. The value is already fully encoded. */
export interface BytesToken {
  kind: 'bytes';
  value: Uint8Array;
  position: Position;
}

export interface LeftCurlyToken {
  kind: 'leftCurly';
  position: Position;
}

export interface RightCurlyToken {
  kind: 'rightCurly';
  position: Position;
}

export interface EofToken {
  kind: 'eof';
  position: Position;
}

/** Parsed contents of a `[ … ]` tag expression. */
export type TagExpression = NamedTagExpression | NumberedTagExpression;

/** `[TYPE_NAME CONSTRUCTEDNESS?]` */
export interface NamedTagExpression {
  kind: 'named';
  name: string;
  /** Explicit PRIMITIVE/CONSTRUCTED override, or null for the type's default. */
  constructed: boolean | null;
}

/** `[CLASS? NUMBER CONSTRUCTEDNESS?]` */
export interface NumberedTagExpression {
  kind: 'numbered';
  tagClass: TagClass;
  number: number;
  constructed: boolean | null;
}
