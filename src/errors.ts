import type { Position } from './parser/types';

/**
 * Error raised while assembling DER ASCII. Carries the source position of
 * the offending token; the whole input is rejected.
 */
export class ParseError extends Error {
  readonly position: Position;
  readonly reason: string;

  constructor(position: Position, reason: string) {
    super(`line ${position.line}, column ${position.column}: ${reason}`);
    this.name = 'ParseError';
    this.position = position;
    this.reason = reason;
  }
}

/** A malformed token: bad string, hex literal, tag expression, or symbol. */
export class LexError extends ParseError {
  constructor(position: Position, reason: string) {
    super(position, reason);
    this.name = 'LexError';
  }
}

/** Unbalanced braces or nesting beyond the configured depth. */
export class StructuralError extends ParseError {
  constructor(position: Position, reason: string) {
    super(position, reason);
    this.name = 'StructuralError';
  }
}

/** Malformed BER header at `offset` of the span being read. */
export class BerError extends Error {
  readonly offset: number;

  constructor(offset: number, message: string) {
    super(`BER: ${message} at offset ${offset}`);
    this.name = 'BerError';
    this.offset = offset;
  }
}
