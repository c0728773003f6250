import { ByteBuffer } from '../ByteBuffer';
import { LexError } from '../errors';
import { encodeInteger, encodeObjectIdentifier, encodeTag, hexToBytes } from '../helpers';
import { tagByName } from '../tags';
import { parseTagExpression } from './TagParser';
import type { Position, Token } from './types';

const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const SPACE = 0x20;
const QUOTE = 0x22;
const HASH = 0x23;
const BACKSLASH = 0x5c;
const LEFT_BRACKET = 0x5b;
const RIGHT_BRACKET = 0x5d;
const BACKTICK = 0x60;
const LEFT_CURLY = 0x7b;
const RIGHT_CURLY = 0x7d;

const WHITESPACE = new Set([SPACE, TAB, LF, CR]);

/** Bytes that end a bare symbol. */
const SYMBOL_TERMINATORS = new Set([
  SPACE, TAB, LF, CR,
  LEFT_CURLY, RIGHT_CURLY, LEFT_BRACKET, RIGHT_BRACKET,
  BACKTICK, QUOTE, HASH,
]);

const INTEGER_PATTERN = /^-?[0-9]+$/;
const OID_PATTERN = /^[0-9]+(\.[0-9]+)+$/;

const textDecoder = new TextDecoder();

/**
 * Tokenizer for DER ASCII. Works on the UTF-8 bytes of the source so that
 * quoted strings copy bytes verbatim and columns count bytes.
 *
 * Every `bytes` token is resolved at scan time: escapes, hex, tags,
 * integers and OIDs are already encoded when the token is returned.
 */
export class Scanner {
  private readonly input: Uint8Array;
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.input = new TextEncoder().encode(source);
  }

  /** Current position as an immutable snapshot. */
  position(): Position {
    return Object.freeze({ offset: this.offset, line: this.line, column: this.column });
  }

  /**
   * Return the next token. Once the input is exhausted every call returns an
   * `eof` token.
   * @throws LexError on a malformed token
   */
  next(): Token {
    this.skipWhitespaceAndComments();
    const start = this.position();
    if (this.isEOF()) {
      return { kind: 'eof', position: start };
    }

    switch (this.peek()) {
      case LEFT_CURLY:
        this.advance();
        return { kind: 'leftCurly', position: start };
      case RIGHT_CURLY:
        this.advance();
        return { kind: 'rightCurly', position: start };
      case QUOTE:
        return this.scanQuotedString(start);
      case BACKTICK:
        return this.scanHexLiteral(start);
      case LEFT_BRACKET:
        return this.scanTagExpression(start);
      default:
        return this.scanSymbol(start);
    }
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isEOF()) {
      const c = this.peek();
      if (WHITESPACE.has(c)) {
        this.advance();
      } else if (c === HASH) {
        while (!this.isEOF() && this.peek() !== LF) {
          this.advance();
        }
      } else {
        return;
      }
    }
  }

  private scanQuotedString(start: Position): Token {
    this.advance();
    const out = ByteBuffer.alloc(32);
    for (;;) {
      if (this.isEOF()) {
        throw new LexError(start, 'unmatched "');
      }
      const c = this.peek();
      if (c === QUOTE) {
        this.advance();
        return { kind: 'bytes', value: out.toUint8Array(), position: start };
      }
      if (c === BACKSLASH) {
        out.writeByte(this.scanEscape());
      } else {
        out.writeByte(c);
        this.advance();
      }
    }
  }

  /** Consume one escape sequence starting at the backslash and return its byte. */
  private scanEscape(): number {
    const escapeStart = this.position();
    this.advance();
    if (this.isEOF()) {
      throw new LexError(escapeStart, 'expected escape character');
    }
    const c = this.peek();
    switch (c) {
      case 0x6e: // n
        this.advance();
        return LF;
      case QUOTE:
      case BACKSLASH:
        this.advance();
        return c;
      case 0x78: { // x
        this.advance();
        if (this.offset + 2 > this.input.length) {
          throw new LexError(escapeStart, 'unfinished escape sequence');
        }
        const digits = textDecoder.decode(this.input.subarray(this.offset, this.offset + 2));
        if (!/^[0-9a-fA-F]{2}$/.test(digits)) {
          throw new LexError(escapeStart, `invalid hex escape \\x${digits}`);
        }
        this.advance();
        this.advance();
        return parseInt(digits, 16);
      }
      default:
        throw new LexError(escapeStart, `unknown escape sequence \\${String.fromCharCode(c)}`);
    }
  }

  private scanHexLiteral(start: Position): Token {
    this.advance();
    const hex = this.consumeUpTo(BACKTICK);
    if (hex === undefined) {
      throw new LexError(start, 'unmatched `');
    }
    try {
      return { kind: 'bytes', value: hexToBytes(hex), position: start };
    } catch (e) {
      throw new LexError(start, e instanceof Error ? e.message : String(e));
    }
  }

  private scanTagExpression(start: Position): Token {
    this.advance();
    const expr = this.consumeUpTo(RIGHT_BRACKET);
    if (expr === undefined) {
      throw new LexError(start, 'unmatched [');
    }
    try {
      return { kind: 'bytes', value: encodeTag(parseTagExpression(expr)), position: start };
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new LexError(start, `invalid tag [${expr}]: ${reason}`);
    }
  }

  private scanSymbol(start: Position): Token {
    this.advance();
    while (!this.isEOF() && !SYMBOL_TERMINATORS.has(this.peek())) {
      this.advance();
    }
    const symbol = textDecoder.decode(this.input.subarray(start.offset, this.offset));

    const tag = tagByName(symbol);
    if (tag) {
      return { kind: 'bytes', value: encodeTag(tag), position: start };
    }

    if (INTEGER_PATTERN.test(symbol)) {
      return { kind: 'bytes', value: encodeInteger(BigInt(symbol)), position: start };
    }

    if (OID_PATTERN.test(symbol)) {
      try {
        return { kind: 'bytes', value: encodeObjectIdentifier(symbol), position: start };
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new LexError(start, `invalid OID ${symbol}: ${reason}`);
      }
    }

    throw new LexError(start, `unrecognized symbol '${symbol}'`);
  }

  /**
   * Consume bytes up to and including the next `terminator`, returning the
   * text before it, or undefined if the input ends first.
   */
  private consumeUpTo(terminator: number): string | undefined {
    const from = this.offset;
    while (!this.isEOF()) {
      if (this.peek() === terminator) {
        const text = textDecoder.decode(this.input.subarray(from, this.offset));
        this.advance();
        return text;
      }
      this.advance();
    }
    return undefined;
  }

  private isEOF(): boolean {
    return this.offset >= this.input.length;
  }

  private peek(): number {
    return this.input[this.offset];
  }

  private advance(): void {
    if (this.isEOF()) return;
    if (this.input[this.offset] === LF) {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    this.offset++;
  }
}

/**
 * Scan DER ASCII source lazily. Each iteration starts again from the
 * beginning and ends with a single `eof` token.
 *
 * @throws LexError during iteration on a malformed token
 */
export function scan(source: string): Iterable<Token> {
  return {
    *[Symbol.iterator](): Iterator<Token> {
      const scanner = new Scanner(source);
      for (;;) {
        const token = scanner.next();
        yield token;
        if (token.kind === 'eof') return;
      }
    },
  };
}
