import { LexError, ParseError } from '../../src/errors';
import { Scanner, scan } from '../../src/parser/Scanner';
import type { Token } from '../../src/parser/types';

function tokens(source: string): Token[] {
  return Array.from(scan(source));
}

function bytesOf(source: string): number[][] {
  const out: number[][] = [];
  for (const token of scan(source)) {
    if (token.kind === 'bytes') out.push(Array.from(token.value));
  }
  return out;
}

function lexErrorOf(source: string): LexError {
  try {
    tokens(source);
  } catch (e) {
    if (e instanceof LexError) return e;
    throw e;
  }
  throw new Error(`expected a LexError for ${source}`);
}

describe('Scanner', () => {
  describe('token stream', () => {
    it('produces kinds and positions', () => {
      const result = tokens('SEQUENCE { INTEGER { 1 } }');
      expect(result.map(t => t.kind)).toEqual([
        'bytes', 'leftCurly', 'bytes', 'leftCurly', 'bytes', 'rightCurly', 'rightCurly', 'eof',
      ]);
      expect(result.map(t => t.position.column)).toEqual([1, 10, 12, 20, 22, 24, 26, 27]);
      expect(result[7].position.offset).toBe(26);
    });

    it('ends with exactly one eof token', () => {
      const result = tokens('1 2');
      expect(result.filter(t => t.kind === 'eof')).toHaveLength(1);
      expect(result[result.length - 1].kind).toBe('eof');
    });

    it('yields only eof for empty or comment-only input', () => {
      expect(tokens('').map(t => t.kind)).toEqual(['eof']);
      expect(tokens('  # nothing here\n\t').map(t => t.kind)).toEqual(['eof']);
    });

    it('restarts from the beginning on each iteration', () => {
      const stream = scan('INTEGER { 5 }');
      const first = Array.from(stream).map(t => t.kind);
      const second = Array.from(stream).map(t => t.kind);
      expect(second).toEqual(first);
    });

    it('is lazy', () => {
      const iterator = scan('INTEGER ]')[Symbol.iterator]();
      const first = iterator.next();
      expect(first.done).toBe(false);
      expect(() => iterator.next()).toThrow(LexError);
    });

    it('keeps returning eof from next() once exhausted', () => {
      const scanner = new Scanner('1');
      expect(scanner.next().kind).toBe('bytes');
      expect(scanner.next().kind).toBe('eof');
      expect(scanner.next().kind).toBe('eof');
    });

    it('tracks lines across comments and newlines', () => {
      const result = tokens('# comment\nINTEGER\n  `00ff`');
      expect(result[0].position).toEqual({ offset: 10, line: 2, column: 1 });
      expect(result[1].position).toEqual({ offset: 20, line: 3, column: 3 });
    });

    it('splits symbols at braces', () => {
      expect(tokens('INTEGER{1}').map(t => t.kind)).toEqual(['bytes', 'leftCurly', 'bytes', 'rightCurly', 'eof']);
    });
  });

  describe('quoted strings', () => {
    it('copies UTF-8 bytes verbatim', () => {
      expect(bytesOf('"hi"')).toEqual([[0x68, 0x69]]);
      expect(bytesOf('"é"')).toEqual([[0xc3, 0xa9]]);
      expect(bytesOf('""')).toEqual([[]]);
    });

    it('decodes escapes', () => {
      expect(bytesOf(String.raw`"a\\\"b\n\x41"`)).toEqual([[0x61, 0x5c, 0x22, 0x62, 0x0a, 0x41]]);
      expect(bytesOf(String.raw`"\xfF"`)).toEqual([[0xff]]);
    });

    it('reports an unterminated string at its opening quote', () => {
      const err = lexErrorOf('INTEGER "abc');
      expect(err.reason).toBe('unmatched "');
      expect(err.position.column).toBe(9);
    });

    it('reports bad escapes at the backslash', () => {
      const unknown = lexErrorOf(String.raw`"a\q"`);
      expect(unknown.reason).toBe(String.raw`unknown escape sequence \q`);
      expect(unknown.position).toEqual({ offset: 2, line: 1, column: 3 });

      const badHex = lexErrorOf(String.raw`"\x4"`);
      expect(badHex.reason).toBe(String.raw`invalid hex escape \x4"`);
      expect(badHex.position.column).toBe(2);

      const unfinished = lexErrorOf(String.raw`"\x4`);
      expect(unfinished.reason).toBe('unfinished escape sequence');
      expect(unfinished.position.column).toBe(2);

      expect(lexErrorOf('"\\').reason).toBe('expected escape character');
    });
  });

  describe('hex literals', () => {
    it('decodes either case', () => {
      expect(bytesOf('`0aFf`')).toEqual([[0x0a, 0xff]]);
      expect(bytesOf('``')).toEqual([[]]);
    });

    it('rejects an odd number of digits', () => {
      const err = lexErrorOf('`abc`');
      expect(err.position.offset).toBe(0);
      expect(err.reason).toContain('even length');
    });

    it('rejects non-hex characters', () => {
      expect(lexErrorOf('`zz`').reason).toContain('Invalid hex');
    });

    it('rejects an unterminated literal', () => {
      expect(lexErrorOf('`00').reason).toBe('unmatched `');
    });
  });

  describe('tag expressions', () => {
    it('encodes the tag', () => {
      expect(bytesOf('[APPLICATION 1]')).toEqual([[0x61]]);
      expect(bytesOf('[0]')).toEqual([[0xa0]]);
      expect(bytesOf('[INTEGER CONSTRUCTED]')).toEqual([[0x22]]);
      expect(bytesOf('[31 PRIMITIVE]')).toEqual([[0x9f, 0x1f]]);
    });

    it('rejects an unterminated expression', () => {
      expect(lexErrorOf('[5').reason).toBe('unmatched [');
    });

    it('rejects an invalid expression', () => {
      const err = lexErrorOf('  [INTEGER 5]');
      expect(err.reason).toMatch(/^invalid tag \[INTEGER 5\]: /);
      expect(err.position.column).toBe(3);
      expect(lexErrorOf('[FOO]').reason).toMatch(/^invalid tag \[FOO\]: /);
    });
  });

  describe('symbols', () => {
    it('encodes type names as tags', () => {
      expect(bytesOf('SEQUENCE OCTET_STRING')).toEqual([[0x30], [0x04]]);
    });

    it('encodes integers in minimal two\'s complement', () => {
      expect(bytesOf('0 -1 256')).toEqual([[0x00], [0xff], [0x01, 0x00]]);
    });

    it('encodes integers beyond 64 bits', () => {
      // 10^20 = 0x56bc75e2d63100000
      expect(bytesOf('100000000000000000000')).toEqual([[0x05, 0x6b, 0xc7, 0x5e, 0x2d, 0x63, 0x10, 0x00, 0x00]]);
    });

    it('encodes object identifiers', () => {
      expect(bytesOf('1.2.840')).toEqual([[0x2a, 0x86, 0x48]]);
    });

    it('rejects an invalid OID', () => {
      expect(lexErrorOf('3.1').reason).toMatch(/^invalid OID 3\.1: /);
    });

    it('rejects unknown symbols', () => {
      const err = lexErrorOf('foo');
      expect(err.reason).toBe("unrecognized symbol 'foo'");
      expect(err.message).toBe("line 1, column 1: unrecognized symbol 'foo'");
      expect(lexErrorOf('1.2.').reason).toBe("unrecognized symbol '1.2.'");
      expect(lexErrorOf('}]').reason).toBe("unrecognized symbol ']'");
    });
  });

  it('raises LexError as a ParseError', () => {
    expect(lexErrorOf('?')).toBeInstanceOf(ParseError);
    expect(lexErrorOf('?').name).toBe('LexError');
  });
});
