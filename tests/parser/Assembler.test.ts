import { LexError, ParseError, StructuralError } from '../../src/errors';
import { toHex } from '../../src/helpers';
import { assemble } from '../../src/parser/Assembler';

function hex(source: string): string {
  return toHex(assemble(source));
}

function parseErrorOf(source: string, options?: { maxDepth?: number }): ParseError {
  try {
    assemble(source, options);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`expected a ParseError for ${source}`);
}

describe('assemble', () => {
  describe('basic output', () => {
    it('emits string bytes', () => {
      expect(hex('"hello"')).toBe('68656c6c6f');
    });

    it('emits nothing for empty input', () => {
      expect(assemble('')).toEqual(new Uint8Array([]));
      expect(assemble('# only a comment')).toEqual(new Uint8Array([]));
    });

    it('writes a length for each brace block', () => {
      expect(hex('INTEGER { 1 }')).toBe('020101');
      expect(hex('{}')).toBe('00');
      expect(hex('NULL {}')).toBe('0500');
    });

    it('assembles nested structures', () => {
      expect(hex('SEQUENCE { INTEGER { 1 } INTEGER { `00ff` } }')).toBe('3007020101020200ff');
    });

    it('concatenates top-level elements', () => {
      expect(hex('INTEGER { 1 } # one\nINTEGER { 2 }')).toBe('020101020102');
    });

    it('writes the length independently of any tag', () => {
      expect(hex('"ab" { "c" }')).toBe('61620163');
    });

    it('uses long-form lengths from 128 bytes', () => {
      const body = '00'.repeat(200);
      expect(hex(`OCTET_STRING { \`${body}\` }`)).toBe('0481c8' + body);
      const longer = '00'.repeat(300);
      expect(hex(`OCTET_STRING { \`${longer}\` }`)).toBe('0482012c' + longer);
    });

    it('passes indefinite-length markers through as written', () => {
      expect(hex('SEQUENCE `80` INTEGER { 1 } `0000`')).toBe('3080020101' + '0000');
    });

    it('encodes high tag numbers', () => {
      expect(hex('[APPLICATION 31 PRIMITIVE] { "x" }')).toBe('5f1f0178');
    });

    it('encodes the object identifier 1.2.840.113554.4.1.72585', () => {
      expect(hex('OBJECT_IDENTIFIER { 1.2.840.113554.4.1.72585 }')).toBe('060b2a864886f712040184b709');
    });

    it('is deterministic', () => {
      const source = 'SEQUENCE { [0] { INTEGER { -12345 } } UTF8String { "x\\n" } }';
      expect(hex(source)).toBe(hex(source));
    });
  });

  describe('brace errors', () => {
    it('rejects an unclosed brace at its position', () => {
      const err = parseErrorOf('INTEGER {\n  1\n');
      expect(err).toBeInstanceOf(StructuralError);
      expect(err.message).toBe("line 1, column 9: unmatched '{'");
    });

    it('reports the outermost unclosed brace', () => {
      const err = parseErrorOf('{ { }');
      expect(err).toBeInstanceOf(StructuralError);
      expect(err.position.offset).toBe(0);
    });

    it('rejects a stray closing brace at its position', () => {
      const err = parseErrorOf('INTEGER { 1 } }');
      expect(err).toBeInstanceOf(StructuralError);
      expect(err.reason).toBe("unmatched '}'");
      expect(err.position.column).toBe(15);
    });

    it('rejects a lone brace', () => {
      expect(parseErrorOf('{')).toBeInstanceOf(StructuralError);
      expect(parseErrorOf('}')).toBeInstanceOf(StructuralError);
    });
  });

  describe('lexical errors', () => {
    it('propagates them with line and column', () => {
      const err = parseErrorOf('SEQUENCE {\n  foo\n}');
      expect(err).toBeInstanceOf(LexError);
      expect(err.message).toBe("line 2, column 3: unrecognized symbol 'foo'");
    });

    it('rejects a type name with a tag number', () => {
      expect(parseErrorOf('[INTEGER 5] {}')).toBeInstanceOf(LexError);
    });
  });

  describe('maxDepth', () => {
    it('accepts nesting up to the limit', () => {
      expect(toHex(assemble('{{}}', { maxDepth: 2 }))).toBe('0100');
    });

    it('rejects deeper nesting at the offending brace', () => {
      const err = parseErrorOf('{{{}}}', { maxDepth: 2 });
      expect(err).toBeInstanceOf(StructuralError);
      expect(err.reason).toBe('braces nested deeper than 2');
      expect(err.position.offset).toBe(2);
    });

    it('allows 256 levels by default', () => {
      const source = '{'.repeat(256) + '}'.repeat(256);
      expect(() => assemble(source)).not.toThrow();
      expect(parseErrorOf('{'.repeat(257) + '}'.repeat(257))).toBeInstanceOf(StructuralError);
    });
  });
});
