import { parseTagExpression } from '../../src/parser/TagParser';

describe('parseTagExpression', () => {
  describe('type names', () => {
    it('uses the type\'s default tag', () => {
      expect(parseTagExpression('SEQUENCE')).toEqual({ tagClass: 'UNIVERSAL', number: 16, constructed: true });
      expect(parseTagExpression('INTEGER')).toEqual({ tagClass: 'UNIVERSAL', number: 2, constructed: false });
    });

    it('overrides constructedness', () => {
      expect(parseTagExpression('INTEGER CONSTRUCTED'))
        .toEqual({ tagClass: 'UNIVERSAL', number: 2, constructed: true });
      expect(parseTagExpression('SEQUENCE PRIMITIVE'))
        .toEqual({ tagClass: 'UNIVERSAL', number: 16, constructed: false });
    });

    it('rejects a type name combined with a tag number', () => {
      expect(() => parseTagExpression('INTEGER 5')).toThrow('cannot be combined');
    });
  });

  describe('numbered tags', () => {
    it('defaults to context-specific and constructed', () => {
      expect(parseTagExpression('0')).toEqual({ tagClass: 'CONTEXT_SPECIFIC', number: 0, constructed: true });
    });

    it('accepts an explicit class', () => {
      expect(parseTagExpression('APPLICATION 5'))
        .toEqual({ tagClass: 'APPLICATION', number: 5, constructed: true });
      expect(parseTagExpression('PRIVATE 201 PRIMITIVE'))
        .toEqual({ tagClass: 'PRIVATE', number: 201, constructed: false });
      expect(parseTagExpression('UNIVERSAL 0 PRIMITIVE'))
        .toEqual({ tagClass: 'UNIVERSAL', number: 0, constructed: false });
    });

    it('accepts an explicit constructedness without a class', () => {
      expect(parseTagExpression('3 PRIMITIVE'))
        .toEqual({ tagClass: 'CONTEXT_SPECIFIC', number: 3, constructed: false });
      expect(parseTagExpression('3 CONSTRUCTED'))
        .toEqual({ tagClass: 'CONTEXT_SPECIFIC', number: 3, constructed: true });
    });

    it('accepts large tag numbers', () => {
      expect(parseTagExpression('4294967296').number).toBe(4294967296);
    });

    it('rejects numbers beyond the safe integer range', () => {
      expect(() => parseTagExpression('99999999999999999999')).toThrow('is too large');
    });
  });

  it('tolerates surrounding spaces and tabs', () => {
    expect(parseTagExpression(' \tAPPLICATION  7\t')).toEqual({ tagClass: 'APPLICATION', number: 7, constructed: true });
  });

  it('rejects malformed expressions', () => {
    expect(() => parseTagExpression('')).toThrow();
    expect(() => parseTagExpression('FOO')).toThrow();
    expect(() => parseTagExpression('APPLICATION')).toThrow();
    expect(() => parseTagExpression('APPLICATION5')).toThrow();
    expect(() => parseTagExpression('5 PRIMITIVE CONSTRUCTED')).toThrow();
    expect(() => parseTagExpression('-1')).toThrow();
  });
});
