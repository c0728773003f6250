import { AsciiWriter } from '../../src/disassembler/AsciiWriter';

describe('AsciiWriter', () => {
  it('is empty with no lines', () => {
    const out = new AsciiWriter();
    expect(out.toString()).toBe('');
  });

  it('indents per level and terminates every line', () => {
    const out = new AsciiWriter('\t');
    out.line(0, 'SEQUENCE {');
    out.line(1, 'NULL {}');
    out.line(0, '}');
    expect(out.toString()).toBe('SEQUENCE {\n\tNULL {}\n}\n');
  });
});
