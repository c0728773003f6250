/**
 * Line-oriented text accumulator for disassembler output.
 * Each line is prefixed with `indent` repeated once per nesting level.
 */
export class AsciiWriter {
  private readonly lines: string[] = [];
  private readonly indent: string;

  constructor(indent = '  ') {
    this.indent = indent;
  }

  /** Append one line at the given nesting level. */
  line(level: number, text: string): void {
    this.lines.push(this.indent.repeat(level) + text);
  }

  /** Joined output; every line, including the last, ends in a newline. */
  toString(): string {
    return this.lines.map(l => l + '\n').join('');
  }
}
