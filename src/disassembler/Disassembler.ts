import { BerError } from '../errors';
import { decodeInteger, decodeObjectIdentifier } from '../helpers';
import {
  type Tag,
  TAG_BIT_STRING,
  TAG_INTEGER,
  TAG_OBJECT_IDENTIFIER,
  isUniversalPrimitive,
} from '../tags';
import { AsciiWriter } from './AsciiWriter';
import {
  type BerElement,
  type DefiniteElement,
  isCanonicalHeader,
  isEndOfContents,
  readElement,
} from './BerReader';
import { bytesToString, hexLiteral, tagToString } from './format';

export interface DisassembleOptions {
  /** Indentation per nesting level, spaces and tabs only (default: two spaces). */
  indent?: string;
  /**
   * Nesting depth at which content is rendered as raw bytes (default: 256).
   * Output never nests braces deeper than this, so it stays within the
   * assembler's limit of the same name.
   */
  maxDepth?: number;
  /** Minimum share of printable ASCII for rendering raw bytes as a string (default: 0.8). */
  printableThreshold?: number;
}

const DEFAULTS: Required<DisassembleOptions> = {
  indent: '  ',
  maxDepth: 256,
  printableThreshold: 0.8,
};

/** INTEGERs longer than this (int64 range) are shown as hex. */
const MAX_DECIMAL_INTEGER_OCTETS = 8;

interface SpanResult {
  /** Octets of the span consumed, including an end-of-contents marker. */
  consumed: number;
  foundEoc: boolean;
}

/**
 * Render arbitrary bytes as DER ASCII.
 *
 * Never throws on any input: whatever cannot be parsed as BER is written as
 * a string or hex literal, so `assemble(disassemble(bytes))` always
 * reproduces `bytes`. Throws only for an `indent` other than spaces and tabs.
 */
export function disassemble(bytes: Uint8Array, options?: DisassembleOptions): string {
  const opts: Required<DisassembleOptions> = { ...DEFAULTS, ...options };
  if (!/^[ \t]*$/.test(opts.indent)) {
    throw new Error(`indent must contain only spaces and tabs, got ${JSON.stringify(opts.indent)}`);
  }
  const disassembler = new Disassembler(opts);
  disassembler.renderElements(bytes, 0, false);
  return disassembler.toString();
}

class Disassembler {
  private readonly out: AsciiWriter;
  private readonly options: Required<DisassembleOptions>;

  constructor(options: Required<DisassembleOptions>) {
    this.options = options;
    this.out = new AsciiWriter(options.indent);
  }

  toString(): string {
    return this.out.toString();
  }

  /**
   * Render the elements that fill `span`. On the first malformed header the
   * rest of the span is written raw. With `stopAtEoc`, rendering stops
   * after an end-of-contents marker.
   */
  renderElements(span: Uint8Array, depth: number, stopAtEoc: boolean): SpanResult {
    if (depth >= this.options.maxDepth) {
      this.renderRaw(span, depth);
      return { consumed: span.length, foundEoc: false };
    }

    let offset = 0;
    while (offset < span.length) {
      let element: BerElement;
      try {
        element = readElement(span, offset);
      } catch (e) {
        if (!(e instanceof BerError)) throw e;
        this.renderRaw(span.subarray(offset), depth);
        return { consumed: span.length, foundEoc: false };
      }

      if (stopAtEoc && isEndOfContents(element)) {
        return { consumed: element.contentOffset, foundEoc: true };
      }
      offset = this.renderElement(span, element, depth);
    }
    return { consumed: offset, foundEoc: false };
  }

  /** Render one element and return the offset in `span` just past it. */
  private renderElement(span: Uint8Array, element: BerElement, depth: number): number {
    if (element.lengthForm === 'indefinite') {
      const head = isCanonicalHeader(element)
        ? `${tagToString(element.tag)} \`80\``
        : hexLiteral(element.header);
      this.out.line(depth, head);
      const contents = span.subarray(element.contentOffset);
      const { consumed, foundEoc } = this.renderElements(contents, depth + 1, true);
      if (foundEoc) this.out.line(depth, '`0000`');
      return element.contentOffset + consumed;
    }

    const end = element.contentOffset + element.length;
    if (!isCanonicalHeader(element)) {
      this.renderVerbatimHeader(element, depth);
      return end;
    }

    const { body } = element;
    const tagText = tagToString(element.tag);
    if (body.length === 0) {
      this.out.line(depth, `${tagText} {}`);
    } else if (element.tag.constructed) {
      this.renderNested(tagText, body, depth);
    } else {
      this.renderPrimitive(tagText, element.tag, body, depth);
    }
    return end;
  }

  /**
   * A non-minimal tag or length cannot be written as a tag token and braces,
   * so the header goes out as hex and the contents follow unbraced.
   */
  private renderVerbatimHeader(element: DefiniteElement, depth: number): void {
    const header = hexLiteral(element.header);
    const { body } = element;
    if (body.length === 0) {
      this.out.line(depth, header);
    } else if (element.tag.constructed) {
      this.out.line(depth, header);
      this.renderElements(body, depth + 1, false);
    } else {
      this.out.line(depth, `${header} ${bytesToString(body, this.options.printableThreshold)}`);
    }
  }

  private renderPrimitive(tagText: string, tag: Tag, body: Uint8Array, depth: number): void {
    if (isUniversalPrimitive(tag, TAG_INTEGER)) {
      const value = body.length <= MAX_DECIMAL_INTEGER_OCTETS ? decodeInteger(body) : undefined;
      const text = value !== undefined ? value.toString() : hexLiteral(body);
      this.out.line(depth, `${tagText} { ${text} }`);
      return;
    }

    if (isUniversalPrimitive(tag, TAG_OBJECT_IDENTIFIER)) {
      const oid = decodeObjectIdentifier(body);
      this.out.line(depth, `${tagText} { ${oid ?? hexLiteral(body)} }`);
      return;
    }

    if (isUniversalPrimitive(tag, TAG_BIT_STRING) && body[0] === 0x00) {
      const bits = body.subarray(1);
      if (this.isMadeOfElements(bits, depth + 1)) {
        this.out.line(depth, `${tagText} {`);
        this.out.line(depth + 1, '`00`');
        this.renderElements(bits, depth + 1, false);
        this.out.line(depth, '}');
        return;
      }
    }

    if (this.isMadeOfElements(body, depth + 1)) {
      this.renderNested(tagText, body, depth);
      return;
    }

    this.out.line(depth, `${tagText} { ${bytesToString(body, this.options.printableThreshold)} }`);
  }

  private renderNested(tagText: string, body: Uint8Array, depth: number): void {
    this.out.line(depth, `${tagText} {`);
    this.renderElements(body, depth + 1, false);
    this.out.line(depth, '}');
  }

  private renderRaw(bytes: Uint8Array, depth: number): void {
    if (bytes.length === 0) return;
    this.out.line(depth, bytesToString(bytes, this.options.printableThreshold));
  }

  /**
   * Whether `span` is a non-empty run of DER-looking elements (minimal
   * headers, definite lengths) that consumes it exactly. Used to spot
   * encodings nested inside primitive contents.
   */
  private isMadeOfElements(span: Uint8Array, depth: number): boolean {
    if (span.length === 0 || depth >= this.options.maxDepth) return false;
    let offset = 0;
    while (offset < span.length) {
      let element: BerElement;
      try {
        element = readElement(span, offset);
      } catch (e) {
        if (!(e instanceof BerError)) throw e;
        return false;
      }
      if (element.lengthForm !== 'definite' || !isCanonicalHeader(element)) return false;
      offset = element.contentOffset + element.length;
    }
    return true;
  }
}
