/**
 * Grammar-aware random DER ASCII generator.
 *
 * Produces well-formed DER ASCII text by choosing randomly among the token
 * kinds at each step, so that every generated document assembles.
 */

/** PRNG with seedable state for reproducible fuzzing. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift never leaves the all-zero state
    this.state = (seed >>> 0) || 0x9e3779b9;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    // xorshift32
    this.state ^= this.state << 13;
    this.state ^= this.state >>> 17;
    this.state ^= this.state << 5;
    return (this.state >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }

  /** Returns `length` random bytes. */
  bytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (let i = 0; i < length; i++) out[i] = this.int(0, 255);
    return out;
  }
}

export interface GeneratorOptions {
  /** Maximum brace nesting depth (default: 5). */
  maxDepth?: number;
  /** Maximum elements per constructed body (default: 5). */
  maxChildren?: number;
  /** Probability of an indefinite-length constructed element (default: 0.1). */
  indefiniteProbability?: number;
  /** Probability of a bracketed tag expression instead of a type name (default: 0.25). */
  tagExpressionProbability?: number;
  /** Probability of a comment line before an element (default: 0.1). */
  commentProbability?: number;
}

const DEFAULTS: Required<GeneratorOptions> = {
  maxDepth: 5,
  maxChildren: 5,
  indefiniteProbability: 0.1,
  tagExpressionProbability: 0.25,
  commentProbability: 0.1,
};

const CONSTRUCTED_NAMES = ['SEQUENCE', 'SET'] as const;
const STRING_NAMES = ['UTF8String', 'PrintableString', 'IA5String', 'OCTET_STRING', 'UTCTime'] as const;
const TAG_CLASS_KEYWORDS = ['', 'APPLICATION ', 'PRIVATE ', 'UNIVERSAL '] as const;
const WORDS = ['alpha', 'beta', 'Test CA', 'example.com', '20250101000000Z', 'a"quote', 'back\\slash', 'tab\there'];
const OID_ROOTS = ['1.2.840.113549', '2.5.4', '2.5.29', '1.3.6.1.4.1', '2.16.840.1.101.3.4'] as const;

export class DerAsciiGenerator {
  private rng: Rng;
  private opts: Required<GeneratorOptions>;

  constructor(seed: number, options?: GeneratorOptions) {
    this.rng = new Rng(seed);
    this.opts = { ...DEFAULTS, ...options };
  }

  /** Generate a complete DER ASCII document. */
  generateDocument(): string {
    const count = this.rng.int(1, 3);
    const lines: string[] = [];
    for (let i = 0; i < count; i++) {
      lines.push(...this.generateElement(0));
    }
    return lines.join('\n') + '\n';
  }

  /** Generate one element as indented lines. */
  private generateElement(depth: number): string[] {
    const pad = '  '.repeat(depth);
    const out: string[] = [];
    if (this.rng.chance(this.opts.commentProbability)) {
      out.push(`${pad}# element ${this.rng.int(0, 999)}`);
    }

    if (depth < this.opts.maxDepth && this.rng.chance(0.4)) {
      const tag = this.constructedTag();
      const children = this.rng.int(0, this.opts.maxChildren);
      if (this.rng.chance(this.opts.indefiniteProbability)) {
        out.push(`${pad}${tag} \`80\``);
        for (let i = 0; i < children; i++) out.push(...this.generateElement(depth + 1));
        out.push(`${pad}\`0000\``);
        return out;
      }
      if (children === 0) {
        out.push(`${pad}${tag} {}`);
        return out;
      }
      out.push(`${pad}${tag} {`);
      for (let i = 0; i < children; i++) out.push(...this.generateElement(depth + 1));
      out.push(`${pad}}`);
      return out;
    }

    out.push(`${pad}${this.generatePrimitive()}`);
    return out;
  }

  private generatePrimitive(): string {
    switch (this.rng.int(0, 6)) {
      case 0:
        return `INTEGER { ${this.integerText()} }`;
      case 1:
        return `OBJECT_IDENTIFIER { ${this.oidText()} }`;
      case 2:
        return `${this.rng.pick(STRING_NAMES)} { ${this.quoted(this.rng.pick(WORDS))} }`;
      case 3:
        return `BOOLEAN { \`${this.rng.pick(['00', 'ff'])}\` }`;
      case 4:
        return 'NULL {}';
      case 5:
        return `BIT_STRING { \`00${this.hex(this.rng.int(0, 8))}\` }`;
      default:
        return `${this.primitiveTag()} { \`${this.hex(this.rng.int(0, 16))}\` }`;
    }
  }

  private constructedTag(): string {
    if (!this.rng.chance(this.opts.tagExpressionProbability)) {
      return this.rng.pick(CONSTRUCTED_NAMES);
    }
    return `[${this.rng.pick(TAG_CLASS_KEYWORDS)}${this.tagNumber()}]`;
  }

  private primitiveTag(): string {
    if (this.rng.chance(0.5)) return 'OCTET_STRING';
    return `[${this.rng.pick(TAG_CLASS_KEYWORDS)}${this.tagNumber()} PRIMITIVE]`;
  }

  private tagNumber(): number {
    return this.rng.chance(0.8) ? this.rng.int(0, 30) : this.rng.int(31, 100000);
  }

  private integerText(): string {
    const magnitude = this.rng.pick([1, 127, 128, 255, 256, 65535, 2 ** 31, 2 ** 53]);
    const value = BigInt(this.rng.int(0, magnitude));
    return String(this.rng.chance(0.3) ? -value : value);
  }

  private oidText(): string {
    const arcs = this.rng.int(0, 4);
    let oid: string = this.rng.pick(OID_ROOTS);
    for (let i = 0; i < arcs; i++) {
      oid += '.' + this.rng.int(0, this.rng.chance(0.8) ? 127 : 1000000);
    }
    return oid;
  }

  private quoted(text: string): string {
    let out = '"';
    for (const ch of text) {
      if (ch === '"' || ch === '\\') out += '\\' + ch;
      else if (ch === '\t') out += '\\x09';
      else out += ch;
    }
    return out + '"';
  }

  private hex(length: number): string {
    return Array.from(this.rng.bytes(length), b => b.toString(16).padStart(2, '0')).join('');
  }
}

/**
 * Generate a random DER ASCII document.
 * @param seed - RNG seed for reproducibility
 * @param options - Generator options
 */
export function generateDerAscii(seed: number, options?: GeneratorOptions): string {
  const gen = new DerAsciiGenerator(seed, options);
  return gen.generateDocument();
}
