import { ByteBuffer } from '../ByteBuffer';
import { StructuralError } from '../errors';
import { encodeLength } from '../helpers';
import { Scanner } from './Scanner';
import type { LeftCurlyToken } from './types';

export interface AssembleOptions {
  /** Maximum brace nesting depth (default: 256). */
  maxDepth?: number;
}

const DEFAULTS: Required<AssembleOptions> = {
  maxDepth: 256,
};

/**
 * Compile DER ASCII source text to bytes.
 *
 * Byte tokens are emitted in order. Each `{ … }` block is assembled first,
 * then written as its minimal DER length followed by its contents,
 * independently of any tag written before it.
 *
 * @param source - DER ASCII text
 * @returns The assembled bytes
 * @throws LexError on a malformed token
 * @throws StructuralError on unbalanced braces or excessive nesting
 */
export function assemble(source: string, options?: AssembleOptions): Uint8Array {
  const opts: Required<AssembleOptions> = { ...DEFAULTS, ...options };
  return assembleBlock(new Scanner(source), undefined, 0, opts.maxDepth);
}

/** Assemble tokens until the `}` matching `leftCurly`, or EOF at top level. */
function assembleBlock(
  scanner: Scanner,
  leftCurly: LeftCurlyToken | undefined,
  depth: number,
  maxDepth: number,
): Uint8Array {
  const out = ByteBuffer.alloc();
  for (;;) {
    const token = scanner.next();
    switch (token.kind) {
      case 'bytes':
        out.writeBytes(token.value);
        break;
      case 'leftCurly': {
        if (depth >= maxDepth) {
          throw new StructuralError(token.position, `braces nested deeper than ${maxDepth}`);
        }
        const child = assembleBlock(scanner, token, depth + 1, maxDepth);
        out.writeBytes(encodeLength(child.length));
        out.writeBytes(child);
        break;
      }
      case 'rightCurly':
        if (leftCurly) return out.toUint8Array();
        throw new StructuralError(token.position, "unmatched '}'");
      case 'eof':
        if (!leftCurly) return out.toUint8Array();
        throw new StructuralError(leftCurly.position, "unmatched '{'");
    }
  }
}
