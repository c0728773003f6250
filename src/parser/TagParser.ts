import peggy from 'peggy';
import { TAG_GRAMMAR } from './grammar';
import type { TagExpression } from './types';
import { type Tag, isTypeName, tagByName } from '../tags';

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(TAG_GRAMMAR);
  }
  return cachedParser;
}

/**
 * Parse the contents of a tag expression (without the brackets).
 *
 * @param input - e.g. `"SEQUENCE"`, `"APPLICATION 5 PRIMITIVE"`, `"0"`
 * @returns The resolved tag. Context-specific class and the constructed bit
 *          are the defaults when a number is given without a type name.
 * @throws Error if the expression is malformed
 */
export function parseTagExpression(input: string): Tag {
  const expr: TagExpression = getParser().parse(input, { isTypeName });

  if (expr.kind === 'named') {
    const base = tagByName(expr.name);
    if (!base) {
      throw new Error(`Unknown type name: ${expr.name}`);
    }
    return { ...base, constructed: expr.constructed ?? base.constructed };
  }

  return {
    tagClass: expr.tagClass,
    number: expr.number,
    constructed: expr.constructed ?? true,
  };
}
