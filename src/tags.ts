/**
 * ASN.1 tag model and the table of universal type names understood by
 * DER ASCII.
 */

/** Tag class, indexed by the two high bits of the identifier octet. */
export type TagClass = 'UNIVERSAL' | 'APPLICATION' | 'CONTEXT_SPECIFIC' | 'PRIVATE';

export const TAG_CLASSES: readonly TagClass[] = [
  'UNIVERSAL',
  'APPLICATION',
  'CONTEXT_SPECIFIC',
  'PRIVATE',
];

export interface Tag {
  tagClass: TagClass;
  number: number;
  constructed: boolean;
}

/**
 * Universal types with a symbolic name. Names use underscores where the
 * ASN.1 type name has spaces, since a bare symbol cannot contain whitespace.
 */
const UNIVERSAL_TYPES: ReadonlyArray<readonly [name: string, number: number, constructed: boolean]> = [
  ['BOOLEAN', 1, false],
  ['INTEGER', 2, false],
  ['BIT_STRING', 3, false],
  ['OCTET_STRING', 4, false],
  ['NULL', 5, false],
  ['OBJECT_IDENTIFIER', 6, false],
  ['OBJECT_DESCRIPTOR', 7, false],
  ['EXTERNAL', 8, true],
  ['REAL', 9, false],
  ['ENUMERATED', 10, false],
  ['EMBEDDED_PDV', 11, true],
  ['UTF8String', 12, false],
  ['RELATIVE_OID', 13, false],
  ['SEQUENCE', 16, true],
  ['SET', 17, true],
  ['NumericString', 18, false],
  ['PrintableString', 19, false],
  ['T61String', 20, false],
  ['VideotexString', 21, false],
  ['IA5String', 22, false],
  ['UTCTime', 23, false],
  ['GeneralizedTime', 24, false],
  ['GraphicString', 25, false],
  ['VisibleString', 26, false],
  ['GeneralString', 27, false],
  ['UniversalString', 28, false],
  ['BMPString', 30, false],
];

const TAGS_BY_NAME: ReadonlyMap<string, Tag> = new Map(
  UNIVERSAL_TYPES.map(([name, number, constructed]) => [
    name,
    { tagClass: 'UNIVERSAL', number, constructed },
  ]),
);

const NAMES_BY_NUMBER: ReadonlyMap<number, string> = new Map(
  UNIVERSAL_TYPES.map(([name, number]) => [number, name]),
);

export const TAG_INTEGER = 2;
export const TAG_BIT_STRING = 3;
export const TAG_OBJECT_IDENTIFIER = 6;

/** Look up the default tag of a type name. */
export function tagByName(name: string): Tag | undefined {
  const tag = TAGS_BY_NAME.get(name);
  return tag ? { ...tag } : undefined;
}

export function isTypeName(name: string): boolean {
  return TAGS_BY_NAME.has(name);
}

/**
 * Reverse lookup by class and number. `toggleConstructed` is set when the
 * tag's constructed bit differs from the named type's default.
 */
export function tagToName(tag: Tag): { name: string; toggleConstructed: boolean } | undefined {
  if (tag.tagClass !== 'UNIVERSAL') return undefined;
  const name = NAMES_BY_NUMBER.get(tag.number);
  if (name === undefined) return undefined;
  const named = TAGS_BY_NAME.get(name);
  return { name, toggleConstructed: named?.constructed !== tag.constructed };
}

/** Whether `tag` is the primitive universal tag with the given number. */
export function isUniversalPrimitive(tag: Tag, number: number): boolean {
  return tag.tagClass === 'UNIVERSAL' && tag.number === number && !tag.constructed;
}

export function tagClassBits(tagClass: TagClass): number {
  return TAG_CLASSES.indexOf(tagClass);
}
