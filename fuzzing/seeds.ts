/**
 * Seed corpus of valid DER ASCII documents for mutation-based fuzzing.
 * Each seed exercises a different token kind or encoding.
 */

/** A single primitive element. */
export const SEED_MINIMAL = `INTEGER { 1 }
`;

/** Every literal kind inside one SEQUENCE. */
export const SEED_LITERALS = `SEQUENCE {
  INTEGER { -129 }
  INTEGER { 18446744073709551616 }
  OBJECT_IDENTIFIER { 1.2.840.113549.1.1.11 }
  UTF8String { "quote \\" backslash \\\\ newline \\n byte \\xff" }
  OCTET_STRING { \`00ff10\` }
  NULL {}
}
`;

/** Tag expressions of every class. */
export const SEED_TAGS = `[0] {
  [1 PRIMITIVE] { "implicit" }
  [APPLICATION 31] {
    [PRIVATE 200 PRIMITIVE] {}
  }
  [UNIVERSAL 0 PRIMITIVE] {}
  [INTEGER CONSTRUCTED] {
    INTEGER { 5 }
  }
  [SEQUENCE PRIMITIVE] { \`\` }
}
`;

/** Indefinite-length encodings with explicit end-of-contents. */
export const SEED_INDEFINITE = `SEQUENCE \`80\`
  [OCTET_STRING CONSTRUCTED] \`80\`
    OCTET_STRING { "a" }
    OCTET_STRING { "b" }
  \`0000\`
\`0000\`
`;

/** An abbreviated certificate. */
export const SEED_CERTIFICATE = `# comments are ignored
SEQUENCE {
  SEQUENCE {
    [0] { INTEGER { 2 } }
    INTEGER { \`00c0ffee\` }
    SEQUENCE {
      OBJECT_IDENTIFIER { 1.2.840.10045.4.3.2 }
    }
    SEQUENCE {
      SET {
        SEQUENCE {
          OBJECT_IDENTIFIER { 2.5.4.3 }
          PrintableString { "Fuzz CA" }
        }
      }
    }
    SEQUENCE {
      UTCTime { "250101000000Z" }
      GeneralizedTime { "20991231235959Z" }
    }
    [3] {
      SEQUENCE {
        SEQUENCE {
          OBJECT_IDENTIFIER { 2.5.29.19 }
          BOOLEAN { \`ff\` }
          OCTET_STRING { SEQUENCE { BOOLEAN { \`ff\` } } }
        }
      }
    }
  }
  BIT_STRING { \`00\` SEQUENCE { INTEGER { 1 } INTEGER { 2 } } }
}
`;

/** Non-canonical headers written as raw hex. */
export const SEED_NON_CANONICAL = `\`3081\` {
  \`1f02\` { 5 }
  \`048200\` { "long" }
}
`;

/** All seeds for iteration. */
export const ALL_SEEDS = [
  SEED_MINIMAL,
  SEED_LITERALS,
  SEED_TAGS,
  SEED_INDEFINITE,
  SEED_CERTIFICATE,
  SEED_NON_CANONICAL,
];
