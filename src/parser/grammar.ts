/**
 * PEG grammar for the contents of a DER ASCII tag expression, i.e. the text
 * between `[` and `]`. Compiled by peggy at runtime.
 *
 * The caller passes `isTypeName` in the parse options so that the table of
 * type names lives in one place.
 */
export const TAG_GRAMMAR = `
TagExpression
  = _ tag:(NamedTag / NumberedTag) _ { return tag; }

NamedTag
  = name:TypeName number:(__ @TagNumber)? constructed:(__ @Constructedness)?
    {
      if (number !== null) {
        error("a type name cannot be combined with an explicit tag number");
      }
      return {
        kind: "named",
        name: name,
        constructed: constructed
      };
    }

NumberedTag
  = tagClass:(@TagClass __)? number:TagNumber constructed:(__ @Constructedness)?
    {
      return {
        kind: "numbered",
        tagClass: tagClass || "CONTEXT_SPECIFIC",
        number: number,
        constructed: constructed
      };
    }

TagClass
  = "APPLICATION" !WordChar { return "APPLICATION"; }
  / "PRIVATE" !WordChar { return "PRIVATE"; }
  / "UNIVERSAL" !WordChar { return "UNIVERSAL"; }

Constructedness
  = "PRIMITIVE" !WordChar { return false; }
  / "CONSTRUCTED" !WordChar { return true; }

TypeName "type name"
  = name:$WordChar+ &{ return options.isTypeName(name); } { return name; }

TagNumber "tag number"
  = digits:$[0-9]+ !WordChar
    {
      var n = Number(digits);
      if (!Number.isSafeInteger(n)) {
        error("tag number " + digits + " is too large");
      }
      return n;
    }

WordChar
  = [A-Za-z0-9_]

// Whitespace between components
__ "whitespace"
  = [ \\t]+

_
  = [ \\t]*
`;
