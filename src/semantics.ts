import type { OpenTagToken, TagStackEntry, Token, ValidateOptions, ValidationError } from "./types.js";
import { createError } from "./diagnostics.js";
import { parseAttributes } from "./tokenizer.js";
import { scanDocument, walkTags, type DocumentScan } from "./walker.js";

export const defaultRequiredFields: Readonly<Record<string, string>> = Object.freeze({
  name: "Empty user name",
  body: "Empty post body",
  topic: "Empty post topic"
});

// Parents under which an <id> points at another user instead of declaring one.
const REFERENCE_PARENTS = new Set(["follower", "following"]);

export function createRequiredFields(override: Record<string, string> = {}): Record<string, string> {
  return { ...defaultRequiredFields, ...(override || {}) };
}

type IdSource = "attribute" | "child";

interface Declaration {
  owner: TagStackEntry;
  sources: Set<IdSource>;
}

interface Reference {
  value: string;
  kind: string;
  line: number;
  index: number;
}

function userIdAttribute(token: OpenTagToken) {
  return parseAttributes(token.attributes).id?.trim();
}

/** Ids declared by `user` elements, as an `id` attribute or a direct `<id>` child. */
export function collectUserIds(tokens: readonly Token[]): ReadonlySet<string> {
  const ids = new Set<string>();
  walkTags(tokens, {
    onOpen(token) {
      if (token.name !== "user") return;
      const id = userIdAttribute(token);
      if (id) ids.add(id);
    },
    onElement(el) {
      if (el.entry.name === "id" && el.parent?.name === "user" && el.text) ids.add(el.text);
    }
  });
  return ids;
}

export function semanticErrors(scan: DocumentScan, opts: ValidateOptions = {}): ValidationError[] {
  const known = collectUserIds(scan.tokens);
  const required = createRequiredFields(opts.requiredFields);
  const errors: ValidationError[] = [];
  const declarations = new Map<string, Declaration>();
  const declared = new Set<TagStackEntry>();
  const references: Reference[] = [];

  function semantic(code: string, description: string, line: number, index: number) {
    errors.push(createError("semantic", code, description, line, index));
  }

  // A user may state its id once as an attribute and once as a child; any other repeat is a duplicate.
  function declare(value: string, owner: TagStackEntry, source: IdSource, line: number, index: number) {
    const first = declarations.get(value);
    if (first === undefined) {
      declarations.set(value, { owner, sources: new Set([source]) });
    } else if (first.owner === owner && !first.sources.has(source)) {
      first.sources.add(source);
    } else {
      semantic("E_DUPLICATE_ID", `Duplicate user ID '${value}'`, line, index);
    }
  }

  walkTags(scan.tokens, {
    onOpen(token, entry) {
      if (token.name !== "user") return;
      const id = userIdAttribute(token);
      if (id === undefined) return;
      declared.add(entry);
      if (!id) semantic("E_EMPTY_ID", "Empty user ID", token.line, token.loc.start);
      else declare(id, entry, "attribute", token.line, token.loc.start);
    },
    onElement({ entry, parent, text, hasChildren }) {
      if (entry.name === "id" && parent) {
        if (parent.name === "user") declared.add(parent);
        if (!text) semantic("E_EMPTY_ID", "Empty user ID", entry.line, entry.index);
        else if (parent.name === "user") declare(text, parent, "child", entry.line, entry.index);
        else if (REFERENCE_PARENTS.has(parent.name)) references.push({ value: text, kind: parent.name, line: entry.line, index: entry.index });
        return;
      }
      if (entry.name === "user" && !declared.has(entry)) {
        semantic("E_MISSING_ID", "User is missing an ID", entry.line, entry.index);
        return;
      }
      const message = Object.hasOwn(required, entry.name) ? required[entry.name] : undefined;
      if (message !== undefined && !text && !hasChildren) {
        semantic("E_EMPTY_FIELD", message, entry.line, entry.index);
      }
    }
  });

  for (const ref of references) {
    if (known.has(ref.value)) continue;
    semantic(
      "E_UNKNOWN_REFERENCE",
      `Invalid ${ref.kind} reference: user ID '${ref.value}' does not exist`,
      ref.line, ref.index
    );
  }
  return errors;
}

/**
 * Schema-level checks: required fields, unique user ids and follower/following
 * references. Every id is collected first, so a follower may point at a user
 * declared further down the document.
 */
export function checkSemantics(input: string, opts: ValidateOptions = {}): ValidationError[] {
  return semanticErrors(scanDocument(input), opts);
}
