import type { Token } from "./types.js";
import { tokenize } from "./tokenizer.js";
import { collapseWhitespace } from "./formatter.js";

export function renderToken(token: Token): string {
  switch (token.type) {
    case "open":
    case "close":
    case "directive":
      return token.raw;
    case "text":
      return collapseWhitespace(token.value);
  }
}

/**
 * Concatenates the document's tokens with nothing in between. Whitespace-only
 * text is already gone after tokenizing, and text runs are collapsed to single
 * spaces, so a formatted document minifies to the same string as its source.
 */
export function minify(input: string): string {
  let out = "";
  for (const token of tokenize(String(input ?? ""))) out += renderToken(token);
  return out;
}
