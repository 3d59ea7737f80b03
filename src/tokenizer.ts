import type { SourceLoc, Token, TokenizeOptions } from "./types.js";

export class ParseError extends Error {
  index: number;
  line: number;
  col: number;
  constructor(message: string, input: string, index: number) {
    super(message);
    this.name = "ParseError";
    this.index = index;
    const { line, col } = indexToLineCol(input, index);
    this.line = line;
    this.col = col;
  }
}

export type RecognizedTag =
  | { type: "open"; name: string; attributes: string; selfClosing: boolean }
  | { type: "close"; name: string }
  | { type: "directive" };

const TAG_NAME_RE = /^[A-Za-z_][A-Za-z0-9_.:-]*$/;
const ATTRIBUTE_RE = /([^\s=]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

export function isValidTagName(name: string) { return TAG_NAME_RE.test(name); }

/** 1-based line and column of a character offset, clamped to the input. */
export function indexToLineCol(input: string, index: number) {
  const i = Math.max(0, Math.min(index | 0, input.length));
  const before = input.slice(0, i);
  return { line: countNewlines(before) + 1, col: i - before.lastIndexOf("\n") };
}

export function countNewlines(s: string) {
  let n = 0;
  for (let i = s.indexOf("\n"); i >= 0; i = s.indexOf("\n", i + 1)) n++;
  return n;
}

/**
 * Classifies a `<...>` span. This is the single place that decides what counts as
 * an opening, closing or directive tag; the tokenizer, validators and formatter
 * all go through it. Returns null for anything not delimited by `<` and `>`.
 */
export function recognizeTag(raw: string): RecognizedTag | null {
  if (raw.length < 2 || raw[0] !== "<" || raw[raw.length - 1] !== ">") return null;
  return classifyTag(raw);
}

function classifyTag(raw: string): RecognizedTag {
  const second = raw[1];
  if (second === "?" || second === "!") return { type: "directive" };
  if (second === "/") return { type: "close", name: raw.slice(2, -1).trim() };
  let inner = raw.slice(1, -1);
  const selfClosing = inner.endsWith("/");
  if (selfClosing) inner = inner.slice(0, -1);
  const name = inner.match(/^[^\s/]*/)?.[0] ?? "";
  return { type: "open", name, attributes: inner.slice(name.length).trim(), selfClosing };
}

/** Quoted `key="value"` / `key='value'` pairs from an open tag's raw attribute text. */
export function parseAttributes(attributes: string): Record<string, string> {
  const out: Record<string, string> = Object.create(null);
  for (const m of attributes.matchAll(ATTRIBUTE_RE)) {
    const key = m[1];
    if (key === undefined) continue;
    out[key] = m[2] ?? m[3] ?? "";
  }
  return out;
}

function tagToken(raw: string, line: number, loc: SourceLoc): Token {
  const tag = classifyTag(raw);
  switch (tag.type) {
    case "open":
      return { type: "open", name: tag.name, attributes: tag.attributes, selfClosing: tag.selfClosing, raw, line, loc };
    case "close":
      return { type: "close", name: tag.name, raw, line, loc };
    case "directive":
      return { type: "directive", raw, line, loc };
  }
}

/**
 * Splits a document into tags and significant text.
 *
 * A `<` with no `>` after it ends the scan: the trailing fragment is dropped, or
 * reported as a ParseError when `strict` is set. Attribute values are not
 * interpreted, so a `>` inside a quoted value ends the tag early.
 */
export function tokenize(input: string, opts: TokenizeOptions = {}): Token[] {
  const tokens: Token[] = [];
  const len = input.length;
  let pos = 0;
  let line = 1;
  while (pos < len) {
    if (input[pos] === "<") {
      const close = input.indexOf(">", pos);
      if (close < 0) {
        if (opts.strict) throw new ParseError("Unterminated tag: expected '>' before end of input", input, pos);
        break;
      }
      const raw = input.slice(pos, close + 1);
      tokens.push(tagToken(raw, line, { start: pos, end: close + 1 }));
      line += countNewlines(raw);
      pos = close + 1;
      continue;
    }
    let next = input.indexOf("<", pos);
    if (next < 0) next = len;
    const chunk = input.slice(pos, next);
    const value = chunk.trim();
    if (value) {
      const lead = chunk.length - chunk.trimStart().length;
      const start = pos + lead;
      tokens.push({
        type: "text",
        value,
        line: line + countNewlines(chunk.slice(0, lead)),
        loc: { start, end: start + value.length }
      });
    }
    line += countNewlines(chunk);
    pos = next;
  }
  return tokens;
}
