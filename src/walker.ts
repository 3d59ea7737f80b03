import type { CloseTagToken, OpenTagToken, TagStackEntry, Token, ValidationError } from "./types.js";
import { countNewlines, isValidTagName, tokenize } from "./tokenizer.js";
import { createError } from "./diagnostics.js";

export interface DocumentScan {
  /** Tokens that survived the malformed-line and tag-name checks. */
  tokens: Token[];
  issues: ValidationError[];
}

export interface ElementInfo {
  entry: TagStackEntry;
  parent: TagStackEntry | null;
  open: OpenTagToken;
  /** Direct text children joined with single spaces; "" when there are none. */
  text: string;
  hasChildren: boolean;
}

export interface TagWalkHandlers {
  onOpen?(token: OpenTagToken, entry: TagStackEntry, parent: TagStackEntry | null): void;
  onElement?(element: ElementInfo): void;
  onUnmatchedClose?(token: CloseTagToken): void;
  /** `stack` is what remains after the mismatched top has been popped. */
  onMismatch?(token: CloseTagToken, expected: TagStackEntry, stack: readonly TagStackEntry[]): void;
}

interface Frame {
  entry: TagStackEntry;
  open: OpenTagToken;
  text: string[];
  hasChildren: boolean;
}

export function findMalformedLines(input: string): ValidationError[] {
  const issues: ValidationError[] = [];
  let index = 0;
  let line = 1;
  for (const text of input.split("\n")) {
    const lt = text.indexOf("<");
    const gt = text.indexOf(">");
    if (lt >= 0 && gt < 0) {
      issues.push(createError("syntax", "E_MISSING_GT", "Malformed tag: missing closing '>'", line, index + lt));
    } else if (gt >= 0 && lt < 0) {
      issues.push(createError("syntax", "E_MISSING_LT", "Malformed tag: missing opening '<'", line, index + gt));
    }
    index += text.length + 1;
    line++;
  }
  return issues;
}

function shiftToken(token: Token, offset: number, lines: number): Token {
  return { ...token, line: token.line + lines, loc: { start: token.loc.start + offset, end: token.loc.end + offset } };
}

/**
 * Tokenizes once and drops what sits on malformed lines. A tag that starts on a
 * malformed line runs to the next `>` wherever it is, so when such a span reaches
 * past the last malformed line it touches, the remainder is tokenized again and kept.
 */
export function scanDocument(input: string): DocumentScan {
  const issues = findMalformedLines(input);
  const malformed = new Set(issues.map(e => e.line));
  const tokens: Token[] = [];

  const keep = (token: Token) => {
    if ((token.type === "open" || token.type === "close") && !isValidTagName(token.name)) {
      issues.push(createError("syntax", "E_TAG_NAME", `Malformed tag '${token.raw}': invalid tag name`, token.line, token.loc.start));
      return;
    }
    tokens.push(token);
  };

  for (const token of tokenize(input)) {
    if (!malformed.size) {
      keep(token);
      continue;
    }
    const lastLine = token.line + countNewlines(input.slice(token.loc.start, token.loc.end));
    let lastBad = 0;
    for (let l = token.line; l <= lastLine; l++) {
      if (malformed.has(l)) lastBad = l;
    }
    if (!lastBad) {
      keep(token);
      continue;
    }
    if (lastBad === lastLine) continue;
    let resume = token.loc.start;
    for (let l = token.line; l <= lastBad; l++) resume = input.indexOf("\n", resume) + 1;
    for (const inner of tokenize(input.slice(resume, token.loc.end))) {
      keep(shiftToken(inner, resume, lastBad));
    }
  }
  return { tokens, issues };
}

/**
 * Runs the tag stack over a token stream and reports what it sees.
 * A mismatched close still pops the top entry, so one bad tag does not leave
 * every ancestor looking unclosed. Returns the entries still open at the end,
 * outermost first.
 */
export function walkTags(tokens: readonly Token[], handlers: TagWalkHandlers = {}): TagStackEntry[] {
  const frames: Frame[] = [];
  const top = () => frames[frames.length - 1];

  for (const token of tokens) {
    switch (token.type) {
      case "open": {
        const parentFrame = top();
        const parent = parentFrame ? parentFrame.entry : null;
        const entry: TagStackEntry = { name: token.name, line: token.line, index: token.loc.start };
        if (parentFrame) parentFrame.hasChildren = true;
        handlers.onOpen?.(token, entry, parent);
        if (token.selfClosing) {
          handlers.onElement?.({ entry, parent, open: token, text: "", hasChildren: false });
        } else {
          frames.push({ entry, open: token, text: [], hasChildren: false });
        }
        break;
      }
      case "text":
        top()?.text.push(token.value);
        break;
      case "close": {
        const frame = frames.pop();
        if (!frame) {
          handlers.onUnmatchedClose?.(token);
          break;
        }
        if (frame.entry.name !== token.name) {
          handlers.onMismatch?.(token, frame.entry, frames.map(f => f.entry));
          break;
        }
        handlers.onElement?.({
          entry: frame.entry,
          parent: top()?.entry ?? null,
          open: frame.open,
          text: frame.text.join(" "),
          hasChildren: frame.hasChildren
        });
        break;
      }
      case "directive":
        break;
    }
  }
  return frames.map(f => f.entry);
}
