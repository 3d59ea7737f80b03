import type { RepairResult } from "./types.js";
import { ParseError, tokenize } from "./tokenizer.js";
import { scanDocument, walkTags } from "./walker.js";

interface Edit { start: number; end: number; insert: string }

/**
 * Auto-corrects tag balance one problem at a time, re-checking after every edit.
 * Stray closing tags are dropped, a closing tag that skips open ancestors gets the
 * missing closes in front of it, a misspelled closing tag is renamed, and tags
 * still open at the end are closed. Lines with a broken `<` or `>` are left alone.
 */
export function repairDocument(input: string, opts: { maxPasses?: number } = {}): RepairResult {
  const maxPasses = Math.max(1, (opts.maxPasses ?? 0) | 0 || 64);
  const original = String(input ?? "");
  let s = original;
  let fixedAny = false;

  for (let pass = 0; pass < maxPasses; pass++) {
    try {
      tokenize(s, { strict: true });
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      // the only strict failure is a '<' with no '>' before the end
      s = s + ">";
      fixedAny = true;
      continue;
    }

    const edit = findBalanceEdit(s);
    if (edit == null) {
      return { fixed: fixedAny, string: s };
    }
    s = applyEdit(s, edit);
    fixedAny = true;
  }

  return { fixed: false, string: original };
}

function findBalanceEdit(s: string): Edit | null {
  const edits: Edit[] = [];
  const open = walkTags(scanDocument(s).tokens, {
    onUnmatchedClose(token) {
      edits.push({ start: token.loc.start, end: token.loc.end, insert: "" });
    },
    onMismatch(token, expected, stack) {
      const closesAncestor = stack.some(entry => entry.name === token.name);
      edits.push(closesAncestor
        ? { start: token.loc.start, end: token.loc.start, insert: `</${expected.name}>` }
        : { start: token.loc.start, end: token.loc.end, insert: `</${expected.name}>` });
    }
  });
  const [first] = edits;
  if (first) return first;
  if (!open.length) return null;
  const closes = open.map(entry => `</${entry.name}>`).reverse().join("");
  return { start: s.length, end: s.length, insert: closes };
}

function clampIndex(s: string, idx: number) {
  return Math.max(0, Math.min(idx | 0, s.length));
}

function applyEdit(s: string, edit: Edit) {
  const start = clampIndex(s, edit.start);
  const end = Math.max(start, clampIndex(s, edit.end));
  return s.slice(0, start) + edit.insert + s.slice(end);
}
