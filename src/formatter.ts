import type { FormatOptions } from "./types.js";
import { tokenize } from "./tokenizer.js";

export const defaultFormatOptions: Readonly<FormatOptions> = Object.freeze({ indent: "    ", width: 80 });

export function createFormatOptions(override: Partial<FormatOptions> = {}): FormatOptions {
  const indent = typeof override.indent === "string" ? override.indent : defaultFormatOptions.indent;
  const width = typeof override.width === "number" && override.width > 0 ? Math.floor(override.width) : defaultFormatOptions.width;
  return { indent, width };
}

export function collapseWhitespace(text: string) {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

/** Greedy word wrap. A word longer than `width` gets a line of its own. */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = "";
  for (const word of text.split(" ")) {
    if (!word) continue;
    if (!current) {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += " " + word;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

/**
 * Pretty-prints a document: one tag per line, children indented one level,
 * `<tag>text</tag>` leaves kept on one line unless the text is wider than
 * `width`, in which case it is wrapped one level deeper.
 */
export function format(input: string, opts: Partial<FormatOptions> = {}): string {
  const { indent, width } = createFormatOptions(opts);
  const tokens = tokenize(String(input ?? ""));
  const out: string[] = [];
  const pad = (level: number) => indent.repeat(level);
  let level = 0;

  for (let k = 0; k < tokens.length; k++) {
    const token = tokens[k];
    if (!token) break;
    switch (token.type) {
      case "close":
        level = Math.max(0, level - 1);
        out.push(pad(level) + token.raw);
        break;
      case "directive":
        out.push(pad(level) + token.raw);
        break;
      case "text":
        // mixed content
        for (const line of token.value.split("\n")) {
          const trimmed = line.trim();
          if (trimmed) out.push(pad(level) + trimmed);
        }
        break;
      case "open": {
        if (token.selfClosing) {
          out.push(pad(level) + token.raw);
          break;
        }
        const text = tokens[k + 1];
        const close = tokens[k + 2];
        if (text?.type === "text" && close?.type === "close" && close.name === token.name) {
          const content = collapseWhitespace(text.value);
          if (content.length <= width) {
            out.push(pad(level) + token.raw + content + close.raw);
          } else {
            out.push(pad(level) + token.raw);
            for (const line of wrapText(content, width)) out.push(pad(level + 1) + line);
            out.push(pad(level) + close.raw);
          }
          k += 2;
          break;
        }
        out.push(pad(level) + token.raw);
        level++;
        break;
      }
    }
  }
  return out.join("\n");
}
