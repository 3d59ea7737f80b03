import type { ValidationError } from "./types.js";
import { createError } from "./diagnostics.js";
import { scanDocument, walkTags, type DocumentScan } from "./walker.js";

export function structureErrors(scan: DocumentScan): ValidationError[] {
  const errors: ValidationError[] = [...scan.issues];

  const unclosed = walkTags(scan.tokens, {
    onUnmatchedClose(token) {
      errors.push(createError(
        "structure", "E_UNMATCHED_CLOSE",
        `Closing tag '</${token.name}>' without matching opening tag`,
        token.line, token.loc.start
      ));
    },
    onMismatch(token, expected) {
      errors.push(createError(
        "structure", "E_MISMATCHED_TAG",
        `Mismatched tags: expected '</${expected.name}>' but found '</${token.name}>'`,
        token.line, token.loc.start
      ));
    }
  });

  // innermost first
  for (let i = unclosed.length - 1; i >= 0; i--) {
    const entry = unclosed[i];
    if (!entry) continue;
    errors.push(createError("structure", "E_UNCLOSED_TAG", `Unclosed tag '<${entry.name}>'`, entry.line, entry.index));
  }
  return errors;
}

/** Tag-balance and malformed-tag errors in discovery order. */
export function checkStructure(input: string): ValidationError[] {
  return structureErrors(scanDocument(input));
}
