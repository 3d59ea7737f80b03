import type { ValidateOptions, ValidationResult } from "./types.js";
import { createError, sortErrors, toResult } from "./diagnostics.js";
import { scanDocument } from "./walker.js";
import { structureErrors } from "./structure.js";
import { semanticErrors } from "./semantics.js";

/**
 * Runs the structural and semantic checks over one document and returns every
 * problem found, ordered by line. Never throws for malformed input.
 */
export function validate(input: string, opts: ValidateOptions = {}): ValidationResult {
  const source = String(input ?? "");
  if (!source.trim()) {
    return toResult([createError("structure", "E_EMPTY_DOCUMENT", "No XML content to validate", 1, 0)]);
  }
  const scan = scanDocument(source);
  return toResult(sortErrors([...structureErrors(scan), ...semanticErrors(scan, opts)]));
}
