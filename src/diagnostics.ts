import type { ErrorType, ValidationError, ValidationResult } from "./types.js";

export function createError(type: ErrorType, code: string, description: string, line: number, index: number): ValidationError {
  return Object.freeze({ line, description, type, code, index: Math.max(0, index | 0) });
}

// Array#sort is stable, so errors on the same line keep discovery order.
export function sortErrors(errors: readonly ValidationError[]): ValidationError[] {
  return [...errors].sort((a, b) => a.line - b.line);
}

export function toResult(errors: ValidationError[]): ValidationResult {
  return { isValid: errors.length === 0, errorCount: errors.length, errors };
}

export function formatError(error: ValidationError) {
  return `Line ${error.line}: ${error.description}`;
}
