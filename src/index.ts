export * from "./types.js";
export * from "./tokenizer.js";
export * from "./diagnostics.js";
export * from "./walker.js";
export * from "./structure.js";
export * from "./semantics.js";
export * from "./validator.js";
export * from "./formatter.js";
export * from "./minifier.js";
export * from "./repair.js";
export * from "./search.js";

// Friendly alias names for public API
export { format as prettify } from "./formatter.js";
export { repairDocument as fixDocument } from "./repair.js";
