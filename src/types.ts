export type Token = OpenTagToken | CloseTagToken | TextToken | DirectiveToken;

export interface SourceLoc { start: number; end: number }

export interface OpenTagToken {
  type: "open";
  name: string;
  /** Raw substring after the tag name, trimmed. Not interpreted. */
  attributes: string;
  selfClosing: boolean;
  raw: string;
  line: number;
  loc: SourceLoc;
}

export interface CloseTagToken {
  type: "close";
  name: string;
  raw: string;
  line: number;
  loc: SourceLoc;
}

export interface TextToken {
  type: "text";
  /** Trimmed; never empty. Inner whitespace is left untouched. */
  value: string;
  line: number;
  loc: SourceLoc;
}

/** `<?...?>` and `<!...>` spans: declarations, comments, doctypes. */
export interface DirectiveToken {
  type: "directive";
  raw: string;
  line: number;
  loc: SourceLoc;
}

export interface TagStackEntry {
  readonly name: string;
  readonly line: number;
  readonly index: number;
}

export type ErrorType = "syntax" | "structure" | "semantic";

export interface ValidationError {
  readonly line: number;
  readonly description: string;
  readonly type: ErrorType;
  readonly code: string;
  readonly index: number;
}

export interface ValidationResult {
  isValid: boolean;
  errorCount: number;
  errors: ValidationError[];
}

export interface TokenizeOptions {
  /** Throw a ParseError on an unterminated trailing tag instead of stopping silently. */
  strict?: boolean;
}

export interface FormatOptions {
  indent: string;
  width: number;
}

export interface ValidateOptions {
  /** Element name → description reported when that element is empty. */
  requiredFields?: Record<string, string>;
}

export interface RepairResult { fixed: boolean; string: string }

/** Exactly one of `word` (matched in the post body) or `topic` must be given. */
export interface PostQuery {
  word?: string;
  topic?: string;
}

export interface PostMatch {
  userId: string | null;
  userName: string | null;
  /** Body text with whitespace runs collapsed. */
  body: string;
  topics: string[];
  /** Line of the `<post>` tag. */
  line: number;
}
