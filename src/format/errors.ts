/** Error kinds raised by the message formatter, each with a stable `code`. */

export type MessageSupportErrorCode = "PATTERN_SYNTAX" | "INVALID_PATTERN" | "INVALID_LOCALE";

export class MessageSupportError extends Error {
  readonly code: MessageSupportErrorCode;

  constructor(code: MessageSupportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MessageSupportError";
    this.code = code;
  }
}

/**
 * Thrown by a pattern compiler when the text is not a valid pattern.
 * Any other error a compiler throws is not treated as an invalid pattern.
 */
export class PatternSyntaxError extends MessageSupportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PATTERN_SYNTAX", message, options);
    this.name = "PatternSyntaxError";
  }
}

/** Raised in strict mode when a message does not parse as a pattern. */
export class InvalidPatternError extends MessageSupportError {
  readonly pattern: string;
  readonly locale: string;

  constructor(pattern: string, locale: string, cause: unknown) {
    super("INVALID_PATTERN", `invalid message pattern for ${locale}: ${describe(cause)}`, { cause });
    this.name = "InvalidPatternError";
    this.pattern = pattern;
    this.locale = locale;
  }
}

export class InvalidLocaleError extends MessageSupportError {
  readonly locale: string;

  constructor(locale: string, cause: unknown) {
    super("INVALID_LOCALE", `invalid locale tag "${locale}": ${describe(cause)}`, { cause });
    this.name = "InvalidLocaleError";
    this.locale = locale;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
