import type { MessageArguments, MessageValue } from "./arguments.js";

/** A pattern parsed for one locale, ready to be applied to argument values. */
export interface CompiledFormatter {
  format(values: Record<string, MessageValue>): string;
}

/**
 * Parses `text` for `locale`. Throws PatternSyntaxError when the text is
 * not a valid pattern; anything else it throws propagates to the caller.
 */
export type PatternCompiler = (text: string, locale: string) => CompiledFormatter;

export type ArgumentResolver = (args: MessageArguments, locale: string) => MessageArguments;

export interface FormatFn {
  (message: string, args: MessageArguments, locale?: string): string;
  (message: string | null | undefined, args: MessageArguments, locale?: string): string | null | undefined;
}

/**
 * Renders a caller-supplied default message. `format` is the component's
 * own format operation, so a renderer can work around it. `locale` is
 * passed as the caller gave it (or the default locale), not canonicalised.
 */
export type DefaultMessageRenderer = (
  defaultMessage: string | null | undefined,
  args: MessageArguments,
  locale: string,
  format: FormatFn,
) => string | null | undefined;

/** Cache entry states. A miss reads as `not-cached`; that state is never stored. */
export type CacheEntry =
  | { kind: "not-cached" }
  | { kind: "valid"; formatter: CompiledFormatter }
  | { kind: "invalid" };

export type StoredEntry = Exclude<CacheEntry, { kind: "not-cached" }>;

export const NOT_CACHED: CacheEntry = { kind: "not-cached" };
export const INVALID: StoredEntry = { kind: "invalid" };
