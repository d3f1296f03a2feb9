/**
 * Formats already-resolved message strings with ICU MessageFormat syntax,
 * caching one compiled formatter per (message, locale) pair.
 *
 * Messages without arguments pass through untouched unless
 * `alwaysEnforceFormat` is set. Text that is not a valid pattern is returned
 * verbatim in lenient mode and rejected with InvalidPatternError in strict mode.
 */

import type { Logger } from "pino";
import { isEmptyArguments, toFormatValues, type MessageArguments } from "./arguments.js";
import { compilePattern as defaultCompilePattern } from "./compilePattern.js";
import { InvalidPatternError, PatternSyntaxError } from "./errors.js";
import { FormatterCache } from "./formatterCache.js";
import { canonicalLocale } from "./locale.js";
import { createLogger } from "../log/logger.js";
import {
  INVALID,
  type ArgumentResolver,
  type DefaultMessageRenderer,
  type FormatFn,
  type PatternCompiler,
  type StoredEntry,
} from "./types.js";

export const DEFAULT_LOCALE = "en";

export interface MessageFormatSupportOptions {
  alwaysEnforceFormat?: boolean;
  /** Locale used when a call passes none. */
  defaultLocale?: string;
  compilePattern?: PatternCompiler;
  resolveArguments?: ArgumentResolver;
  renderDefault?: DefaultMessageRenderer;
  cache?: FormatterCache;
  logger?: Logger;
}

const identityArguments: ArgumentResolver = (args) => args;

const formatDefault: DefaultMessageRenderer = (defaultMessage, args, locale, format) =>
  format(defaultMessage, args, locale);

export class MessageFormatSupport {
  private alwaysEnforceFormat: boolean;
  private readonly defaultLocale: string;
  private readonly compilePattern: PatternCompiler;
  private readonly argumentResolver: ArgumentResolver;
  private readonly defaultRenderer: DefaultMessageRenderer;
  private readonly cache: FormatterCache;
  private readonly logger: Logger;
  private readonly boundFormat: FormatFn = this.format.bind(this);

  constructor(options: MessageFormatSupportOptions = {}) {
    this.alwaysEnforceFormat = options.alwaysEnforceFormat ?? false;
    this.defaultLocale = canonicalLocale(options.defaultLocale ?? DEFAULT_LOCALE);
    this.compilePattern = options.compilePattern ?? defaultCompilePattern;
    this.argumentResolver = options.resolveArguments ?? identityArguments;
    this.defaultRenderer = options.renderDefault ?? formatDefault;
    this.cache = options.cache ?? new FormatterCache();
    this.logger = options.logger ?? createLogger("message-format");
  }

  /**
   * When true every message is parsed, including ones without arguments,
   * so all texts must use pattern escaping (a literal quote is written `''`).
   */
  isAlwaysEnforceFormat(): boolean {
    return this.alwaysEnforceFormat;
  }

  setAlwaysEnforceFormat(alwaysEnforceFormat: boolean): void {
    this.alwaysEnforceFormat = alwaysEnforceFormat;
  }

  getDefaultLocale(): string {
    return this.defaultLocale;
  }

  getCache(): FormatterCache {
    return this.cache;
  }

  format(message: string, args: MessageArguments, locale?: string): string;
  format(message: string | null | undefined, args: MessageArguments, locale?: string): string | null | undefined;
  format(message: string | null | undefined, args: MessageArguments, locale?: string): string | null | undefined {
    if (message == null || (!this.alwaysEnforceFormat && isEmptyArguments(args))) {
      return message;
    }
    const tag = canonicalLocale(locale ?? this.defaultLocale);
    const entry = this.cache.resolve(message, tag, () => this.compile(message, tag));
    if (entry.kind === "invalid") {
      return message;
    }

    return entry.formatter.format(toFormatValues(this.resolveArguments(args, tag)));
  }

  /** Renders a default message supplied by the caller instead of a catalog entry. */
  renderDefault(defaultMessage: string, args: MessageArguments, locale?: string): string;
  renderDefault(
    defaultMessage: string | null | undefined,
    args: MessageArguments,
    locale?: string,
  ): string | null | undefined;
  renderDefault(
    defaultMessage: string | null | undefined,
    args: MessageArguments,
    locale?: string,
  ): string | null | undefined {
    return this.defaultRenderer(defaultMessage, args, locale ?? this.defaultLocale, this.boundFormat);
  }

  resolveArguments(args: MessageArguments, locale: string): MessageArguments {
    return this.argumentResolver(args, locale);
  }

  private compile(message: string, locale: string): StoredEntry {
    try {
      const formatter = this.compilePattern(message, locale);
      this.logger.debug({ locale, cached: this.cache.size + 1 }, "compiled message pattern");
      return { kind: "valid", formatter };
    } catch (err) {
      if (!(err instanceof PatternSyntaxError)) throw err;
      if (this.alwaysEnforceFormat) {
        this.logger.debug({ locale, reason: err.message }, "rejected invalid message pattern");
        throw new InvalidPatternError(message, locale, err);
      }
      return INVALID;
    }
  }
}
