export { MessageFormatSupport, DEFAULT_LOCALE, type MessageFormatSupportOptions } from "./format/messageFormatSupport.js";
export { FormatterCache } from "./format/formatterCache.js";
export { argumentNames, compilePattern, isParserSyntaxError } from "./format/compilePattern.js";
export { createMessageFormatSupport } from "./format/fromConfig.js";
export { canonicalLocale } from "./format/locale.js";
export {
  argumentCount,
  isEmptyArguments,
  isPositional,
  toFormatValues,
  type MessageArguments,
  type MessageValue,
  type NamedArguments,
  type PositionalArguments,
} from "./format/arguments.js";
export {
  InvalidLocaleError,
  InvalidPatternError,
  MessageSupportError,
  PatternSyntaxError,
  type MessageSupportErrorCode,
} from "./format/errors.js";
export type {
  ArgumentResolver,
  CacheEntry,
  CompiledFormatter,
  DefaultMessageRenderer,
  FormatFn,
  PatternCompiler,
  StoredEntry,
} from "./format/types.js";
export { CONFIG_FILE, defaultFormatConfig, loadFormatConfig, parseFormatConfig, type FormatConfig } from "./config/formatYaml.js";
export { createLogger, isLogLevel, type LogLevel } from "./log/logger.js";
