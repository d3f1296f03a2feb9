import type { FormatConfig } from "../config/formatYaml.js";
import { createLogger } from "../log/logger.js";
import { MessageFormatSupport, type MessageFormatSupportOptions } from "./messageFormatSupport.js";

/** Build a formatter from loaded config; `overrides` win over config values. */
export function createMessageFormatSupport(
  config: FormatConfig,
  overrides: MessageFormatSupportOptions = {},
): MessageFormatSupport {
  return new MessageFormatSupport({
    alwaysEnforceFormat: config.alwaysEnforceFormat,
    defaultLocale: config.defaultLocale,
    logger: createLogger("message-format", config.logLevel),
    ...overrides,
  });
}
