/**
 * .icu-format.yml loader. Strict schema: unknown keys or bad values throw.
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import { isLogLevel, type LogLevel } from "../log/logger.js";

export const CONFIG_FILE = ".icu-format.yml";

const ALLOWED_KEYS = new Set(["alwaysEnforceFormat", "logLevel", "defaultLocale"]);
const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_LOCALE = "en";

export interface FormatConfig {
  alwaysEnforceFormat: boolean;
  logLevel: LogLevel;
  defaultLocale: string;
}

export function defaultFormatConfig(): FormatConfig {
  return { alwaysEnforceFormat: false, logLevel: DEFAULT_LOG_LEVEL, defaultLocale: DEFAULT_LOCALE };
}

/**
 * Validate an already-parsed config document.
 * `null` (empty file) → defaults.
 */
export function parseFormatConfig(raw: unknown): FormatConfig {
  if (raw === null || raw === undefined) {
    return defaultFormatConfig();
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new Error(`${CONFIG_FILE}: root must be an object`);
  }

  const obj = raw as Record<string, unknown>;

  for (const key of Object.keys(obj)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new Error(`${CONFIG_FILE}: unknown key "${key}"`);
    }
  }

  const config = defaultFormatConfig();

  if (obj.alwaysEnforceFormat !== undefined) {
    if (typeof obj.alwaysEnforceFormat !== "boolean") {
      throw new Error(`${CONFIG_FILE}: alwaysEnforceFormat must be true or false`);
    }
    config.alwaysEnforceFormat = obj.alwaysEnforceFormat;
  }

  if (obj.logLevel !== undefined) {
    if (typeof obj.logLevel !== "string" || !isLogLevel(obj.logLevel)) {
      throw new Error(`${CONFIG_FILE}: logLevel must be one of fatal, error, warn, info, debug, trace, silent`);
    }
    config.logLevel = obj.logLevel;
  }

  if (obj.defaultLocale !== undefined) {
    if (typeof obj.defaultLocale !== "string" || obj.defaultLocale.trim() === "") {
      throw new Error(`${CONFIG_FILE}: defaultLocale must be a non-empty locale tag`);
    }
    config.defaultLocale = obj.defaultLocale.trim();
  }

  return config;
}

/**
 * Load and validate .icu-format.yml from a project root.
 * Missing file → defaults.
 */
export function loadFormatConfig(root: string): FormatConfig {
  const path = join(root, CONFIG_FILE);
  if (!existsSync(path)) {
    return defaultFormatConfig();
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${CONFIG_FILE}: invalid YAML — ${msg}`);
  }
  return parseFormatConfig(raw);
}
