import { IntlMessageFormat } from "intl-messageformat";
import {
  TYPE,
  type LiteralElement,
  type MessageFormatElement,
  type PluralOrSelectOption,
} from "@formatjs/icu-messageformat-parser";
import { PatternSyntaxError } from "./errors.js";
import type { MessageValue } from "./arguments.js";
import type { CompiledFormatter } from "./types.js";

/**
 * The ICU parser reports bad syntax with a plain SyntaxError whose message
 * is the error kind (e.g. EXPECT_ARGUMENT_CLOSING_BRACE).
 */
export function isParserSyntaxError(err: unknown): err is SyntaxError {
  return err instanceof SyntaxError;
}

/** Names of every argument the pattern reads, nested plural/select branches included. */
export function argumentNames(elements: readonly MessageFormatElement[], into = new Set<string>()): Set<string> {
  for (const el of elements) {
    switch (el.type) {
      case TYPE.argument:
      case TYPE.number:
      case TYPE.date:
      case TYPE.time:
        into.add(el.value);
        break;
      case TYPE.select:
      case TYPE.plural:
        into.add(el.value);
        for (const option of Object.values(el.options)) {
          argumentNames(option.value, into);
        }
        break;
      case TYPE.tag:
        argumentNames(el.children, into);
        break;
      default:
        break;
    }
  }
  return into;
}

function placeholder(name: string): LiteralElement {
  return { type: TYPE.literal, value: `{${name}}` };
}

function mapOptions(
  options: Record<string, PluralOrSelectOption>,
  missing: ReadonlySet<string>,
): Record<string, PluralOrSelectOption> {
  return Object.fromEntries(
    Object.entries(options).map(([key, option]) => [key, { ...option, value: withPlaceholders(option.value, missing) }]),
  );
}

/** Copy of the AST with every argument in `missing` turned into its literal `{name}`. */
function withPlaceholders(
  elements: readonly MessageFormatElement[],
  missing: ReadonlySet<string>,
): MessageFormatElement[] {
  return elements.map((el): MessageFormatElement => {
    switch (el.type) {
      case TYPE.argument:
      case TYPE.number:
      case TYPE.date:
      case TYPE.time:
        return missing.has(el.value) ? placeholder(el.value) : el;
      case TYPE.select:
        return missing.has(el.value) ? placeholder(el.value) : { ...el, options: mapOptions(el.options, missing) };
      case TYPE.plural:
        return missing.has(el.value) ? placeholder(el.value) : { ...el, options: mapOptions(el.options, missing) };
      case TYPE.tag:
        return { ...el, children: withPlaceholders(el.children, missing) };
      default:
        return el;
    }
  });
}

/**
 * Joins multi-part output. A Date passed to a bare `{0}` comes back as its
 * own part and is rendered as a short date and time for the locale.
 */
function joinParts(out: string | Date | Array<string | Date>, locale: string): string {
  const parts = Array.isArray(out) ? out : [out];
  let dates: Intl.DateTimeFormat | undefined;
  return parts
    .map((part) => {
      if (typeof part === "string") return part;
      dates ??= new Intl.DateTimeFormat(locale, { dateStyle: "short", timeStyle: "short" });
      return dates.format(part);
    })
    .join("");
}

function build(source: string | MessageFormatElement[], locale: string): IntlMessageFormat {
  return new IntlMessageFormat(source, locale, undefined, { ignoreTag: true });
}

/**
 * Default compiler backed by intl-messageformat. Tags such as `<b>` are
 * kept as literal text, since the output is a plain string. Arguments the
 * caller leaves out render as their literal `{name}`.
 */
export function compilePattern(text: string, locale: string): CompiledFormatter {
  let mf: IntlMessageFormat;
  try {
    mf = build(text, locale);
  } catch (err) {
    if (isParserSyntaxError(err)) {
      throw new PatternSyntaxError(err.message, { cause: err });
    }
    throw err;
  }
  const names = argumentNames(mf.getAst());

  return {
    format(values: Record<string, MessageValue>): string {
      const missing = new Set([...names].filter((name) => !(name in values)));
      const target = missing.size === 0 ? mf : build(withPlaceholders(mf.getAst(), missing), locale);
      return joinParts(target.format<Date>(values), locale);
    },
  };
}
