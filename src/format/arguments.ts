/** A single value substituted into a placeholder. */
export type MessageValue = string | number | boolean | Date | null | undefined;

export type PositionalArguments = readonly MessageValue[];
export type NamedArguments = Readonly<Record<string, MessageValue>>;

/**
 * Arguments for one format call. Positional sets fill `{0}`, `{1}`...;
 * named sets fill `{name}`. `undefined` and `null` mean no arguments.
 */
export type MessageArguments = PositionalArguments | NamedArguments | null | undefined;

export function isPositional(args: MessageArguments): args is PositionalArguments {
  return Array.isArray(args);
}

export function argumentCount(args: MessageArguments): number {
  if (args == null) return 0;
  if (isPositional(args)) return args.length;
  return Object.keys(args).length;
}

export function isEmptyArguments(args: MessageArguments): boolean {
  return argumentCount(args) === 0;
}

/** Key/value form handed to the formatter: index i of a positional set becomes key "i". */
export function toFormatValues(args: MessageArguments): Record<string, MessageValue> {
  const values: Record<string, MessageValue> = {};
  if (args == null) return values;
  if (isPositional(args)) {
    args.forEach((v, i) => {
      values[String(i)] = v;
    });
    return values;
  }
  for (const key of Object.keys(args)) {
    values[key] = args[key];
  }
  return values;
}
