import { argumentCount, isEmptyArguments, isPositional, toFormatValues } from "../src/format/arguments.js";

describe("message arguments", () => {
  it("treats missing, empty array and empty record as empty", () => {
    expect(isEmptyArguments(undefined)).toBe(true);
    expect(isEmptyArguments(null)).toBe(true);
    expect(isEmptyArguments([])).toBe(true);
    expect(isEmptyArguments({})).toBe(true);
    expect(isEmptyArguments([undefined])).toBe(false);
    expect(isEmptyArguments({ name: "x" })).toBe(false);
  });

  it("counts entries", () => {
    expect(argumentCount(["a", 1, null])).toBe(3);
    expect(argumentCount({ a: 1, b: 2 })).toBe(2);
    expect(argumentCount(undefined)).toBe(0);
  });

  it("maps positional values to index keys", () => {
    const when = new Date(0);
    expect(isPositional(["a"])).toBe(true);
    expect(toFormatValues(["a", 2, when])).toEqual({ "0": "a", "1": 2, "2": when });
  });

  it("copies named values", () => {
    const named = { name: "Ana", count: 3 };
    const values = toFormatValues(named);
    expect(isPositional(named)).toBe(false);
    expect(values).toEqual({ name: "Ana", count: 3 });
    expect(values).not.toBe(named);
    expect(toFormatValues(null)).toEqual({});
  });
});
