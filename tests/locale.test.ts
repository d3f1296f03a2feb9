import { canonicalLocale } from "../src/format/locale.js";
import { InvalidLocaleError } from "../src/format/errors.js";

describe("canonicalLocale", () => {
  it("normalises case", () => {
    expect(canonicalLocale("en-us")).toBe("en-US");
    expect(canonicalLocale("EN")).toBe("en");
    expect(canonicalLocale("zh-hant-tw")).toBe("zh-Hant-TW");
  });

  it("throws InvalidLocaleError for a malformed tag", () => {
    expect(() => canonicalLocale("")).toThrow(InvalidLocaleError);
    expect(() => canonicalLocale("en_US!")).toThrow(InvalidLocaleError);
  });
});
