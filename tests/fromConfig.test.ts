import { pino } from "pino";
import { createMessageFormatSupport } from "../src/format/fromConfig.js";
import { InvalidLocaleError, InvalidPatternError } from "../src/format/errors.js";

const silent = pino({ level: "silent" });

describe("createMessageFormatSupport", () => {
  it("applies config values", () => {
    const support = createMessageFormatSupport(
      { alwaysEnforceFormat: true, logLevel: "silent", defaultLocale: "de-de" },
    );
    expect(support.isAlwaysEnforceFormat()).toBe(true);
    expect(support.getDefaultLocale()).toBe("de-DE");
    expect(support.format("{0, number}", [0.5])).toBe("0,5");
    expect(() => support.format("Broken {", [])).toThrow(InvalidPatternError);
  });

  it("lets overrides win", () => {
    const support = createMessageFormatSupport(
      { alwaysEnforceFormat: true, logLevel: "info", defaultLocale: "en" },
      { alwaysEnforceFormat: false, logger: silent },
    );
    expect(support.isAlwaysEnforceFormat()).toBe(false);
    expect(support.format("Broken {", ["x"])).toBe("Broken {");
  });

  it("rejects a malformed default locale", () => {
    expect(() =>
      createMessageFormatSupport({ alwaysEnforceFormat: false, logLevel: "silent", defaultLocale: "not valid!" }),
    ).toThrow(InvalidLocaleError);
  });
});
