import { FormatterCache } from "../src/format/formatterCache.js";
import type { CompiledFormatter, StoredEntry } from "../src/format/types.js";

const upper: CompiledFormatter = { format: (values) => String(values["0"]).toUpperCase() };

describe("FormatterCache", () => {
  it("reports a miss as not-cached", () => {
    const cache = new FormatterCache();
    expect(cache.lookup("a", "en")).toEqual({ kind: "not-cached" });
    expect(cache.has("a", "en")).toBe(false);
  });

  it("stores the outcome of compile and reuses it", () => {
    const cache = new FormatterCache();
    const compile = jest.fn((): StoredEntry => ({ kind: "valid", formatter: upper }));
    const first = cache.resolve("a", "en", compile);
    const second = cache.resolve("a", "en", compile);
    expect(second).toBe(first);
    expect(compile).toHaveBeenCalledTimes(1);
    expect(cache.lookup("a", "en")).toBe(first);
    expect(cache.size).toBe(1);
  });

  it("keys by message then locale", () => {
    const cache = new FormatterCache();
    cache.resolve("a", "en", () => ({ kind: "invalid" }));
    cache.resolve("a", "de", () => ({ kind: "valid", formatter: upper }));
    cache.resolve("b", "en", () => ({ kind: "valid", formatter: upper }));
    expect(cache.size).toBe(3);
    expect(cache.lookup("a", "en").kind).toBe("invalid");
    expect(cache.lookup("a", "de").kind).toBe("valid");
    expect(cache.has("b", "de")).toBe(false);
  });

  it("stores nothing when compile throws", () => {
    const cache = new FormatterCache();
    expect(() =>
      cache.resolve("a", "en", () => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(cache.size).toBe(0);
    expect(cache.has("a", "en")).toBe(false);
  });

  it("clear drops all entries", () => {
    const cache = new FormatterCache();
    cache.resolve("a", "en", () => ({ kind: "invalid" }));
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.lookup("a", "en").kind).toBe("not-cached");
  });
});
