import { NOT_CACHED, type CacheEntry, type StoredEntry } from "./types.js";

/**
 * Two-level store: raw message → canonical locale → entry.
 * Entries are never evicted; `clear` drops everything at once.
 */
export class FormatterCache {
  private readonly perMessage = new Map<string, Map<string, StoredEntry>>();
  private entries = 0;

  get size(): number {
    return this.entries;
  }

  has(message: string, locale: string): boolean {
    return this.perMessage.get(message)?.has(locale) ?? false;
  }

  lookup(message: string, locale: string): CacheEntry {
    return this.perMessage.get(message)?.get(locale) ?? NOT_CACHED;
  }

  /**
   * Stored entry for the pair, or the outcome of `compile` stored first.
   * When `compile` throws nothing is stored.
   */
  resolve(message: string, locale: string, compile: () => StoredEntry): StoredEntry {
    let perLocale = this.perMessage.get(message);
    const existing = perLocale?.get(locale);
    if (existing !== undefined) return existing;

    const created = compile();
    if (perLocale === undefined) {
      perLocale = new Map();
      this.perMessage.set(message, perLocale);
    }
    perLocale.set(locale, created);
    this.entries++;
    return created;
  }

  clear(): void {
    this.perMessage.clear();
    this.entries = 0;
  }
}
