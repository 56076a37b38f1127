import { CalendarDate, toIsoDate, todayLocal } from "../../astro/calendarDate.js";

export type CacheEntry = {
  insight: string;
  date: string; // YYYY-MM-DD the entry was written
};

export type InsightCacheOptions = {
  enabled: boolean;
  today?: () => CalendarDate;
};

/**
 * In-memory insights keyed by sign, language and calendar day.
 *
 * Entries are only served on the day they were written. Nothing evicts stale
 * entries automatically: they stay in memory until sweep() or clear().
 */
export class InsightCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly today: () => CalendarDate;
  readonly enabled: boolean;

  constructor(options: InsightCacheOptions) {
    this.enabled = options.enabled;
    this.today = options.today ?? (() => todayLocal());
  }

  /**
   * `day` pins the lookup to a request's day; it defaults to the cache clock.
   */
  get(sign: string, language: string, day: CalendarDate = this.today()): string | null {
    if (!this.enabled) return null;

    const today = toIsoDate(day);
    const entry = this.entries.get(cacheKey(sign, language, today));
    if (!entry || entry.date !== today) return null;

    return entry.insight;
  }

  set(sign: string, language: string, insight: string, day: CalendarDate = this.today()): void {
    if (!this.enabled) return;

    const today = toIsoDate(day);
    this.entries.set(cacheKey(sign, language, today), { insight, date: today });
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drop entries written on any day but today. Returns how many were removed. */
  sweep(): number {
    const today = toIsoDate(this.today());
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (entry.date !== today) {
        this.entries.delete(key);
        removed += 1;
      }
    }

    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

function cacheKey(sign: string, language: string, day: string): string {
  return `${sign}:${language}:${day}`;
}
