import { beforeEach, describe, expect, it } from "vitest";
import { CalendarDate } from "../../../astro/calendarDate.js";
import { InsightCache } from "../InsightCache.js";

describe("InsightCache", () => {
  let current: CalendarDate;
  let cache: InsightCache;

  beforeEach(() => {
    current = { year: 2024, month: 7, day: 15 };
    cache = new InsightCache({ enabled: true, today: () => current });
  });

  it("returns what was stored for the same sign and language today", () => {
    cache.set("Cancer", "en", "Trust your intuition.");

    expect(cache.get("Cancer", "en")).toBe("Trust your intuition.");
  });

  it("reads and writes an explicit day instead of the clock", () => {
    const yesterday = { year: 2024, month: 7, day: 14 };
    cache.set("Cancer", "en", "from yesterday", yesterday);

    expect(cache.get("Cancer", "en", yesterday)).toBe("from yesterday");
    expect(cache.get("Cancer", "en")).toBeNull();
  });

  it("misses on a different language or sign", () => {
    cache.set("Cancer", "en", "Trust your intuition.");

    expect(cache.get("Cancer", "hi")).toBeNull();
    expect(cache.get("Leo", "en")).toBeNull();
  });

  it("overwrites an existing entry for the same key", () => {
    cache.set("Cancer", "en", "first");
    cache.set("Cancer", "en", "second");

    expect(cache.get("Cancer", "en")).toBe("second");
    expect(cache.size).toBe(1);
  });

  it("does not serve yesterday's entry but keeps it until swept", () => {
    cache.set("Cancer", "en", "yesterday");
    current = { year: 2024, month: 7, day: 16 };

    expect(cache.get("Cancer", "en")).toBeNull();
    expect(cache.size).toBe(1);
  });

  it("sweep removes prior-day entries and keeps today's", () => {
    cache.set("Cancer", "en", "old cancer");
    cache.set("Leo", "hi", "old leo");
    current = { year: 2024, month: 7, day: 16 };
    cache.set("Cancer", "en", "new cancer");

    expect(cache.size).toBe(3);
    expect(cache.sweep()).toBe(2);
    expect(cache.size).toBe(1);
    expect(cache.get("Cancer", "en")).toBe("new cancer");
    expect(cache.get("Leo", "hi")).toBeNull();
  });

  it("clear drops everything", () => {
    cache.set("Cancer", "en", "a");
    cache.set("Leo", "en", "b");

    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.get("Cancer", "en")).toBeNull();
  });

  it("is a passthrough when disabled", () => {
    const disabled = new InsightCache({ enabled: false, today: () => current });

    disabled.set("Cancer", "en", "ignored");

    expect(disabled.get("Cancer", "en")).toBeNull();
    expect(disabled.size).toBe(0);
  });
});
