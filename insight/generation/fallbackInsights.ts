import { z } from "zod";
import { loadDataFile } from "../../data/loadDataFile.js";
import { CalendarDate, dayOfYear } from "../../astro/calendarDate.js";
import { ZodiacSignSchema } from "../../astro/zodiac/zodiacTable.js";

const FallbackInsightsSchema = z.record(
  ZodiacSignSchema,
  z.array(z.string().min(1)).length(3)
);

const FALLBACK_INSIGHTS = loadDataFile("fallbackInsights.json", FallbackInsightsSchema);

export function fallbackInsightsFor(sign: string): readonly string[] {
  const parsed = ZodiacSignSchema.safeParse(sign);
  const list = parsed.success ? FALLBACK_INSIGHTS[parsed.data] : undefined;
  const insights = list ?? FALLBACK_INSIGHTS.Aries;
  if (!insights) {
    throw new Error("fallbackInsights.json has no insights for Aries");
  }
  return insights;
}

/**
 * Pre-written insight for the day. Deterministic: the same sign on the same
 * calendar day always gets the same line. Unknown signs use Aries' list.
 */
export function fallbackInsight(sign: string, date: CalendarDate): string {
  const insights = fallbackInsightsFor(sign);
  return insights[dayOfYear(date) % insights.length];
}
