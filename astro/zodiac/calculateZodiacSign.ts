import { CalendarDate } from "../calendarDate.js";
import { SIGN_BOUNDARIES, SignBoundary, ZodiacSign } from "./zodiacTable.js";

// Returned when no boundary matches; the table covers every month/day.
export const FALLBACK_SIGN: ZodiacSign = "Aries";

export function matchesBoundary(boundary: SignBoundary, month: number, day: number): boolean {
  const [startMonth, startDay] = boundary.start;
  const [endMonth, endDay] = boundary.end;

  const onStart = month === startMonth && day >= startDay;
  const onEnd = month === endMonth && day <= endDay;

  if (startMonth > endMonth) {
    // Wraps December -> January: no month lies numerically "between".
    return onStart || onEnd;
  }

  return onStart || onEnd || (month > startMonth && month < endMonth);
}

/**
 * Tropical sun sign for a birth date. Total over month/day: never throws.
 */
export function calculateZodiacSign(date: Pick<CalendarDate, "month" | "day">): ZodiacSign {
  for (const boundary of SIGN_BOUNDARIES) {
    if (matchesBoundary(boundary, date.month, date.day)) {
      return boundary.sign;
    }
  }

  return FALLBACK_SIGN;
}
