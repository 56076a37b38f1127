import {
  BirthDetailsInputSchema,
  createBirthDetails,
  FUTURE_DATE_MESSAGE,
  MISSING_FIELDS_MESSAGE,
} from "../astro/schemas/birthDetails.schema.js";
import { compareDates, parseIsoDate, todayLocal } from "../astro/calendarDate.js";
import { InvalidInputError } from "../insight/errors.js";
import { normalizeLanguage } from "../insight/language.js";
import {
  InsightDeps,
  InsightResponse,
  lookupZodiac,
  resolveInsight,
  toInsightResponseBody,
  ZodiacLookupResponse,
} from "../insight/resolveInsight.js";

export const SERVICE_NAME = "astrological-insight-generator";

export type ErrorBody = { error: string };

export type HandlerResult<T> =
  | { status: 200; body: T }
  | { status: 400 | 404 | 500; body: ErrorBody };

export type HealthBody = { status: "healthy"; service: string };

export function handleHealth(): HandlerResult<HealthBody> {
  return { status: 200, body: { status: "healthy", service: SERVICE_NAME } };
}

function badRequest(message: string): HandlerResult<never> {
  return { status: 400, body: { error: message } };
}

/**
 * GET /api/zodiac?date=YYYY-MM-DD&language=en|hi
 */
export function handleZodiacLookup(
  query: { date?: unknown; language?: unknown },
  deps: Pick<InsightDeps, "today">
): HandlerResult<ZodiacLookupResponse> {
  if (query.date === undefined || query.date === "") {
    return badRequest("Missing 'date' parameter");
  }

  const birthDate = typeof query.date === "string" ? parseIsoDate(query.date) : null;
  if (!birthDate) {
    return badRequest("Invalid date format. Use YYYY-MM-DD");
  }

  const today = deps.today ? deps.today() : todayLocal();
  if (compareDates(birthDate, today) > 0) {
    return badRequest(FUTURE_DATE_MESSAGE);
  }

  const language = normalizeLanguage(typeof query.language === "string" ? query.language : null);
  return { status: 200, body: lookupZodiac(birthDate, language) };
}

function isEmptyBody(body: unknown): boolean {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return true;
  return Object.keys(body).length === 0;
}

/**
 * POST /api/insight
 */
export async function handleInsight(
  body: unknown,
  deps: InsightDeps
): Promise<HandlerResult<InsightResponse>> {
  if (isEmptyBody(body)) {
    return badRequest("Missing request body");
  }

  const parsed = BirthDetailsInputSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return badRequest(issue ? issue.message : MISSING_FIELDS_MESSAGE);
  }

  try {
    const today = deps.today ? deps.today() : todayLocal();
    const details = createBirthDetails(parsed.data, today);
    const language = normalizeLanguage(parsed.data.language);
    const response = await resolveInsight(details, language, deps);
    return { status: 200, body: toInsightResponseBody(response) };
  } catch (err) {
    if (err instanceof InvalidInputError) {
      return badRequest(err.message);
    }
    throw err;
  }
}
