import { BirthDetails } from "../astro/schemas/birthDetails.schema.js";
import { CalendarDate, todayLocal } from "../astro/calendarDate.js";
import { calculateZodiacSign } from "../astro/zodiac/calculateZodiacSign.js";
import { Element, getZodiacInfo, ZodiacInfo } from "../astro/zodiac/zodiacTable.js";
import { LLMSettings } from "../llm/invokeLLM.js";
import { insightLog } from "../logging/insightLog.js";
import { InsightCache } from "./cache/InsightCache.js";
import { ZodiacLookupError } from "./errors.js";
import { GenerateInsightOptions, generateInsight } from "./generation/generateInsight.js";
import { SupportedLanguage } from "./language.js";
import { translateText } from "./translation/translateText.js";
import { translateZodiacSign } from "./translation/translateZodiacSign.js";

export type InsightDeps = {
  cache: InsightCache;
  llm: LLMSettings;
  today?: () => CalendarDate;
  generation?: Omit<GenerateInsightOptions, "date">;
};

export type InsightResponse = {
  zodiac: string;
  insight: string;
  language: SupportedLanguage;
  element?: Element;
  ruling_planet?: string;
  traits?: string[];
};

export type ZodiacLookupResponse = {
  sign: string;
  element: Element;
  ruling_planet: string;
  traits: string[];
  date_range: string;
  language: SupportedLanguage;
};

export function isLlmEnabled(llm: LLMSettings): boolean {
  return llm.apiKey !== null && llm.apiKey !== "";
}

function requireZodiacInfo(date: CalendarDate): ZodiacInfo {
  const sign = calculateZodiacSign(date);
  const info = getZodiacInfo(sign);
  if (!info) {
    throw new ZodiacLookupError(sign);
  }
  return info;
}

/**
 * Sign record for a birth date, with the sign replaced by its display name.
 */
export function lookupZodiac(date: CalendarDate, language: SupportedLanguage): ZodiacLookupResponse {
  const info = requireZodiacInfo(date);

  return {
    sign: translateZodiacSign(info.sign, language),
    element: info.element,
    ruling_planet: info.ruling_planet,
    traits: [...info.traits],
    date_range: info.date_range,
    language,
  };
}

/**
 * Cache-first insight for a person. On a miss the insight is generated,
 * translated when the LLM path is on and the language is not English, and
 * stored under the request day's key for the sign and language.
 */
export async function resolveInsight(
  details: BirthDetails,
  language: SupportedLanguage,
  deps: InsightDeps
): Promise<InsightResponse> {
  const info = requireZodiacInfo(details.birth_date);
  const { cache, llm } = deps;
  // Read once per request; generation may run past midnight.
  const date = deps.today ? deps.today() : todayLocal();

  let insight = cache.get(info.sign, language, date);

  if (insight !== null) {
    insightLog({ event: "insight.cache.hit", sign: info.sign, language });
  } else {
    insightLog({ event: "insight.cache.miss", sign: info.sign, language });

    const useLlm = isLlmEnabled(llm);
    const generated = await generateInsight(
      { name: details.name, zodiac: info, language, useLlm },
      llm,
      { ...deps.generation, date }
    );
    insight = generated.text;

    if (language !== "en" && useLlm) {
      const translated = await translateText(insight, language, llm, useLlm);
      insight = translated.text;
    }

    cache.set(info.sign, language, insight, date);
  }

  return {
    zodiac: translateZodiacSign(info.sign, language),
    insight,
    language,
    element: info.element,
    ruling_planet: info.ruling_planet,
    traits: [...info.traits],
  };
}

/** JSON body for an insight, leaving out empty optional fields. */
export function toInsightResponseBody(response: InsightResponse): InsightResponse {
  const body: InsightResponse = {
    zodiac: response.zodiac,
    insight: response.insight,
    language: response.language,
  };
  if (response.element) body.element = response.element;
  if (response.ruling_planet) body.ruling_planet = response.ruling_planet;
  if (response.traits && response.traits.length > 0) body.traits = response.traits;
  return body;
}
