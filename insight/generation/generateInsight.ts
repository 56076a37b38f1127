import {
  DEFAULT_LLM_CONFIG,
  LLMInvocationConfig,
  LLMInvocationResult,
  LLMSettings,
} from "../../llm/invokeLLM.js";
import { ZodiacInfo } from "../../astro/zodiac/zodiacTable.js";
import { CalendarDate, todayLocal } from "../../astro/calendarDate.js";
import { errorMessage, insightLog } from "../../logging/insightLog.js";
import { SupportedLanguage } from "../language.js";
import { DAILY_THEMES, ThemePicker, buildInsightPrompt, randomTheme } from "./buildInsightPrompt.js";
import { fallbackInsight } from "./fallbackInsights.js";

export const INSIGHT_LLM_CONFIG: LLMInvocationConfig = {
  ...DEFAULT_LLM_CONFIG,
  temperature: 0.8,
  max_tokens: 150,
};

export type InsightGeneration =
  | { source: "llm"; text: string; model: string }
  | { source: "fallback"; text: string; reason: string };

export type InsightRequest = {
  name: string;
  zodiac: ZodiacInfo;
  language: SupportedLanguage;
  useLlm: boolean;
};

export type GenerateInsightOptions = {
  date?: CalendarDate;
  pickTheme?: ThemePicker;
};

/**
 * Single model call for an insight. The result is explicit; choosing a
 * fallback is up to the caller.
 */
export async function requestLlmInsight(
  request: Omit<InsightRequest, "useLlm">,
  llm: LLMSettings,
  options: GenerateInsightOptions = {}
): Promise<LLMInvocationResult> {
  const date = options.date ?? todayLocal();
  const pickTheme = options.pickTheme ?? randomTheme;

  const prompt = buildInsightPrompt({
    name: request.name,
    zodiac: request.zodiac,
    language: request.language,
    date,
    theme: pickTheme(DAILY_THEMES),
  });

  try {
    return await llm.invoke(
      prompt,
      { ...INSIGHT_LLM_CONFIG, model: llm.model, timeout_ms: llm.timeoutMs },
      llm.apiKey
    );
  } catch (err) {
    return {
      status: "error",
      error_type: "provider_error",
      message: errorMessage(err),
    };
  }
}

/**
 * Insight text for a person. Never rejects: LLM failures and a disabled LLM
 * both resolve to the day's fallback line.
 */
export async function generateInsight(
  request: InsightRequest,
  llm: LLMSettings,
  options: GenerateInsightOptions = {}
): Promise<InsightGeneration> {
  const date = options.date ?? todayLocal();
  let reason = "llm_disabled";

  if (request.useLlm && llm.apiKey) {
    const result = await requestLlmInsight(request, llm, { ...options, date });
    if (result.status === "ok") {
      return { source: "llm", text: result.text, model: result.model };
    }

    insightLog({
      event: "insight.llm.failed",
      sign: request.zodiac.sign,
      language: request.language,
      error_type: result.error_type,
      error_message: result.message,
    });
    reason = result.error_type;
  }

  insightLog({
    event: "insight.fallback.used",
    sign: request.zodiac.sign,
    language: request.language,
    reason,
  });

  return {
    source: "fallback",
    text: fallbackInsight(request.zodiac.sign, date),
    reason,
  };
}
