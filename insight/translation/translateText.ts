import {
  AssembledPrompt,
  DEFAULT_LLM_CONFIG,
  LLMInvocationConfig,
  LLMSettings,
} from "../../llm/invokeLLM.js";
import { errorMessage, insightLog } from "../../logging/insightLog.js";

export const TRANSLATION_LLM_CONFIG: LLMInvocationConfig = {
  ...DEFAULT_LLM_CONFIG,
  temperature: 0.3,
  max_tokens: 200,
};

const HINDI_SYSTEM_PROMPT =
  "You are a professional translator. Translate English to Hindi (Devanagari script). Maintain the tone and meaning.";

export type TranslationResult =
  | { status: "translated"; text: string }
  | { status: "unchanged"; text: string; reason: string };

export function buildHindiTranslationPrompt(text: string): AssembledPrompt {
  return {
    system_prompt: HINDI_SYSTEM_PROMPT,
    user_prompt: `Translate to Hindi: ${text}`,
  };
}

/**
 * Translate English text into the target language. Never rejects: English,
 * unsupported codes, a disabled LLM and failed calls all return the input
 * unchanged.
 */
export async function translateText(
  text: string,
  language: string,
  llm: LLMSettings,
  useLlm = true
): Promise<TranslationResult> {
  if (language === "en") {
    return { status: "unchanged", text, reason: "source_language" };
  }

  if (language !== "hi") {
    return { status: "unchanged", text, reason: "unsupported_language" };
  }

  if (!useLlm || !llm.apiKey) {
    return { status: "unchanged", text, reason: "llm_disabled" };
  }

  let reason: string;
  try {
    const result = await llm.invoke(
      buildHindiTranslationPrompt(text),
      { ...TRANSLATION_LLM_CONFIG, model: llm.model, timeout_ms: llm.timeoutMs },
      llm.apiKey
    );
    if (result.status === "ok") {
      return { status: "translated", text: result.text };
    }
    reason = result.error_type;
    insightLog({
      event: "translation.failed",
      language,
      error_type: result.error_type,
      error_message: result.message,
    });
  } catch (err) {
    reason = "provider_error";
    insightLog({
      event: "translation.failed",
      language,
      error_type: reason,
      error_message: errorMessage(err),
    });
  }

  return { status: "unchanged", text, reason };
}
