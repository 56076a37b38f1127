import { AssembledPrompt } from "../../llm/invokeLLM.js";
import { ZodiacInfo } from "../../astro/zodiac/zodiacTable.js";
import { CalendarDate, weekdayName } from "../../astro/calendarDate.js";
import { SupportedLanguage } from "../language.js";

export const DAILY_THEMES = [
  "relationships",
  "career",
  "personal growth",
  "creativity",
  "challenges",
  "opportunities",
  "communication",
  "emotions",
] as const;

export type DailyTheme = (typeof DAILY_THEMES)[number];

export type ThemePicker = (themes: readonly DailyTheme[]) => DailyTheme;

export const randomTheme: ThemePicker = (themes) =>
  themes[Math.floor(Math.random() * themes.length)] ?? "personal growth";

const SYSTEM_PROMPT = "You are an expert astrologer providing personalized daily insights.";

const LANGUAGE_INSTRUCTIONS: Record<SupportedLanguage, string> = {
  en: "English",
  hi: "Hindi (Devanagari script)",
};

export function buildInsightPrompt(input: {
  name: string;
  zodiac: ZodiacInfo;
  language: SupportedLanguage;
  date: CalendarDate;
  theme: DailyTheme;
}): AssembledPrompt {
  const { name, zodiac, language, date, theme } = input;
  const traits = zodiac.traits.slice(0, 3).join(", ");

  const user_prompt = [
    `Generate a personalized daily astrological insight for ${name}.`,
    "",
    `Zodiac Sign: ${zodiac.sign}`,
    `Element: ${zodiac.element}`,
    `Key Traits: ${traits}`,
    `Day: ${weekdayName(date)}`,
    `Focus Area: ${theme}`,
    "",
    "Create a warm, encouraging insight (2-3 sentences) that:",
    "1. Acknowledges their zodiac traits",
    `2. Provides guidance related to ${theme}`,
    "3. Is positive and actionable",
    "4. Does not repeat itself",
    "",
    `Language: ${LANGUAGE_INSTRUCTIONS[language]}. Respond only in this language and its script.`,
    "Tone: Friendly, mystical, encouraging",
  ].join("\n");

  return { system_prompt: SYSTEM_PROMPT, user_prompt };
}
