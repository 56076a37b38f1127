export const SUPPORTED_LANGUAGES = ["en", "hi"] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

export const DEFAULT_LANGUAGE: SupportedLanguage = "en";

export function isSupportedLanguage(value: string): value is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some((language) => language === value);
}

/** Lowercases the code; anything unsupported (or absent) becomes English. */
export function normalizeLanguage(raw: string | null | undefined): SupportedLanguage {
  const code = (raw ?? "").trim().toLowerCase();
  return isSupportedLanguage(code) ? code : DEFAULT_LANGUAGE;
}
