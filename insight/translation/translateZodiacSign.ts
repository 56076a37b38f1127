import { z } from "zod";
import { loadDataFile } from "../../data/loadDataFile.js";

const SignTranslationsSchema = z.record(z.string(), z.record(z.string(), z.string().min(1)));

const SIGN_TRANSLATIONS = loadDataFile("signTranslations.json", SignTranslationsSchema);

/**
 * Display name of a sign in the given language. Falls back to the English
 * name when there is no table for the language or no entry for the sign.
 */
export function translateZodiacSign(sign: string, language: string): string {
  if (language === "en") return sign;

  const translations = SIGN_TRANSLATIONS[language];
  return translations?.[sign] ?? sign;
}
