import { z } from "zod";
import { loadDataFile } from "../../data/loadDataFile.js";

export const ZODIAC_SIGNS = [
  "Aries",
  "Taurus",
  "Gemini",
  "Cancer",
  "Leo",
  "Virgo",
  "Libra",
  "Scorpio",
  "Sagittarius",
  "Capricorn",
  "Aquarius",
  "Pisces",
] as const;

export const ZodiacSignSchema = z.enum(ZODIAC_SIGNS);
export type ZodiacSign = z.infer<typeof ZodiacSignSchema>;

export const ElementSchema = z.enum(["Fire", "Earth", "Air", "Water"]);
export type Element = z.infer<typeof ElementSchema>;

const SignRecordSchema = z.object({
  element: ElementSchema,
  ruling_planet: z.string().min(1),
  traits: z.array(z.string().min(1)).length(5),
  date_range: z.string().min(1),
});

const MonthDaySchema = z.tuple([
  z.number().int().min(1).max(12),
  z.number().int().min(1).max(31),
]);

const SignBoundarySchema = z.object({
  sign: ZodiacSignSchema,
  start: MonthDaySchema,
  end: MonthDaySchema,
});

export type SignBoundary = z.infer<typeof SignBoundarySchema>;

const ZodiacTableSchema = z.object({
  signs: z.record(ZodiacSignSchema, SignRecordSchema),
  boundaries: z.array(SignBoundarySchema).length(ZODIAC_SIGNS.length),
});

export type ZodiacInfo = {
  readonly sign: ZodiacSign;
  readonly element: Element;
  readonly ruling_planet: string;
  readonly traits: readonly string[];
  readonly date_range: string;
};

const table = loadDataFile("zodiacSigns.json", ZodiacTableSchema);

const ZODIAC_INFO: ReadonlyMap<string, ZodiacInfo> = new Map(
  ZODIAC_SIGNS.map((sign): [string, ZodiacInfo] => {
    const record = table.signs[sign];
    if (!record) {
      throw new Error(`zodiacSigns.json is missing a record for ${sign}`);
    }
    const info: ZodiacInfo = Object.freeze({
      sign,
      element: record.element,
      ruling_planet: record.ruling_planet,
      traits: Object.freeze([...record.traits]),
      date_range: record.date_range,
    });
    return [sign, info];
  })
);

/** Ordered (sign, start, end) tuples; Capricorn wraps the year boundary. */
export const SIGN_BOUNDARIES: readonly SignBoundary[] = table.boundaries;

export function isZodiacSign(value: string): value is ZodiacSign {
  return ZodiacSignSchema.safeParse(value).success;
}

/**
 * Static record for a sign name, or null for anything outside the 12 names.
 * Names are matched exactly ("aries" is not a sign).
 */
export function getZodiacInfo(sign: string): ZodiacInfo | null {
  return ZODIAC_INFO.get(sign) ?? null;
}

export function listZodiacSigns(): ZodiacSign[] {
  return [...ZODIAC_SIGNS];
}
