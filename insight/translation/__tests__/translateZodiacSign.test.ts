import { describe, expect, it } from "vitest";
import { translateZodiacSign } from "../translateZodiacSign.js";
import { ZODIAC_SIGNS } from "../../../astro/zodiac/zodiacTable.js";

describe("translateZodiacSign", () => {
  it("returns the Devanagari name for Hindi", () => {
    expect(translateZodiacSign("Aries", "hi")).toBe("मेष");
    expect(translateZodiacSign("Cancer", "hi")).toBe("कर्क");
    expect(translateZodiacSign("Pisces", "hi")).toBe("मीन");
  });

  it("has a Hindi name for every sign", () => {
    for (const sign of ZODIAC_SIGNS) {
      expect(translateZodiacSign(sign, "hi")).not.toBe(sign);
    }
  });

  it("is the identity for English", () => {
    expect(translateZodiacSign("Aries", "en")).toBe("Aries");
  });

  it("passes the name through for unknown languages and signs", () => {
    expect(translateZodiacSign("Aries", "fr")).toBe("Aries");
    expect(translateZodiacSign("Ophiuchus", "hi")).toBe("Ophiuchus");
  });
});
