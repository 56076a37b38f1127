import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { handleHealth, handleInsight, handleZodiacLookup } from "../handlers.js";
import { InsightCache } from "../../insight/cache/InsightCache.js";
import { InsightDeps } from "../../insight/resolveInsight.js";
import { createLLMSettings } from "../../llm/invokeLLM.js";

const today = { year: 2024, month: 7, day: 15 };

function buildDeps(): InsightDeps {
  return {
    cache: new InsightCache({ enabled: true, today: () => today }),
    llm: createLLMSettings({ apiKey: null }),
    today: () => today,
  };
}

describe("handleHealth", () => {
  it("reports the service as healthy", () => {
    expect(handleHealth()).toEqual({
      status: 200,
      body: { status: "healthy", service: "astrological-insight-generator" },
    });
  });
});

describe("handleZodiacLookup", () => {
  const deps = { today: () => today };

  it("requires a date", () => {
    expect(handleZodiacLookup({}, deps)).toEqual({
      status: 400,
      body: { error: "Missing 'date' parameter" },
    });
  });

  it("rejects malformed dates, including repeated parameters", () => {
    const expected = { status: 400, body: { error: "Invalid date format. Use YYYY-MM-DD" } };
    expect(handleZodiacLookup({ date: "10-07-2024" }, deps)).toEqual(expected);
    expect(handleZodiacLookup({ date: ["2024-07-10", "2024-07-11"] }, deps)).toEqual(expected);
  });

  it("rejects future dates", () => {
    expect(handleZodiacLookup({ date: "2024-07-16" }, deps)).toEqual({
      status: 400,
      body: { error: "Birth date cannot be in the future" },
    });
  });

  it("defaults unknown languages to English", () => {
    const result = handleZodiacLookup({ date: "2024-07-10", language: "fr" }, deps);

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ sign: "Cancer", language: "en" });
  });
});

describe("handleInsight", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it.each([null, [], {}, "text"])("rejects %j as a missing body", async (body) => {
    expect(await handleInsight(body, buildDeps())).toEqual({
      status: 400,
      body: { error: "Missing request body" },
    });
  });

  it("rejects missing required fields", async () => {
    expect(await handleInsight({ name: "Asha" }, buildDeps())).toEqual({
      status: 400,
      body: { error: "Missing required fields: name, birth_date" },
    });
  });

  it("rejects a non-string language", async () => {
    expect(
      await handleInsight({ name: "Asha", birth_date: "2024-07-10", language: 7 }, buildDeps())
    ).toEqual({
      status: 400,
      body: { error: "Invalid language. Use en or hi" },
    });
  });

  it("returns the insight for valid input", async () => {
    const result = await handleInsight(
      { name: "Asha", birth_date: "2024-07-10", birth_place: "Pune", language: "EN" },
      buildDeps()
    );

    expect(result).toEqual({
      status: 200,
      body: {
        zodiac: "Cancer",
        insight: "Create a safe space for yourself and honor your feelings.",
        language: "en",
        element: "Water",
        ruling_planet: "Moon",
        traits: ["intuitive", "emotional", "nurturing", "protective", "sensitive"],
      },
    });
  });

  it.each([
    { birth_time: "14:30:00" },
    { birth_time: "9:30" },
    { birth_place: 42 },
  ])("accepts informational field %j as given", async (extra) => {
    const result = await handleInsight({ name: "Asha", birth_date: "2024-07-10", ...extra }, buildDeps());
    expect(result.status).toBe(200);
  });

  it("propagates unexpected errors", async () => {
    const deps = buildDeps();
    vi.spyOn(deps.cache, "get").mockImplementation(() => {
      throw new Error("cache offline");
    });

    await expect(handleInsight({ name: "Asha", birth_date: "2024-07-10" }, deps)).rejects.toThrow(
      "cache offline"
    );
  });
});
