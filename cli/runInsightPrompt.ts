import { createBirthDetails } from "../astro/schemas/birthDetails.schema.js";
import { parseIsoDate } from "../astro/calendarDate.js";
import { InvalidInputError } from "../insight/errors.js";
import { normalizeLanguage } from "../insight/language.js";
import {
  InsightDeps,
  InsightResponse,
  isLlmEnabled,
  resolveInsight,
  toInsightResponseBody,
} from "../insight/resolveInsight.js";
import { errorMessage, insightLog } from "../logging/insightLog.js";

export type OutputFormat = "text" | "json";

export type PromptIO = {
  ask: (question: string) => Promise<string>;
  print: (line: string) => void;
};

export class PromptInterruptedError extends Error {
  constructor() {
    super("Prompt interrupted");
    this.name = "PromptInterruptedError";
  }
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

const SEPARATOR = "=".repeat(60);

export function formatTextOutput(name: string, response: InsightResponse): string[] {
  const traits = (response.traits ?? []).slice(0, 3).join(", ");
  return [
    SEPARATOR,
    `Name: ${name}`,
    `Zodiac Sign: ${response.zodiac} (${response.element ?? "Unknown"})`,
    `Ruling Planet: ${response.ruling_planet ?? "Unknown"}`,
    `Key Traits: ${traits}`,
    SEPARATOR,
    "",
    "✨ Your Daily Insight ✨",
    "",
    response.insight,
    "",
    SEPARATOR,
  ];
}

export function formatJsonOutput(response: InsightResponse): string {
  return JSON.stringify(toInsightResponseBody(response), null, 2);
}

function parseOutputFormat(raw: string): OutputFormat {
  const format = raw.trim().toLowerCase();
  return format === "json" ? "json" : "text";
}

/**
 * Interactive prompt sequence. Returns the process exit code instead of
 * exiting so the flow can be driven by scripted answers.
 */
export async function runInsightPrompt(io: PromptIO, deps: InsightDeps): Promise<number> {
  io.print(SEPARATOR);
  io.print("🌟 Astrological Insight Generator 🌟");
  io.print(SEPARATOR);
  io.print("");

  try {
    const name = (await io.ask("Enter your name: ")).trim();
    if (!name) {
      io.print("Error: Name cannot be empty");
      return EXIT_FAILURE;
    }

    const birthDateRaw = (await io.ask("Enter your birth date (YYYY-MM-DD): ")).trim();
    if (!parseIsoDate(birthDateRaw)) {
      io.print("Error: Invalid date format. Use YYYY-MM-DD");
      return EXIT_FAILURE;
    }

    const birthPlace = (await io.ask("Enter your birth place (optional): ")).trim();
    const language = normalizeLanguage(await io.ask("Choose language (en/hi) [default: en]: "));
    const format = parseOutputFormat(await io.ask("Output format (text/json) [default: text]: "));

    io.print("");
    io.print("Generating your personalized insight...");
    io.print("");

    const details = createBirthDetails(
      { name, birth_date: birthDateRaw, birth_place: birthPlace || null },
      deps.today ? deps.today() : undefined
    );

    if (!isLlmEnabled(deps.llm)) {
      io.print("Note: OpenAI API key not found. Using rule-based insights.");
      io.print("Set OPENAI_API_KEY environment variable for AI-generated insights.");
      io.print("");
    }

    const response = await resolveInsight(details, language, deps);

    if (format === "json") {
      io.print(formatJsonOutput(response));
    } else {
      for (const line of formatTextOutput(details.name, response)) {
        io.print(line);
      }
    }

    return EXIT_OK;
  } catch (err) {
    if (err instanceof PromptInterruptedError) {
      io.print("");
      io.print("Exiting...");
      return EXIT_INTERRUPTED;
    }

    if (err instanceof InvalidInputError) {
      io.print(`Error: ${err.message}`);
      return EXIT_FAILURE;
    }

    insightLog({ event: "cli.failed", error_message: errorMessage(err) });
    io.print(`Error: ${errorMessage(err)}`);
    return EXIT_FAILURE;
  }
}
