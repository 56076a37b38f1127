import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLinePrompt } from "../linePrompt.js";
import { EXIT_OK, PromptInterruptedError, runInsightPrompt } from "../runInsightPrompt.js";
import { InsightCache } from "../../insight/cache/InsightCache.js";
import { createLLMSettings } from "../../llm/invokeLLM.js";

const today = { year: 2024, month: 7, day: 15 };
const CANCER_FALLBACK = "Create a safe space for yourself and honor your feelings.";

function readAll(stream: PassThrough): string {
  const chunks: string[] = [];
  let chunk: unknown;
  while ((chunk = stream.read()) !== null) {
    chunks.push(String(chunk));
  }
  return chunks.join("");
}

describe("createLinePrompt", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers each question from a single piped chunk", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompt = createLinePrompt(input, output);
    input.end("Asha\n2024-07-10\n\nen\ntext\n");

    const answers: string[] = [];
    for (const question of ["a: ", "b: ", "c: ", "d: ", "e: "]) {
      answers.push(await prompt.ask(question));
    }
    prompt.close();

    expect(answers).toEqual(["Asha", "2024-07-10", "", "en", "text"]);
    expect(readAll(output)).toBe("a: b: c: d: e: ");
  });

  it("interrupts the question pending when input ends", async () => {
    const input = new PassThrough();
    const prompt = createLinePrompt(input, new PassThrough());
    input.end("Asha\n");

    await expect(prompt.ask("name: ")).resolves.toBe("Asha");
    await expect(prompt.ask("date: ")).rejects.toBeInstanceOf(PromptInterruptedError);
  });

  it("runs the whole prompt from piped input", async () => {
    const input = new PassThrough();
    const prompt = createLinePrompt(input, new PassThrough());
    input.end("Asha\n2024-07-10\n\nen\ntext\n");

    const lines: string[] = [];
    const code = await runInsightPrompt(
      { ask: prompt.ask, print: (line) => lines.push(line) },
      {
        cache: new InsightCache({ enabled: true, today: () => today }),
        llm: createLLMSettings({ apiKey: null }),
        today: () => today,
      }
    );
    prompt.close();

    expect(code).toBe(EXIT_OK);
    expect(lines).toContain("Name: Asha");
    expect(lines).toContain(CANCER_FALLBACK);
  });
});
