#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "../config/env.js";
import { InsightCache } from "../insight/cache/InsightCache.js";
import { createLLMSettings } from "../llm/invokeLLM.js";
import { createLinePrompt } from "./linePrompt.js";
import { runInsightPrompt } from "./runInsightPrompt.js";

async function main() {
  const config = loadConfig();

  const prompt = createLinePrompt(process.stdin, process.stdout);

  try {
    process.exitCode = await runInsightPrompt(
      { ask: prompt.ask, print: (line) => console.log(line) },
      {
        cache: new InsightCache({ enabled: config.cachingEnabled }),
        llm: createLLMSettings({
          apiKey: config.openaiApiKey,
          model: config.openaiModel,
          timeoutMs: config.llmTimeoutMs,
        }),
      }
    );
  } finally {
    prompt.close();
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
