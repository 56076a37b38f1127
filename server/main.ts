import "dotenv/config";
import { loadConfig } from "../config/env.js";
import { InsightCache } from "../insight/cache/InsightCache.js";
import { createLLMSettings } from "../llm/invokeLLM.js";
import { insightLog } from "../logging/insightLog.js";
import { createApp, startServer } from "./app.js";

async function main() {
  const config = loadConfig();

  const cache = new InsightCache({ enabled: config.cachingEnabled });
  const llm = createLLMSettings({
    apiKey: config.openaiApiKey,
    model: config.openaiModel,
    timeoutMs: config.llmTimeoutMs,
  });

  const app = createApp({ cache, llm }, { appEnv: config.appEnv });

  await startServer(app, config.port, "0.0.0.0");

  insightLog({
    event: "server.started",
    port: config.port,
    app_env: config.appEnv,
    llm_enabled: config.openaiApiKey !== null,
    caching_enabled: config.cachingEnabled,
  });
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
