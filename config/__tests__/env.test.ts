import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../env.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      openaiApiKey: null,
      openaiModel: "gpt-3.5-turbo",
      llmTimeoutMs: 30000,
      cachingEnabled: true,
      port: 5000,
      appEnv: "production",
    });
  });

  it("reads every setting", () => {
    expect(
      loadConfig({
        OPENAI_API_KEY: "test-secret",
        OPENAI_MODEL: "gpt-test",
        LLM_TIMEOUT_MS: "1500",
        ENABLE_CACHING: "false",
        PORT: "8080",
        APP_ENV: "Development",
      })
    ).toEqual({
      openaiApiKey: "test-secret",
      openaiModel: "gpt-test",
      llmTimeoutMs: 1500,
      cachingEnabled: false,
      port: 8080,
      appEnv: "development",
    });
  });

  it("treats an empty API key as missing", () => {
    expect(loadConfig({ OPENAI_API_KEY: "" }).openaiApiKey).toBeNull();
  });

  it("enables caching only for a case-insensitive 'true'", () => {
    expect(loadConfig({ ENABLE_CACHING: "TRUE" }).cachingEnabled).toBe(true);
    expect(loadConfig({ ENABLE_CACHING: "yes" }).cachingEnabled).toBe(false);
    expect(loadConfig({ ENABLE_CACHING: "0" }).cachingEnabled).toBe(false);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(ConfigError);
    expect(() => loadConfig({ APP_ENV: "staging" })).toThrow(/APP_ENV/);
    expect(() => loadConfig({ LLM_TIMEOUT_MS: "-5" })).toThrow(/LLM_TIMEOUT_MS/);
  });
});
