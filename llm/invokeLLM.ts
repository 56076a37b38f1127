import { z } from "zod";

export type AssembledPrompt = {
  system_prompt: string;
  user_prompt: string;
};

export type LLMInvocationConfig = {
  provider: "openai";
  model: string;

  temperature: number;
  max_tokens: number;

  frequency_penalty: number;
  presence_penalty: number;

  stop_sequences: string[] | null;
  timeout_ms: number;
};

export type LLMErrorType = "timeout" | "provider_error" | "invalid_response" | "not_configured";

export type LLMInvocationResult =
  | {
      status: "ok";
      text: string;
      model: string;
      usage?: {
        prompt_tokens?: number;
        completion_tokens?: number;
        total_tokens?: number;
      };
    }
  | {
      status: "error";
      error_type: LLMErrorType;
      message: string;
    };

export type LLMInvoker = (
  prompt: AssembledPrompt,
  config: LLMInvocationConfig,
  apiKey: string | null
) => Promise<LLMInvocationResult>;

/**
 * What the generator and translator need to reach the model. A null apiKey
 * disables the LLM path.
 */
export type LLMSettings = {
  apiKey: string | null;
  model: string;
  timeoutMs: number;
  invoke: LLMInvoker;
};

export const OPENAI_CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";

export const DEFAULT_LLM_CONFIG: LLMInvocationConfig = {
  provider: "openai",
  model: "gpt-3.5-turbo",

  temperature: 0.7,
  max_tokens: 150,

  frequency_penalty: 0.0,
  presence_penalty: 0.0,

  stop_sequences: null,
  timeout_ms: 30000,
};

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

/**
 * One chat-completions call. Never throws: every failure comes back as an
 * error result. No retries.
 */
export const invokeLLM: LLMInvoker = async (prompt, config, apiKey) => {
  if (!apiKey) {
    return {
      status: "error",
      error_type: "not_configured",
      message: "OPENAI_API_KEY is not set",
    };
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.timeout_ms);

  try {
    const response = await fetch(OPENAI_CHAT_COMPLETIONS_URL, {
      method: "POST",
      signal: controller.signal,
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model: config.model,
        messages: [
          { role: "system", content: prompt.system_prompt },
          { role: "user", content: prompt.user_prompt },
        ],
        temperature: config.temperature,
        max_tokens: config.max_tokens,
        frequency_penalty: config.frequency_penalty,
        presence_penalty: config.presence_penalty,
        stop: config.stop_sequences ?? undefined,
        stream: false,
      }),
    });

    if (!response.ok) {
      const errorText = await safeReadError(response);
      return {
        status: "error",
        error_type: "provider_error",
        message: `OpenAI error ${response.status}: ${errorText}`,
      };
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      return {
        status: "error",
        error_type: "invalid_response",
        message: "OpenAI returned an unexpected response shape",
      };
    }

    const data = parsed.data;
    const content = data.choices[0]?.message.content;

    if (typeof content !== "string" || content.trim() === "") {
      return {
        status: "error",
        error_type: "invalid_response",
        message: "OpenAI returned empty content",
      };
    }

    return {
      status: "ok",
      text: content.trim(),
      model: data.model ?? config.model,
      usage: data.usage,
    };
  } catch (err) {
    if (controller.signal.aborted) {
      return {
        status: "error",
        error_type: "timeout",
        message: "LLM invocation timed out",
      };
    }

    return {
      status: "error",
      error_type: "provider_error",
      message: err instanceof Error ? err.message : "OpenAI invocation failed",
    };
  } finally {
    clearTimeout(timeout);
  }
};

async function safeReadError(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text || response.statusText || "Unknown provider error";
  } catch {
    return response.statusText || "Unknown provider error";
  }
}

export function createLLMSettings(options: {
  apiKey: string | null;
  model?: string;
  timeoutMs?: number;
  invoke?: LLMInvoker;
}): LLMSettings {
  return {
    apiKey: options.apiKey,
    model: options.model ?? DEFAULT_LLM_CONFIG.model,
    timeoutMs: options.timeoutMs ?? DEFAULT_LLM_CONFIG.timeout_ms,
    invoke: options.invoke ?? invokeLLM,
  };
}
