import type { EngineConfig } from "../../config";
import { apiKeyVariables } from "../../config";
import { ConfigError } from "../../synthesis/errors";
import { createGeminiTransport, DEFAULT_GEMINI_MODEL } from "./adapters/gemini";
import { createAnthropicTransport, DEFAULT_ANTHROPIC_MODEL } from "./anthropic";
import type { ModelClient } from "./modelClient";
import { RetryingModelClient } from "./modelClient";
import { createOpenAiCompatibleTransport, OPENAI_COMPATIBLE_PRESETS } from "./openaiCompatible";
import type { CompletionOpts, ModelTransport } from "./types";

export function createTransport(config: EngineConfig): ModelTransport {
  if (!config.apiKey) {
    throw new ConfigError(
      `No API key for provider "${config.provider}". Set ${apiKeyVariables(config.provider).join(" or ")}.`,
      { variable: apiKeyVariables(config.provider)[0] ?? "FALLBACK_PROVIDER" }
    );
  }

  const completion = (defaultModel: string): CompletionOpts => ({
    model: config.model ?? defaultModel,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    structuredOutput: config.structuredOutput,
  });
  const baseURL = config.baseURL === undefined ? {} : { baseURL: config.baseURL };

  switch (config.provider) {
    case "openai":
    case "groq":
    case "cerebras": {
      const preset = OPENAI_COMPATIBLE_PRESETS[config.provider];
      return createOpenAiCompatibleTransport({
        ...completion(preset.defaultModel),
        apiKey: config.apiKey,
        preset,
        ...baseURL,
      });
    }
    case "anthropic":
      return createAnthropicTransport({ ...completion(DEFAULT_ANTHROPIC_MODEL), apiKey: config.apiKey, ...baseURL });
    case "gemini":
      return createGeminiTransport({ ...completion(DEFAULT_GEMINI_MODEL), apiKey: config.apiKey, ...baseURL });
  }
}

export function createModelClient(config: EngineConfig, transport?: ModelTransport): ModelClient {
  return new RetryingModelClient(transport ?? createTransport(config), {
    transportRetries: config.transportRetries,
    backoffMs: config.backoffMs,
  });
}

export { RetryingModelClient } from "./modelClient";
export type { ModelClient, ModelClientOptions } from "./modelClient";
export type { Deadline, ModelTransport, TransportReply, CompletionOpts } from "./types";
export { TransportError, deadlineIn } from "./types";
