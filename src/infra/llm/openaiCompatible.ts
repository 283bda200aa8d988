import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import type { CompiledPrompt } from "../../contracts/synthesis";
import type { CompletionOpts, ModelTransport, TransportReply } from "./types";
import { TransportError } from "./types";

export type OpenAiCompatiblePreset = {
  provider: string;
  baseURL: string | undefined;
  defaultModel: string;
};

export const OPENAI_COMPATIBLE_PRESETS = {
  openai: { provider: "openai", baseURL: undefined, defaultModel: "gpt-4.1-mini" },
  groq: {
    provider: "groq",
    baseURL: "https://api.groq.com/openai/v1",
    defaultModel: "moonshotai/kimi-k2-instruct",
  },
  cerebras: {
    provider: "cerebras",
    baseURL: "https://api.cerebras.ai/v1",
    defaultModel: "qwen-3-coder-480b",
  },
} satisfies Record<string, OpenAiCompatiblePreset>;

type ChatCompletionLike = {
  model: string;
  choices: Array<{ message: { content: string | null } }>;
};

export type CreateChatCompletion = (
  body: ChatCompletionCreateParamsNonStreaming,
  options: { signal: AbortSignal }
) => Promise<ChatCompletionLike>;

const sharedClients = new Map<string, OpenAI>();

function getOpenAiClient(apiKey: string, baseURL: string | undefined): OpenAI {
  const key = `${baseURL ?? "default"}|${apiKey}`;
  const existing = sharedClients.get(key);
  if (existing) return existing;
  const client = new OpenAI({ apiKey, baseURL: baseURL ?? null, maxRetries: 0 });
  sharedClients.set(key, client);
  return client;
}

/**
 * Chat-completions transport for OpenAI and API-compatible backends.
 * SDK-level retries are disabled; RetryingModelClient owns retry policy.
 */
export function createOpenAiCompatibleTransport(
  opts: CompletionOpts & {
    apiKey: string;
    preset: OpenAiCompatiblePreset;
    baseURL?: string;
    createCompletion?: CreateChatCompletion;
  }
): ModelTransport {
  const createCompletion: CreateChatCompletion =
    opts.createCompletion ??
    ((body, options) =>
      getOpenAiClient(opts.apiKey, opts.baseURL ?? opts.preset.baseURL).chat.completions.create(body, options));

  return {
    provider: opts.preset.provider,
    async send(prompt: CompiledPrompt, signal: AbortSignal): Promise<TransportReply> {
      const body: ChatCompletionCreateParamsNonStreaming = {
        model: opts.model,
        temperature: opts.temperature,
        max_tokens: opts.maxTokens,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
      };
      if (opts.structuredOutput) {
        body.response_format = {
          type: "json_schema",
          json_schema: { name: prompt.schemaName, schema: prompt.jsonSchema, strict: false },
        };
      }

      try {
        const completion = await createCompletion(body, { signal });
        const text = completion.choices[0]?.message.content ?? "";
        return { text, status: 200, model: completion.model || opts.model };
      } catch (err) {
        throw toTransportError(err);
      }
    },
  };
}

export function toTransportError(err: unknown): unknown {
  // Aborts are classified by the client from its own signal.
  if (err instanceof OpenAI.APIUserAbortError) return err;
  if (err instanceof OpenAI.APIConnectionError) {
    return new TransportError(`Connection failed: ${err.message}`, { kind: "network" });
  }
  if (err instanceof OpenAI.APIError) {
    const status = typeof err.status === "number" ? err.status : undefined;
    return new TransportError(`API error (${status ?? "unknown"}): ${err.message}`, {
      kind: "status",
      ...(status === undefined ? {} : { status }),
    });
  }
  return err;
}
