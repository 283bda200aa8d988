import Anthropic from "@anthropic-ai/sdk";
import type { CompiledPrompt } from "../../contracts/synthesis";
import type { CompletionOpts, ModelTransport, TransportReply } from "./types";
import { TransportError } from "./types";

export const DEFAULT_ANTHROPIC_MODEL = "claude-haiku-4-5-20251001";

type MessageLike = {
  model: string;
  content: Array<{ type: string; text?: string }>;
};

export type CreateMessage = (
  body: Anthropic.MessageCreateParamsNonStreaming,
  options: { signal: AbortSignal }
) => Promise<MessageLike>;

let anthropicClient: Anthropic | null = null;

/**
 * Singleton Anthropic client. SDK retries are off so RetryingModelClient
 * alone decides when to try again.
 */
export function getAnthropicClient(apiKey: string, baseURL?: string): Anthropic {
  if (!anthropicClient || anthropicClient.apiKey !== apiKey || (baseURL && anthropicClient.baseURL !== baseURL)) {
    anthropicClient = new Anthropic({ apiKey, maxRetries: 0, ...(baseURL ? { baseURL } : {}) });
  }
  return anthropicClient;
}

export function createAnthropicTransport(
  opts: CompletionOpts & { apiKey: string; baseURL?: string; createMessage?: CreateMessage }
): ModelTransport {
  const createMessage: CreateMessage =
    opts.createMessage ??
    ((body, options) => getAnthropicClient(opts.apiKey, opts.baseURL).messages.create(body, options));

  return {
    provider: "anthropic",
    async send(prompt: CompiledPrompt, signal: AbortSignal): Promise<TransportReply> {
      // No native JSON-schema mode: structured output prefills the opening brace.
      const prefill = opts.structuredOutput && prompt.jsonSchema.type === "object" ? "{" : "";
      try {
        const message = await createMessage(
          {
            model: opts.model,
            max_tokens: opts.maxTokens,
            temperature: opts.temperature,
            system: prompt.system,
            messages: prefill
              ? [
                  { role: "user", content: prompt.user },
                  { role: "assistant", content: prefill },
                ]
              : [{ role: "user", content: prompt.user }],
          },
          { signal }
        );
        const text = message.content
          .map((block) => (block.type === "text" && typeof block.text === "string" ? block.text : ""))
          .join("\n");
        return { text: `${prefill}${text}`, status: 200, model: message.model || opts.model };
      } catch (err) {
        throw toAnthropicTransportError(err);
      }
    },
  };
}

function toAnthropicTransportError(err: unknown): unknown {
  if (err instanceof Anthropic.APIUserAbortError) return err;
  if (err instanceof Anthropic.APIConnectionError) {
    return new TransportError(`Connection failed: ${err.message}`, { kind: "network" });
  }
  if (err instanceof Anthropic.APIError) {
    const status = typeof err.status === "number" ? err.status : undefined;
    return new TransportError(`Anthropic API error (${status ?? "unknown"}): ${err.message}`, {
      kind: "status",
      ...(status === undefined ? {} : { status }),
    });
  }
  return err;
}
