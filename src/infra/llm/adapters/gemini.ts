import { z } from "zod";
import type { CompiledPrompt } from "../../../contracts/synthesis";
import type { CompletionOpts, ModelTransport, TransportReply } from "../types";
import { TransportError } from "../types";

// Default to a broadly available model (free keys often lack access to Pro).
export const DEFAULT_GEMINI_MODEL = "gemini-1.5-flash";
const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional() })
          .passthrough()
          .optional(),
      })
    )
    .optional(),
  modelVersion: z.string().optional(),
});

export function createGeminiTransport(
  opts: CompletionOpts & { apiKey: string; baseURL?: string; fetch?: typeof fetch }
): ModelTransport {
  const baseURL = (opts.baseURL ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  const fetchImpl = opts.fetch ?? fetch;

  return {
    provider: "gemini",
    async send(prompt: CompiledPrompt, signal: AbortSignal): Promise<TransportReply> {
      const url = `${baseURL}/models/${encodeURIComponent(opts.model)}:generateContent?key=${encodeURIComponent(opts.apiKey)}`;
      let res: Response;
      try {
        res = await fetchImpl(url, {
          method: "POST",
          headers: { "content-type": "application/json" },
          signal,
          body: JSON.stringify({
            // Conservative: combine system + user to avoid API/version quirks around system instruction fields.
            contents: [{ role: "user", parts: [{ text: `${prompt.system}\n\n${prompt.user}`.trim() }] }],
            generationConfig: {
              temperature: opts.temperature,
              maxOutputTokens: opts.maxTokens,
              ...(opts.structuredOutput ? { responseMimeType: "application/json" } : {}),
            },
          }),
        });
      } catch (err) {
        if (signal.aborted) throw err;
        throw new TransportError(`Gemini request failed: ${err instanceof Error ? err.message : String(err)}`, {
          kind: "network",
        });
      }

      const raw = await res.text();
      if (res.status < 200 || res.status >= 300) {
        throw new TransportError(`Gemini API error (${res.status}): ${raw.slice(0, 800)}`, {
          kind: "status",
          status: res.status,
        });
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch {
        throw new TransportError(`Gemini API returned non-JSON: ${raw.slice(0, 800)}`, {
          kind: "status",
          status: res.status,
          retryable: false,
        });
      }
      const parsed = GeminiResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new TransportError(`Gemini API returned an unexpected payload: ${parsed.error.issues[0]?.message ?? "unknown"}`, {
          kind: "status",
          status: res.status,
          retryable: false,
        });
      }

      const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
      const text = parts
        .map((p) => p.text ?? "")
        .join("")
        .trim();
      return { text, status: res.status, model: parsed.data.modelVersion ?? opts.model };
    },
  };
}
