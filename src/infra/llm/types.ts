import type { CompiledPrompt } from "../../contracts/synthesis";

export type CompletionOpts = {
  model: string;
  temperature: number;
  maxTokens: number;
  // Send the JSON schema as a structured-output constraint where supported.
  structuredOutput: boolean;
};

export type TransportReply = {
  text: string;
  status: number;
  model: string;
};

/**
 * One provider's wire protocol. A transport performs exactly one request and
 * reports failures as TransportError; retries and deadlines belong to
 * ModelClient.
 */
export type ModelTransport = {
  readonly provider: string;
  send(prompt: CompiledPrompt, signal: AbortSignal): Promise<TransportReply>;
};

export type TransportFailureKind = "network" | "status";

export class TransportError extends Error {
  kind: TransportFailureKind;
  status: number | undefined;
  retryable: boolean;

  constructor(message: string, opts: { kind: TransportFailureKind; status?: number; retryable?: boolean }) {
    super(message);
    this.name = "TransportError";
    this.kind = opts.kind;
    this.status = opts.status;
    this.retryable = opts.retryable ?? (opts.kind === "network" || isRetryableStatus(opts.status));
  }
}

export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return false;
  return status === 408 || status === 429 || status >= 500;
}

export type Deadline = {
  // Epoch milliseconds after which the call is abandoned.
  expiresAt: number;
  signal?: AbortSignal;
};

// setTimeout fires at once for delays beyond a signed 32-bit millisecond count.
export const MAX_TIMER_MS = 2_147_483_647;

export function clampTimerMs(ms: number): number {
  if (Number.isNaN(ms)) return 0;
  return Math.min(Math.max(ms, 0), MAX_TIMER_MS);
}

export function deadlineIn(ms: number, signal?: AbortSignal): Deadline {
  const expiresAt = Date.now() + clampTimerMs(ms);
  return signal ? { expiresAt, signal } : { expiresAt };
}
