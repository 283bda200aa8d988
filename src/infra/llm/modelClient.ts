import { setTimeout as delay } from "timers/promises";
import type { CompiledPrompt, RawModelResponse } from "../../contracts/synthesis";
import { ModelClientError } from "../../synthesis/errors";
import { trace } from "../../utils/trace";
import type { Deadline, ModelTransport } from "./types";
import { clampTimerMs, TransportError } from "./types";

export type ModelClient = {
  invoke(prompt: CompiledPrompt, deadline: Deadline): Promise<RawModelResponse>;
};

export type ModelClientOptions = {
  transportRetries?: number;
  backoffMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
};

const DEFAULT_TRANSPORT_RETRIES = 2;
const DEFAULT_BACKOFF_MS = 250;

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, signal ? { signal } : {});
}

function abortAsRejection(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    const fail = () => reject(new Error("Model request aborted."));
    if (signal.aborted) {
      fail();
      return;
    }
    signal.addEventListener("abort", fail, { once: true });
  });
}

/**
 * Sends compiled prompts through a transport under a deadline.
 *
 * Retryable transport failures (connection errors, 408/429/5xx) are retried
 * with exponential backoff. Validation retries are the orchestrator's job.
 */
export class RetryingModelClient implements ModelClient {
  private readonly transportRetries: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly transport: ModelTransport,
    opts: ModelClientOptions = {}
  ) {
    this.transportRetries = Math.max(0, opts.transportRetries ?? DEFAULT_TRANSPORT_RETRIES);
    this.backoffMs = Math.max(0, opts.backoffMs ?? DEFAULT_BACKOFF_MS);
    this.sleep = opts.sleep ?? defaultSleep;
    this.now = opts.now ?? Date.now;
  }

  async invoke(prompt: CompiledPrompt, deadline: Deadline): Promise<RawModelResponse> {
    const maxTries = this.transportRetries + 1;
    let lastError: TransportError | undefined;
    let tries = 0;

    while (tries < maxTries) {
      tries++;
      this.assertTimeLeft(deadline, tries - 1);

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, clampTimerMs(deadline.expiresAt - this.now()));
      const forwardAbort = () => controller.abort();
      deadline.signal?.addEventListener("abort", forwardAbort, { once: true });

      const started = this.now();
      try {
        const pending = this.transport.send(prompt, controller.signal);
        void pending.catch((err: unknown) => {
          if (controller.signal.aborted) {
            trace("model.request.abandoned", {
              provider: this.transport.provider,
              error: err instanceof Error ? err.message : String(err),
            });
          }
        });
        const reply = await Promise.race([pending, abortAsRejection(controller.signal)]);
        const latency = this.now() - started;
        trace("model.request.ok", {
          provider: this.transport.provider,
          model: reply.model,
          status: reply.status,
          latencyMs: latency,
          tries,
        });
        return {
          text: reply.text,
          backendLatencyMs: latency,
          backendStatus: reply.status,
          provider: this.transport.provider,
          model: reply.model,
        };
      } catch (err) {
        if (deadline.signal?.aborted) {
          throw new ModelClientError("Model request cancelled by caller.", {
            kind: "timeout",
            attempts: tries,
            cancelled: true,
          });
        }
        if (timedOut || controller.signal.aborted) {
          throw new ModelClientError(`Model request exceeded its deadline after ${tries} tries.`, {
            kind: "timeout",
            attempts: tries,
          });
        }
        if (!(err instanceof TransportError)) throw err;

        lastError = err;
        trace("model.request.failed", {
          provider: this.transport.provider,
          tries,
          kind: err.kind,
          status: err.status,
          retryable: err.retryable,
          error: err.message,
        });
        if (!err.retryable) break;
      } finally {
        clearTimeout(timer);
        deadline.signal?.removeEventListener("abort", forwardAbort);
      }

      if (tries < maxTries) await this.backoff(tries, deadline);
    }

    if (lastError?.kind === "network") {
      throw new ModelClientError(`Backend unreachable after ${tries} tries: ${lastError.message}`, {
        kind: "unreachable",
        attempts: tries,
      });
    }
    throw new ModelClientError(`Backend rejected the request: ${lastError?.message ?? "unknown error"}`, {
      kind: "backend_rejected",
      attempts: tries,
      ...(lastError?.status === undefined ? {} : { status: lastError.status }),
    });
  }

  private assertTimeLeft(deadline: Deadline, triesSoFar: number): void {
    if (deadline.signal?.aborted) {
      throw new ModelClientError("Model request cancelled by caller.", {
        kind: "timeout",
        attempts: triesSoFar,
        cancelled: true,
      });
    }
    if (deadline.expiresAt - this.now() <= 0) {
      throw new ModelClientError("Model request deadline elapsed.", { kind: "timeout", attempts: triesSoFar });
    }
  }

  private async backoff(tries: number, deadline: Deadline): Promise<void> {
    const wait = this.backoffMs * 2 ** (tries - 1);
    if (this.now() + wait >= deadline.expiresAt) {
      throw new ModelClientError("Model request deadline elapsed during backoff.", {
        kind: "timeout",
        attempts: tries,
      });
    }
    if (wait === 0) return;
    try {
      await this.sleep(wait, deadline.signal);
    } catch (err) {
      if (deadline.signal?.aborted) {
        throw new ModelClientError("Model request cancelled by caller.", {
          kind: "timeout",
          attempts: tries,
          cancelled: true,
        });
      }
      throw err;
    }
  }
}
