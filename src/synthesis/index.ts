import crypto from "crypto";
import type { EngineConfig } from "../config";
import { loadEngineConfig } from "../config";
import type { Result } from "../contracts/result";
import { describeFailure } from "../contracts/result";
import type {
  FallbackReason,
  RawModelResponse,
  RejectionReason,
  SynthesisArgument,
  SynthesisOutcome,
  SynthesisRequest,
  SynthesisState,
} from "../contracts/synthesis";
import { assertCanTransition } from "../contracts/synthesis";
import type { SchemaDescriptor } from "../contracts/schemaDescriptor";
import { formatPath } from "../contracts/schemaDescriptor";
import { createModelClient } from "../infra/llm";
import type { ModelClient } from "../infra/llm/modelClient";
import { deadlineIn } from "../infra/llm/types";
import type { TargetSchema } from "../schema/descriptorBuilder";
import { buildSchemaDescriptor } from "../schema/descriptorBuilder";
import { trace, traceText } from "../utils/trace";
import { markTraceAttempt, runWithTraceContext } from "../utils/traceContext";
import { describeRejection, ModelClientError, type ModelClientErrorKind } from "./errors";
import { materializeDefault, materializeValue } from "./materializer";
import { compilePrompt } from "./prompts";
import { validateResponse } from "./responseValidator";

export type OperationContext = {
  name: string;
  // Ordered (name, value) pairs, or an object whose key order is kept.
  args?: ReadonlyArray<readonly [string, unknown]> | Record<string, unknown>;
  description?: string;
  source?: string;
};

export type TransitionListener = (from: SynthesisState, to: SynthesisState, attempt: number) => void;

export type SynthesisCallOptions<T> = {
  signal?: AbortSignal;
  timeoutMs?: number;
  // Replaces the deterministic default instance when attempts run out.
  fallbackValue?: () => T;
  onTransition?: TransitionListener;
  onOutcome?: (outcome: SynthesisOutcome<T>) => void;
};

export type EngineOptions = {
  client?: ModelClient;
  config?: EngineConfig;
  maxAttempts?: number;
  timeoutMs?: number;
  includeSource?: boolean;
};

export type FallbackEngine = {
  synthesize<T>(
    result: Result<T, unknown>,
    target: TargetSchema<T>,
    context: OperationContext,
    call?: SynthesisCallOptions<T>
  ): Promise<T>;
  synthesizeOutcome<T>(
    result: Result<T, unknown>,
    target: TargetSchema<T>,
    context: OperationContext,
    call?: SynthesisCallOptions<T>
  ): Promise<SynthesisOutcome<T>>;
};

type Settings = {
  client: ModelClient;
  maxAttempts: number;
  timeoutMs: number;
  includeSource: boolean;
};

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_ARGUMENT_CHARS = 500;

const FALLBACK_REASON_BY_KIND: Record<ModelClientErrorKind, FallbackReason> = {
  timeout: "timeout",
  unreachable: "unreachable",
  backend_rejected: "backend_rejected",
};

function sha256(text: string): string {
  return crypto.createHash("sha256").update(text).digest("hex");
}

export function formatArgument(value: unknown): string {
  let text: string;
  if (value === undefined) {
    text = "undefined";
  } else if (typeof value === "function") {
    text = `[function ${value.name || "anonymous"}]`;
  } else if (typeof value === "bigint") {
    text = `${value}n`;
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
  }
  return text.length <= MAX_ARGUMENT_CHARS ? text : `${text.slice(0, MAX_ARGUMENT_CHARS)}…`;
}

export function normalizeArguments(args: OperationContext["args"]): SynthesisArgument[] {
  if (!args) return [];
  const entries: ReadonlyArray<readonly [string, unknown]> = Array.isArray(args) ? args : Object.entries(args);
  return entries.map(([name, value]) => ({ name, value: formatArgument(value) }));
}

class StateTracker {
  private state: SynthesisState = "Idle";

  private attempt = 0;

  constructor(private readonly onTransition: TransitionListener | undefined) {}

  to(next: SynthesisState, attempt = this.attempt): void {
    assertCanTransition(this.state, next);
    const from = this.state;
    this.state = next;
    this.attempt = attempt;
    trace("synthesis.state", { from, to: next, attempt });
    this.onTransition?.(from, next, attempt);
  }
}

/**
 * Drive one synthesis from a failure to a value.
 *
 * Validation-class rejections are retried with the rejection fed back into
 * the prompt, up to `maxAttempts`. Model client failures (timeout,
 * unreachable, backend rejection) end the loop at once. Either way the
 * outcome carries a value; `source` says whether the model produced it.
 */
async function runSynthesis<T>(
  failure: unknown,
  target: TargetSchema<T>,
  context: OperationContext,
  settings: Settings,
  call: SynthesisCallOptions<T>
): Promise<SynthesisOutcome<T>> {
  const schema = buildSchemaDescriptor(target);
  // Both checks run before any model call, so an unsupported target fails fast.
  const resolveDefault = call.fallbackValue ?? constantDefault(schema, target);
  const synthesisId = crypto.randomUUID();

  return runWithTraceContext({ synthesisId, operation: context.name }, async () => {
    const machine = new StateTracker(call.onTransition);
    const deadline = deadlineIn(call.timeoutMs ?? settings.timeoutMs, call.signal);
    const args = normalizeArguments(context.args);
    const failureReason = describeFailure(failure);
    const source = settings.includeSource ? context.source : undefined;
    const rejections: RejectionReason[] = [];
    let priorRejection: string | undefined;
    let attempt = 0;

    trace("synthesis.start", {
      failureReason,
      maxAttempts: settings.maxAttempts,
      timeoutMs: call.timeoutMs ?? settings.timeoutMs,
    });

    const finish = (outcome: SynthesisOutcome<T>): SynthesisOutcome<T> => {
      trace("synthesis.outcome", {
        source: outcome.source,
        attempts: outcome.attempts,
        ...(outcome.source === "default" ? { reason: outcome.reason } : {}),
      });
      call.onOutcome?.(outcome);
      return outcome;
    };

    const exhaust = (reason: FallbackReason): SynthesisOutcome<T> => {
      const lastRejection = rejections.at(-1);
      return finish({
        source: "default",
        value: resolveDefault(),
        attempts: attempt,
        reason,
        rejections,
        ...(lastRejection ? { lastRejection } : {}),
      });
    };

    while (attempt < settings.maxAttempts) {
      attempt++;
      markTraceAttempt(attempt);
      machine.to("Prompting", attempt);

      const request: SynthesisRequest = Object.freeze({
        schema,
        operationName: context.name,
        arguments: args,
        failureReason,
        attempt,
        ...(priorRejection === undefined ? {} : { priorRejection }),
        ...(source === undefined ? {} : { source }),
        ...(context.description === undefined ? {} : { description: context.description }),
      });
      const prompt = compilePrompt(request);
      traceText("synthesis.prompt", prompt.user);

      machine.to("AwaitingResponse");
      let raw: RawModelResponse;
      try {
        raw = await settings.client.invoke(prompt, deadline);
      } catch (err) {
        const kind: ModelClientErrorKind = err instanceof ModelClientError ? err.kind : "unreachable";
        console.warn(
          `Synthesis for ${context.name} attempt ${attempt}/${settings.maxAttempts} failed at the model client:`,
          err instanceof Error ? err.message : err
        );
        trace("synthesis.client.failed", {
          attempt,
          kind,
          cancelled: err instanceof ModelClientError ? err.cancelled : false,
          error: err instanceof Error ? err.message : String(err),
        });
        machine.to("ExhaustedFallback");
        return exhaust(FALLBACK_REASON_BY_KIND[kind]);
      }
      traceText("synthesis.response.raw", raw.text, {
        extra: { llmOutputHash: sha256(raw.text), latencyMs: raw.backendLatencyMs },
      });

      machine.to("Validating");
      const validated = validateResponse(raw, schema);
      let rejection: RejectionReason;
      if (validated.ok) {
        machine.to("Materializing");
        const materialized = materializeValue(validated.value, schema, target);
        if (materialized.ok) {
          machine.to("Succeeded");
          return finish({ source: "model", value: materialized.value, attempts: attempt, rejections });
        }
        rejection = materialized.rejection;
      } else {
        rejection = validated.rejection;
      }

      rejections.push(rejection);
      priorRejection = describeRejection(rejection);
      console.warn(`Synthesis for ${context.name} attempt ${attempt}/${settings.maxAttempts} rejected:`, priorRejection);
      trace("synthesis.attempt.rejected", {
        attempt,
        kind: rejection.kind,
        ...(rejection.kind === "unparseable" ? {} : { path: formatPath(rejection.path) }),
        reason: priorRejection,
      });
      machine.to("Retrying");
    }

    machine.to("ExhaustedFallback");
    return exhaust("attempts_exhausted");
  });
}

function constantDefault<T>(schema: SchemaDescriptor, target: TargetSchema<T>): () => T {
  const value = materializeDefault(schema, target);
  return () => value;
}

export function createFallbackEngine(opts: EngineOptions = {}): FallbackEngine {
  let settings: Settings | null = null;

  // Resolved on first failure so Ok results never touch configuration.
  const resolveSettings = (): Settings => {
    if (settings) return settings;
    const config = opts.config ?? (opts.client ? undefined : loadEngineConfig());
    settings = {
      client: opts.client ?? createModelClient(config ?? loadEngineConfig()),
      maxAttempts: opts.maxAttempts ?? config?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
      timeoutMs: opts.timeoutMs ?? config?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      includeSource: opts.includeSource ?? config?.includeSource ?? true,
    };
    return settings;
  };

  const synthesizeOutcome = async <T>(
    result: Result<T, unknown>,
    target: TargetSchema<T>,
    context: OperationContext,
    call: SynthesisCallOptions<T> = {}
  ): Promise<SynthesisOutcome<T>> => {
    if (result.ok) {
      return { source: "original", value: result.value, attempts: 0, rejections: [] };
    }
    return runSynthesis(result.error, target, context, resolveSettings(), call);
  };

  const synthesize = async <T>(
    result: Result<T, unknown>,
    target: TargetSchema<T>,
    context: OperationContext,
    call?: SynthesisCallOptions<T>
  ): Promise<T> => {
    if (result.ok) return result.value;
    const outcome = await synthesizeOutcome(result, target, context, call);
    return outcome.value;
  };

  return { synthesize, synthesizeOutcome };
}

let defaultEngine: FallbackEngine | null = null;

export function getDefaultEngine(): FallbackEngine {
  if (!defaultEngine) defaultEngine = createFallbackEngine();
  return defaultEngine;
}

export function configureDefaultEngine(opts: EngineOptions): FallbackEngine {
  defaultEngine = createFallbackEngine(opts);
  return defaultEngine;
}

/**
 * Return the operation's value, or a synthesized substitute when it failed.
 * Never rejects for operational failures; UnsupportedTypeError and
 * ConfigError signal defects in the call itself.
 */
export function synthesize<T>(
  result: Result<T, unknown>,
  target: TargetSchema<T>,
  context: OperationContext,
  call?: SynthesisCallOptions<T>
): Promise<T> {
  if (result.ok) return Promise.resolve(result.value);
  return getDefaultEngine().synthesize(result, target, context, call);
}

export function synthesizeOutcome<T>(
  result: Result<T, unknown>,
  target: TargetSchema<T>,
  context: OperationContext,
  call?: SynthesisCallOptions<T>
): Promise<SynthesisOutcome<T>> {
  return getDefaultEngine().synthesizeOutcome(result, target, context, call);
}
