import { z } from "zod";
import type { PathSegment, SchemaDescriptor } from "./schemaDescriptor";

export type SynthesisArgument = {
  name: string;
  value: string;
};

export type SynthesisRequest = {
  readonly schema: SchemaDescriptor;
  readonly operationName: string;
  readonly arguments: readonly SynthesisArgument[];
  readonly failureReason: string;
  readonly attempt: number;
  readonly priorRejection?: string;
  // Source text of the wrapped operation, when the caller opted in.
  readonly source?: string;
  readonly description?: string;
};

export type CompiledPrompt = {
  system: string;
  user: string;
  schemaName: string;
  jsonSchema: Record<string, unknown>;
  attempt: number;
};

export type RawModelResponse = {
  text: string;
  backendLatencyMs: number;
  backendStatus: number;
  provider: string;
  model: string;
};

// JSON-like value known to conform to a SchemaDescriptor.
export type ValidatedValue =
  | null
  | boolean
  | number
  | string
  | ValidatedValue[]
  | { [key: string]: ValidatedValue };

export type RejectionReason =
  | { kind: "unparseable"; message: string; excerpt: string }
  | { kind: "schema"; path: PathSegment[]; expected: string; observed: string }
  | { kind: "materialization"; path: PathSegment[]; message: string };

// "original": the operation succeeded and no synthesis ran.
export const OutcomeSourceSchema = z.enum(["original", "model", "default"]);
export type OutcomeSource = z.infer<typeof OutcomeSourceSchema>;

export const FallbackReasonSchema = z.enum([
  "attempts_exhausted",
  "timeout",
  "unreachable",
  "backend_rejected",
]);
export type FallbackReason = z.infer<typeof FallbackReasonSchema>;

export type SynthesisOutcome<T> =
  | {
      source: "original";
      value: T;
      attempts: 0;
      rejections: [];
    }
  | {
      source: "model";
      value: T;
      attempts: number;
      rejections: RejectionReason[];
    }
  | {
      source: "default";
      value: T;
      attempts: number;
      reason: FallbackReason;
      rejections: RejectionReason[];
      lastRejection?: RejectionReason;
    };

export const SynthesisStateSchema = z.enum([
  "Idle",
  "Prompting",
  "AwaitingResponse",
  "Validating",
  "Materializing",
  "Retrying",
  "Succeeded",
  "ExhaustedFallback",
]);
export type SynthesisState = z.infer<typeof SynthesisStateSchema>;

const ALLOWED_TRANSITIONS: Record<SynthesisState, SynthesisState[]> = {
  Idle: ["Prompting"],
  Prompting: ["AwaitingResponse"],
  AwaitingResponse: ["Validating", "ExhaustedFallback"],
  Validating: ["Materializing", "Retrying"],
  Materializing: ["Succeeded", "Retrying"],
  Retrying: ["Prompting", "ExhaustedFallback"],
  Succeeded: [],
  ExhaustedFallback: [],
};

export function canTransition(from: SynthesisState, to: SynthesisState): boolean {
  const allowed = ALLOWED_TRANSITIONS[from] ?? [];
  return allowed.includes(to);
}

export function assertCanTransition(from: SynthesisState, to: SynthesisState): void {
  if (!canTransition(from, to)) {
    throw new Error(`Invalid synthesis state transition: ${from} -> ${to}`);
  }
}
