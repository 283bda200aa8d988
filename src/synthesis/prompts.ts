import type { CompiledPrompt, SynthesisRequest } from "../contracts/synthesis";
import { toJsonSchema } from "../schema/jsonSchema";

export const RECOVERY_SYSTEM_PROMPT = `You are an error recovery assistant. A program operation failed; you receive its name, arguments, the failure reason and the JSON Schema of the value it should have returned.
Infer the most plausible value the operation would have produced had it succeeded. Keep values consistent with the arguments (for example, reuse a requested id).
Do not explain the error. Return ONLY a JSON value matching the schema. No markdown. No code fences. No prose.`;

const MAX_SOURCE_CHARS = 4000;
const MAX_REASON_CHARS = 1200;

function schemaNameFor(operationName: string): string {
  // Structured-output APIs accept [a-zA-Z0-9_-]{1,64}.
  const cleaned = operationName.replace(/[^a-zA-Z0-9_-]+/g, "_").replace(/^_+|_+$/g, "");
  return (cleaned || "synthesized_value").slice(0, 64);
}

function clip(text: string, maxLen: number): string {
  return text.length <= maxLen ? text : `${text.slice(0, maxLen)}…`;
}

/**
 * Compile a synthesis request into the payload handed to the model client.
 * Pure: identical requests compile to identical prompts.
 */
export function compilePrompt(request: SynthesisRequest): CompiledPrompt {
  const jsonSchema = toJsonSchema(request.schema);
  const args = request.arguments.map((a) => `${a.name}=${a.value}`).join(", ");
  const argLines = request.arguments.length
    ? request.arguments.map((a) => `- ${a.name}: ${a.value}`).join("\n")
    : "(none)";

  const sections = [
    `The following operation failed: ${request.operationName}(${args})`,
    `Operation: ${request.operationName}`,
    request.description ? `Description: ${request.description}` : null,
    `Arguments:\n${argLines}`,
    `Failure reason:\n${clip(request.failureReason, MAX_REASON_CHARS) || "(not provided)"}`,
    request.source ? `Source code:\n${clip(request.source, MAX_SOURCE_CHARS)}` : null,
    `Target JSON Schema:\n${JSON.stringify(jsonSchema, null, 2)}`,
  ];

  if (request.attempt > 1 && request.priorRejection) {
    sections.push(
      `Attempt ${request.attempt}. Your previous response was rejected:\n${request.priorRejection}\nCorrect this structural violation and keep every other field conforming to the schema.`
    );
  }

  sections.push("Return ONLY valid JSON. No markdown. No code fences. No prose.");

  return {
    system: RECOVERY_SYSTEM_PROMPT,
    user: sections.filter((s): s is string => s !== null).join("\n\n"),
    schemaName: schemaNameFor(request.operationName),
    jsonSchema,
    attempt: request.attempt,
  };
}
