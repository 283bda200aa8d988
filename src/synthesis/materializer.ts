import type { SchemaDescriptor } from "../contracts/schemaDescriptor";
import type { RejectionReason, ValidatedValue } from "../contracts/synthesis";
import { buildDefaultInstance } from "../schema/defaults";
import type { TargetSchema } from "../schema/descriptorBuilder";
import { describeRejection, UnsupportedTypeError } from "./errors";

export type MaterializationResult<T> = { ok: true; value: T } | { ok: false; rejection: RejectionReason };

/**
 * Final type-safety gate. Revives wire-only encodings (date-time strings to
 * Date), then parses with the caller's target schema so ranges, integer-ness,
 * enum membership, lengths and refinements are enforced.
 */
export function materializeValue<T>(
  value: ValidatedValue,
  schema: SchemaDescriptor,
  target: TargetSchema<T>
): MaterializationResult<T> {
  const result = target.safeParse(revive(value, schema));
  if (result.success) return { ok: true, value: result.data };

  const issue = result.error.issues[0];
  return {
    ok: false,
    rejection: {
      kind: "materialization",
      path: issue ? [...issue.path] : [],
      message: issue?.message ?? "Value does not satisfy the target type.",
    },
  };
}

/**
 * Materialize the deterministic default instance of a target. A target whose
 * refinements no minimal instance satisfies is unsupported.
 */
export function materializeDefault<T>(schema: SchemaDescriptor, target: TargetSchema<T>): T {
  const materialized = materializeValue(buildDefaultInstance(schema), schema, target);
  if (materialized.ok) return materialized.value;

  const { rejection } = materialized;
  throw new UnsupportedTypeError(
    `No default instance satisfies this refinement: ${
      rejection.kind === "materialization" ? rejection.message : describeRejection(rejection)
    }`,
    { path: rejection.kind === "unparseable" ? [] : [...rejection.path], construct: "refinement" }
  );
}

function revive(value: ValidatedValue, schema: SchemaDescriptor): unknown {
  if (value === null) return null;

  switch (schema.type) {
    case "primitive":
      return schema.kind === "datetime" && typeof value === "string" ? new Date(value) : value;
    case "sequence":
      return Array.isArray(value) ? value.map((item) => revive(item, schema.element)) : value;
    case "mapping": {
      if (!isRecord(value)) return value;
      const out = bareObject();
      for (const [key, entry] of Object.entries(value)) out[key] = revive(entry, schema.value);
      return out;
    }
    case "record": {
      if (!isRecord(value)) return value;
      const out = bareObject();
      for (const field of schema.fields) {
        const entry = Object.hasOwn(value, field.name) ? value[field.name] : undefined;
        if (entry !== undefined) out[field.name] = revive(entry, field.schema);
      }
      return out;
    }
  }
}

// Without a prototype, zod reads an absent "constructor" or "toString" field as undefined.
function bareObject(): Record<string, unknown> {
  return Object.create(null);
}

function isRecord(value: ValidatedValue): value is { [key: string]: ValidatedValue } {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
