import type { PathSegment, PrimitiveDescriptor, SchemaDescriptor } from "../contracts/schemaDescriptor";
import { describeKind } from "../contracts/schemaDescriptor";
import type { RawModelResponse, RejectionReason, ValidatedValue } from "../contracts/synthesis";
import { tryParseJson } from "../utils/jsonParser";

export type ValidationResult = { ok: true; value: ValidatedValue } | { ok: false; rejection: RejectionReason };

type Checked = ValidationResult;

/**
 * Two gates: a lenient syntactic parse of the model text, then a structural
 * conformance check. The first failing path is reported so the next prompt
 * can ask for exactly that correction.
 */
export function validateResponse(raw: RawModelResponse, schema: SchemaDescriptor): ValidationResult {
  let parsed: unknown;
  try {
    parsed = tryParseJson(raw.text);
  } catch (err) {
    return {
      ok: false,
      rejection: {
        kind: "unparseable",
        message: err instanceof Error ? err.message : String(err),
        excerpt: raw.text.slice(0, 200),
      },
    };
  }
  return checkConformance(parsed, schema);
}

export function checkConformance(value: unknown, schema: SchemaDescriptor): ValidationResult {
  return check(value, schema, []);
}

export function observedKind(value: unknown): string {
  if (value === undefined) return "missing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "number";
  return typeof value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function mismatch(path: PathSegment[], schema: SchemaDescriptor, value: unknown): Checked {
  return {
    ok: false,
    rejection: { kind: "schema", path, expected: describeKind(schema), observed: observedKind(value) },
  };
}

function check(value: unknown, schema: SchemaDescriptor, path: PathSegment[]): Checked {
  if (value === null && schema.nullable) return { ok: true, value: null };

  switch (schema.type) {
    case "primitive":
      return checkPrimitive(value, schema, path);

    case "sequence": {
      if (!Array.isArray(value)) return mismatch(path, schema, value);
      const out: ValidatedValue[] = [];
      for (let i = 0; i < value.length; i++) {
        const item = check(value[i], schema.element, [...path, i]);
        if (!item.ok) return item;
        out.push(item.value);
      }
      return { ok: true, value: out };
    }

    case "mapping": {
      if (!isPlainObject(value)) return mismatch(path, schema, value);
      const out: { [key: string]: ValidatedValue } = {};
      for (const [key, entry] of Object.entries(value)) {
        const item = check(entry, schema.value, [...path, key]);
        if (!item.ok) return item;
        out[key] = item.value;
      }
      return { ok: true, value: out };
    }

    case "record": {
      if (!isPlainObject(value)) return mismatch(path, schema, value);
      const out: { [key: string]: ValidatedValue } = {};
      for (const field of schema.fields) {
        // Own keys only, so a field named like an Object.prototype member reads as absent.
        const entry = Object.hasOwn(value, field.name) ? value[field.name] : undefined;
        // Models often emit null for an omitted optional field; treat it as absent.
        const absent = entry === undefined || (entry === null && !field.required && !field.schema.nullable);
        if (absent) {
          if (field.required) return mismatch([...path, field.name], field.schema, entry);
          continue;
        }
        const item = check(entry, field.schema, [...path, field.name]);
        if (!item.ok) return item;
        out[field.name] = item.value;
      }
      if (schema.closed) {
        const declared = new Set(schema.fields.map((f) => f.name));
        for (const key of Object.keys(value)) {
          if (!declared.has(key)) {
            return {
              ok: false,
              rejection: { kind: "schema", path: [...path, key], expected: "absent", observed: observedKind(value[key]) },
            };
          }
        }
      }
      return { ok: true, value: out };
    }
  }
}

function checkPrimitive(value: unknown, schema: PrimitiveDescriptor, path: PathSegment[]): Checked {
  switch (schema.kind) {
    case "string":
      return typeof value === "string" ? { ok: true, value } : mismatch(path, schema, value);
    case "boolean":
      return typeof value === "boolean" ? { ok: true, value } : mismatch(path, schema, value);
    case "number":
      return typeof value === "number" && Number.isFinite(value) ? { ok: true, value } : mismatch(path, schema, value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value) ? { ok: true, value } : mismatch(path, schema, value);
    case "datetime":
      if (typeof value === "string" && !Number.isNaN(Date.parse(value))) return { ok: true, value };
      return {
        ok: false,
        rejection: {
          kind: "schema",
          path,
          expected: "datetime",
          observed: typeof value === "string" ? "string (not an ISO-8601 date-time)" : observedKind(value),
        },
      };
  }
}
