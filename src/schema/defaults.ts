import type {
  PrimitiveConstraints,
  PrimitiveDescriptor,
  SchemaDescriptor,
  StringFormat,
} from "../contracts/schemaDescriptor";
import type { ValidatedValue } from "../contracts/synthesis";

export const EPOCH_ISO = "1970-01-01T00:00:00.000Z";

/**
 * Deterministic minimal instance of a descriptor: zero values pulled into the
 * declared ranges and steps, a sample value for each string format, empty
 * (or minimum-length) sequences, required fields only.
 */
export function buildDefaultInstance(schema: SchemaDescriptor): ValidatedValue {
  switch (schema.type) {
    case "primitive":
      return defaultPrimitive(schema);
    case "sequence": {
      const count = schema.minItems ?? 0;
      return Array.from({ length: count }, () => buildDefaultInstance(schema.element));
    }
    case "mapping":
      return {};
    case "record": {
      const out: { [key: string]: ValidatedValue } = {};
      for (const field of schema.fields) {
        if (field.required) out[field.name] = buildDefaultInstance(field.schema);
      }
      return out;
    }
  }
}

// Shortest values each format accepts.
const FORMAT_SAMPLES: Record<StringFormat, string> = {
  email: "user@example.com",
  uri: "https://example.com",
  uuid: "00000000-0000-0000-0000-000000000000",
  "date-time": "1970-01-01T00:00:00Z",
  date: "1970-01-01",
  time: "00:00:00",
  duration: "P0D",
  ipv4: "127.0.0.1",
  ipv6: "::1",
  cuid: "c00000000",
  cuid2: "a",
  ulid: "00000000000000000000000000",
  nanoid: "000000000000000000000",
  emoji: "\u{1F600}",
  base64: "",
};

function defaultPrimitive(schema: PrimitiveDescriptor): ValidatedValue {
  const c = schema.constraints;
  const [first] = c.enum ?? [];
  if (first !== undefined) return first;

  switch (schema.kind) {
    case "boolean":
      return false;
    case "datetime":
      return defaultDate(c);
    case "string":
      return defaultString(c);
    case "number":
    case "integer":
      return defaultNumber(schema.kind === "integer", c);
  }
}

function defaultDate(c: PrimitiveConstraints): string {
  if (c.earliest !== undefined && Date.parse(c.earliest) > 0) return c.earliest;
  if (c.latest !== undefined && Date.parse(c.latest) < 0) return c.latest;
  return EPOCH_ISO;
}

function defaultString(c: PrimitiveConstraints): string {
  if (c.format === "date-time" || c.format === "time") {
    const fraction = c.precision ? `.${"0".repeat(c.precision)}` : "";
    return c.format === "time" ? `00:00:00${fraction}` : `1970-01-01T00:00:00${fraction}Z`;
  }
  if (c.format !== undefined) return FORMAT_SAMPLES[c.format];

  const prefix = c.prefix ?? "";
  const suffix = c.suffix ?? "";
  const middle = (c.contains ?? []).join("");
  const padding = Math.max(0, (c.minLength ?? 0) - prefix.length - middle.length - suffix.length);
  return `${prefix}${middle}${"x".repeat(padding)}${suffix}`;
}

function defaultNumber(integer: boolean, c: PrimitiveConstraints): number {
  const step = c.multipleOf ?? (integer ? 1 : undefined);
  const { minimum: min, maximum: max } = c;
  let value = 0;

  if (min !== undefined && (value < min || (c.exclusiveMinimum && value <= min))) {
    if (step === undefined) {
      value = c.exclusiveMinimum ? min + 1 : min;
    } else {
      value = multipleOf(Math.ceil(min / step), step);
      if (c.exclusiveMinimum && value <= min) value = multipleOf(Math.ceil(min / step) + 1, step);
    }
  }

  if (max !== undefined && (value > max || (c.exclusiveMaximum && value >= max))) {
    if (step !== undefined) {
      value = multipleOf(Math.floor(max / step), step);
      if (c.exclusiveMaximum && value >= max) value = multipleOf(Math.floor(max / step) - 1, step);
    } else if (min !== undefined) {
      value = (min + max) / 2;
    } else {
      value = c.exclusiveMaximum ? max - 1 : max;
    }
  }

  return value;
}

// k * step, rounded to the step's own decimal places.
function multipleOf(k: number, step: number): number {
  const [digits = "", exponent = "0"] = step.toString().split("e");
  const decimals = Math.max(0, (digits.split(".")[1] ?? "").length - Number(exponent));
  return Number((k * step).toFixed(Math.min(decimals, 100)));
}
