import { z } from "zod";
import type {
  EnumValue,
  PathSegment,
  PrimitiveConstraints,
  PrimitiveDescriptor,
  RecordField,
  SchemaDescriptor,
  StringFormat,
} from "../contracts/schemaDescriptor";
import { ELEMENT_SEGMENT } from "../contracts/schemaDescriptor";
import { UnsupportedTypeError } from "../synthesis/errors";

/**
 * A synthesis target: the zod schema that describes the value the failed
 * operation should have produced.
 */
export type TargetSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const MAX_DEPTH = 32;

let cache = new WeakMap<z.ZodTypeAny, SchemaDescriptor>();
const stats = { builds: 0, hits: 0 };

/**
 * Build (or fetch from the process-wide cache) the descriptor for a target.
 *
 * The cache is keyed by schema identity. Builds are pure, so two concurrent
 * first builds may both run; the first one stored wins.
 */
export function buildSchemaDescriptor(target: z.ZodTypeAny): SchemaDescriptor {
  const cached = cache.get(target);
  if (cached) {
    stats.hits++;
    return cached;
  }

  const built = deepFreeze(describe(target, [], new Set(), 0));
  stats.builds++;

  const existing = cache.get(target);
  if (existing) return existing;
  cache.set(target, built);
  return built;
}

export function getSchemaCacheStats(): { builds: number; hits: number } {
  return { ...stats };
}

export function resetSchemaDescriptorCache(): void {
  cache = new WeakMap();
  stats.builds = 0;
  stats.hits = 0;
}

type Unwrapped = {
  inner: z.ZodTypeAny;
  nullable: boolean;
  optional: boolean;
  description: string | undefined;
};

function unwrap(schema: z.ZodTypeAny): Unwrapped {
  let current = schema;
  let nullable = false;
  let optional = false;
  let description = schema.description;

  for (;;) {
    if (current instanceof z.ZodOptional) {
      optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodNullable) {
      nullable = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      // The default fills in a missing key at materialization time.
      optional = true;
      current = current.removeDefault();
    } else if (current instanceof z.ZodCatch) {
      current = current.removeCatch();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodBranded) {
      current = current.unwrap();
    } else if (current instanceof z.ZodReadonly) {
      current = current.unwrap();
    } else if (current instanceof z.ZodPipeline) {
      current = current._def.in;
    } else {
      break;
    }
    description = description ?? current.description;
  }

  return { inner: current, nullable, optional, description };
}

function unsupported(schema: z.ZodTypeAny, path: PathSegment[], message: string): UnsupportedTypeError {
  return new UnsupportedTypeError(message, { path, construct: schema.constructor.name });
}

function describe(
  schema: z.ZodTypeAny,
  path: PathSegment[],
  stack: Set<z.ZodTypeAny>,
  depth: number
): SchemaDescriptor {
  if (depth > MAX_DEPTH) {
    throw unsupported(schema, path, `Type nesting exceeds ${MAX_DEPTH} levels`);
  }

  let { inner, nullable, description } = unwrap(schema);
  // Lazy getters may build a fresh schema per call, so the lazy itself is what repeats.
  const visited: z.ZodTypeAny[] = [];
  const enter = (node: z.ZodTypeAny): void => {
    if (stack.has(node)) {
      throw unsupported(node, path, "Recursive types have no finite structural representation");
    }
    stack.add(node);
    visited.push(node);
  };

  try {
    while (inner instanceof z.ZodLazy) {
      if (visited.length > MAX_DEPTH) {
        throw unsupported(inner, path, "Lazy type never resolves to a concrete type");
      }
      enter(inner);
      const resolved = unwrap(inner.schema);
      inner = resolved.inner;
      nullable = nullable || resolved.nullable;
      description = description ?? resolved.description;
    }

    enter(inner);
    const described = describeInner(inner, path, stack, depth, nullable);
    return description ? { ...described, description } : described;
  } finally {
    for (const node of visited) stack.delete(node);
  }
}

function describeInner(
  inner: z.ZodTypeAny,
  path: PathSegment[],
  stack: Set<z.ZodTypeAny>,
  depth: number,
  nullable: boolean
): SchemaDescriptor {
  if (inner instanceof z.ZodString) {
    return describeString(inner, path, nullable);
  }

  if (inner instanceof z.ZodNumber) {
    return describeNumber(inner, nullable);
  }

  if (inner instanceof z.ZodBoolean) {
    return primitive("boolean", nullable, {});
  }

  if (inner instanceof z.ZodDate) {
    const constraints: PrimitiveConstraints = {};
    if (inner.minDate) constraints.earliest = inner.minDate.toISOString();
    if (inner.maxDate) constraints.latest = inner.maxDate.toISOString();
    return primitive("datetime", nullable, constraints);
  }

  if (inner instanceof z.ZodEnum) {
    const options: string[] = inner.options;
    return primitive("string", nullable, { enum: [...options] });
  }

  if (inner instanceof z.ZodNativeEnum) {
    return describeEnumValues(inner, nativeEnumValues(inner.enum), path, nullable);
  }

  if (inner instanceof z.ZodLiteral) {
    const value: unknown = inner.value;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      return describeEnumValues(inner, [value], path, nullable);
    }
    throw unsupported(inner, path, "Only string, number and boolean literals are supported");
  }

  if (inner instanceof z.ZodUnion) {
    return describeUnion(inner, path, stack, depth, nullable);
  }

  if (inner instanceof z.ZodArray) {
    const element = describe(inner.element, [...path, ELEMENT_SEGMENT], stack, depth + 1);
    const def = inner._def;
    const minItems = def.exactLength?.value ?? def.minLength?.value;
    const maxItems = def.exactLength?.value ?? def.maxLength?.value;
    return {
      type: "sequence",
      element,
      nullable,
      ...(minItems === undefined ? {} : { minItems }),
      ...(maxItems === undefined ? {} : { maxItems }),
    };
  }

  if (inner instanceof z.ZodRecord) {
    const keySchema = unwrap(inner.keySchema).inner;
    if (!(keySchema instanceof z.ZodString)) {
      throw unsupported(keySchema, path, "Mapping keys must be strings");
    }
    return {
      type: "mapping",
      keyKind: "string",
      value: describe(inner.valueSchema, [...path, ELEMENT_SEGMENT], stack, depth + 1),
      nullable,
    };
  }

  if (inner instanceof z.ZodObject) {
    const shape: Record<string, z.ZodTypeAny> = inner.shape;
    const fields: RecordField[] = Object.entries(shape).map(([name, fieldSchema]) => ({
      name,
      schema: describe(fieldSchema, [...path, name], stack, depth + 1),
      required: !unwrap(fieldSchema).optional,
    }));
    return {
      type: "record",
      fields,
      closed: inner._def.unknownKeys === "strict",
      nullable,
    };
  }

  throw unsupported(inner, path, `${inner.constructor.name} has no structural representation`);
}

function primitive(
  kind: PrimitiveDescriptor["kind"],
  nullable: boolean,
  constraints: PrimitiveConstraints
): PrimitiveDescriptor {
  return { type: "primitive", kind, nullable, constraints };
}

function describeString(schema: z.ZodString, path: PathSegment[], nullable: boolean): PrimitiveDescriptor {
  const c: PrimitiveConstraints = {};
  const contains: string[] = [];

  const setFormat = (format: StringFormat): void => {
    if (c.format !== undefined && c.format !== format) {
      throw unsupported(schema, path, `A string cannot be both ${c.format} and ${format}`);
    }
    c.format = format;
  };

  for (const check of schema._def.checks) {
    const kind: string = check.kind;
    switch (check.kind) {
      case "min":
        c.minLength = Math.max(c.minLength ?? 0, check.value);
        break;
      case "max":
        c.maxLength = Math.min(c.maxLength ?? check.value, check.value);
        break;
      case "length":
        c.minLength = check.value;
        c.maxLength = check.value;
        break;
      case "email":
        setFormat("email");
        break;
      case "url":
        setFormat("uri");
        break;
      case "uuid":
      case "cuid":
      case "cuid2":
      case "ulid":
      case "nanoid":
      case "emoji":
      case "base64":
      case "date":
      case "duration":
        setFormat(check.kind);
        break;
      case "datetime":
        setFormat("date-time");
        if (check.precision !== null) c.precision = check.precision;
        break;
      case "time":
        setFormat("time");
        if (check.precision !== null) c.precision = check.precision;
        break;
      case "ip":
        setFormat(check.version === "v6" ? "ipv6" : "ipv4");
        break;
      case "regex":
        if (c.pattern !== undefined) throw unsupported(schema, path, "A string may declare only one pattern");
        c.pattern = check.regex.source;
        break;
      case "startsWith":
        if (check.value.length > (c.prefix ?? "").length) c.prefix = check.value;
        break;
      case "endsWith":
        if (check.value.length > (c.suffix ?? "").length) c.suffix = check.value;
        break;
      case "includes":
        contains.push(check.value);
        break;
      case "trim":
      case "toLowerCase":
      case "toUpperCase":
        break;
      default:
        throw unsupported(schema, path, `String check "${kind}" has no structural representation`);
    }
  }

  if (contains.length > 0) c.contains = contains;
  return primitive("string", nullable, c);
}

function describeNumber(schema: z.ZodNumber, nullable: boolean): PrimitiveDescriptor {
  const constraints: PrimitiveConstraints = {};
  let integer = false;

  for (const check of schema._def.checks) {
    if (check.kind === "int") {
      integer = true;
    } else if (check.kind === "min") {
      if (constraints.minimum === undefined || check.value > constraints.minimum) {
        constraints.minimum = check.value;
        constraints.exclusiveMinimum = !check.inclusive;
      }
    } else if (check.kind === "max") {
      if (constraints.maximum === undefined || check.value < constraints.maximum) {
        constraints.maximum = check.value;
        constraints.exclusiveMaximum = !check.inclusive;
      }
    } else if (check.kind === "multipleOf") {
      constraints.multipleOf = check.value;
    }
  }

  return primitive(integer ? "integer" : "number", nullable, constraints);
}

function nativeEnumValues(enumObject: Record<string, string | number>): EnumValue[] {
  // Numeric TS enums carry reverse mappings (value -> key); skip those keys.
  return Object.keys(enumObject)
    .filter((key) => typeof enumObject[enumObject[key] ?? ""] !== "number")
    .map((key) => enumObject[key])
    .filter((value): value is string | number => value !== undefined);
}

function describeEnumValues(
  schema: z.ZodTypeAny,
  values: EnumValue[],
  path: PathSegment[],
  nullable: boolean
): PrimitiveDescriptor {
  if (values.length === 0) {
    throw unsupported(schema, path, "Enumerations must declare at least one value");
  }
  if (values.every((v) => typeof v === "string")) {
    return primitive("string", nullable, { enum: values });
  }
  if (values.every((v) => typeof v === "boolean")) {
    return primitive("boolean", nullable, { enum: values });
  }
  if (values.every((v) => typeof v === "number")) {
    const kind = values.every((v) => Number.isInteger(v)) ? "integer" : "number";
    return primitive(kind, nullable, { enum: values });
  }
  throw unsupported(schema, path, "Enumerations must not mix value kinds");
}

function describeUnion(
  schema: z.ZodUnion<readonly [z.ZodTypeAny, ...z.ZodTypeAny[]]>,
  path: PathSegment[],
  stack: Set<z.ZodTypeAny>,
  depth: number,
  nullable: boolean
): SchemaDescriptor {
  const options: readonly z.ZodTypeAny[] = schema.options;
  const nonNull = options.filter((o) => !(o instanceof z.ZodNull));
  const withNull = nullable || nonNull.length < options.length;

  const [only] = nonNull;
  if (nonNull.length === 1 && only) {
    const described = describe(only, path, stack, depth + 1);
    return { ...described, nullable: withNull || described.nullable };
  }

  const literals: EnumValue[] = [];
  for (const option of nonNull) {
    if (!(option instanceof z.ZodLiteral)) {
      throw unsupported(schema, path, "Unions are only supported over literals and null");
    }
    const value: unknown = option.value;
    if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      throw unsupported(option, path, "Only string, number and boolean literals are supported");
    }
    literals.push(value);
  }
  return describeEnumValues(schema, literals, path, withNull);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
