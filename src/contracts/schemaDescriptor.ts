/**
 * Structural description of a synthesis target.
 *
 * Descriptors are built once per target type, frozen, and shared read-only
 * between concurrent syntheses.
 */

export type PrimitiveKind = "string" | "number" | "integer" | "boolean" | "datetime";

export type EnumValue = string | number | boolean;

// Named string formats; the first nine are JSON Schema formats.
export type StringFormat =
  | "email"
  | "uri"
  | "uuid"
  | "date-time"
  | "date"
  | "time"
  | "duration"
  | "ipv4"
  | "ipv6"
  | "cuid"
  | "cuid2"
  | "ulid"
  | "nanoid"
  | "emoji"
  | "base64";

export type PrimitiveConstraints = {
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: boolean;
  exclusiveMaximum?: boolean;
  multipleOf?: number;
  minLength?: number;
  maxLength?: number;
  format?: StringFormat;
  // Fractional-second digits a date-time or time must carry.
  precision?: number;
  pattern?: string;
  prefix?: string;
  suffix?: string;
  contains?: readonly string[];
  // ISO-8601 bounds of a datetime.
  earliest?: string;
  latest?: string;
  enum?: readonly EnumValue[];
};

export type PrimitiveDescriptor = {
  type: "primitive";
  kind: PrimitiveKind;
  nullable: boolean;
  constraints: PrimitiveConstraints;
  description?: string;
};

export type SequenceDescriptor = {
  type: "sequence";
  element: SchemaDescriptor;
  nullable: boolean;
  minItems?: number;
  maxItems?: number;
  description?: string;
};

// JSON object keys are always strings on the wire.
export type MappingKeyKind = "string";

export type MappingDescriptor = {
  type: "mapping";
  keyKind: MappingKeyKind;
  value: SchemaDescriptor;
  nullable: boolean;
  description?: string;
};

export type RecordField = {
  name: string;
  schema: SchemaDescriptor;
  required: boolean;
};

export type RecordDescriptor = {
  type: "record";
  fields: readonly RecordField[];
  // Closed records reject keys that are not declared fields.
  closed: boolean;
  nullable: boolean;
  description?: string;
};

export type SchemaDescriptor =
  | PrimitiveDescriptor
  | SequenceDescriptor
  | MappingDescriptor
  | RecordDescriptor;

export type PathSegment = string | number;

// Stands for "every element" in descriptor paths, where no index exists yet.
export const ELEMENT_SEGMENT = "*";

export function formatPath(path: readonly PathSegment[]): string {
  if (path.length === 0) return "$";
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else if (segment === ELEMENT_SEGMENT) {
      out += "[*]";
    } else if (out.length === 0) {
      out = segment;
    } else {
      out += `.${segment}`;
    }
  }
  return out;
}

export function describeKind(schema: SchemaDescriptor): string {
  switch (schema.type) {
    case "primitive":
      return schema.kind;
    case "sequence":
      return "array";
    case "mapping":
    case "record":
      return "object";
  }
}
