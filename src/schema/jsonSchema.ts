import type { PrimitiveConstraints, SchemaDescriptor } from "../contracts/schemaDescriptor";

type JsonSchema = Record<string, unknown>;

/**
 * Render a descriptor as a JSON Schema document (2020-12 keywords) so the
 * backend has a machine-readable contract to target.
 */
export function toJsonSchema(schema: SchemaDescriptor): JsonSchema {
  const out = render(schema);
  if (schema.description) out.description = schema.description;
  return out;
}

function render(schema: SchemaDescriptor): JsonSchema {
  switch (schema.type) {
    case "primitive": {
      const c = schema.constraints;
      const out: JsonSchema = {};
      if (schema.kind === "datetime") {
        out.type = withNull("string", schema.nullable);
        out.format = "date-time";
      } else {
        out.type = withNull(schema.kind, schema.nullable);
      }
      if (c.enum) out.enum = schema.nullable ? [...c.enum, null] : [...c.enum];
      if (c.minimum !== undefined) {
        out[c.exclusiveMinimum ? "exclusiveMinimum" : "minimum"] = c.minimum;
      }
      if (c.maximum !== undefined) {
        out[c.exclusiveMaximum ? "exclusiveMaximum" : "maximum"] = c.maximum;
      }
      if (c.multipleOf !== undefined) out.multipleOf = c.multipleOf;
      if (c.minLength !== undefined) out.minLength = c.minLength;
      if (c.maxLength !== undefined) out.maxLength = c.maxLength;
      if (c.format !== undefined) out.format = c.format;
      // Date bounds use the ajv-formats keywords.
      if (c.earliest !== undefined) out.formatMinimum = c.earliest;
      if (c.latest !== undefined) out.formatMaximum = c.latest;

      const patterns = stringPatterns(c);
      const [pattern] = patterns;
      if (patterns.length === 1 && pattern !== undefined) {
        out.pattern = pattern;
      } else if (patterns.length > 1) {
        out.allOf = patterns.map((p) => ({ pattern: p }));
      }
      return out;
    }
    case "sequence": {
      const out: JsonSchema = {
        type: withNull("array", schema.nullable),
        items: toJsonSchema(schema.element),
      };
      if (schema.minItems !== undefined) out.minItems = schema.minItems;
      if (schema.maxItems !== undefined) out.maxItems = schema.maxItems;
      return out;
    }
    case "mapping":
      return {
        type: withNull("object", schema.nullable),
        additionalProperties: toJsonSchema(schema.value),
      };
    case "record": {
      const properties: Record<string, JsonSchema> = {};
      for (const field of schema.fields) {
        properties[field.name] = toJsonSchema(field.schema);
      }
      return {
        type: withNull("object", schema.nullable),
        properties,
        required: schema.fields.filter((f) => f.required).map((f) => f.name),
        additionalProperties: !schema.closed,
      };
    }
  }
}

function stringPatterns(c: PrimitiveConstraints): string[] {
  const patterns: string[] = [];
  if (c.pattern !== undefined) patterns.push(c.pattern);
  if (c.prefix !== undefined) patterns.push(`^${escapeRegExp(c.prefix)}`);
  if (c.suffix !== undefined) patterns.push(`${escapeRegExp(c.suffix)}$`);
  for (const fragment of c.contains ?? []) patterns.push(escapeRegExp(fragment));
  return patterns;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function withNull(type: string, nullable: boolean): string | string[] {
  return nullable ? [type, "null"] : type;
}
