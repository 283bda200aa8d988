import { describe, expect, it } from "vitest";
import { z } from "zod";
import { buildSchemaDescriptor } from "../descriptorBuilder";
import { toJsonSchema } from "../jsonSchema";

describe("toJsonSchema", () => {
  it("renders records with required fields and ranges", () => {
    const target = z.object({
      id: z.number().int().min(0).max(4294967295),
      name: z.string().min(1),
      nickname: z.string().optional(),
    });

    expect(toJsonSchema(buildSchemaDescriptor(target))).toEqual({
      type: "object",
      properties: {
        id: { type: "integer", minimum: 0, maximum: 4294967295 },
        name: { type: "string", minLength: 1 },
        nickname: { type: "string" },
      },
      required: ["id", "name"],
      additionalProperties: true,
    });
  });

  it("renders nullable primitives, enums and date-times", () => {
    const target = z
      .object({
        status: z.enum(["open", "closed"]).nullable(),
        createdAt: z.date(),
        ratio: z.number().gt(0).lt(1),
      })
      .strict();

    expect(toJsonSchema(buildSchemaDescriptor(target))).toEqual({
      type: "object",
      properties: {
        status: { type: ["string", "null"], enum: ["open", "closed", null] },
        createdAt: { type: "string", format: "date-time" },
        ratio: { type: "number", exclusiveMinimum: 0, exclusiveMaximum: 1 },
      },
      required: ["status", "createdAt", "ratio"],
      additionalProperties: false,
    });
  });

  it("renders sequences and mappings", () => {
    const target = z.object({
      tags: z.array(z.string()).length(2),
      counts: z.record(z.number().int()),
    });

    expect(toJsonSchema(buildSchemaDescriptor(target))).toEqual({
      type: "object",
      properties: {
        tags: { type: "array", items: { type: "string" }, minItems: 2, maxItems: 2 },
        counts: { type: "object", additionalProperties: { type: "integer" } },
      },
      required: ["tags", "counts"],
      additionalProperties: true,
    });
  });

  it("keeps descriptions", () => {
    expect(toJsonSchema(buildSchemaDescriptor(z.boolean().describe("Whether the job ran")))).toEqual({
      type: "boolean",
      description: "Whether the job ran",
    });
  });

  it("renders formats, patterns, steps and date bounds", () => {
    const target = z.object({
      email: z.string().email(),
      code: z.string().regex(/^[A-Z]{3}$/),
      ref: z.string().startsWith("ord_").endsWith(".v1"),
      price: z.number().multipleOf(0.01),
      due: z.date().min(new Date("2020-01-01T00:00:00.000Z")),
    });

    expect(toJsonSchema(buildSchemaDescriptor(target))).toEqual({
      type: "object",
      properties: {
        email: { type: "string", format: "email" },
        code: { type: "string", pattern: "^[A-Z]{3}$" },
        ref: { type: "string", allOf: [{ pattern: "^ord_" }, { pattern: "\\.v1$" }] },
        price: { type: "number", multipleOf: 0.01 },
        due: { type: "string", format: "date-time", formatMinimum: "2020-01-01T00:00:00.000Z" },
      },
      required: ["email", "code", "ref", "price", "due"],
      additionalProperties: true,
    });
  });
});
