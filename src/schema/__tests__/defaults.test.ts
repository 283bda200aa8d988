import { describe, expect, it } from "vitest";
import { z } from "zod";
import { buildDefaultInstance, EPOCH_ISO } from "../defaults";
import { buildSchemaDescriptor } from "../descriptorBuilder";

function defaultFor(target: z.ZodTypeAny) {
  return buildDefaultInstance(buildSchemaDescriptor(target));
}

describe("buildDefaultInstance", () => {
  it("uses zero values for required fields only", () => {
    const target = z.object({
      id: z.number().int().min(0),
      name: z.string(),
      active: z.boolean(),
      note: z.string().optional(),
    });

    expect(defaultFor(target)).toEqual({ id: 0, name: "", active: false });
  });

  it("pulls numbers into their declared ranges", () => {
    expect(defaultFor(z.number().int().min(5))).toBe(5);
    expect(defaultFor(z.number().int().positive())).toBe(1);
    expect(defaultFor(z.number().int().max(-3))).toBe(-3);
    expect(defaultFor(z.number().min(2).max(4))).toBe(2);
    expect(defaultFor(z.number().gt(0).lt(1))).toBe(0.5);
  });

  it("satisfies string lengths, enums and date-times", () => {
    expect(defaultFor(z.string().min(3))).toBe("xxx");
    expect(defaultFor(z.enum(["low", "high"]))).toBe("low");
    expect(defaultFor(z.date())).toBe(EPOCH_ISO);
  });

  it("fills minimum-length sequences and leaves mappings empty", () => {
    expect(defaultFor(z.array(z.number().int()).min(2))).toEqual([0, 0]);
    expect(defaultFor(z.array(z.string()))).toEqual([]);
    expect(defaultFor(z.record(z.string()))).toEqual({});
  });

  it("still produces a zero value for nullable fields", () => {
    expect(defaultFor(z.object({ count: z.number().nullable() }))).toEqual({ count: 0 });
  });

  it("uses a valid sample for each string format", () => {
    expect(defaultFor(z.string().email())).toBe("user@example.com");
    expect(defaultFor(z.string().uuid())).toBe("00000000-0000-0000-0000-000000000000");
    expect(defaultFor(z.string().ip({ version: "v6" }))).toBe("::1");
    expect(defaultFor(z.string().datetime({ precision: 3 }))).toBe("1970-01-01T00:00:00.000Z");
    expect(defaultFor(z.string().time())).toBe("00:00:00");
    expect(defaultFor(z.string().startsWith("id-").includes("_").min(6))).toBe("id-_xx");
  });

  it("respects steps and date bounds", () => {
    expect(defaultFor(z.number().multipleOf(3).min(10))).toBe(12);
    expect(defaultFor(z.number().int().multipleOf(5).lt(0))).toBe(-5);
    expect(defaultFor(z.date().min(new Date("2021-06-01T00:00:00.000Z")))).toBe("2021-06-01T00:00:00.000Z");
    expect(defaultFor(z.date().max(new Date("1960-01-01T00:00:00.000Z")))).toBe("1960-01-01T00:00:00.000Z");
  });
});
