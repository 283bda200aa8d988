import { describe, expect, it } from "vitest";
import { apiKeyVariables, loadEngineConfig } from "../config";
import { ConfigError } from "../synthesis/errors";

describe("loadEngineConfig", () => {
  it("applies defaults", () => {
    expect(loadEngineConfig({})).toEqual({
      provider: "groq",
      model: undefined,
      baseURL: undefined,
      apiKey: undefined,
      maxAttempts: 3,
      timeoutMs: 30_000,
      transportRetries: 2,
      backoffMs: 250,
      temperature: 0.3,
      maxTokens: 2000,
      structuredOutput: true,
      includeSource: true,
    });
  });

  it("reads provider settings and key aliases", () => {
    const config = loadEngineConfig({
      FALLBACK_PROVIDER: "cerebras",
      FALLBACK_MODEL: "test-model",
      FALLBACK_MAX_ATTEMPTS: "5",
      FALLBACK_STRUCTURED_OUTPUT: "false",
      CEREBRAS_API: "test-key",
    });

    expect(config.provider).toBe("cerebras");
    expect(config.model).toBe("test-model");
    expect(config.maxAttempts).toBe(5);
    expect(config.structuredOutput).toBe(false);
    expect(config.apiKey).toBe("test-key");
  });

  it("prefers the primary key variable and ignores blank values", () => {
    const config = loadEngineConfig({
      FALLBACK_PROVIDER: "gemini",
      FALLBACK_MODEL: "   ",
      GEMINI_API_KEY: "primary-key",
      GOOGLE_API_KEY: "alias-key",
    });

    expect(config.apiKey).toBe("primary-key");
    expect(config.model).toBeUndefined();
  });

  it("rejects out-of-range values with the variable name", () => {
    let caught: unknown;
    try {
      loadEngineConfig({ FALLBACK_MAX_ATTEMPTS: "0" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.variable).toBe("FALLBACK_MAX_ATTEMPTS");
      expect(caught.message).toBe(
        "Invalid fallback configuration: FALLBACK_MAX_ATTEMPTS: Number must be greater than or equal to 1"
      );
    }
  });

  it("rejects unknown providers and malformed flags", () => {
    expect(() => loadEngineConfig({ FALLBACK_PROVIDER: "mainframe" })).toThrow(ConfigError);
    expect(() => loadEngineConfig({ FALLBACK_INCLUDE_SOURCE: "yes" })).toThrow(/FALLBACK_INCLUDE_SOURCE/);
  });
});

describe("apiKeyVariables", () => {
  it("lists the primary variable first", () => {
    expect(apiKeyVariables("groq")).toEqual(["GROQ_API_KEY", "GROQ_API"]);
    expect(apiKeyVariables("anthropic")).toEqual(["ANTHROPIC_API_KEY"]);
  });
});
