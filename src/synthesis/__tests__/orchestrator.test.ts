import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { err, ok } from "../../contracts/result";
import type { CompiledPrompt, RawModelResponse, SynthesisState } from "../../contracts/synthesis";
import type { ModelClient } from "../../infra/llm/modelClient";
import { RetryingModelClient } from "../../infra/llm/modelClient";
import type { TransportReply } from "../../infra/llm/types";
import { getSchemaCacheStats, resetSchemaDescriptorCache } from "../../schema/descriptorBuilder";
import { ModelClientError, UnsupportedTypeError } from "../errors";
import { createFallbackEngine, formatArgument } from "../index";

const User = z.object({
  id: z.number().int().min(0).max(4294967295),
  name: z.string(),
});

type ScriptedClient = ModelClient & { prompts: CompiledPrompt[] };

function scriptedClient(script: Array<string | ModelClientError>): ScriptedClient {
  const prompts: CompiledPrompt[] = [];
  return {
    prompts,
    async invoke(prompt: CompiledPrompt): Promise<RawModelResponse> {
      prompts.push(prompt);
      const next = script[prompts.length - 1] ?? script[script.length - 1];
      if (next === undefined) throw new Error("script is empty");
      if (next instanceof ModelClientError) throw next;
      return { text: next, backendLatencyMs: 5, backendStatus: 200, provider: "fake", model: "fake-model" };
    },
  };
}

const failure = err(new Error("connection refused"));

describe("synthesis engine", () => {
  beforeEach(() => {
    resetSchemaDescriptorCache();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns Ok values without building a schema or calling the model", async () => {
    const client = scriptedClient(['{"id": 1, "name": "unused"}']);
    const engine = createFallbackEngine({ client });
    const user = { id: 7, name: "Ada" };

    await expect(engine.synthesize(ok(user), User, { name: "fetchUser" })).resolves.toBe(user);
    expect(client.prompts).toHaveLength(0);
    expect(getSchemaCacheStats()).toEqual({ builds: 0, hits: 0 });
  });

  it("tags Ok values as the operation's own result", async () => {
    const client = scriptedClient(['{"id": 1, "name": "unused"}']);
    const engine = createFallbackEngine({ client });

    const outcome = await engine.synthesizeOutcome(ok({ id: 1, name: "Ada" }), User, { name: "fetchUser" });

    expect(outcome).toEqual({ source: "original", value: { id: 1, name: "Ada" }, attempts: 0, rejections: [] });
    expect(client.prompts).toHaveLength(0);
  });

  it("does not read configuration for Ok values", async () => {
    await expect(createFallbackEngine().synthesize(ok(5), z.number(), { name: "count" })).resolves.toBe(5);
  });

  it("returns a conforming model value on the first attempt", async () => {
    const client = scriptedClient(['{"id": 42, "name": "Ada"}']);
    const engine = createFallbackEngine({ client });

    const outcome = await engine.synthesizeOutcome(failure, User, { name: "fetchUser", args: [["id", 42]] });

    expect(outcome).toEqual({ source: "model", value: { id: 42, name: "Ada" }, attempts: 1, rejections: [] });
    expect(client.prompts[0]?.user).toContain("The following operation failed: fetchUser(id=42)");
    expect(client.prompts[0]?.user).toContain("Failure reason:\nError: connection refused");
  });

  it("feeds a schema rejection into the corrective attempt", async () => {
    const client = scriptedClient(['{"id": "seven"}', '{"id": 42, "name": "Ada"}']);
    const engine = createFallbackEngine({ client });

    const outcome = await engine.synthesizeOutcome(failure, User, { name: "fetchUser", args: { id: 42 } });

    expect(outcome.source).toBe("model");
    expect(outcome.value).toEqual({ id: 42, name: "Ada" });
    expect(outcome.attempts).toBe(2);
    expect(outcome.rejections).toEqual([{ kind: "schema", path: ["id"], expected: "integer", observed: "string" }]);
    expect(client.prompts[1]?.attempt).toBe(2);
    expect(client.prompts[1]?.user).toContain(
      'Your previous response was rejected:\nField "id" expected integer but got string.'
    );
  });

  it("stops after exactly maxAttempts and returns the default instance", async () => {
    const client = scriptedClient([""]);
    const engine = createFallbackEngine({ client, maxAttempts: 3 });

    const outcome = await engine.synthesizeOutcome(failure, User, { name: "fetchUser" });

    expect(client.prompts).toHaveLength(3);
    expect(outcome.source).toBe("default");
    expect(outcome.value).toEqual({ id: 0, name: "" });
    if (outcome.source === "default") {
      expect(outcome.reason).toBe("attempts_exhausted");
      expect(outcome.attempts).toBe(3);
      expect(outcome.lastRejection?.kind).toBe("unparseable");
    }
  });

  it("retries range violations caught at materialization", async () => {
    const client = scriptedClient(['{"id": 4294967296, "name": "Ada"}']);
    const engine = createFallbackEngine({ client, maxAttempts: 2 });

    const outcome = await engine.synthesizeOutcome(failure, User, { name: "fetchUser" });

    expect(outcome.source).toBe("default");
    expect(outcome.rejections.map((r) => r.kind)).toEqual(["materialization", "materialization"]);
    expect(client.prompts[1]?.user).toContain(
      'Field "id" violates a constraint: Number must be less than or equal to 4294967295'
    );
  });

  it("falls back at once when the model client times out", async () => {
    const client = scriptedClient([new ModelClientError("deadline elapsed", { kind: "timeout", attempts: 1 })]);
    const engine = createFallbackEngine({ client, maxAttempts: 3 });

    const outcome = await engine.synthesizeOutcome(failure, User, { name: "fetchUser" });

    expect(client.prompts).toHaveLength(1);
    expect(outcome).toEqual({
      source: "default",
      value: { id: 0, name: "" },
      attempts: 1,
      reason: "timeout",
      rejections: [],
    });
  });

  it("maps unreachable and rejected backends to their reasons", async () => {
    const unreachable = createFallbackEngine({
      client: scriptedClient([new ModelClientError("down", { kind: "unreachable", attempts: 3 })]),
    });
    const rejected = createFallbackEngine({
      client: scriptedClient([new ModelClientError("bad", { kind: "backend_rejected", attempts: 1, status: 400 })]),
    });

    const first = await unreachable.synthesizeOutcome(failure, User, { name: "fetchUser" });
    const second = await rejected.synthesizeOutcome(failure, User, { name: "fetchUser" });

    expect(first.source === "default" && first.reason).toBe("unreachable");
    expect(second.source === "default" && second.reason).toBe("backend_rejected");
  });

  it("bounds a silent backend by the synthesis deadline", async () => {
    const transport = {
      provider: "silent",
      send: () => new Promise<TransportReply>(() => undefined),
    };
    const engine = createFallbackEngine({ client: new RetryingModelClient(transport), timeoutMs: 30 });

    const outcome = await engine.synthesizeOutcome(failure, User, { name: "fetchUser" });

    expect(outcome.source === "default" && outcome.reason).toBe("timeout");
    expect(outcome.value).toEqual({ id: 0, name: "" });
  });

  it("treats caller cancellation as a timeout", async () => {
    const controller = new AbortController();
    controller.abort();
    const transport = {
      provider: "silent",
      send: () => new Promise<TransportReply>(() => undefined),
    };
    const engine = createFallbackEngine({ client: new RetryingModelClient(transport) });

    const outcome = await engine.synthesizeOutcome(failure, User, { name: "fetchUser" }, { signal: controller.signal });

    expect(outcome.source === "default" && outcome.reason).toBe("timeout");
  });

  it("uses the caller's fallback value in place of the default instance", async () => {
    const engine = createFallbackEngine({ client: scriptedClient([""]), maxAttempts: 1 });

    const user = await engine.synthesize(failure, User, { name: "fetchUser" }, {
      fallbackValue: () => ({ id: 1, name: "guest" }),
    });

    expect(user).toEqual({ id: 1, name: "guest" });
  });

  it("falls back to format-valid defaults for constrained strings and numbers", async () => {
    const Account = z.object({
      id: z.number().int(),
      name: z.string(),
      email: z.string().email(),
      homepage: z.string().url(),
      token: z.string().uuid(),
      joinedOn: z.string().date(),
      price: z.number().multipleOf(0.25).min(1.1),
      renewsAt: z.date().min(new Date("2020-01-01T00:00:00.000Z")),
    });
    const engine = createFallbackEngine({
      client: scriptedClient([new ModelClientError("deadline elapsed", { kind: "timeout", attempts: 1 })]),
    });

    const account = await engine.synthesize(failure, Account, { name: "getAccount" });

    expect(account).toEqual({
      id: 0,
      name: "",
      email: "user@example.com",
      homepage: "https://example.com",
      token: "00000000-0000-0000-0000-000000000000",
      joinedOn: "1970-01-01",
      price: 1.25,
      renewsAt: new Date("2020-01-01T00:00:00.000Z"),
    });
  });

  it("rejects refinements no default satisfies before calling the model", async () => {
    const Currency = z.object({ code: z.string().regex(/^[A-Z]{3}$/) });
    const client = scriptedClient(['{"code": "EUR"}']);
    const engine = createFallbackEngine({ client });

    const attempt = engine.synthesize(failure, Currency, { name: "lookupCurrency" });

    await expect(attempt).rejects.toThrow(UnsupportedTypeError);
    await expect(attempt).rejects.toThrow("No default instance satisfies this refinement: Invalid (at code)");
    expect(client.prompts).toHaveLength(0);
  });

  it("accepts an unsatisfiable refinement when the caller supplies the fallback", async () => {
    const Currency = z.object({ code: z.string().regex(/^[A-Z]{3}$/) });
    const engine = createFallbackEngine({ client: scriptedClient(['{"code": "EUR"}']) });

    const currency = await engine.synthesize(failure, Currency, { name: "lookupCurrency" }, {
      fallbackValue: () => ({ code: "USD" }),
    });

    expect(currency).toEqual({ code: "EUR" });
  });

  it("treats an unbounded timeout as the longest timer", async () => {
    const transport = {
      provider: "slow",
      send: () =>
        new Promise<TransportReply>((resolve) => {
          setTimeout(() => resolve({ text: '{"id": 5, "name": "Kai"}', status: 200, model: "fake-model" }), 20);
        }),
    };
    const engine = createFallbackEngine({ client: new RetryingModelClient(transport) });

    const outcome = await engine.synthesizeOutcome(failure, User, { name: "fetchUser" }, {
      timeoutMs: Number.POSITIVE_INFINITY,
    });

    expect(outcome).toEqual({ source: "model", value: { id: 5, name: "Kai" }, attempts: 1, rejections: [] });
  });

  it("surfaces unsupported targets before calling the model", async () => {
    const client = scriptedClient(["{}"]);
    const engine = createFallbackEngine({ client });

    await expect(
      engine.synthesize(failure, z.object({ callback: z.function() }), { name: "register" })
    ).rejects.toThrow(UnsupportedTypeError);
    expect(client.prompts).toHaveLength(0);
  });

  it("walks the state machine in order", async () => {
    const transitions: Array<[SynthesisState, SynthesisState]> = [];
    const engine = createFallbackEngine({ client: scriptedClient(['{"id": "x"}', '{"id": 3, "name": "Lin"}']) });

    await engine.synthesize(failure, User, { name: "fetchUser" }, {
      onTransition: (from, to) => transitions.push([from, to]),
    });

    expect(transitions).toEqual([
      ["Idle", "Prompting"],
      ["Prompting", "AwaitingResponse"],
      ["AwaitingResponse", "Validating"],
      ["Validating", "Retrying"],
      ["Retrying", "Prompting"],
      ["Prompting", "AwaitingResponse"],
      ["AwaitingResponse", "Validating"],
      ["Validating", "Materializing"],
      ["Materializing", "Succeeded"],
    ]);
  });

  it("sends the source text only when enabled", async () => {
    const withSource = scriptedClient(['{"id": 1, "name": "a"}']);
    const withoutSource = scriptedClient(['{"id": 1, "name": "a"}']);
    const context = { name: "fetchUser", source: "function fetchUser(id) { return db.get(id); }" };

    await createFallbackEngine({ client: withSource }).synthesize(failure, User, context);
    await createFallbackEngine({ client: withoutSource, includeSource: false }).synthesize(failure, User, context);

    expect(withSource.prompts[0]?.user).toContain("Source code:\nfunction fetchUser(id) { return db.get(id); }");
    expect(withoutSource.prompts[0]?.user).not.toContain("Source code:");
  });

  it("runs concurrent syntheses independently", async () => {
    const client: ScriptedClient = {
      prompts: [],
      async invoke(prompt) {
        client.prompts.push(prompt);
        const text = prompt.schemaName === "fetchUser" ? '{"id": 1, "name": "Ada"}' : '["a", "b"]';
        return { text, backendLatencyMs: 1, backendStatus: 200, provider: "fake", model: "fake-model" };
      },
    };
    const engine = createFallbackEngine({ client });

    const [user, tags] = await Promise.all([
      engine.synthesize(failure, User, { name: "fetchUser" }),
      engine.synthesize(failure, z.array(z.string()), { name: "listTags" }),
    ]);

    expect(user).toEqual({ id: 1, name: "Ada" });
    expect(tags).toEqual(["a", "b"]);
  });
});

describe("formatArgument", () => {
  it("renders argument values for the prompt", () => {
    expect(formatArgument("Ada")).toBe('"Ada"');
    expect(formatArgument({ active: true })).toBe('{"active":true}');
    expect(formatArgument(undefined)).toBe("undefined");
    expect(formatArgument(10n)).toBe("10n");
    expect(formatArgument(function lookup() {})).toBe("[function lookup]");
  });
});
