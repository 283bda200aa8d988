import type { Result } from "../contracts/result";
import { err, ok } from "../contracts/result";
import type { TargetSchema } from "../schema/descriptorBuilder";
import type { FallbackEngine, SynthesisCallOptions } from "./index";
import { getDefaultEngine } from "./index";

type Awaitable<T> = T | Promise<T>;

export type WrapOptions<T> = {
  // Defaults to the function's own name.
  name?: string;
  // Parameter names in call order; unnamed positions become arg0, arg1, ...
  argNames?: readonly string[];
  description?: string;
  // Send the function's source text with the prompt (the engine may still drop it).
  includeSource?: boolean;
  engine?: FallbackEngine;
  call?: Omit<SynthesisCallOptions<T>, "signal">;
};

export class MissingValueError extends Error {
  constructor(operationName: string) {
    super(`${operationName} returned no value`);
    this.name = "MissingValueError";
  }
}

function operationName(fn: { name: string }, opts: { name?: string }): string {
  return opts.name ?? (fn.name || "anonymous_operation");
}

function namedArguments(args: readonly unknown[], names: readonly string[] | undefined): Array<[string, unknown]> {
  return args.map((value, i): [string, unknown] => [names?.[i] ?? `arg${i}`, value]);
}

async function capture<T>(run: () => Awaitable<T>): Promise<Result<T, unknown>> {
  try {
    return ok(await run());
  } catch (e) {
    return err(e);
  }
}

function wrapWith<A extends unknown[], R, T>(
  operation: (...args: A) => Awaitable<R>,
  target: TargetSchema<T>,
  opts: WrapOptions<T>,
  settle: (result: Result<R, unknown>, name: string) => Result<T, unknown>
): (...args: A) => Promise<T> {
  const name = operationName(operation, opts);
  const source = opts.includeSource === false ? undefined : operation.toString();

  return async (...args: A): Promise<T> => {
    const result = settle(await capture(() => operation(...args)), name);
    if (result.ok) return result.value;
    const engine = opts.engine ?? getDefaultEngine();
    return engine.synthesize(
      result,
      target,
      {
        name,
        args: namedArguments(args, opts.argNames),
        ...(opts.description === undefined ? {} : { description: opts.description }),
        ...(source === undefined ? {} : { source }),
      },
      opts.call
    );
  };
}

/**
 * Wrap a throwing (or rejecting) function so a failure yields a synthesized
 * value of `target` instead of an exception.
 */
export function withFallback<A extends unknown[], T>(
  operation: (...args: A) => Awaitable<T>,
  target: TargetSchema<T>,
  opts: WrapOptions<T> = {}
): (...args: A) => Promise<T> {
  return wrapWith<A, T, T>(operation, target, opts, (result) => result);
}

/**
 * Like withFallback, but a null or undefined return counts as a failure too.
 */
export function withOptionalFallback<A extends unknown[], T>(
  operation: (...args: A) => Awaitable<T | null | undefined>,
  target: TargetSchema<T>,
  opts: WrapOptions<T> = {}
): (...args: A) => Promise<T> {
  return wrapWith<A, T | null | undefined, T>(operation, target, opts, (result, name) => {
    if (!result.ok) return result;
    return result.value === null || result.value === undefined ? err(new MissingValueError(name)) : ok(result.value);
  });
}
