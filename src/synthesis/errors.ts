import type { PathSegment } from "../contracts/schemaDescriptor";
import { formatPath } from "../contracts/schemaDescriptor";
import type { RejectionReason } from "../contracts/synthesis";

export class UnsupportedTypeError extends Error {
  path: PathSegment[];
  construct: string;

  constructor(message: string, opts: { path: PathSegment[]; construct: string }) {
    super(`${message} (at ${formatPath(opts.path)})`);
    this.name = "UnsupportedTypeError";
    this.path = opts.path;
    this.construct = opts.construct;
  }
}

export type ModelClientErrorKind = "timeout" | "unreachable" | "backend_rejected";

export class ModelClientError extends Error {
  kind: ModelClientErrorKind;
  attempts: number;
  status: number | undefined;
  cancelled: boolean;

  constructor(
    message: string,
    opts: { kind: ModelClientErrorKind; attempts: number; status?: number; cancelled?: boolean }
  ) {
    super(message);
    this.name = "ModelClientError";
    this.kind = opts.kind;
    this.attempts = opts.attempts;
    this.status = opts.status;
    this.cancelled = opts.cancelled ?? false;
  }
}

export class ConfigError extends Error {
  variable: string | undefined;

  constructor(message: string, opts?: { variable?: string }) {
    super(message);
    this.name = "ConfigError";
    this.variable = opts?.variable;
  }
}

export function describeRejection(rejection: RejectionReason): string {
  switch (rejection.kind) {
    case "unparseable":
      return `Response was not parseable as JSON: ${rejection.message}`;
    case "schema":
      return `Field "${formatPath(rejection.path)}" expected ${rejection.expected} but got ${rejection.observed}.`;
    case "materialization":
      return `Field "${formatPath(rejection.path)}" violates a constraint: ${rejection.message}`;
  }
}
