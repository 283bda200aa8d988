export { ok, err, fromNullable, fromPromise, describeFailure } from "./contracts/result";
export type { Result } from "./contracts/result";
export type {
  FallbackReason,
  OutcomeSource,
  RejectionReason,
  SynthesisOutcome,
  SynthesisState,
} from "./contracts/synthesis";
export type { SchemaDescriptor, PathSegment } from "./contracts/schemaDescriptor";
export { formatPath } from "./contracts/schemaDescriptor";

export { buildSchemaDescriptor, getSchemaCacheStats, resetSchemaDescriptorCache } from "./schema/descriptorBuilder";
export type { TargetSchema } from "./schema/descriptorBuilder";
export { toJsonSchema } from "./schema/jsonSchema";
export { buildDefaultInstance } from "./schema/defaults";

export {
  synthesize,
  synthesizeOutcome,
  createFallbackEngine,
  configureDefaultEngine,
  getDefaultEngine,
} from "./synthesis";
export type {
  EngineOptions,
  FallbackEngine,
  OperationContext,
  SynthesisCallOptions,
  TransitionListener,
} from "./synthesis";
export { withFallback, withOptionalFallback, MissingValueError } from "./synthesis/wrap";
export type { WrapOptions } from "./synthesis/wrap";
export {
  UnsupportedTypeError,
  ModelClientError,
  ConfigError,
  describeRejection,
} from "./synthesis/errors";

export { loadEngineConfig } from "./config";
export type { EngineConfig, Provider } from "./config";
export { createModelClient, createTransport, RetryingModelClient, TransportError, deadlineIn } from "./infra/llm";
export type { ModelClient, ModelTransport, Deadline } from "./infra/llm";

export { subscribeTrace } from "./utils/traceBus";
export type { TraceEvent, TraceListener } from "./utils/traceBus";
