/**
 * @seqflow/core — configuration, errors and ownership tracing shared by
 * every seqflow package.
 */

export { config, allocationLimit, MAX_ARRAY_LENGTH } from "./config.js";
export type { SeqflowConfig, AllocationConfig } from "./config.js";

export {
  SeqflowError,
  AllocationError,
  DoubleReleaseError,
  StaleViewError,
  PlaceholderError,
  CurryError,
  ConfigError,
} from "./errors.js";
export type { SeqflowErrorCode } from "./errors.js";

export { OwnershipTracer, tracer } from "./trace.js";
export type { OwnershipEvent, OwnershipEventKind, TracerOptions } from "./trace.js";
