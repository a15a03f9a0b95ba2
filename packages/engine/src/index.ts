// Incremental computation engine
//
// Public surface: createCalcGraph() plus the node kinds, identity helpers,
// error classes and instrumentation used around it.

// Engine
export {
  createCalcGraph,
  type CalcGraph,
  type CalcGraphOptions,
  type OverrideParams,
  type IdentityState,
  type StalenessHandler,
} from "./graph/engine.js";
export type { Freshness } from "./graph/store.js";

// Model
export {
  createIdentity,
  identityKey,
  sameIdentity,
  type ArgValue,
  type NodeArgs,
  type IdentityKey,
  type NodeIdentity,
} from "./model/identity.js";
export { formatIdentity, formatArg } from "./model/format.js";
export { nodeKindOf, type EvaluationContext, type GraphNode, type NodeKind } from "./model/node.js";

// Node kinds
export { ConstantNode, VariableNode, isVariableNode, CalculatedNode, type CalculationBody } from "./nodes/index.js";

// Errors
export {
  CalcGraphError,
  CalcGraphErrorCode,
  UnknownNodeError,
  DuplicateNameError,
  NotVariableError,
  CycleError,
  InvalidArgumentError,
  ExpiredContextError,
  ReentrantMutationError,
  type CalcGraphErrorCodeType,
} from "./shared/errors.js";

// Instrumentation
export {
  debug,
  configureDebug,
  refreshDebugChannels,
  isDebugEnabled,
  type DebugConfig,
  type DebugChannel,
  type DebugData,
} from "./shared/debug.js";
export {
  createTrace,
  NOOP_TRACE,
  NOOP_SPAN,
  EngineAttributes,
  formatDuration,
  type EngineTrace,
  type Span,
  type SpanEvent,
  type TraceExporter,
  type AttributeValue,
  type CreateTraceOptions,
} from "./shared/trace.js";
export {
  createConsoleExporter,
  createCollectingExporter,
  ConsoleExporter,
  CollectingExporter,
  type ConsoleExporterOptions,
} from "./shared/trace-exporters.js";
