/**
 * @file index.ts
 * @description Entry point of the package: process graph validation and evaluation.
 */

// Public entrypoints
export {ProcessGraphEngine, evaluate, validate} from "./engine.js";
export type {EngineOptions, EvaluationOutcome, InvocationScope, ValidationReport} from "./engine.js";

// Evaluation
export {ProcessGraphRunnable} from "./graph.js";
export type {EvaluationFrame, GraphInvocation, ProcessGraphRunnableOptions} from "./graph.js";
export {Runnable} from "./runnable.js";
export type {RunnableOptions} from "./runnable.js";
export {EvaluationContext} from "./context.js";
export {resolveArguments} from "./arguments.js";
export {evaluationOptionsSchema, resolveEvaluationOptions} from "./config.js";
export type {EvaluationOptions, EvaluationOptionsInput} from "./config.js";

// Parsing and dependency resolution
export {parseProcessGraph, classifyArgument} from "./parser.js";
export type {ParseOptions, ParseResult} from "./parser.js";
export {resolveDependencies, buildDependencyIndex, dependenciesOf} from "./resolver.js";
export type {DependencyIndex, DependencyResolution} from "./resolver.js";
export {ProcessGraphBuilder, fromArgument, fromNode} from "./graphBuilder.js";

// Processes and schemas
export {ProcessRegistry} from "./registry.js";
export type {BuiltinProcessInput, UserDefinedProcessInput} from "./registry.js";
export {bindArguments, bindExternalParameters, bindParameters, checkReturn, checkValue} from "./binder.js";
export type {BindingResult} from "./binder.js";
export {compileSchema, describeSchema, validateSchemaCompatibility} from "./schema-validator.js";
export type {ValidationResult} from "./schema-validator.js";
export {createFunctionInvoker} from "./invoker.js";
export type {ProcessFunction} from "./invoker.js";
export {mathImplementations, mathProcesses} from "./processes/math.js";

// Errors
export {
  AmbiguousResultError,
  CyclicDependencyError,
  DanglingReferenceError,
  GraphValidationError,
  MalformedGraphError,
  ProcessDefinitionError,
  ProcessExecutionFailureError,
  ProcessGraphError,
  RecursionLimitExceededError,
  SchemaViolationError,
  UnboundParameterError,
  UnknownProcessError,
  errorFromIssue,
} from "./errors.js";
export type {
  ErrorKind,
  IssueKind,
  SchemaSide,
  SchemaViolation,
  SerializedProcessGraphError,
  ValidationIssue,
} from "./errors.js";

// Events
export {ChunkEvent, ErrorEvent, LogEvent, PerformanceEvent} from "./events.js";
export type {BaseRunnableEvent, EvaluationEvent, EventMetadata, LogLevel} from "./events.js";
export {measure, measureAsync} from "./helpers.js";
export type {MeasureResult} from "./helpers.js";

// Data model
export type * from "./types.js";

// Export zod for schema definitions
export {z} from "zod";
