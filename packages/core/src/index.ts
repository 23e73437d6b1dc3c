/**
 * opgraph - dataflow computation graphs
 *
 * Core concepts:
 * - Operations declare what they need and provide
 * - compose → Network, compile → Plan, execute → Solution
 * - Every value displaced during execution is kept as an overwrite
 */

export { operation, optional, needName, isOptional, describeOperation } from './operation.js';
export { compose, findCycle, networkInputs, networkOutputs } from './network.js';
export { compile, describePlan } from './compiler.js';
export { execute } from './executor.js';
export { NetworkOperation, composeOperation } from './networkOperation.js';
export type { ComposeOperationOptions, ComputeOptions } from './networkOperation.js';

export {
  GraphError,
  DuplicateOperationError,
  EmptyOutputError,
  CyclicGraphError,
  UnsatisfiableOutputError,
  MissingInputError,
  OperationExecutionError,
  InternalConsistencyError,
  InvalidOperationError,
  InvalidOptionError,
  isGraphError,
} from './errors.js';
export type { GraphErrorKind, ExecutionContext } from './errors.js';

export { loadConfig } from './config.js';
export type { EngineConfig, LogLevel } from './config.js';
export { createLogger, log } from './logger.js';
export type { Logger } from './logger.js';
export { formatZodError } from './validation.js';

export type {
  NamedValues,
  OptionalNeed,
  Need,
  Operation,
  OperationDeclaration,
  DataNode,
  NeedRef,
  OperationNode,
  Edge,
  Network,
  Plan,
  Solution,
  Overwrites,
  ExecutionResult,
  ExecutionMethod,
  ExecutionStatus,
  ExecuteOptions,
  GraphOptions,
  PlanDescription,
} from './types.js';
