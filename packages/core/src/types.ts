/**
 * opgraph type definitions
 */

import type { Logger } from 'pino';

/**
 * Named values handed to / returned by an operation body
 */
export type NamedValues = Record<string, unknown>;

/**
 * A need declared as optional: never blocks the operation from running
 */
export interface OptionalNeed {
  readonly name: string;
  readonly optional: true;
}

/**
 * An operation input: a plain name (required) or an optional need
 */
export type Need = string | OptionalNeed;

/**
 * Operation contract consumed by compose/compile/execute
 */
export interface Operation {
  /** Unique name within a network */
  readonly name: string;
  /** Ordered input names */
  readonly needs: readonly Need[];
  /** Ordered output names */
  readonly provides: readonly string[];
  /** Static parameters handed to the body */
  readonly params: Readonly<NamedValues>;
  /** Compute body; must return a value for every name in `provides` */
  invoke(inputs: Readonly<NamedValues>): NamedValues | Promise<NamedValues>;
}

/**
 * operation() parameters
 */
export interface OperationDeclaration {
  name: string;
  needs?: readonly Need[];
  provides: readonly string[];
  params?: NamedValues;
  fn: (inputs: Readonly<NamedValues>, params: Readonly<NamedValues>) => NamedValues | Promise<NamedValues>;
}

/**
 * Data node: a named value slot, identity only
 */
export interface DataNode {
  /** Arena index */
  readonly id: number;
  readonly name: string;
  /** Ids of operations providing this name, declaration order */
  readonly producers: readonly number[];
  /** Ids of operations needing this name, declaration order */
  readonly consumers: readonly number[];
}

/**
 * A need resolved to its data node
 */
export interface NeedRef {
  readonly data: number;
  readonly optional: boolean;
}

/**
 * Operation node: one operation inside a network
 */
export interface OperationNode {
  /** Arena index, equal to the declaration index */
  readonly id: number;
  readonly name: string;
  readonly operation: Operation;
  readonly needs: readonly NeedRef[];
  /** Data node ids */
  readonly provides: readonly number[];
}

export type Edge =
  | { readonly kind: 'needs'; readonly from: number; readonly to: number; readonly optional: boolean }
  | { readonly kind: 'provides'; readonly from: number; readonly to: number };

/**
 * Validated, immutable graph
 */
export interface Network {
  readonly dataNodes: readonly DataNode[];
  readonly operationNodes: readonly OperationNode[];
  /** `needs` edges go data → operation, `provides` edges operation → data */
  readonly edges: readonly Edge[];
  /** Name → data node id */
  readonly dataIndex: ReadonlyMap<string, number>;
}

/**
 * Compiled execution plan for one (inputs, outputs) request
 */
export interface Plan {
  readonly network: Network;
  /** Dependency order */
  readonly steps: readonly OperationNode[];
  /** Names that must be supplied to execute() */
  readonly requiredInputs: readonly string[];
  /** Names guaranteed present in the solution */
  readonly providedOutputs: readonly string[];
}

export interface Solution {
  values: NamedValues;
}

/**
 * Displaced values per name, in write order
 */
export type Overwrites = Record<string, unknown[]>;

export interface ExecutionResult {
  solution: Solution;
  overwrites: Overwrites;
}

export type ExecutionMethod = 'sequential' | 'parallel';

export type ExecutionStatus = 'pending' | 'running' | 'completed' | 'failed';

/**
 * execute() options
 */
export interface ExecuteOptions {
  /** Default from OPGRAPH_EXECUTION_METHOD */
  method?: ExecutionMethod;
  /** Upper bound of steps in flight for the parallel method */
  maxConcurrency?: number;
  logger?: Logger;
  onStatusChange?: (status: ExecutionStatus) => void;
}

/**
 * compose()/compile() options
 */
export interface GraphOptions {
  logger?: Logger;
}

/**
 * JSON summary of a plan
 */
export interface PlanDescription {
  steps: string[];
  requiredInputs: string[];
  providedOutputs: string[];
}
