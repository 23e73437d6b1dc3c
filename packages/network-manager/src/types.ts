import type { ExecutionMethod, NamedValues } from '@opgraph/core';

export type OperationInputFieldType = 'string' | 'number' | 'boolean' | 'enum' | 'json';

export interface OperationInputFieldSchema {
  key: string;
  type: OperationInputFieldType;
  required: boolean;
  description?: string;
  defaultValue?: unknown;
  enumValues?: string[];
}

export interface OperationInputSchema {
  type: 'object';
  fields: OperationInputFieldSchema[];
}

export interface ManagedOperationMeta {
  name: string;
  label?: string;
  description?: string;
  needs: string[];
  provides: string[];
  /** One field per need, typed from the registered zod schema when given */
  inputSchema: OperationInputSchema;
}

export interface NetworkGraphNode {
  /** `data:${name}` or `op:${name}` */
  id: string;
  kind: 'data' | 'operation';
  label: string;
  /** Member of the plan the graph was built for */
  inPlan: boolean;
  /** 1-based position of an operation in the plan */
  step?: number;
}

export interface NetworkGraphEdge {
  id: string;
  source: string;
  target: string;
  kind: 'needs' | 'provides';
  optional?: boolean;
}

export interface NetworkGraph {
  nodes: NetworkGraphNode[];
  edges: NetworkGraphEdge[];
}

export interface ComputeResponse {
  values: NamedValues;
  overwrites: Record<string, unknown[]>;
}

export interface NetworkManagerOptions {
  /** Name of the composed network operation */
  name?: string;
  method?: ExecutionMethod;
  maxConcurrency?: number;
}
