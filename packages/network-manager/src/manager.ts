import {
  DuplicateOperationError,
  composeOperation,
  formatZodError,
  log,
  needName,
  operation,
  type ComputeOptions,
  type Logger,
  type NamedValues,
  type NetworkOperation,
  type Operation,
  type OperationDeclaration,
  type Plan,
} from '@opgraph/core';
import type { ZodType } from 'zod';
import type {
  ComputeResponse,
  ManagedOperationMeta,
  NetworkGraph,
  NetworkGraphEdge,
  NetworkGraphNode,
  NetworkManagerOptions,
} from './types.js';
import { describeOperationInputs } from './inputSchema.js';

export interface RegisterOperationParams extends OperationDeclaration {
  label?: string;
  description?: string;
  /** Validates the gathered inputs before the body runs */
  inputSchema?: ZodType<NamedValues>;
}

export const dataNodeId = (name: string) => `data:${name}`;
export const operationNodeId = (name: string) => `op:${name}`;

/**
 * Registry of operations composed into one network, with graph helpers
 */
export class NetworkManager {
  private readonly registry = new Map<string, { operation: Operation; meta: ManagedOperationMeta }>();
  private composed: NetworkOperation | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly options: NetworkManagerOptions = {},
    logger: Logger = log
  ) {
    this.logger = logger.child({ component: 'network-manager' });
  }

  /**
   * Register an operation with metadata
   * @throws DuplicateOperationError | InvalidOperationError
   */
  registerOperation(params: RegisterOperationParams): Operation {
    const { label, description, inputSchema, fn, ...declaration } = params;
    if (this.registry.has(declaration.name)) {
      throw new DuplicateOperationError(declaration.name);
    }

    const body: OperationDeclaration['fn'] = inputSchema
      ? (inputs, opParams) => {
          const parsed = inputSchema.safeParse(inputs);
          if (!parsed.success) {
            throw new Error(`Invalid input: ${formatZodError(parsed.error)}`);
          }
          return fn(parsed.data, opParams);
        }
      : fn;
    const op = operation({ ...declaration, fn: body });

    const meta: ManagedOperationMeta = {
      name: op.name,
      needs: op.needs.map(needName),
      provides: [...op.provides],
      inputSchema: describeOperationInputs(op, inputSchema),
    };
    if (label !== undefined) meta.label = label;
    if (description !== undefined) meta.description = description;

    this.registry.set(op.name, { operation: op, meta });
    this.composed = undefined;
    this.logger.debug({ operation: op.name }, 'operation registered');
    return op;
  }

  listOperations(): ManagedOperationMeta[] {
    return [...this.registry.values()].map(({ meta }) => meta);
  }

  /**
   * Network of every registered operation, recomposed after registration
   */
  network(): NetworkOperation {
    if (!this.composed) {
      this.composed = composeOperation(
        this.options.name ?? 'network',
        [...this.registry.values()].map((entry) => entry.operation),
        {
          method: this.options.method,
          maxConcurrency: this.options.maxConcurrency,
          logger: this.logger,
        }
      );
    }
    return this.composed;
  }

  plan(inputs: Iterable<string>, outputs: Iterable<string> = []): Plan {
    return this.network().compile(inputs, outputs);
  }

  async compute(
    values: NamedValues,
    outputs: Iterable<string> = [],
    options: Omit<ComputeOptions, 'overwrites'> = {}
  ): Promise<ComputeResponse> {
    const overwrites: ComputeResponse['overwrites'] = {};
    const result = await this.network().compute(values, outputs, { ...options, overwrites });
    return { values: result, overwrites };
  }

  /**
   * Build the network graph, marking membership of an optional plan
   */
  getGraph(plan?: Plan): NetworkGraph {
    const { network } = this.network();
    const stepIndex = new Map<number, number>(plan?.steps.map((step, index) => [step.id, index]));
    const planData = new Set<number>();
    for (const step of plan?.steps ?? []) {
      for (const need of step.needs) planData.add(need.data);
      for (const data of step.provides) planData.add(data);
    }
    for (const name of plan?.requiredInputs ?? []) {
      const data = network.dataIndex.get(name);
      if (data !== undefined) planData.add(data);
    }

    const nodes: NetworkGraphNode[] = [];
    for (const data of network.dataNodes) {
      nodes.push({ id: dataNodeId(data.name), kind: 'data', label: data.name, inPlan: planData.has(data.id) });
    }
    for (const op of network.operationNodes) {
      const node: NetworkGraphNode = {
        id: operationNodeId(op.name),
        kind: 'operation',
        label: op.name,
        inPlan: stepIndex.has(op.id),
      };
      const index = stepIndex.get(op.id);
      if (index !== undefined) node.step = index + 1;
      nodes.push(node);
    }

    const edges: NetworkGraphEdge[] = network.edges.map((edge): NetworkGraphEdge => {
      const op = operationNodeId(network.operationNodes[edge.kind === 'needs' ? edge.to : edge.from].name);
      if (edge.kind === 'needs') {
        const source = dataNodeId(network.dataNodes[edge.from].name);
        return { id: `${source}->${op}`, source, target: op, kind: 'needs', optional: edge.optional };
      }
      const target = dataNodeId(network.dataNodes[edge.to].name);
      return { id: `${op}->${target}`, source: op, target, kind: 'provides' };
    });

    return { nodes, edges };
  }
}
