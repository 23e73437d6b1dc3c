/**
 * Network operations: a composed network usable as a single operation
 */

import { LRUCache } from 'lru-cache';
import { compile } from './compiler.js';
import { execute } from './executor.js';
import { compose } from './network.js';
import { assertValidOperation, isOptional, optional } from './operation.js';
import type {
  ExecuteOptions,
  ExecutionMethod,
  GraphOptions,
  NamedValues,
  Need,
  Network,
  Operation,
  Overwrites,
  Plan,
} from './types.js';

export interface ComposeOperationOptions extends GraphOptions {
  /** Flatten nested network operations into their members, first name wins */
  merge?: boolean;
  /** Default execution method for compute() */
  method?: ExecutionMethod;
  maxConcurrency?: number;
  /** Compiled plans kept per network, least recently used evicted first (default 128) */
  planCacheSize?: number;
}

export interface ComputeOptions extends Omit<ExecuteOptions, 'logger'> {
  /** Collector receiving the overwrites of this computation */
  overwrites?: Overwrites;
}

const DEFAULT_PLAN_CACHE_SIZE = 128;

function planKey(inputs: Iterable<string>, outputs: Iterable<string>): string {
  return JSON.stringify([[...new Set(inputs)].sort(), [...new Set(outputs)].sort()]);
}

export class NetworkOperation implements Operation {
  readonly needs: readonly Need[];
  readonly provides: readonly string[];
  readonly params: Readonly<NamedValues> = Object.freeze({});
  readonly network: Network;
  private readonly plans: LRUCache<string, Plan>;

  constructor(
    readonly name: string,
    readonly operations: readonly Operation[],
    private readonly options: ComposeOperationOptions = {}
  ) {
    this.network = compose(operations, { logger: options.logger });
    this.plans = new LRUCache<string, Plan>({ max: options.planCacheSize ?? DEFAULT_PLAN_CACHE_SIZE });

    const provided = new Set<string>();
    for (const op of operations) {
      for (const name of op.provides) provided.add(name);
    }
    this.provides = Object.freeze([...provided]);

    // A need stays optional only if every member treats it so
    const external = new Map<string, boolean>();
    for (const op of operations) {
      for (const need of op.needs) {
        const needName = typeof need === 'string' ? need : need.name;
        if (provided.has(needName)) continue;
        external.set(needName, (external.get(needName) ?? true) && isOptional(need));
      }
    }
    this.needs = Object.freeze(
      [...external].map(([needName, isOpt]) => (isOpt ? optional(needName) : needName))
    );

    assertValidOperation(this);
  }

  /**
   * Compile (cached per request shape)
   */
  compile(inputs: Iterable<string>, outputs: Iterable<string> = []): Plan {
    const inputList = [...inputs];
    const outputList = [...outputs];
    const key = planKey(inputList, outputList);
    let plan = this.plans.get(key);
    if (!plan) {
      plan = compile(this.network, inputList, outputList, { logger: this.options.logger });
      this.plans.set(key, plan);
    }
    return plan;
  }

  /**
   * Compute requested outputs (all values when none requested)
   */
  async compute(
    values: NamedValues,
    outputs: Iterable<string> = [],
    options: ComputeOptions = {}
  ): Promise<NamedValues> {
    const requested = [...new Set(outputs)];
    const plan = this.compile(Object.keys(values), requested);
    const { overwrites: collector, ...executeOptions } = options;
    const { solution, overwrites } = await execute(plan, values, {
      method: this.options.method,
      maxConcurrency: this.options.maxConcurrency,
      ...executeOptions,
      logger: this.options.logger,
    });

    if (collector) {
      for (const [name, history] of Object.entries(overwrites)) {
        const previous = Object.prototype.hasOwnProperty.call(collector, name) ? collector[name] : [];
        Object.defineProperty(collector, name, {
          value: [...previous, ...history],
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
    }

    if (!requested.length) return solution.values;
    return Object.fromEntries(requested.map((name) => [name, solution.values[name]]));
  }

  invoke(inputs: Readonly<NamedValues>): Promise<NamedValues> {
    return this.compute({ ...inputs });
  }
}

/**
 * Compose operations into a named network operation
 */
export function composeOperation(
  name: string,
  operations: Iterable<Operation>,
  options: ComposeOperationOptions = {}
): NetworkOperation {
  const members: Operation[] = [];
  for (const op of operations) {
    if (options.merge && op instanceof NetworkOperation) {
      members.push(...op.operations);
    } else {
      members.push(op);
    }
  }

  if (!options.merge) {
    return new NetworkOperation(name, members, options);
  }

  const seen = new Set<string>();
  const unique = members.filter((op) => {
    if (seen.has(op.name)) return false;
    seen.add(op.name);
    return true;
  });
  return new NetworkOperation(name, unique, options);
}
