/**
 * Plan executor
 *
 * State lives in a per-call store; a plan may be executed by any number of
 * concurrent calls. In parallel mode results are merged by the coordinating
 * loop in plan order, so overwrite histories match the sequential method.
 */

import type { Logger } from 'pino';
import { loadConfig } from './config.js';
import {
  InternalConsistencyError,
  InvalidOptionError,
  MissingInputError,
  OperationExecutionError,
} from './errors.js';
import { log } from './logger.js';
import { needName } from './operation.js';
import type {
  ExecuteOptions,
  ExecutionMethod,
  ExecutionResult,
  ExecutionStatus,
  NamedValues,
  OperationNode,
  Overwrites,
  Plan,
} from './types.js';
import { executeOptionsSchema, formatZodError } from './validation.js';

interface ResolvedOptions {
  method: ExecutionMethod;
  maxConcurrency: number;
}

type StepOutcome = { ok: true; outputs: NamedValues } | { ok: false; error: unknown };

/** Environment defaults, read once at load */
const defaults = loadConfig();

function resolveOptions(options: ExecuteOptions): ResolvedOptions {
  const parsed = executeOptionsSchema.safeParse({
    method: options.method ?? defaults.executionMethod,
    maxConcurrency: options.maxConcurrency ?? defaults.maxConcurrency,
  });
  if (!parsed.success) {
    throw new InvalidOptionError(formatZodError(parsed.error));
  }
  return parsed.data;
}

/**
 * Per-call value store with overwrite tracking
 */
class ValueStore {
  private readonly values: Map<string, unknown>;
  private readonly overwrites = new Map<string, unknown[]>();

  constructor(seed: NamedValues) {
    this.values = new Map(Object.entries(seed));
  }

  /**
   * Gather a step's needs; optional needs are passed only when present
   */
  gather(step: OperationNode): NamedValues {
    // Entries, not assignment: a name such as __proto__ must stay an own key
    const inputs: Array<[string, unknown]> = [];
    for (const need of step.operation.needs) {
      const name = needName(need);
      if (this.values.has(name)) {
        inputs.push([name, this.values.get(name)]);
      } else if (typeof need === 'string') {
        throw new InternalConsistencyError(`step "${step.name}" reached with "${name}" unset`, [
          step.name,
          name,
        ]);
      }
    }
    return Object.fromEntries(inputs);
  }

  merge(step: OperationNode, outputs: NamedValues): void {
    for (const name of step.operation.provides) {
      if (this.values.has(name)) {
        const history = this.overwrites.get(name) ?? [];
        history.push(this.values.get(name));
        this.overwrites.set(name, history);
      }
      this.values.set(name, outputs[name]);
    }
  }

  result(): ExecutionResult {
    const overwrites: Overwrites = Object.fromEntries(this.overwrites);
    return { solution: { values: Object.fromEntries(this.values) }, overwrites };
  }
}

function isRecord(value: unknown): value is NamedValues {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Invoke one step and check its output contract
 * @throws OperationExecutionError
 */
async function runStep(step: OperationNode, inputs: NamedValues, logger: Logger): Promise<NamedValues> {
  const { operation } = step;
  const context = {
    needs: operation.needs.map(needName),
    provides: [...operation.provides],
    inputs,
  };

  let results: unknown;
  try {
    results = await operation.invoke(inputs);
  } catch (err) {
    throw new OperationExecutionError(step.name, err, context);
  }

  if (!isRecord(results)) {
    throw new OperationExecutionError(
      step.name,
      new Error(`expected an object of outputs, got ${Array.isArray(results) ? 'array' : typeof results}`),
      { ...context, results }
    );
  }
  const missing = operation.provides.filter((name) => !Object.prototype.hasOwnProperty.call(results, name));
  if (missing.length) {
    throw new OperationExecutionError(
      step.name,
      new Error(`no value returned for ${missing.join(', ')}`),
      { ...context, results }
    );
  }
  const undeclared = Object.keys(results).filter((name) => !operation.provides.includes(name));
  if (undeclared.length) {
    logger.debug({ operation: step.name, undeclared }, 'ignoring undeclared outputs');
  }
  return results;
}

async function runSequential(plan: Plan, store: ValueStore, logger: Logger): Promise<void> {
  for (const step of plan.steps) {
    const outputs = await runStep(step, store.gather(step), logger);
    store.merge(step, outputs);
  }
}

/**
 * Indices of earlier steps providing a name each step needs
 */
function stepDependencies(plan: Plan): number[][] {
  return plan.steps.map((step, index) => {
    const needed = new Set(step.needs.map((need) => need.data));
    const deps: number[] = [];
    for (let earlier = 0; earlier < index; earlier++) {
      if (plan.steps[earlier].provides.some((data) => needed.has(data))) deps.push(earlier);
    }
    return deps;
  });
}

async function runParallel(
  plan: Plan,
  store: ValueStore,
  maxConcurrency: number,
  logger: Logger
): Promise<void> {
  const { steps } = plan;
  const deps = stepDependencies(plan);
  const outcomes: Array<StepOutcome | undefined> = new Array(steps.length);
  const started = new Set<number>();
  const running = new Map<number, Promise<number>>();
  const failures: number[] = [];
  // Steps below the cursor are merged into the store
  let cursor = 0;

  const start = (index: number) => {
    started.add(index);
    const step = steps[index];
    const task = (async () => {
      try {
        outcomes[index] = { ok: true, outputs: await runStep(step, store.gather(step), logger) };
      } catch (error) {
        outcomes[index] = { ok: false, error };
        failures.push(index);
      }
      return index;
    })();
    running.set(index, task);
  };

  for (;;) {
    while (!failures.length && cursor < steps.length) {
      const outcome = outcomes[cursor];
      if (!outcome || !outcome.ok) break;
      store.merge(steps[cursor], outcome.outputs);
      cursor++;
    }
    if (cursor === steps.length) return;

    if (!failures.length) {
      for (let index = cursor; index < steps.length && running.size < maxConcurrency; index++) {
        if (started.has(index)) continue;
        if (deps[index].every((dep) => dep < cursor)) start(index);
      }
    }

    if (!running.size) break;
    running.delete(await Promise.race(running.values()));
  }

  if (failures.length) {
    const first = Math.min(...failures);
    const outcome = outcomes[first];
    if (outcome && !outcome.ok) throw outcome.error;
  }
  throw new InternalConsistencyError(
    'no runnable step left before the plan completed',
    steps.slice(cursor).map((step) => step.name)
  );
}

/**
 * Execute a compiled plan over concrete values
 * @throws MissingInputError | OperationExecutionError | InvalidOptionError | InternalConsistencyError
 */
export async function execute(
  plan: Plan,
  values: NamedValues,
  options: ExecuteOptions = {}
): Promise<ExecutionResult> {
  const { method, maxConcurrency } = resolveOptions(options);
  const logger = (options.logger ?? log).child({ component: 'executor' });
  const transition = (status: ExecutionStatus) => {
    logger.debug({ status }, 'execution status');
    options.onStatusChange?.(status);
  };

  transition('pending');

  const missing = plan.requiredInputs.filter(
    (name) => !Object.prototype.hasOwnProperty.call(values, name)
  );
  if (missing.length) {
    transition('failed');
    throw new MissingInputError(missing);
  }

  const store = new ValueStore(values);
  transition('running');
  try {
    if (method === 'parallel') {
      await runParallel(plan, store, maxConcurrency, logger);
    } else {
      await runSequential(plan, store, logger);
    }
  } catch (err) {
    transition('failed');
    if (err instanceof OperationExecutionError) {
      logger.warn({ operation: err.operation, err: err.cause }, 'operation failed');
    }
    throw err;
  }
  transition('completed');
  return store.result();
}
