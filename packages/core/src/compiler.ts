/**
 * Plan compiler: prunes a network for one (inputs, outputs) request and orders the survivors
 */

import { CyclicGraphError, InternalConsistencyError, UnsatisfiableOutputError } from './errors.js';
import { log } from './logger.js';
import { findCycle } from './network.js';
import type { GraphOptions, Network, OperationNode, Plan, PlanDescription } from './types.js';

/**
 * Operations that could contribute to `targets`, walking data → producer → needs.
 * Available inputs are not walked past.
 */
function reachBackward(
  network: Network,
  targets: readonly string[],
  inputs: ReadonlySet<string>,
  allowed: ReadonlySet<number>
): Set<number> {
  const { dataNodes, operationNodes, dataIndex } = network;
  const selected = new Set<number>();
  const visited = new Set<number>();
  const stack: number[] = [];

  for (const name of targets) {
    const id = dataIndex.get(name);
    if (id !== undefined) stack.push(id);
  }

  let data: number | undefined;
  while ((data = stack.pop()) !== undefined) {
    if (visited.has(data)) continue;
    visited.add(data);

    const node = dataNodes[data];
    if (inputs.has(node.name)) continue;

    for (const producer of node.producers) {
      if (!allowed.has(producer) || selected.has(producer)) continue;
      selected.add(producer);
      for (const need of operationNodes[producer].needs) {
        stack.push(need.data);
      }
    }
  }

  return selected;
}

/**
 * Candidates that become runnable from `inputs`, iterated to a fixed point
 */
function reachForward(
  network: Network,
  candidates: ReadonlySet<number>,
  inputs: ReadonlySet<string>
): Set<number> {
  const { operationNodes, dataIndex } = network;
  const available = new Set<number>();
  for (const name of inputs) {
    const id = dataIndex.get(name);
    if (id !== undefined) available.add(id);
  }

  const pending = [...candidates].sort((a, b) => a - b);
  const runnable = new Set<number>();
  let progressed = true;

  while (progressed) {
    progressed = false;
    for (const id of pending) {
      if (runnable.has(id)) continue;
      const node = operationNodes[id];
      if (node.needs.every((need) => need.optional || available.has(need.data))) {
        runnable.add(id);
        for (const data of node.provides) available.add(data);
        progressed = true;
      }
    }
  }

  return runnable;
}

function insertSorted(queue: number[], id: number): void {
  let index = queue.findIndex((queued) => queued > id);
  if (index === -1) index = queue.length;
  queue.splice(index, 0, id);
}

/**
 * Kahn's algorithm over the surviving operations; ties go to the earlier declaration
 */
function orderSteps(network: Network, survivors: ReadonlySet<number>): OperationNode[] {
  const { operationNodes, dataNodes } = network;
  const ids = [...survivors].sort((a, b) => a - b);
  const indegree = new Array<number>(operationNodes.length).fill(0);
  const successors: number[][] = operationNodes.map(() => []);

  for (const id of ids) {
    const predecessors = new Set<number>();
    for (const need of operationNodes[id].needs) {
      for (const producer of dataNodes[need.data].producers) {
        if (survivors.has(producer)) predecessors.add(producer);
      }
    }
    indegree[id] = predecessors.size;
    for (const producer of predecessors) successors[producer].push(id);
  }

  const ready = ids.filter((id) => indegree[id] === 0);
  const steps: OperationNode[] = [];
  let id: number | undefined;
  while ((id = ready.shift()) !== undefined) {
    steps.push(operationNodes[id]);
    for (const next of successors[id]) {
      indegree[next] -= 1;
      if (indegree[next] === 0) insertSorted(ready, next);
    }
  }

  if (steps.length !== ids.length) {
    const placed = new Set(steps.map((step) => step.id));
    const remaining = new Set(ids.filter((candidate) => !placed.has(candidate)));
    const cycle = findCycle(network, remaining);
    const names = [...remaining].map((op) => operationNodes[op].name);
    if (!cycle) {
      throw new InternalConsistencyError('operations left unordered without a cycle', names);
    }
    throw new CyclicGraphError(cycle);
  }

  return steps;
}

/**
 * Compile the minimal ordered plan computing `outputs` from `inputs`.
 * Without outputs (undefined or empty) every operation runnable from the inputs is kept.
 * @throws UnsatisfiableOutputError | CyclicGraphError | InternalConsistencyError
 */
export function compile(
  network: Network,
  inputs: Iterable<string>,
  outputs?: Iterable<string>,
  options: GraphOptions = {}
): Plan {
  const logger = (options.logger ?? log).child({ component: 'compiler' });
  const inputList = [...new Set(inputs)];
  const inputSet = new Set(inputList);
  const requestedList = outputs === undefined ? [] : [...new Set(outputs)];
  const requested = requestedList.length ? requestedList : undefined;

  const everything = new Set(network.operationNodes.map((node) => node.id));
  const candidates = requested ? reachBackward(network, requested, inputSet, everything) : everything;
  const runnable = reachForward(network, candidates, inputSet);
  // Drop runnable operations that only fed operations discarded above
  const survivors = requested ? reachBackward(network, requested, inputSet, runnable) : runnable;
  const steps = orderSteps(network, survivors);

  const produced: string[] = [];
  const producedSet = new Set<string>();
  for (const step of steps) {
    for (const data of step.provides) {
      const name = network.dataNodes[data].name;
      if (!producedSet.has(name)) {
        producedSet.add(name);
        produced.push(name);
      }
    }
  }

  if (requested) {
    const unsatisfied = requested.filter((name) => !inputSet.has(name) && !producedSet.has(name));
    if (unsatisfied.length) {
      throw new UnsatisfiableOutputError(unsatisfied, inputList);
    }
  }

  // Inputs read before any step produces them, plus outputs passed straight through
  const requiredInputs: string[] = [];
  const available = new Set<string>();
  const requireInput = (name: string) => {
    if (!available.has(name) && !requiredInputs.includes(name)) requiredInputs.push(name);
  };
  for (const step of steps) {
    for (const need of step.needs) {
      if (!need.optional) requireInput(network.dataNodes[need.data].name);
    }
    for (const data of step.provides) available.add(network.dataNodes[data].name);
  }
  for (const name of requested ?? []) {
    requireInput(name);
  }

  const providedOutputs = requested ?? [...new Set([...inputList, ...produced])];

  const plan: Plan = Object.freeze({
    network,
    steps: Object.freeze(steps),
    requiredInputs: Object.freeze(requiredInputs),
    providedOutputs: Object.freeze(providedOutputs),
  });

  logger.debug(
    {
      steps: steps.map((step) => step.name),
      pruned: network.operationNodes.length - steps.length,
      requiredInputs,
    },
    'compiled plan'
  );
  return plan;
}

export function describePlan(plan: Plan): PlanDescription {
  return {
    steps: plan.steps.map((step) => step.name),
    requiredInputs: [...plan.requiredInputs],
    providedOutputs: [...plan.providedOutputs],
  };
}
