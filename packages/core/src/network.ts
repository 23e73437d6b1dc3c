/**
 * Network builder
 */

import {
  CyclicGraphError,
  DuplicateOperationError,
  EmptyOutputError,
} from './errors.js';
import { log } from './logger.js';
import { assertValidOperation, isOptional, needName } from './operation.js';
import type { DataNode, Edge, GraphOptions, Network, NeedRef, Operation, OperationNode } from './types.js';

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

interface DfsFrame {
  op: number;
  /** Outgoing [data, operation] pairs */
  next: Array<[number, number]>;
  cursor: number;
  /** Data node of the edge last taken out of this frame */
  via: number;
}

/**
 * Find one operation→data→operation cycle, optionally restricted to a subset of operations
 * @returns Alternating operation/data names closed on the first operation, or null
 */
export function findCycle(network: Network, subset?: ReadonlySet<number>): string[] | null {
  const { operationNodes, dataNodes } = network;
  const included = (id: number) => !subset || subset.has(id);
  const color = new Array<number>(operationNodes.length).fill(WHITE);

  const successors = (id: number): Array<[number, number]> => {
    const out: Array<[number, number]> = [];
    for (const data of operationNodes[id].provides) {
      for (const consumer of dataNodes[data].consumers) {
        if (included(consumer)) out.push([data, consumer]);
      }
    }
    return out;
  };

  for (const root of operationNodes) {
    if (!included(root.id) || color[root.id] !== WHITE) continue;

    color[root.id] = GRAY;
    const stack: DfsFrame[] = [{ op: root.id, next: successors(root.id), cursor: 0, via: -1 }];

    while (stack.length) {
      const frame = stack[stack.length - 1];
      if (frame.cursor >= frame.next.length) {
        color[frame.op] = BLACK;
        stack.pop();
        continue;
      }

      const [data, target] = frame.next[frame.cursor++];
      frame.via = data;

      if (color[target] === GRAY) {
        const start = stack.findIndex((f) => f.op === target);
        const cycle: string[] = [];
        for (const f of stack.slice(start)) {
          cycle.push(operationNodes[f.op].name, dataNodes[f.via].name);
        }
        cycle.push(operationNodes[target].name);
        return cycle;
      }

      if (color[target] === WHITE) {
        color[target] = GRAY;
        stack.push({ op: target, next: successors(target), cursor: 0, via: -1 });
      }
    }
  }

  return null;
}

/**
 * Build a validated, acyclic network from operations (declaration order is kept)
 * @throws DuplicateOperationError | EmptyOutputError | CyclicGraphError | InvalidOperationError
 */
export function compose(operations: Iterable<Operation>, options: GraphOptions = {}): Network {
  const logger = (options.logger ?? log).child({ component: 'compose' });
  const ops = [...operations];

  const names = new Set<string>();
  for (const op of ops) {
    assertValidOperation(op);
    if (names.has(op.name)) {
      throw new DuplicateOperationError(op.name);
    }
    names.add(op.name);
    if (op.provides.length === 0) {
      throw new EmptyOutputError(op.name);
    }
  }

  // Data nodes are interned on first mention
  const dataNames: string[] = [];
  const dataIndex = new Map<string, number>();
  const producers: number[][] = [];
  const consumers: number[][] = [];
  const edges: Edge[] = [];

  const intern = (name: string): number => {
    let id = dataIndex.get(name);
    if (id === undefined) {
      id = dataNames.length;
      dataIndex.set(name, id);
      dataNames.push(name);
      producers.push([]);
      consumers.push([]);
    }
    return id;
  };

  const operationNodes: OperationNode[] = ops.map((op, id) => {
    const needs: NeedRef[] = op.needs.map((need) => {
      const data = intern(needName(need));
      const optional = isOptional(need);
      consumers[data].push(id);
      edges.push({ kind: 'needs', from: data, to: id, optional });
      return Object.freeze({ data, optional });
    });
    const provides = op.provides.map((name) => {
      const data = intern(name);
      producers[data].push(id);
      edges.push({ kind: 'provides', from: id, to: data });
      return data;
    });
    return Object.freeze({
      id,
      name: op.name,
      operation: op,
      needs: Object.freeze(needs),
      provides: Object.freeze(provides),
    });
  });

  const dataNodes: DataNode[] = dataNames.map((name, id) =>
    Object.freeze({
      id,
      name,
      producers: Object.freeze(producers[id]),
      consumers: Object.freeze(consumers[id]),
    })
  );

  const network: Network = Object.freeze({
    dataNodes: Object.freeze(dataNodes),
    operationNodes: Object.freeze(operationNodes),
    edges: Object.freeze(edges),
    dataIndex,
  });

  const cycle = findCycle(network);
  if (cycle) {
    throw new CyclicGraphError(cycle);
  }

  logger.debug(
    { operations: operationNodes.length, dataNodes: dataNodes.length, edges: edges.length },
    'composed network'
  );
  return network;
}

/**
 * Names no operation in the network provides
 */
export function networkInputs(network: Network): string[] {
  return network.dataNodes.filter((node) => node.producers.length === 0).map((node) => node.name);
}

/**
 * Names no operation in the network needs
 */
export function networkOutputs(network: Network): string[] {
  return network.dataNodes.filter((node) => node.consumers.length === 0).map((node) => node.name);
}
