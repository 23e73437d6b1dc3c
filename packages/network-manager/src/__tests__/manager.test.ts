import { describe, it, expect } from 'vitest';
import { DuplicateOperationError, OperationExecutionError } from '@opgraph/core';
import { createPricingManager } from './fixtures.js';

describe('NetworkManager', () => {
  it('should list registered operations with metadata', () => {
    const manager = createPricingManager();

    expect(manager.listOperations()).toEqual([
      {
        name: 'subtotal',
        label: 'Subtotal',
        needs: ['price', 'quantity'],
        provides: ['subtotal'],
        inputSchema: {
          type: 'object',
          fields: [
            { key: 'price', type: 'number', required: true, description: 'Unit price' },
            { key: 'quantity', type: 'number', required: true, defaultValue: 1 },
          ],
        },
      },
      {
        name: 'shipping',
        description: 'Adds the shipping fee',
        needs: ['subtotal', 'fee'],
        provides: ['total'],
        inputSchema: {
          type: 'object',
          fields: [
            { key: 'subtotal', type: 'json', required: true },
            { key: 'fee', type: 'json', required: false },
          ],
        },
      },
    ]);
  });

  it('should reject duplicate registrations', () => {
    const manager = createPricingManager();

    expect(() =>
      manager.registerOperation({ name: 'shipping', provides: ['x'], fn: () => ({ x: 1 }) })
    ).toThrow(DuplicateOperationError);
  });

  it('should recompose the network after registration', () => {
    const manager = createPricingManager();
    const first = manager.network();

    expect(manager.network()).toBe(first);
    expect(first.name).toBe('pricing');
    expect(first.needs).toEqual(['price', 'quantity', { name: 'fee', optional: true }]);

    manager.registerOperation({
      name: 'discount',
      needs: ['total'],
      provides: ['discounted'],
      fn: ({ total }) => ({ discounted: Number(total) - 1 }),
    });

    expect(manager.network()).not.toBe(first);
    expect(manager.network().provides).toEqual(['subtotal', 'total', 'discounted']);
  });

  it('should compute requested outputs with overwrites', async () => {
    const manager = createPricingManager();

    expect(await manager.compute({ price: 10, quantity: 2 }, ['total'])).toEqual({
      values: { total: 25 },
      overwrites: {},
    });
    expect(await manager.compute({ price: 10, quantity: 2, fee: 1 }, ['total'])).toEqual({
      values: { total: 21 },
      overwrites: {},
    });
  });

  it('should validate gathered inputs against the schema', async () => {
    const manager = createPricingManager();

    const attempt = manager.compute({ price: 'ten', quantity: 2 }, ['total']);

    await expect(attempt).rejects.toThrow(OperationExecutionError);
    await expect(attempt).rejects.toThrow(/^Operation "subtotal" failed: Invalid input: price: /);
  });

  it('should mark plan membership on the graph', () => {
    const manager = createPricingManager();
    const plan = manager.plan(['price', 'quantity'], ['subtotal']);

    const graph = manager.getGraph(plan);

    expect(graph.nodes).toEqual([
      { id: 'data:price', kind: 'data', label: 'price', inPlan: true },
      { id: 'data:quantity', kind: 'data', label: 'quantity', inPlan: true },
      { id: 'data:subtotal', kind: 'data', label: 'subtotal', inPlan: true },
      { id: 'data:fee', kind: 'data', label: 'fee', inPlan: false },
      { id: 'data:total', kind: 'data', label: 'total', inPlan: false },
      { id: 'op:subtotal', kind: 'operation', label: 'subtotal', inPlan: true, step: 1 },
      { id: 'op:shipping', kind: 'operation', label: 'shipping', inPlan: false },
    ]);
    expect(graph.edges).toEqual([
      { id: 'data:price->op:subtotal', source: 'data:price', target: 'op:subtotal', kind: 'needs', optional: false },
      { id: 'data:quantity->op:subtotal', source: 'data:quantity', target: 'op:subtotal', kind: 'needs', optional: false },
      { id: 'op:subtotal->data:subtotal', source: 'op:subtotal', target: 'data:subtotal', kind: 'provides' },
      { id: 'data:subtotal->op:shipping', source: 'data:subtotal', target: 'op:shipping', kind: 'needs', optional: false },
      { id: 'data:fee->op:shipping', source: 'data:fee', target: 'op:shipping', kind: 'needs', optional: true },
      { id: 'op:shipping->data:total', source: 'op:shipping', target: 'data:total', kind: 'provides' },
    ]);
  });

  it('should leave every node out of the plan without one', () => {
    const graph = createPricingManager().getGraph();

    expect(graph.nodes.every((node) => !node.inPlan)).toBe(true);
  });
});
