import { describe, it, expect, vi } from 'vitest';
import { execute } from '../executor.js';
import { NetworkOperation, composeOperation } from '../networkOperation.js';
import { describeOperation, operation, optional } from '../operation.js';
import { MissingInputError, UnsatisfiableOutputError } from '../errors.js';
import type { Overwrites } from '../types.js';
import { add, double } from './fixtures.js';

const report = operation({
  name: 'report',
  needs: ['doubled'],
  provides: ['text'],
  fn: ({ doubled }) => ({ text: `doubled=${doubled}` }),
});

describe('composeOperation', () => {
  it('should expose external needs and every provided name', () => {
    const math = composeOperation('math', [add, double]);

    expect(math).toBeInstanceOf(NetworkOperation);
    expect(math.needs).toEqual(['a', 'b']);
    expect(math.provides).toEqual(['sum', 'doubled']);
    expect(math.network.operationNodes.map((n) => n.name)).toEqual(['add', 'double']);
  });

  it('should describe itself', () => {
    const math = composeOperation('math', [add, double]);

    expect(describeOperation(math)).toBe(
      "NetworkOperation(name='math', needs=['a', 'b'], provides=['sum', 'doubled'])"
    );
  });

  it('should keep a need optional only when every member treats it so', () => {
    const greet = operation({
      name: 'greet',
      needs: ['name', optional('title')],
      provides: ['greeting'],
      fn: () => ({ greeting: 'hi' }),
    });
    const badge = operation({ name: 'badge', needs: ['title'], provides: ['label'], fn: () => ({ label: 'x' }) });

    expect(composeOperation('g', [greet]).needs).toEqual(['name', { name: 'title', optional: true }]);
    expect(composeOperation('g', [greet, badge]).needs).toEqual(['name', 'title']);
  });

  it('should flatten nested network operations when merging', () => {
    const math = composeOperation('math', [add, double]);
    const merged = composeOperation('all', [math, add, report], { merge: true });

    expect(merged.operations.map((op) => op.name)).toEqual(['add', 'double', 'report']);
  });

  it('should keep nested network operations whole without merge', async () => {
    const math = composeOperation('math', [add, double]);
    const outer = composeOperation('outer', [math, report]);

    expect(outer.operations.map((op) => op.name)).toEqual(['math', 'report']);
    expect(await outer.compute({ a: 1, b: 2 }, ['text'])).toEqual({ text: 'doubled=6' });
  });
});

describe('NetworkOperation.compute', () => {
  const math = composeOperation('math', [add, double]);

  it('should return only the requested outputs', async () => {
    expect(await math.compute({ a: 1, b: 2 }, ['doubled'])).toEqual({ doubled: 6 });
  });

  it('should return every value when no outputs are requested', async () => {
    expect(await math.compute({ a: 1, b: 2 })).toEqual({ a: 1, b: 2, sum: 3, doubled: 6 });
  });

  it('should reuse compiled plans for the same request shape', () => {
    const first = math.compile(['a', 'b'], ['doubled']);
    const second = math.compile(['b', 'a', 'a'], ['doubled']);

    expect(second).toBe(first);
    expect(math.compile(['a', 'b'], ['sum'])).not.toBe(first);
  });

  it('should surface compile and execute errors', async () => {
    await expect(math.compute({ a: 1 }, ['doubled'])).rejects.toThrow(UnsatisfiableOutputError);

    const plan = math.compile(['a', 'b'], ['doubled']);
    expect(plan.requiredInputs).toEqual(['a', 'b']);
    await expect(math.compute({ a: 1, c: 2 }, ['sum'])).rejects.toThrow(UnsatisfiableOutputError);
  });

  it('should evict the least recently used plan once the cache is full', () => {
    const small = composeOperation('small', [add, double], { planCacheSize: 2 });
    const doubled = small.compile(['a', 'b'], ['doubled']);
    const sum = small.compile(['a', 'b'], ['sum']);

    expect(small.compile(['a', 'b'], ['doubled'])).toBe(doubled);
    small.compile(['a', 'b', 'extra'], ['sum']);

    expect(small.compile(['a', 'b'], ['doubled'])).toBe(doubled);
    expect(small.compile(['a', 'b'], ['sum'])).not.toBe(sum);
  });

  it('should keep __proto__ as an own key of the overwrites collector', async () => {
    const first = operation({ name: 'first', needs: ['a'], provides: ['__proto__'], fn: () => ({ ['__proto__']: 'first' }) });
    const second = operation({ name: 'second', needs: ['a'], provides: ['__proto__'], fn: () => ({ ['__proto__']: 'second' }) });
    const both = composeOperation('both', [first, second]);
    const overwrites: Overwrites = {};

    const result = await both.compute({ a: 1 }, ['__proto__'], { overwrites });

    expect(Object.entries(result)).toEqual([['__proto__', 'second']]);
    expect(Object.entries(overwrites)).toEqual([['__proto__', ['first']]]);
    expect(Object.getPrototypeOf(overwrites)).toBe(Object.prototype);
  });

  it('should fill the overwrites collector across calls', async () => {
    const first = operation({ name: 'first', needs: ['a'], provides: ['z'], fn: ({ a }) => ({ z: `first-${a}` }) });
    const second = operation({ name: 'second', needs: ['a'], provides: ['z'], fn: ({ a }) => ({ z: `second-${a}` }) });
    const both = composeOperation('both', [first, second]);
    const overwrites: Overwrites = {};

    expect(await both.compute({ a: 1 }, ['z'], { overwrites })).toEqual({ z: 'second-1' });
    await both.compute({ a: 2 }, ['z'], { overwrites });

    expect(overwrites).toEqual({ z: ['first-1', 'first-2'] });
  });

  it('should honor per-call execution options', async () => {
    const onStatusChange = vi.fn();

    await math.compute({ a: 1, b: 2 }, ['doubled'], { method: 'parallel', onStatusChange });

    expect(onStatusChange.mock.calls.map(([status]) => status)).toEqual(['pending', 'running', 'completed']);
  });

  it('should run as a member operation through invoke', async () => {
    expect(await math.invoke({ a: 2, b: 2 })).toEqual({ a: 2, b: 2, sum: 4, doubled: 8 });
  });

  it('should report missing inputs of a cached plan', async () => {
    const plan = math.compile(['a', 'b'], ['sum']);
    expect(plan.steps.map((s) => s.name)).toEqual(['add']);

    await expect(execute(plan, { a: 1 })).rejects.toThrow(MissingInputError);
  });
});
