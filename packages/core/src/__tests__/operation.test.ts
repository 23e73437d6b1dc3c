import { describe, it, expect, vi } from 'vitest';
import { describeOperation, isOptional, needName, operation, optional } from '../operation.js';
import { InvalidOperationError } from '../errors.js';

describe('operation', () => {
  it('should create a frozen operation', () => {
    const op = operation({
      name: 'scale',
      needs: ['x'],
      provides: ['y'],
      params: { factor: 3 },
      fn: ({ x }, { factor }) => ({ y: Number(x) * Number(factor) }),
    });

    expect(op.name).toBe('scale');
    expect(op.needs).toEqual(['x']);
    expect(op.provides).toEqual(['y']);
    expect(op.params).toEqual({ factor: 3 });
    expect(Object.isFrozen(op)).toBe(true);
    expect(Object.isFrozen(op.needs)).toBe(true);
  });

  it('should hand inputs and params to fn', async () => {
    const fn = vi.fn(() => ({ y: 6 }));
    const op = operation({ name: 'scale', needs: ['x'], provides: ['y'], params: { factor: 3 }, fn });

    expect(await op.invoke({ x: 2 })).toEqual({ y: 6 });
    expect(fn).toHaveBeenCalledWith({ x: 2 }, { factor: 3 });
  });

  it('should not be affected by later changes to the declaration arrays', () => {
    const needs = ['a'];
    const op = operation({ name: 'copy', needs, provides: ['b'], fn: ({ a }) => ({ b: a }) });
    needs.push('c');

    expect(op.needs).toEqual(['a']);
  });

  it('should reject names with surrounding whitespace', () => {
    expect(() => operation({ name: ' add', provides: ['sum'], fn: () => ({}) })).toThrow(
      InvalidOperationError
    );
  });

  it('should reject empty data names', () => {
    expect(() => operation({ name: 'add', needs: ['a'], provides: [''], fn: () => ({}) })).toThrow(
      /provides\.0: must be a non-empty string/
    );
  });

  it('should reject duplicate needs and outputs', () => {
    expect(() =>
      operation({ name: 'add', needs: ['a', optional('a')], provides: ['sum'], fn: () => ({}) })
    ).toThrow(/duplicate need "a"/);
    expect(() =>
      operation({ name: 'add', needs: ['a'], provides: ['sum', 'sum'], fn: () => ({}) })
    ).toThrow(/duplicate output "sum"/);
  });

  it('should leave empty outputs to compose', () => {
    const op = operation({ name: 'noop', provides: [], fn: () => ({}) });
    expect(op.provides).toEqual([]);
  });
});

describe('optional needs', () => {
  it('should mark a need as optional', () => {
    const need = optional('title');

    expect(need).toEqual({ name: 'title', optional: true });
    expect(isOptional(need)).toBe(true);
    expect(isOptional('title')).toBe(false);
    expect(needName(need)).toBe('title');
    expect(needName('title')).toBe('title');
  });
});

describe('describeOperation', () => {
  it('should render name, needs and provides', () => {
    const op = operation({
      name: 'add',
      needs: ['a', optional('b')],
      provides: ['sum'],
      fn: () => ({ sum: 0 }),
    });

    expect(describeOperation(op)).toBe(
      "Operation(name='add', needs=['a', optional('b')], provides=['sum'])"
    );
  });
});
