import { operation } from '../operation.js';

export const add = operation({
  name: 'add',
  needs: ['a', 'b'],
  provides: ['sum'],
  fn: ({ a, b }) => ({ sum: Number(a) + Number(b) }),
});

export const double = operation({
  name: 'double',
  needs: ['sum'],
  provides: ['doubled'],
  fn: ({ sum }) => ({ doubled: Number(sum) * 2 }),
});

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
