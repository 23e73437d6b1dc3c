/**
 * Operation declarations
 */

import { InvalidOperationError } from './errors.js';
import type { NamedValues, Need, Operation, OperationDeclaration, OptionalNeed } from './types.js';
import { declarationSchema, formatZodError } from './validation.js';

/**
 * Mark a need as optional
 */
export function optional(name: string): OptionalNeed {
  return Object.freeze({ name, optional: true });
}

export function needName(need: Need): string {
  return typeof need === 'string' ? need : need.name;
}

export function isOptional(need: Need): need is OptionalNeed {
  return typeof need !== 'string' && need.optional;
}

/**
 * Validate names of an operation-like value
 * @throws InvalidOperationError
 */
export function assertValidOperation(op: Pick<Operation, 'name' | 'needs' | 'provides'>): void {
  const parsed = declarationSchema.safeParse({
    name: op.name,
    needs: [...op.needs],
    provides: [...op.provides],
  });
  if (!parsed.success) {
    throw new InvalidOperationError(String(op.name), formatZodError(parsed.error));
  }
}

/**
 * Create an immutable operation
 */
export function operation(declaration: OperationDeclaration): Operation {
  const needs = Object.freeze([...(declaration.needs ?? [])]);
  const provides = Object.freeze([...declaration.provides]);
  assertValidOperation({ name: declaration.name, needs, provides });

  const params: Readonly<NamedValues> = Object.freeze({ ...(declaration.params ?? {}) });
  const { fn } = declaration;

  return Object.freeze({
    name: declaration.name,
    needs,
    provides,
    params,
    invoke: (inputs: Readonly<NamedValues>) => fn(inputs, params),
  });
}

export function describeOperation(op: Operation): string {
  const needs = op.needs.map((need) =>
    isOptional(need) ? `optional('${need.name}')` : `'${need}'`
  );
  const provides = op.provides.map((name) => `'${name}'`);
  const kind = op.constructor === Object ? 'Operation' : op.constructor.name;
  return `${kind}(name='${op.name}', needs=[${needs.join(', ')}], provides=[${provides.join(', ')}])`;
}
