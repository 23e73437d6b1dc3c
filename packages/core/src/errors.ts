/**
 * Engine errors
 *
 * Every error carries a `kind` discriminator and the names it concerns, so
 * callers (and the HTTP layer) can pinpoint the node responsible without
 * parsing messages.
 */

import type { NamedValues } from './types.js';

export type GraphErrorKind =
  | 'duplicate-operation'
  | 'empty-output'
  | 'cyclic-graph'
  | 'unsatisfiable-output'
  | 'missing-input'
  | 'operation-execution'
  | 'internal-consistency'
  | 'invalid-operation'
  | 'invalid-option';

export abstract class GraphError extends Error {
  abstract readonly kind: GraphErrorKind;

  /** Structured fields, serialized by toJSON() */
  protected abstract details(): Record<string, unknown>;

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, message: this.message, ...this.details() };
  }
}

export class DuplicateOperationError extends GraphError {
  readonly kind = 'duplicate-operation';

  constructor(readonly operation: string) {
    super(`Duplicate operation name: ${operation}`);
    this.name = 'DuplicateOperationError';
  }

  protected details() {
    return { operation: this.operation };
  }
}

export class EmptyOutputError extends GraphError {
  readonly kind = 'empty-output';

  constructor(readonly operation: string) {
    super(`Operation "${operation}" provides no outputs`);
    this.name = 'EmptyOutputError';
  }

  protected details() {
    return { operation: this.operation };
  }
}

export class CyclicGraphError extends GraphError {
  readonly kind = 'cyclic-graph';
  /** Operation names on the cycle, in order, without the closing repeat */
  readonly operations: string[];

  /**
   * @param cycle Alternating operation/data names; first and last entries are the same operation
   */
  constructor(readonly cycle: string[]) {
    super(`Cycle detected: ${cycle.join(' -> ')}`);
    this.name = 'CyclicGraphError';
    this.operations = cycle.filter((_, i) => i % 2 === 0).slice(0, -1);
  }

  protected details() {
    return { cycle: this.cycle, operations: this.operations };
  }
}

export class UnsatisfiableOutputError extends GraphError {
  readonly kind = 'unsatisfiable-output';

  constructor(readonly outputs: string[], readonly inputs: string[]) {
    super(
      `Unreachable outputs ${JSON.stringify(outputs)} given inputs ${JSON.stringify(inputs)}`
    );
    this.name = 'UnsatisfiableOutputError';
  }

  protected details() {
    return { outputs: this.outputs, inputs: this.inputs };
  }
}

export class MissingInputError extends GraphError {
  readonly kind = 'missing-input';

  constructor(readonly missing: string[]) {
    super(`Missing required inputs: ${missing.join(', ')}`);
    this.name = 'MissingInputError';
  }

  protected details() {
    return { missing: this.missing };
  }
}

/**
 * Values salvaged from a failed step
 */
export interface ExecutionContext {
  needs: string[];
  provides: string[];
  inputs: NamedValues;
  /** Present when the body returned but broke its output contract */
  results?: unknown;
}

export class OperationExecutionError extends GraphError {
  readonly kind = 'operation-execution';

  constructor(
    readonly operation: string,
    cause: unknown,
    readonly context: ExecutionContext
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Operation "${operation}" failed: ${reason}`, { cause });
    this.name = 'OperationExecutionError';
  }

  protected details() {
    return {
      operation: this.operation,
      needs: this.context.needs,
      provides: this.context.provides,
    };
  }
}

export class InternalConsistencyError extends GraphError {
  readonly kind = 'internal-consistency';

  constructor(message: string, readonly names: string[] = []) {
    super(`Internal consistency failure: ${message}`);
    this.name = 'InternalConsistencyError';
  }

  protected details() {
    return { names: this.names };
  }
}

export class InvalidOperationError extends GraphError {
  readonly kind = 'invalid-operation';

  constructor(readonly operation: string, reason: string) {
    super(`Invalid operation "${operation}": ${reason}`);
    this.name = 'InvalidOperationError';
  }

  protected details() {
    return { operation: this.operation };
  }
}

export class InvalidOptionError extends GraphError {
  readonly kind = 'invalid-option';

  constructor(reason: string) {
    super(`Invalid options: ${reason}`);
    this.name = 'InvalidOptionError';
  }

  protected details() {
    return {};
  }
}

export function isGraphError(err: unknown): err is GraphError {
  return err instanceof GraphError;
}
