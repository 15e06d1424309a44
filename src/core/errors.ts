export type TreeErrorCode =
  | 'NULL_VALUE'
  | 'DUPLICATE_VALUE'
  | 'INVALID_RELATIONSHIP'
  | 'INVARIANT_VIOLATION';

/**
 * Base class for every failure raised by the tree
 * `code` lets callers (the HTTP layer in particular) branch without instanceof chains
 */
export class TreeError extends Error {
  readonly code: TreeErrorCode;

  constructor(code: TreeErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Thrown by insert when the value is null or undefined */
export class NullValueError extends TreeError {
  constructor() {
    super('NULL_VALUE', 'This tree cannot store null or undefined values');
  }
}

/** Thrown by insert when an equal value is already stored */
export class DuplicateValueError<T = unknown> extends TreeError {
  readonly value: T;

  constructor(value: T) {
    super('DUPLICATE_VALUE', `This tree already contains ${String(value)}`);
    this.value = value;
  }
}

/**
 * Thrown by rotate when the two nodes are not an immediate child/parent pair.
 * Signals a broken balancing step, never bad user input.
 */
export class InvalidRelationshipError extends TreeError {
  constructor() {
    super('INVALID_RELATIONSHIP', 'The provided child and parent nodes are not related');
  }
}

export type InvariantRule =
  | 'bst-order'
  | 'root-black'
  | 'red-red'
  | 'black-height'
  | 'parent-link';

export class InvariantViolationError extends TreeError {
  readonly rule: InvariantRule;

  constructor(rule: InvariantRule, detail: string) {
    super('INVARIANT_VIOLATION', `Red-black invariant "${rule}" violated: ${detail}`);
    this.rule = rule;
  }
}

export function isTreeError(error: unknown): error is TreeError {
  return error instanceof TreeError;
}
