import { EventEmitter } from 'events';
import type { FastifyBaseLogger } from 'fastify';
import { nanoid } from 'nanoid';
import { RedBlackTree, colorName } from '../core/red-black-tree.js';
import { NullValueError, isTreeError } from '../core/errors.js';
import type { BatchInsertResult, IndexChange, IndexChangeType, IndexState, NodeRecord } from '../types/ordered-index.js';
import { getErrorMessage } from '../utils/error-utils.js';

/**
 * Events emitted by the OrderedIndexService after each successful mutation
 */
export interface OrderedIndexEvents {
  inserted: (change: IndexChange) => void;
  removed: (change: IndexChange) => void;
}

/**
 * Thrown by insertMany when one value of a batch is rejected
 * Values before it stay stored; `inserted` lists them
 */
export class BatchInsertError extends Error {
  readonly inserted: number[];

  constructor(inserted: number[], cause: unknown) {
    super(`Batch stopped after ${inserted.length} values: ${getErrorMessage(cause)}`, { cause });
    this.name = 'BatchInsertError';
    this.inserted = inserted;
  }
}

/**
 * Numeric ordered index backed by a red-black tree
 *
 * Adds what the bare tree leaves out: logging through the Fastify logger and
 * typed change events for anything that wants to follow the index.
 * Single-threaded: every call runs to completion on the event loop.
 */
export class OrderedIndexService extends EventEmitter {
  private readonly tree: RedBlackTree<number>;
  private readonly logger: FastifyBaseLogger | undefined;

  constructor(logger?: FastifyBaseLogger) {
    super();
    this.logger = logger;
    this.tree = new RedBlackTree<number>((a, b) => a - b);
  }

  override on<E extends keyof OrderedIndexEvents>(event: E, listener: OrderedIndexEvents[E]): this {
    return super.on(event, listener);
  }

  override emit<E extends keyof OrderedIndexEvents>(event: E, ...args: Parameters<OrderedIndexEvents[E]>): boolean {
    return super.emit(event, ...args);
  }

  /**
   * @throws NullValueError | DuplicateValueError from the tree, after logging a warning
   */
  insert(value: number | null | undefined): IndexChange {
    if (value === null || value === undefined) {
      this.logger?.warn('Rejected insert of an absent value');
      throw new NullValueError();
    }

    try {
      this.tree.insert(value);
    } catch (error) {
      if (isTreeError(error)) {
        this.logger?.warn(`Rejected insert of ${value}: ${error.code}`);
      }
      throw error;
    }

    const change = this.recordChange('inserted', value);
    this.logger?.debug(`Inserted ${value}, size ${change.size}`);
    return change;
  }

  /**
   * Inserts values in order and stops at the first rejected one
   * @throws BatchInsertError listing what was stored before the failure
   */
  insertMany(values: number[]): BatchInsertResult {
    const inserted: number[] = [];
    for (const value of values) {
      try {
        this.insert(value);
      } catch (error) {
        throw new BatchInsertError(inserted, error);
      }
      inserted.push(value);
    }
    return { inserted, size: this.tree.getSize() };
  }

  /**
   * @returns The removed value and the color it had, or null if it was not stored
   */
  remove(value: number): NodeRecord | null {
    const removed = this.tree.remove(value);
    if (!removed) {
      this.logger?.debug(`Remove of ${value} found nothing`);
      return null;
    }

    const change = this.recordChange('removed', value);
    this.logger?.debug(`Removed ${value}, size ${change.size}`);
    return { value: removed.value, color: colorName(removed.color) };
  }

  search(value: number): NodeRecord | null {
    const node = this.tree.search(value);
    return node ? { value: node.value, color: colorName(node.color) } : null;
  }

  getSize(): number {
    return this.tree.getSize();
  }

  getState(): IndexState {
    return {
      size: this.tree.getSize(),
      height: this.tree.height(),
      blackHeight: this.tree.blackHeight(),
      min: this.tree.findMin(),
      max: this.tree.findMax(),
      levelOrder: this.tree.toString(),
      inOrder: this.tree.toArray(),
      tree: this.tree.snapshot()
    };
  }

  /**
   * Runs the full invariant check
   * @returns The black-height
   * @throws InvariantViolationError, logged as an error first
   */
  validate(): number {
    try {
      return this.tree.validate();
    } catch (error) {
      this.logger?.error(`Index failed validation: ${getErrorMessage(error)}`);
      throw error;
    }
  }

  clear(): void {
    const size = this.tree.getSize();
    this.tree.clear();
    this.logger?.info(`Cleared index of ${size} values`);
  }

  private recordChange(type: IndexChangeType, value: number): IndexChange {
    const change: IndexChange = {
      id: nanoid(),
      type,
      value,
      size: this.tree.getSize(),
      timestamp: Date.now()
    };
    this.emit(type, change);
    return change;
  }
}
