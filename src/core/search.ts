import type { RBNode } from './rb-node.js';

/** Total order over stored values: <0 if a<b, 0 if a==b, >0 if a>b */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Binary search descent from `node`
 * @returns The node holding a value equal to `value`, or null if absent
 */
export function search<T>(node: RBNode<T> | null, value: T, compare: Comparator<T>): RBNode<T> | null {
  let current = node;
  while (current) {
    const cmp = compare(value, current.value);
    if (cmp < 0) {
      current = current.left;
    } else if (cmp > 0) {
      current = current.right;
    } else {
      return current;
    }
  }
  return null;
}

/**
 * Leftmost node of a subtree; the in-order successor source during removal
 */
export function minimum<T>(node: RBNode<T>): RBNode<T> {
  while (node.left) {
    node = node.left;
  }
  return node;
}

export function maximum<T>(node: RBNode<T>): RBNode<T> {
  while (node.right) {
    node = node.right;
  }
  return node;
}
