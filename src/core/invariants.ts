import { Color, type RBNode, isRed } from './rb-node.js';
import type { Comparator } from './search.js';
import { InvariantViolationError } from './errors.js';

/**
 * Walks the whole tree and checks every red-black property
 *
 * - BST order, strict (so no duplicates)
 * - root is BLACK
 * - no RED node has a RED child
 * - every path to an absent child crosses the same number of BLACK nodes
 * - child.parent points back at the node holding the child link
 *
 * Time complexity: O(n)
 * @returns Black-height of the root (0 for an empty tree)
 * @throws InvariantViolationError on the first broken property
 */
export function validateTree<T>(root: RBNode<T> | null, compare: Comparator<T>): number {
  if (!root) return 0;
  if (root.parent !== null) {
    throw new InvariantViolationError('parent-link', `root ${String(root.value)} has a parent`);
  }
  if (root.color !== Color.BLACK) {
    throw new InvariantViolationError('root-black', `root ${String(root.value)} is RED`);
  }
  return validateSubtree(root, compare, null, null);
}

function validateSubtree<T>(
  node: RBNode<T> | null,
  compare: Comparator<T>,
  lower: RBNode<T> | null,
  upper: RBNode<T> | null
): number {
  if (!node) return 0;
  const label = String(node.value);

  if (lower && compare(node.value, lower.value) <= 0) {
    throw new InvariantViolationError('bst-order', `${label} is not greater than ${String(lower.value)}`);
  }
  if (upper && compare(node.value, upper.value) >= 0) {
    throw new InvariantViolationError('bst-order', `${label} is not less than ${String(upper.value)}`);
  }

  for (const child of [node.left, node.right]) {
    if (!child) continue;
    if (child.parent !== node) {
      throw new InvariantViolationError('parent-link', `${String(child.value)} does not point back at ${label}`);
    }
    if (isRed(node) && isRed(child)) {
      throw new InvariantViolationError('red-red', `RED ${String(child.value)} under RED ${label}`);
    }
  }

  const leftHeight = validateSubtree(node.left, compare, lower, node);
  const rightHeight = validateSubtree(node.right, compare, node, upper);
  if (leftHeight !== rightHeight) {
    throw new InvariantViolationError(
      'black-height',
      `${label} has black-height ${leftHeight} on the left and ${rightHeight} on the right`
    );
  }
  return leftHeight + (node.color === Color.BLACK ? 1 : 0);
}
