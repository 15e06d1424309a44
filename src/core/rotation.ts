import type { RBNode } from './rb-node.js';
import { InvalidRelationshipError } from './errors.js';

/**
 * Rotates `child` into `parent`'s position, preserving BST order
 *
 * - child is parent's left link: right rotation, child.right moves to parent.left
 * - child is parent's right link: left rotation, child.left moves to parent.right
 * - anything else: InvalidRelationshipError, nothing is modified
 *
 * Colors are not touched; callers recolor. The function never writes a root
 * slot. When the rotated pair was at the top of the tree, `child` ends up with
 * no parent and is returned so the owner can install it as the new root.
 *
 * @param child - Node moving up
 * @param parent - Node moving down, must be child's immediate parent
 * @returns child when it became the root of the whole tree, otherwise null
 */
export function rotate<T>(child: RBNode<T>, parent: RBNode<T>): RBNode<T> | null {
  if (child.parent !== parent) {
    throw new InvalidRelationshipError();
  }

  const grandparent = parent.parent;
  const parentWasLeft = parent.isLeftChild();

  if (parent.left === child) {
    // Right rotation: child's right subtree sits between child and parent
    parent.left = child.right;
    if (child.right) {
      child.right.parent = parent;
    }
    child.right = parent;
  } else {
    // Left rotation (mirror)
    parent.right = child.left;
    if (child.left) {
      child.left.parent = parent;
    }
    child.left = parent;
  }
  parent.parent = child;

  // Connect child to the grandparent
  child.parent = grandparent;
  if (!grandparent) {
    return child;
  }
  if (parentWasLeft) {
    grandparent.left = child;
  } else {
    grandparent.right = child;
  }
  return null;
}
