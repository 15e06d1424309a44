/**
 * Red-Black tree node colors used to maintain balance properties
 * RED = 0: new nodes start RED so an insertion never changes black-height
 * BLACK = 1: black nodes are the ones counted by the height balance constraint
 */
export enum Color {
  RED = 0,
  BLACK = 1
}

/**
 * A single vertex of the tree
 * Children are owned by the node; `parent` is a plain back-reference that the
 * tree keeps consistent with the child links on every structural change
 */
export class RBNode<T> {
  value: T;                          // The ordered value stored at this node
  color: Color = Color.RED;          // Every node is created as a RED leaf
  parent: RBNode<T> | null = null;   // null only for the root
  left: RBNode<T> | null = null;     // Smaller values
  right: RBNode<T> | null = null;    // Larger values

  constructor(value: T) {
    this.value = value;
  }

  /**
   * @returns true when this node has a parent and is that parent's left link
   */
  isLeftChild(): boolean {
    return this.parent !== null && this.parent.left === this;
  }

  /**
   * @returns true when this node has a parent and is that parent's right link
   */
  isRightChild(): boolean {
    return this.parent !== null && this.parent.right === this;
  }

  /**
   * The other child of this node's parent, or null for the root and for a
   * parent with a single child
   */
  sibling(): RBNode<T> | null {
    if (!this.parent) return null;
    return this.isLeftChild() ? this.parent.right : this.parent.left;
  }

  isLeaf(): boolean {
    return this.left === null && this.right === null;
  }
}

// Absent children are the conceptual black nil leaves
export function isRed<T>(node: RBNode<T> | null): boolean {
  return node !== null && node.color === Color.RED;
}

export function isBlack<T>(node: RBNode<T> | null): boolean {
  return node === null || node.color === Color.BLACK;
}
