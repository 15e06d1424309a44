import { Color, RBNode, isRed } from './rb-node.js';
import { rotate } from './rotation.js';
import { type Comparator, search, minimum, maximum } from './search.js';
import { validateTree } from './invariants.js';
import { NullValueError, DuplicateValueError } from './errors.js';

export type ColorName = 'RED' | 'BLACK';

/**
 * Plain-data copy of a subtree, used for structural comparison and rendering
 */
export interface NodeSnapshot<T> {
  value: T;
  color: ColorName;
  left: NodeSnapshot<T> | null;
  right: NodeSnapshot<T> | null;
}

export function colorName(color: Color): ColorName {
  return color === Color.RED ? 'RED' : 'BLACK';
}

/**
 * Self-balancing binary search tree holding distinct values
 * Guarantees O(log n) insert, remove and search regardless of insertion order
 *
 * Key properties:
 * - All RED nodes have BLACK children (no consecutive RED nodes)
 * - Every path from a node to an absent child contains the same number of BLACK nodes
 * - Root is always BLACK
 * - New insertions are always RED initially
 *
 * The tree is the only owner of the root slot. Rotations report a new root
 * back to it instead of writing the slot themselves.
 */
export class RedBlackTree<T> {
  private root: RBNode<T> | null = null;     // Root of the tree
  private size = 0;                          // Node count for O(1) size queries
  private readonly compareFn: Comparator<T>; // Total order over stored values

  /**
   * Creates a new Red-Black Tree with custom comparison function
   * @param compareFn - Function that returns <0 if a<b, 0 if a==b, >0 if a>b
   *                   (a,b) => a-b for ascending numbers, (a,b) => a.localeCompare(b) for strings
   */
  constructor(compareFn: Comparator<T>) {
    this.compareFn = compareFn;
  }

  /**
   * Inserts a value as a new RED leaf and rebalances
   * Time complexity: O(log n)
   * @throws NullValueError when value is null or undefined
   * @throws DuplicateValueError when an equal value is already stored; the tree is left untouched
   */
  insert(value: T | null | undefined): void {
    if (value === null || value === undefined) {
      throw new NullValueError();
    }

    const newNode = new RBNode<T>(value);

    // Handle empty tree case - root must be BLACK
    if (!this.root) {
      this.root = newNode;
      this.root.color = Color.BLACK;
      this.size++;
      return;
    }

    // Find insertion point using binary search
    let current: RBNode<T> | null = this.root;
    let parent: RBNode<T> = this.root;
    let cmp = 0;
    while (current) {
      parent = current;
      cmp = this.compareFn(value, current.value);
      if (cmp < 0) {
        current = current.left;
      } else if (cmp > 0) {
        current = current.right;
      } else {
        throw new DuplicateValueError(value);
      }
    }

    newNode.parent = parent;
    if (cmp < 0) {
      parent.left = newNode;
    } else {
      parent.right = newNode;
    }

    this.size++;
    this.fixAfterInsertion(newNode);
  }

  /**
   * Removes the node holding `value`
   * A missing value is an expected outcome, not an error
   * Time complexity: O(log n)
   * @returns The detached node (links cleared, color as it was before the call),
   *   or null if the value is not stored
   */
  remove(value: T): RBNode<T> | null {
    const node = search(this.root, value, this.compareFn);
    if (!node) return null;

    if (node.left && node.right) {
      // Two children: pull the in-order successor out of its own slot,
      // then let it take over the removed node's position and color
      // Fixup below the successor may recolor `node`; report its color at call time
      const color = node.color;
      const successor = minimum(node.right);
      this.detach(successor);
      this.replace(node, successor);
      node.color = color;
    } else {
      this.detach(node);
    }

    this.size--;
    node.parent = null;
    node.left = null;
    node.right = null;
    return node;
  }

  /**
   * Finds the node holding a value
   * Time complexity: O(log n)
   */
  search(value: T): RBNode<T> | null {
    return search(this.root, value, this.compareFn);
  }

  contains(value: T): boolean {
    return this.search(value) !== null;
  }

  /**
   * Smallest stored value, or null if tree is empty
   * Time complexity: O(log n)
   */
  findMin(): T | null {
    return this.root ? minimum(this.root).value : null;
  }

  /**
   * Largest stored value, or null if tree is empty
   * Time complexity: O(log n)
   */
  findMax(): T | null {
    return this.root ? maximum(this.root).value : null;
  }

  getRoot(): RBNode<T> | null {
    return this.root;
  }

  getSize(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  clear(): void {
    this.root = null;
    this.size = 0;
  }

  /**
   * Number of nodes on the longest root-to-leaf path (0 for an empty tree)
   * Bounded by 2·log2(n+1)
   */
  height(): number {
    return this.heightOf(this.root);
  }

  /**
   * Count of BLACK nodes from the root down to an absent child, root included
   * Read along the left spine; uniform on every path while the invariants hold
   */
  blackHeight(): number {
    let count = 0;
    for (let node = this.root; node; node = node.left) {
      if (node.color === Color.BLACK) count++;
    }
    return count;
  }

  /**
   * Checks every red-black invariant
   * @returns The black-height of the tree
   * @throws InvariantViolationError naming the first broken rule
   */
  validate(): number {
    return validateTree(this.root, this.compareFn);
  }

  /**
   * Iterator for in-order traversal (ascending order)
   * Restartable: each call walks the current tree from the start
   * Time complexity: O(n) for full traversal
   */
  *inOrderTraversal(): IterableIterator<T> {
    yield* this.inOrderTraversalNode(this.root);
  }

  /** In-order values collected into an array */
  toArray(): T[] {
    return Array.from(this.inOrderTraversal());
  }

  /** Values in breadth-first order */
  levelOrder(): T[] {
    const values: T[] = [];
    if (!this.root) return values;

    // The array iterator picks up nodes appended during the loop
    const queue: RBNode<T>[] = [this.root];
    for (const next of queue) {
      if (next.left) queue.push(next.left);
      if (next.right) queue.push(next.right);
      values.push(next.value);
    }
    return values;
  }

  snapshot(): NodeSnapshot<T> | null {
    return this.snapshotNode(this.root);
  }

  /**
   * Level-order rendering, e.g. `[5, 3, 8, 1, 4, 7, 9]`
   * An empty tree renders as `[]`
   */
  toString(): string {
    return `[${this.levelOrder().map(value => String(value)).join(', ')}]`;
  }

  private *inOrderTraversalNode(node: RBNode<T> | null): IterableIterator<T> {
    if (!node) return;
    yield* this.inOrderTraversalNode(node.left);
    yield node.value;
    yield* this.inOrderTraversalNode(node.right);
  }

  private heightOf(node: RBNode<T> | null): number {
    if (!node) return 0;
    return 1 + Math.max(this.heightOf(node.left), this.heightOf(node.right));
  }

  private snapshotNode(node: RBNode<T> | null): NodeSnapshot<T> | null {
    if (!node) return null;
    return {
      value: node.value,
      color: colorName(node.color),
      left: this.snapshotNode(node.left),
      right: this.snapshotNode(node.right)
    };
  }

  /**
   * Rotates child above parent and installs it as root when the rotation
   * reached the top of the tree
   */
  private rotate(child: RBNode<T>, parent: RBNode<T>): void {
    const newRoot = rotate(child, parent);
    if (newRoot) {
      this.root = newRoot;
    }
  }

  /**
   * Puts `replacement` (or nothing) into the slot `node` occupies under its parent
   * Does not touch node's own links
   */
  private transplant(node: RBNode<T>, replacement: RBNode<T> | null): void {
    const parent = node.parent;
    if (!parent) {
      this.root = replacement;
    } else if (parent.left === node) {
      parent.left = replacement;
    } else {
      parent.right = replacement;
    }
    if (replacement) {
      replacement.parent = parent;
    }
  }

  /**
   * Removes a node with at most one child from its slot
   * - one child: the child takes the slot and turns BLACK; under the invariants
   *   this node is BLACK and its only child RED, so black-height is kept
   * - RED leaf: removed directly
   * - BLACK leaf: the deficiency is resolved first, with the leaf still attached,
   *   then the leaf is removed
   */
  private detach(node: RBNode<T>): void {
    const child = node.left ?? node.right;
    if (child) {
      this.transplant(node, child);
      child.color = Color.BLACK;
      return;
    }
    if (node.color === Color.BLACK) {
      this.fixAfterDeletion(node);
    }
    this.transplant(node, null);
  }

  /**
   * Moves a detached successor into the position of `node`, adopting its
   * subtrees and color so every path keeps its black count
   */
  private replace(node: RBNode<T>, successor: RBNode<T>): void {
    this.transplant(node, successor);
    successor.left = node.left;
    if (successor.left) {
      successor.left.parent = successor;
    }
    successor.right = node.right;
    if (successor.right) {
      successor.right.parent = successor;
    }
    successor.color = node.color;
  }

  /**
   * Restores Red-Black tree properties after insertion
   * Handles cases where the new RED node sits under a RED parent
   * @param node - The newly inserted node to fix violations around
   */
  private fixAfterInsertion(node: RBNode<T>): void {
    node.color = Color.RED;
    let parent = node.parent;

    while (parent && parent.color === Color.RED) {
      const grandparent = parent.parent;
      if (!grandparent) break;  // RED root, blackened below

      const uncle = parent.sibling();
      if (uncle && isRed(uncle)) {
        // Case 1: Uncle is RED - recolor and move the violation up
        parent.color = Color.BLACK;
        uncle.color = Color.BLACK;
        grandparent.color = Color.RED;
        node = grandparent;
        parent = node.parent;
        continue;
      }

      if (node.isLeftChild() !== parent.isLeftChild()) {
        // Case 2: node is on the inner side - rotate it up to form a straight line
        this.rotate(node, parent);
        const promoted = node;
        node = parent;
        parent = promoted;
      }

      // Case 3: node, parent and grandparent in a line - final rotation
      this.rotate(parent, grandparent);
      parent.color = Color.BLACK;
      grandparent.color = Color.RED;
      break;
    }

    // A rotation or recoloring may have left a RED node at the top
    if (this.root) {
      this.root.color = Color.BLACK;
    }
  }

  /**
   * Resolves the missing black left behind when a BLACK leaf goes away
   * Runs while the leaf is still attached; `node` carries the extra black and
   * moves up the tree until a case absorbs it or it reaches the root
   * @param node - The BLACK leaf about to be removed
   */
  private fixAfterDeletion(node: RBNode<T>): void {
    let current = node;

    while (current.parent) {
      const parent: RBNode<T> = current.parent;
      const isLeft = current.isLeftChild();
      const sibling = isLeft ? parent.right : parent.left;

      if (sibling && isRed(sibling)) {
        // Case 1: Sibling is RED - rotate it up so current gets a BLACK sibling
        sibling.color = Color.BLACK;
        parent.color = Color.RED;
        this.rotate(sibling, parent);
        continue;
      }

      const near = sibling ? (isLeft ? sibling.left : sibling.right) : null;
      const far = sibling ? (isLeft ? sibling.right : sibling.left) : null;

      if (sibling && far && isRed(far)) {
        // Case 4: far child is RED - rotate sibling up, deficiency absorbed
        sibling.color = parent.color;
        parent.color = Color.BLACK;
        far.color = Color.BLACK;
        this.rotate(sibling, parent);
        return;
      }

      if (sibling && near && isRed(near)) {
        // Case 3: near child RED, far child BLACK - rotate near child up to reach Case 4
        sibling.color = Color.RED;
        near.color = Color.BLACK;
        this.rotate(near, sibling);
        continue;
      }

      // Case 2: sibling and both its children are BLACK
      if (sibling) {
        sibling.color = Color.RED;
      }
      if (parent.color === Color.RED) {
        parent.color = Color.BLACK;
        return;
      }
      current = parent;  // Move the deficiency up the tree
    }
  }
}
