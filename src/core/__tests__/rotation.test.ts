import { describe, it, expect } from 'vitest';
import { Color, RBNode, isBlack, isRed } from '../rb-node.js';
import { rotate } from '../rotation.js';
import { InvalidRelationshipError } from '../errors.js';

function attach(parent: RBNode<number>, child: RBNode<number>, side: 'left' | 'right'): RBNode<number> {
  parent[side] = child;
  child.parent = parent;
  return child;
}

/**
 *        10
 *       /  \
 *      5    15
 *     / \
 *    2   7
 */
function buildLeftLeaning() {
  const parent = new RBNode(10);
  const child = attach(parent, new RBNode(5), 'left');
  const outer = attach(child, new RBNode(2), 'left');
  const inner = attach(child, new RBNode(7), 'right');
  const sibling = attach(parent, new RBNode(15), 'right');
  return { parent, child, outer, inner, sibling };
}

describe('RBNode', () => {
  it('should start as a RED node without links', () => {
    const node = new RBNode('a');

    expect(node.color).toBe(Color.RED);
    expect(node.parent).toBe(null);
    expect(node.isLeaf()).toBe(true);
  });

  it('should know which side of its parent it hangs on', () => {
    const { parent, child, sibling } = buildLeftLeaning();

    expect(child.isLeftChild()).toBe(true);
    expect(child.isRightChild()).toBe(false);
    expect(sibling.isRightChild()).toBe(true);
    expect(parent.isLeftChild()).toBe(false);
    expect(parent.isRightChild()).toBe(false);
  });

  it('should find its sibling', () => {
    const { parent, child, sibling, outer, inner } = buildLeftLeaning();

    expect(child.sibling()).toBe(sibling);
    expect(sibling.sibling()).toBe(child);
    expect(outer.sibling()).toBe(inner);
    expect(parent.sibling()).toBe(null);
  });

  it('should treat absent nodes as BLACK', () => {
    const red = new RBNode(1);
    const black = new RBNode(2);
    black.color = Color.BLACK;

    expect(isBlack(null)).toBe(true);
    expect(isRed(null)).toBe(false);
    expect(isRed(red)).toBe(true);
    expect(isBlack(black)).toBe(true);
    expect(isRed(black)).toBe(false);
  });
});

describe('rotate', () => {
  it('should rotate a left child up as a right rotation', () => {
    const { parent, child, outer, inner, sibling } = buildLeftLeaning();

    const newRoot = rotate(child, parent);

    expect(newRoot).toBe(child);
    expect(child.parent).toBe(null);
    expect(child.left).toBe(outer);
    expect(child.right).toBe(parent);
    expect(parent.parent).toBe(child);
    expect(parent.left).toBe(inner);
    expect(inner.parent).toBe(parent);
    expect(parent.right).toBe(sibling);
  });

  it('should rotate a right child up as a left rotation', () => {
    const parent = new RBNode(5);
    const left = attach(parent, new RBNode(2), 'left');
    const child = attach(parent, new RBNode(10), 'right');
    const inner = attach(child, new RBNode(7), 'left');
    const outer = attach(child, new RBNode(15), 'right');

    expect(rotate(child, parent)).toBe(child);

    expect(child.left).toBe(parent);
    expect(child.right).toBe(outer);
    expect(parent.left).toBe(left);
    expect(parent.right).toBe(inner);
    expect(inner.parent).toBe(parent);
    expect(parent.parent).toBe(child);
  });

  it('should reattach the rotated pair to the grandparent', () => {
    const grandparent = new RBNode(20);
    const { parent, child } = buildLeftLeaning();
    attach(grandparent, parent, 'left');

    expect(rotate(child, parent)).toBe(null);
    expect(grandparent.left).toBe(child);
    expect(child.parent).toBe(grandparent);
  });

  it('should reattach on the right side of the grandparent', () => {
    const grandparent = new RBNode(1);
    const { parent, child } = buildLeftLeaning();
    attach(grandparent, parent, 'right');

    rotate(child, parent);

    expect(grandparent.right).toBe(child);
    expect(grandparent.left).toBe(null);
  });

  it('should move a missing inner subtree as null', () => {
    const parent = new RBNode(10);
    const child = attach(parent, new RBNode(5), 'left');

    rotate(child, parent);

    expect(parent.left).toBe(null);
    expect(child.right).toBe(parent);
  });

  it('should leave colors alone', () => {
    const { parent, child } = buildLeftLeaning();
    parent.color = Color.BLACK;

    rotate(child, parent);

    expect(parent.color).toBe(Color.BLACK);
    expect(child.color).toBe(Color.RED);
  });

  it('should reject nodes that are not parent and child', () => {
    const { parent, child, outer, sibling } = buildLeftLeaning();

    expect(() => rotate(outer, parent)).toThrow(InvalidRelationshipError);
    expect(() => rotate(parent, child)).toThrow(InvalidRelationshipError);
    expect(() => rotate(child, sibling)).toThrow(InvalidRelationshipError);

    // Nothing moved
    expect(parent.left).toBe(child);
    expect(child.left).toBe(outer);
    expect(outer.parent).toBe(child);
  });

  it('should report the relationship error code', () => {
    const a = new RBNode(1);
    const b = new RBNode(2);

    expect(() => rotate(a, b)).toThrow('The provided child and parent nodes are not related');
    expect(new InvalidRelationshipError().code).toBe('INVALID_RELATIONSHIP');
  });
});
