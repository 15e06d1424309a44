import type { ColorName, NodeSnapshot } from '../core/red-black-tree.js';

export type IndexChangeType = 'inserted' | 'removed';

// Emitted by the service after every successful mutation
export interface IndexChange {
  id: string;
  type: IndexChangeType;
  value: number;
  size: number;
  timestamp: number;
}

export interface NodeRecord {
  value: number;
  color: ColorName;
}

export interface IndexState {
  size: number;
  height: number;
  blackHeight: number;
  min: number | null;
  max: number | null;
  levelOrder: string;   // e.g. "[5, 3, 8]"
  inOrder: number[];
  tree: NodeSnapshot<number> | null;
}

export interface BatchInsertResult {
  inserted: number[];
  size: number;
}
