/**
 * Deterministic Huffman tree construction.
 *
 * Nodes live in a flat arena and refer to their children by index. The merge
 * order is fixed by the `(weight, key)` comparator below, so the decoder can
 * rebuild the exact tree the encoder used from the frequency table alone.
 */

import { ALPHABET_SIZE, symbolEntries, type FrequencyTable } from './frequency.js';
import { MinHeap } from './min-heap.js';

export interface LeafNode {
  kind: 'leaf';
  symbol: number;
  weight: number;
}

export interface InternalNode {
  kind: 'internal';
  weight: number;
  /** Arena index of the child reached with bit 0 */
  left: number;
  /** Arena index of the child reached with bit 1 */
  right: number;
}

/**
 * Zero-weight sibling that gives a lone symbol a one-bit code.
 * No symbol decodes to it.
 */
export interface PlaceholderNode {
  kind: 'placeholder';
  weight: 0;
}

export type HuffmanNode = LeafNode | InternalNode | PlaceholderNode;

export interface HuffmanTree {
  readonly nodes: readonly HuffmanNode[];
  /** Arena index of the root (always the last node) */
  readonly root: number;
}

interface QueueEntry {
  index: number;
  weight: number;
  key: number;
}

/**
 * Order by weight, then by tie-break key. Leaves use their symbol as key and
 * internal nodes use ALPHABET_SIZE + creation sequence, so on equal weight
 * leaves come first and older internal nodes precede newer ones.
 */
function compareEntries(a: QueueEntry, b: QueueEntry): number {
  if (a.weight !== b.weight) return a.weight - b.weight;
  return a.key - b.key;
}

/**
 * Build the Huffman tree for a frequency table.
 *
 * @returns The tree, or null when every count is zero (nothing to encode).
 */
export function buildHuffmanTree(table: FrequencyTable): HuffmanTree | null {
  const entries = symbolEntries(table);
  if (entries.length === 0) {
    return null;
  }

  const nodes: HuffmanNode[] = [];

  if (entries.length === 1) {
    const { symbol, count } = entries[0];
    nodes.push({ kind: 'leaf', symbol, weight: count });
    nodes.push({ kind: 'placeholder', weight: 0 });
    nodes.push({ kind: 'internal', weight: count, left: 0, right: 1 });
    return { nodes, root: 2 };
  }

  const queue = new MinHeap<QueueEntry>(compareEntries);
  for (const { symbol, count } of entries) {
    queue.push({ index: nodes.length, weight: count, key: symbol });
    nodes.push({ kind: 'leaf', symbol, weight: count });
  }

  let sequence = 0;
  while (queue.size > 1) {
    const first = queue.pop();
    const second = queue.pop();
    if (first === undefined || second === undefined) break;

    const weight = first.weight + second.weight;
    queue.push({ index: nodes.length, weight, key: ALPHABET_SIZE + sequence++ });
    nodes.push({ kind: 'internal', weight, left: first.index, right: second.index });
  }

  return { nodes, root: nodes.length - 1 };
}

/**
 * Length of the longest root-to-leaf path.
 */
export function treeDepth(tree: HuffmanTree): number {
  let maxDepth = 0;
  const stack: Array<{ index: number; depth: number }> = [
    { index: tree.root, depth: 0 },
  ];

  while (stack.length > 0) {
    const top = stack.pop();
    if (top === undefined) break;

    const node = tree.nodes[top.index];
    if (node.kind === 'internal') {
      stack.push({ index: node.left, depth: top.depth + 1 });
      stack.push({ index: node.right, depth: top.depth + 1 });
    } else {
      maxDepth = Math.max(maxDepth, top.depth);
    }
  }

  return maxDepth;
}
