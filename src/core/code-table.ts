/**
 * Code table derivation from a Huffman tree.
 */

import type { FrequencyTable } from './frequency.js';
import type { HuffmanTree } from './huffman-tree.js';

export type Bit = 0 | 1;

/**
 * A symbol's code, first bit first.
 */
export type Code = readonly Bit[];

export type CodeTable = ReadonlyMap<number, Code>;

/**
 * Assign a code to every leaf: 0 for each step to a left child, 1 for a right.
 * Returns an empty table for a null tree.
 */
export function generateCodeTable(tree: HuffmanTree | null): CodeTable {
  const codes = new Map<number, Code>();
  if (tree === null) {
    return codes;
  }

  // Explicit stack; right pushed first so left subtrees are visited first.
  const stack: Array<{ index: number; path: Bit[] }> = [
    { index: tree.root, path: [] },
  ];

  while (stack.length > 0) {
    const top = stack.pop();
    if (top === undefined) break;

    const node = tree.nodes[top.index];
    switch (node.kind) {
      case 'leaf':
        codes.set(node.symbol, top.path);
        break;
      case 'internal':
        stack.push({ index: node.right, path: [...top.path, 1] });
        stack.push({ index: node.left, path: [...top.path, 0] });
        break;
      case 'placeholder':
        break;
    }
  }

  return codes;
}

/**
 * Check that no code is a prefix of another code in the table.
 */
export function isPrefixFree(table: CodeTable): boolean {
  const codes = [...table.values()].map(codeToString).sort();
  // After sorting, a prefix always sorts directly before some code it prefixes.
  for (let i = 1; i < codes.length; i++) {
    if (codes[i].startsWith(codes[i - 1])) {
      return false;
    }
  }
  return true;
}

export function codeToString(code: Code): string {
  return code.join('');
}

/**
 * Total number of body bits needed to encode the counted input.
 */
export function encodedBitLength(table: CodeTable, frequencies: FrequencyTable): number {
  let bits = 0;
  for (const [symbol, code] of table) {
    bits += code.length * frequencies[symbol];
  }
  return bits;
}
