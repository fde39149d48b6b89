import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import { TREE_JSON_KEY_ORDER, treeToJson, type TreeNode, type TreeToJsonOptions } from './treeModel';
import { stableStringify } from './deterministicJson';

export type WriteTreeJsonOptions = TreeToJsonOptions & {
  /** Pretty-print indentation (default 2). */
  space?: number;
};

/**
 * Serialize a hierarchy tree to a deterministic JSON string.
 */
export function serializeTreeJson(tree: TreeNode, options: WriteTreeJsonOptions = {}): string {
  return stableStringify(treeToJson(tree, options), options.space ?? 2, TREE_JSON_KEY_ORDER);
}

/**
 * Write a hierarchy tree to disk in a deterministic form.
 */
export async function writeTreeJsonFile(filePath: string, tree: TreeNode, options: WriteTreeJsonOptions = {}): Promise<void> {
  const json = serializeTreeJson(tree, options);
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, json, 'utf8');
}
