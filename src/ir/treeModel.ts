/**
 * Tree Model: the normalized module/instance hierarchy shared by the extractor output and the
 * expected-architecture input.
 *
 * On disk the model uses the JSON projection below (source of truth:
 * src/ir/schema/tree-model-schema.json).
 */
import Ajv from 'ajv/dist/2020';

import treeModelSchema from './schema/tree-model-schema.json';

export const ROOT_INSTANCE_NAME = 'Top';

export type TreeNode = {
  /** Module type name. */
  moduleName: string;
  /** Unique among siblings; "Top" for the root. */
  instanceName: string;
  /** File declaring the module, "" when unknown. */
  sourceLocation: string;
  /**
   * Root: bare port names. Instantiated submodule: "port : signal" (signals comma-joined when a
   * port fans out). Compared as a multiset.
   */
  ports: string[];
  /** Discovery order; not significant for comparison. */
  children: TreeNode[];
};

export type NodeSummary = {
  moduleName: string;
  instanceName: string;
  ports: string[];
};

export type TreeNodeJson = {
  Module_name: string;
  Instance_name: string;
  File_path?: string;
  Port?: string[];
  Instances?: TreeNodeJson[];
};

export const TREE_JSON_KEY_ORDER = ['Module_name', 'Instance_name', 'File_path', 'Port', 'Instances'] as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateTreeJson = ajv.compile<TreeNodeJson>(treeModelSchema);

export type TreeParseResult = { ok: true; tree: TreeNode } | { ok: false; error: string };

/**
 * Validate an untrusted JSON value against the tree schema and normalize it.
 * Defaults: File_path → "", Port → [], Instances → [].
 */
export function parseTreeJson(value: unknown): TreeParseResult {
  if (!validateTreeJson(value)) {
    return { ok: false, error: ajv.errorsText(validateTreeJson.errors, { dataVar: 'tree' }) };
  }
  return { ok: true, tree: fromJson(value) };
}

function fromJson(j: TreeNodeJson): TreeNode {
  return {
    moduleName: j.Module_name,
    instanceName: j.Instance_name,
    sourceLocation: j.File_path ?? '',
    ports: [...(j.Port ?? [])],
    children: (j.Instances ?? []).map(fromJson),
  };
}

export type TreeToJsonOptions = {
  /** Emit File_path even when empty (the extractor always does; the expected tree never has one). */
  includeFilePath?: boolean;
};

export function treeToJson(node: TreeNode, opts: TreeToJsonOptions = {}): TreeNodeJson {
  const includeFilePath = opts.includeFilePath ?? true;
  const out: TreeNodeJson = {
    Module_name: node.moduleName,
    Instance_name: node.instanceName,
  };
  if (includeFilePath) out.File_path = node.sourceLocation;
  out.Port = [...node.ports];
  out.Instances = node.children.map((c) => treeToJson(c, opts));
  return out;
}

export function summarizeNode(node: TreeNode): NodeSummary {
  return {
    moduleName: node.moduleName,
    instanceName: node.instanceName,
    ports: [...node.ports],
  };
}

export type WalkEntry = {
  node: TreeNode;
  depth: number;
  /** Module names from the root down to (excluding) this node. */
  ancestors: readonly string[];
};

/**
 * Depth-first pre-order walk over an explicit worklist. Return `false` from `visit` to skip a
 * node's children.
 */
export function walkTree(root: TreeNode, visit: (entry: WalkEntry) => boolean | void): void {
  const stack: WalkEntry[] = [{ node: root, depth: 0, ancestors: [] }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    if (visit(entry) === false) continue;
    const ancestors = [...entry.ancestors, entry.node.moduleName];
    for (let i = entry.node.children.length - 1; i >= 0; i--) {
      stack.push({ node: entry.node.children[i], depth: entry.depth + 1, ancestors });
    }
  }
}

export function countNodes(root: TreeNode): number {
  let n = 0;
  walkTree(root, () => {
    n++;
  });
  return n;
}
