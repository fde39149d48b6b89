import { CompareError } from '../errors';
import { parseTreeJson, summarizeNode, type NodeSummary, type TreeNode } from '../ir/treeModel';

export const TOP_LEVEL_FILE = 'Top Level';

export type MissingSide = 'missing';

export type DiffRecord = {
  /** Source file the mismatch is filed under. */
  file: string;
  expected: NodeSummary | MissingSide;
  actual: NodeSummary | MissingSide;
};

/** Whitespace never carries meaning in a port or connection string. */
export function normalizePort(port: string): string {
  return port.replace(/\s+/g, '');
}

/** Multiset equality of two port lists after normalization; order is ignored. */
export function portsEqual(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  const na = a.map(normalizePort).sort();
  const nb = b.map(normalizePort).sort();
  return na.every((p, i) => p === nb[i]);
}

/** Sibling lookup by instance name; on a name collision the last sibling wins. */
function childrenByInstance(node: TreeNode): Map<string, TreeNode> {
  const m = new Map<string, TreeNode>();
  for (const c of node.children) m.set(c.instanceName, c);
  return m;
}

function compareNodes(expected: TreeNode, actual: TreeNode, parentFile: string | undefined, out: DiffRecord[]): void {
  const currentFile = actual.sourceLocation || parentFile || TOP_LEVEL_FILE;

  if (expected.moduleName !== actual.moduleName || !portsEqual(expected.ports, actual.ports)) {
    out.push({ file: currentFile, expected: summarizeNode(expected), actual: summarizeNode(actual) });
  }

  const expectedChildren = childrenByInstance(expected);
  const actualChildren = childrenByInstance(actual);
  const keys = new Set<string>([...expectedChildren.keys(), ...actualChildren.keys()]);

  for (const key of keys) {
    const e = expectedChildren.get(key);
    const a = actualChildren.get(key);
    if (e && a) {
      compareNodes(e, a, currentFile, out);
    } else if (e) {
      out.push({ file: currentFile, expected: summarizeNode(e), actual: 'missing' });
    } else if (a) {
      out.push({ file: a.sourceLocation || currentFile, expected: 'missing', actual: summarizeNode(a) });
    }
  }
}

/**
 * Structural diff of two hierarchy trees, matched by instance name at every level.
 *
 * One pass over the whole tree: a mismatch at a node never suppresses the comparison of its
 * children. Sibling records follow expected order, then actual-only instances in actual order.
 * An instance present on one side only yields exactly one record and is not descended into.
 */
export function compareArchitectures(expected: TreeNode, actual: TreeNode): DiffRecord[] {
  const out: DiffRecord[] = [];
  compareNodes(expected, actual, undefined, out);
  return out;
}

/**
 * Compare two untrusted JSON values. Fails with CompareError when either is not a well-formed tree.
 */
export function compareTreeJson(expected: unknown, actual: unknown): DiffRecord[] {
  const e = parseTreeJson(expected);
  if (!e.ok) throw new CompareError(`Expected architecture is not a valid hierarchy tree: ${e.error}`);
  const a = parseTreeJson(actual);
  if (!a.ok) throw new CompareError(`Actual architecture is not a valid hierarchy tree: ${a.error}`);
  return compareArchitectures(e.tree, a.tree);
}
