import type { TreeNode } from '../ir/treeModel';
import type { ElaboratedDesign } from '../extract/elab/elaboratedDesign';

type Frame = {
  node: TreeNode;
  prefix: string;
  last: boolean;
  /** Module types from the root down to the parent of `node`. */
  ancestors: ReadonlySet<string>;
};

/**
 * Box-drawing listing of the instance hierarchy:
 *
 *   top
 *   ├── u_a(ModA)
 *   │   └── u_leaf(Leaf)
 *   └── u_b(ModB)
 *
 * A node whose module type already appears among its ancestors is listed but not expanded.
 */
export function renderHierarchyText(root: TreeNode): string {
  const lines: string[] = [root.moduleName];
  const stack: Frame[] = [];

  const pushChildren = (node: TreeNode, prefix: string, ancestors: ReadonlySet<string>): void => {
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ node: node.children[i], prefix, last: i === node.children.length - 1, ancestors });
    }
  };

  pushChildren(root, '', new Set([root.moduleName]));
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, prefix, last, ancestors } = frame;
    lines.push(`${prefix}${last ? '└── ' : '├── '}${node.instanceName}(${node.moduleName})`);
    if (ancestors.has(node.moduleName)) continue;
    pushChildren(node, prefix + (last ? '    ' : '│   '), new Set(ancestors).add(node.moduleName));
  }

  return lines.join('\n') + '\n';
}

/**
 * Per-module listing of declared ports and of each submodule instance's connections.
 */
export function renderConnectionsText(design: ElaboratedDesign): string {
  const out: string[] = [];
  for (const mod of design.modules) {
    out.push(`Module: ${mod.name}\n`);
    out.push('='.repeat(50) + '\n');

    if (mod.ports.length > 0) {
      out.push('Ports:\n');
      for (const p of mod.ports) out.push(`  ${p.direction}: ${p.name} (${p.type})\n`);
    }

    if (mod.instances.length > 0) {
      out.push('\nConnections:\n');
      for (const inst of mod.instances) {
        out.push(`  Submodule: ${inst.name}\n`);
        for (const c of inst.connections) {
          out.push(`    ${c.port} (${c.direction}) -> ${c.signals.join(', ')}\n`);
        }
      }
    }

    out.push('\n\n');
  }
  return out.join('');
}
