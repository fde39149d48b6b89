import type { TreeNode } from '../ir/treeModel';

/**
 * Graphviz projections of the hierarchy. Each module type is expanded once: `visited` is the
 * explicit set of module types already emitted, threaded through the walk.
 */

type DotState = {
  lines: string[];
  visited: Set<string>;
};

function esc(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function q(id: string): string {
  return `"${esc(id)}"`;
}

function instanceLabel(node: TreeNode): string {
  return `"${esc(node.instanceName)}\\n(${esc(node.moduleName)})"`;
}

function emitTypeGraph(node: TreeNode, state: DotState): void {
  const mod = node.moduleName;
  if (state.visited.has(mod)) return;
  state.visited.add(mod);

  state.lines.push(`  ${q(mod)} [label=${q(mod)}];`);
  for (const child of node.children) {
    const instId = `${mod}.${child.instanceName}`;
    state.lines.push(`  ${q(instId)} [label=${instanceLabel(child)}, shape=ellipse, fillcolor=lightgreen];`);
    state.lines.push(`  ${q(mod)} -> ${q(instId)} [style=dashed];`);
    state.lines.push(`  ${q(instId)} -> ${q(child.moduleName)} [label=" "];`);
    emitTypeGraph(child, state);
  }
}

/**
 * Module types as boxes, instances as ellipses: parent type → instance → instantiated type.
 */
export function renderHierarchyDot(root: TreeNode): string {
  const state: DotState = { lines: [], visited: new Set() };
  state.lines.push('digraph ModuleHierarchy {');
  state.lines.push('  rankdir=LR;');
  state.lines.push('  node [shape=box, style=filled, fillcolor=lightblue];');
  state.lines.push('');
  emitTypeGraph(root, state);
  state.lines.push('}');
  return state.lines.join('\n') + '\n';
}

function emitCluster(node: TreeNode, state: DotState): void {
  const mod = node.moduleName;
  if (state.visited.has(mod)) return;
  state.visited.add(mod);

  const moduleNodeId = `${mod}_node`;
  state.lines.push(`  subgraph ${q(`cluster_${mod}`)} {`);
  state.lines.push(`    label=${q(mod)};`);
  state.lines.push('    style=filled;');
  state.lines.push('    color=lightgrey;');
  state.lines.push('    node [style=filled, fillcolor=white];');
  state.lines.push(`    ${q(moduleNodeId)} [label=${q(mod)}, shape=box, fillcolor=lightblue];`);
  for (const child of node.children) {
    const instId = `${mod}_${child.instanceName}`;
    state.lines.push(`    ${q(instId)} [label=${instanceLabel(child)}, shape=ellipse, fillcolor=lightgreen];`);
    state.lines.push(`    ${q(moduleNodeId)} -> ${q(instId)} [style=dashed];`);
  }
  state.lines.push('  }');
  state.lines.push('');

  for (const child of node.children) {
    emitCluster(child, state);
    const instId = `${mod}_${child.instanceName}`;
    state.lines.push(
      `  ${q(instId)} -> ${q(`${child.moduleName}_node`)} [lhead=${q(`cluster_${child.moduleName}`)}];`,
    );
  }
}

/**
 * One cluster per module type holding its instances; instances point at the cluster of their type.
 */
export function renderNestedHierarchyDot(root: TreeNode): string {
  const state: DotState = { lines: [], visited: new Set() };
  state.lines.push('digraph ModuleHierarchy {');
  state.lines.push('  rankdir=TB;');
  state.lines.push('  compound=true;');
  state.lines.push('  node [shape=box, style=filled, fillcolor=lightblue];');
  state.lines.push('');
  emitCluster(root, state);
  state.lines.push('}');
  return state.lines.join('\n') + '\n';
}
