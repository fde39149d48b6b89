import { ROOT_INSTANCE_NAME, type TreeNode } from '../../ir/treeModel';
import { addFinding, type ExtractionReport, type ReportFinding } from '../../report/extractionReport';
import type { ElabConnection, ElabModule, ElaboratedDesign } from './elaboratedDesign';

type BuildContext = {
  byModule: Map<string, ElabModule>;
  report?: ExtractionReport;
  /** Findings already emitted; a module type instantiated N times is walked N times. */
  reported: Set<string>;
};

export function formatConnection(c: ElabConnection): string {
  return `${c.port} : ${c.signals.join(', ')}`;
}

function report(ctx: BuildContext, key: string, finding: ReportFinding): void {
  if (!ctx.report || ctx.reported.has(key)) return;
  ctx.reported.add(key);
  addFinding(ctx.report, finding);
}

/**
 * `ancestors` holds the module types on the path from the root to this node (exclusive), so a
 * type that instantiates itself, directly or through others, is cut at the repeated occurrence.
 * A type instantiated at several unrelated sites is expanded at each of them.
 */
function buildNode(
  ctx: BuildContext,
  moduleName: string,
  instanceName: string,
  ports: string[],
  ancestors: ReadonlySet<string>,
): TreeNode {
  const mod = ctx.byModule.get(moduleName);
  const node: TreeNode = {
    moduleName,
    instanceName,
    sourceLocation: mod?.sourceFile ?? '',
    ports,
    children: [],
  };
  if (!mod) return node;

  const path = new Set(ancestors).add(moduleName);
  const slotByInstance = new Map<string, number>();

  for (const inst of mod.instances) {
    const childPorts = inst.connections.map(formatConnection);
    let child: TreeNode;

    if (path.has(inst.moduleType)) {
      report(ctx, `recursive:${mod.name}:${inst.name}`, {
        kind: 'recursiveInstantiation',
        severity: 'warning',
        message: `${inst.moduleType} is instantiated inside its own hierarchy; subtree truncated`,
        location: { module: mod.name, instance: inst.name, file: mod.sourceFile || undefined },
      });
      child = {
        moduleName: inst.moduleType,
        instanceName: inst.name,
        sourceLocation: ctx.byModule.get(inst.moduleType)?.sourceFile ?? '',
        ports: childPorts,
        children: [],
      };
    } else {
      if (!ctx.byModule.has(inst.moduleType)) {
        report(ctx, `unresolved:${inst.moduleType}`, {
          kind: 'unresolvedModule',
          severity: 'info',
          message: `Module type ${inst.moduleType} is not declared in the elaborated design`,
          location: { module: mod.name, instance: inst.name, file: mod.sourceFile || undefined },
        });
      }
      child = buildNode(ctx, inst.moduleType, inst.name, childPorts, path);
    }

    const slot = slotByInstance.get(inst.name);
    if (slot === undefined) {
      slotByInstance.set(inst.name, node.children.length);
      node.children.push(child);
    } else {
      // Last writer wins.
      node.children[slot] = child;
      report(ctx, `duplicate:${mod.name}:${inst.name}`, {
        kind: 'duplicateInstance',
        severity: 'warning',
        message: `Instance name ${inst.name} is used more than once in ${mod.name}; the last one is kept`,
        location: { module: mod.name, instance: inst.name, file: mod.sourceFile || undefined },
      });
    }
  }

  return node;
}

/**
 * Build the hierarchy tree rooted at `topModule`. The root carries bare port names; every
 * instantiated submodule carries its "port : signal" connections.
 */
export function buildHierarchyTree(design: ElaboratedDesign, topModule: string, report?: ExtractionReport): TreeNode {
  const byModule = new Map<string, ElabModule>();
  for (const m of design.modules) byModule.set(m.name, m);

  const ctx: BuildContext = { byModule, report, reported: new Set() };
  const rootPorts = (byModule.get(topModule)?.ports ?? []).map((p) => p.name);
  return buildNode(ctx, topModule, ROOT_INSTANCE_NAME, rootPorts, new Set());
}
