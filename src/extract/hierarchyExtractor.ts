import { ExtractionError, errorMessage } from '../errors';
import { countNodes, type TreeNode } from '../ir/treeModel';
import { addFinding, createEmptyReport, finalizeReport, type ExtractionReport } from '../report/extractionReport';
import { TOOL_NAME, VERSION } from '../version';
import { buildHierarchyTree } from './elab/buildTree';
import { parseElaboratedXml, type ElaboratedDesign } from './elab/elaboratedDesign';
import { detectTopModule, type TopModuleSelection } from './elab/topModule';

export type ExtractHierarchyOptions = {
  /** Base identifier of the description (XML file base name); feeds the name-match fallback. */
  baseName?: string;
  /** Label recorded in the extraction report. */
  input?: string;
};

export type HierarchyExtraction = {
  design: ElaboratedDesign;
  top: TopModuleSelection;
  tree: TreeNode;
  report: ExtractionReport;
};

function recordTopSelection(report: ExtractionReport, top: TopModuleSelection): void {
  if (top.bestEffort) {
    addFinding(report, {
      kind: 'topModuleFallback',
      severity: 'warning',
      message: `Top module ${top.name} chosen by ${top.strategy} heuristic (candidates: ${top.candidates.join(', ')})`,
      location: { module: top.name },
    });
  } else if (top.strategy === 'largest-root') {
    addFinding(report, {
      kind: 'topModuleSelection',
      severity: 'info',
      message: `Several modules are never instantiated (${top.candidates.join(', ')}); using ${top.name}`,
      location: { module: top.name },
    });
  }
}

/**
 * Elaborated-design XML text → hierarchy tree rooted at the detected top module.
 *
 * Fails with ExtractionError on malformed input or when no top module can be determined.
 */
export function extractHierarchy(xmlText: string, opts: ExtractHierarchyOptions = {}): HierarchyExtraction {
  const report = createEmptyReport({ toolName: TOOL_NAME, toolVersion: VERSION, input: opts.input ?? opts.baseName ?? '' });

  let design: ElaboratedDesign;
  try {
    design = parseElaboratedXml(xmlText);
  } catch (e) {
    if (e instanceof ExtractionError) throw e;
    throw new ExtractionError(`Failed to parse elaborated design: ${errorMessage(e)}`, { cause: e });
  }

  const top = detectTopModule(design, { baseName: opts.baseName });
  recordTopSelection(report, top);

  const tree = buildHierarchyTree(design, top.name, report);

  report.topModule = top.name;
  report.modulesDeclared = design.modules.length;
  report.instancesInTree = countNodes(tree) - 1;
  finalizeReport(report);

  return { design, top, tree, report };
}
