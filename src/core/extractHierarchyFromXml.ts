import fs from 'node:fs/promises';
import path from 'node:path';

import { ExtractionError, errorMessage } from '../errors';
import { extractHierarchy, type HierarchyExtraction } from '../extract/hierarchyExtractor';
import { writeTreeJsonFile } from '../ir/writeTreeJson';
import { renderHierarchyDot, renderNestedHierarchyDot } from '../report/dotExport';
import { renderConnectionsText, renderHierarchyText } from '../report/hierarchyText';
import { writeReportFile, writeTextFile } from '../report/writeReport';

export type ExtractHierarchyFileOptions = {
  /** Directory receiving the artifacts (default: current directory). */
  outDir?: string;
  /** Explicit path for the hierarchy JSON (default: <outDir>/<base>_hierarchy.json). */
  jsonPath?: string;
  /** Also write the Graphviz type graph and nested-cluster graph. */
  dot?: boolean;
  /** Optional extraction report path (.md or .json). */
  reportPath?: string;
};

export type ExtractHierarchyFileResult = HierarchyExtraction & {
  outputs: {
    hierarchyText: string;
    portsText: string;
    json: string;
    dot?: string;
    nestedDot?: string;
    report?: string;
  };
};

/**
 * Library entrypoint: extract the hierarchy from an elaborated-design XML file and write the
 * listing, connection listing and hierarchy JSON beside each other.
 */
export async function extractHierarchyFromXml(
  xmlPath: string,
  opts: ExtractHierarchyFileOptions = {},
): Promise<ExtractHierarchyFileResult> {
  let text: string;
  try {
    text = await fs.readFile(xmlPath, 'utf8');
  } catch (e) {
    throw new ExtractionError(`Cannot read elaborated design ${xmlPath}: ${errorMessage(e)}`, { cause: e });
  }

  const baseName = path.basename(xmlPath, path.extname(xmlPath));
  const extraction = extractHierarchy(text, { baseName, input: xmlPath });

  const outDir = opts.outDir ?? '.';
  const outputs: ExtractHierarchyFileResult['outputs'] = {
    hierarchyText: path.join(outDir, `${baseName}_hierarchy.txt`),
    portsText: path.join(outDir, `${baseName}_ports.txt`),
    json: opts.jsonPath ?? path.join(outDir, `${baseName}_hierarchy.json`),
  };

  await writeTextFile(outputs.hierarchyText, renderHierarchyText(extraction.tree));
  await writeTextFile(outputs.portsText, renderConnectionsText(extraction.design));
  await writeTreeJsonFile(outputs.json, extraction.tree);

  if (opts.dot) {
    outputs.dot = path.join(outDir, `${baseName}_hierarchy.dot`);
    outputs.nestedDot = path.join(outDir, `${baseName}_nested_hierarchy.dot`);
    await writeTextFile(outputs.dot, renderHierarchyDot(extraction.tree));
    await writeTextFile(outputs.nestedDot, renderNestedHierarchyDot(extraction.tree));
  }

  if (opts.reportPath) {
    outputs.report = opts.reportPath;
    await writeReportFile(opts.reportPath, extraction.report);
  }

  return { ...extraction, outputs };
}
