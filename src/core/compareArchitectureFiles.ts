import fs from 'node:fs/promises';
import path from 'node:path';

import { compareTreeJson, type DiffRecord } from '../compare/architectureComparator';
import { serializeDiffReport } from '../compare/diffReport';
import { CompareError, errorMessage } from '../errors';

export const DEFAULT_EXPECTED_JSON = 'SPEC.json';
export const DEFAULT_ACTUAL_JSON = 'Vtop_hierarchy.json';
export const DEFAULT_DIFF_JSON = 'Diff_Arch.json';

async function readJson(filePath: string, role: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new CompareError(`Cannot read ${role} architecture ${filePath}: ${errorMessage(e)}`, { cause: e });
  }
  try {
    const doc: unknown = JSON.parse(text);
    return doc;
  } catch (e) {
    throw new CompareError(`${role} architecture ${filePath} is not valid JSON: ${errorMessage(e)}`, { cause: e });
  }
}

/**
 * Library entrypoint: compare two hierarchy JSON files and write the Diff Report.
 */
export async function compareArchitectureFiles(
  expectedPath: string = DEFAULT_EXPECTED_JSON,
  actualPath: string = DEFAULT_ACTUAL_JSON,
  outputPath: string = DEFAULT_DIFF_JSON,
): Promise<DiffRecord[]> {
  const expected = await readJson(expectedPath, 'Expected');
  const actual = await readJson(actualPath, 'Actual');
  const records = compareTreeJson(expected, actual);

  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, serializeDiffReport(records), 'utf8');
  return records;
}
