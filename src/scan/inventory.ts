import path from 'node:path';
import fs from 'node:fs/promises';
import { stableStringify } from '../ir/deterministicJson';
import { scanSourceFiles, type SourceScanOptions } from './sourceScanner';

export type InventoryRoot = {
  sourceRoot: string;
  files: string[];
};

export type FileInventory = {
  schema: 'rtl-inventory-v1';
  roots: InventoryRoot[];
};

/**
 * Scan every RTL source root. Roots keep the order given; files inside each root are sorted.
 */
export async function buildFileInventory(
  sourceRoots: readonly string[],
  opts: Omit<SourceScanOptions, 'sourceRoot'> = {},
): Promise<FileInventory> {
  const roots: InventoryRoot[] = [];
  for (const root of sourceRoots) {
    const files = await scanSourceFiles({ ...opts, sourceRoot: root });
    roots.push({ sourceRoot: path.resolve(root), files });
  }
  return { schema: 'rtl-inventory-v1', roots };
}

/** Absolute paths of every inventoried file whose base name is `baseName`. */
export function findByBaseName(inv: FileInventory, baseName: string): string[] {
  const out: string[] = [];
  for (const root of inv.roots) {
    for (const rel of root.files) {
      if (path.posix.basename(rel) === baseName) out.push(path.join(root.sourceRoot, rel));
    }
  }
  return out;
}

export async function writeFileInventoryFile(outFile: string, inv: FileInventory): Promise<void> {
  const abs = path.resolve(outFile);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, stableStringify(inv), 'utf8');
}
