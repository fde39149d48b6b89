import path from 'node:path';

import { TOP_LEVEL_FILE } from '../compare/architectureComparator';
import { isFile } from '../util/path';
import { findByBaseName, type FileInventory } from './inventory';

export type ResolveSourceFileOptions = {
  /** Directory relative record paths are interpreted against (the elaboration working dir). */
  workDir: string;
  /** RTL inventory used when the recorded path does not exist as written. */
  inventory?: FileInventory;
};

export type ResolvedSourceFile =
  | { ok: true; path: string; via: 'as-is' | 'source-root' | 'basename' }
  | { ok: false; reason: string };

/**
 * Map a Diff Record's file to an existing file on disk.
 *
 * Tried in order: the path as written (relative to workDir), the path below each inventoried
 * source root, then a unique base-name match in the inventory. An ambiguous base name is not
 * resolved.
 */
export async function resolveSourceFile(file: string, opts: ResolveSourceFileOptions): Promise<ResolvedSourceFile> {
  const trimmed = file.trim();
  if (!trimmed || trimmed === TOP_LEVEL_FILE) {
    return { ok: false, reason: `no source file recorded (${trimmed || 'empty'})` };
  }

  const direct = path.resolve(opts.workDir, trimmed);
  if (await isFile(direct)) return { ok: true, path: direct, via: 'as-is' };

  const inv = opts.inventory;
  if (!inv) return { ok: false, reason: `${trimmed} does not exist` };

  if (!path.isAbsolute(trimmed)) {
    for (const root of inv.roots) {
      const candidate = path.resolve(root.sourceRoot, trimmed);
      if (await isFile(candidate)) return { ok: true, path: candidate, via: 'source-root' };
    }
  }

  const matches = findByBaseName(inv, path.basename(trimmed));
  if (matches.length === 1) return { ok: true, path: matches[0], via: 'basename' };
  if (matches.length > 1) {
    return { ok: false, reason: `${trimmed} matches several source files: ${matches.join(', ')}` };
  }
  return { ok: false, reason: `${trimmed} does not exist` };
}
