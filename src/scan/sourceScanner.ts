import fg from 'fast-glob';
import path from 'node:path';

import { toPosixPath } from '../util/path';

export type SourceScanOptions = {
  sourceRoot: string;
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
  /** When false, testbench locations/patterns are excluded. */
  includeTestbenches?: boolean;
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
};

const DEFAULT_EXCLUDES = [
  '**/node_modules/**',
  '**/.git/**',
  '**/work/**',
  '**/obj_dir/**',
  '**/csrc/**',
  '**/simv.daidir/**',
  '**/*.bak',
];

const DEFAULT_TESTBENCH_EXCLUDES = [
  '**/tb/**',
  '**/testbench/**',
  '**/*_tb.*',
  '**/tb_*.*',
];

const DEFAULT_INCLUDES = [
  '**/*.v',
  '**/*.sv',
  '**/*.vh',
  '**/*.svh',
];

/**
 * Deterministically discovers RTL source files below a root.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function scanSourceFiles(opts: SourceScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const exclude = [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])];
  if (!opts.includeTestbenches) exclude.push(...DEFAULT_TESTBENCH_EXCLUDES);

  const matches = await fg(DEFAULT_INCLUDES, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: false,
    followSymbolicLinks: false,
    ignore: exclude,
  });

  const rel = matches.map((p) => toPosixPath(p));

  rel.sort((a, b) => a.localeCompare(b));
  if (opts.maxFiles && opts.maxFiles > 0 && rel.length > opts.maxFiles) {
    return rel.slice(0, opts.maxFiles);
  }
  return rel;
}
