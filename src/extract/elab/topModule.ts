import { ExtractionError } from '../../errors';
import type { ElaboratedDesign } from './elaboratedDesign';

export type TopModuleStrategy =
  /** Explicit top flag in the elaborated description. */
  | 'flagged'
  /** Exactly one module is never instantiated. */
  | 'unique-root'
  /** Several never-instantiated modules; the one with the largest instance subtree wins. */
  | 'largest-root'
  /** Every module is instantiated somewhere (cyclic or incomplete input); matched by name. */
  | 'name-match'
  /** Nothing else applied; first known module. */
  | 'fallback';

export type TopModuleSelection = {
  name: string;
  strategy: TopModuleStrategy;
  /** Every module that was eligible under the winning strategy, sorted. */
  candidates: string[];
  /** True when the choice came from a heuristic the caller should not silently trust. */
  bestEffort: boolean;
};

export type DetectTopModuleOptions = {
  /**
   * Base identifier of the elaborated description (usually the XML file's base name, e.g.
   * "Vtop"). Used only by the name-match fallback.
   */
  baseName?: string;
};

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * The elaborator prefixes its outputs with "V" (Vtop.xml for module top). Strip that prefix and
 * lowercase for a case-insensitive substring match.
 */
export function normalizeBaseIdentifier(baseName: string): string {
  const trimmed = baseName.trim();
  const unprefixed = trimmed.length > 1 && trimmed.startsWith('V') ? trimmed.slice(1) : trimmed;
  return unprefixed.toLowerCase();
}

/**
 * Count instances reachable from `root`, visiting each module type once per path.
 */
function subtreeSize(design: ElaboratedDesign, root: string): number {
  const byModule = new Map(design.modules.map((m) => [m.name, m]));
  let count = 0;
  const stack: Array<{ name: string; path: ReadonlySet<string> }> = [{ name: root, path: new Set([root]) }];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const mod = byModule.get(frame.name);
    if (!mod) continue;
    for (const inst of mod.instances) {
      count++;
      if (frame.path.has(inst.moduleType)) continue;
      stack.push({ name: inst.moduleType, path: new Set([...frame.path, inst.moduleType]) });
    }
  }
  return count;
}

/**
 * Pick the root of the hierarchy. Precedence: explicit flag, unique never-instantiated module,
 * largest never-instantiated module, name match against the base identifier, first module.
 *
 * The result depends only on the set of modules, never on their order in the description.
 */
export function detectTopModule(design: ElaboratedDesign, opts: DetectTopModuleOptions = {}): TopModuleSelection {
  const names = Array.from(new Set(design.modules.map((m) => m.name))).sort(byName);
  if (names.length === 0) {
    throw new ExtractionError('Could not determine top module: the design declares no modules');
  }

  const flagged = Array.from(new Set(design.modules.filter((m) => m.isTop).map((m) => m.name))).sort(byName);
  if (flagged.length > 0) {
    return { name: flagged[0], strategy: 'flagged', candidates: flagged, bestEffort: false };
  }

  const instantiated = new Set<string>();
  for (const m of design.modules) {
    for (const inst of m.instances) instantiated.add(inst.moduleType);
  }
  const roots = names.filter((n) => !instantiated.has(n));
  if (roots.length === 1) {
    return { name: roots[0], strategy: 'unique-root', candidates: roots, bestEffort: false };
  }
  if (roots.length > 1) {
    const sized = roots.map((name) => ({ name, size: subtreeSize(design, name) }));
    sized.sort((a, b) => b.size - a.size || byName(a.name, b.name));
    return { name: sized[0].name, strategy: 'largest-root', candidates: roots, bestEffort: false };
  }

  const needle = opts.baseName ? normalizeBaseIdentifier(opts.baseName) : '';
  if (needle) {
    const matches = names.filter((n) => n.toLowerCase().includes(needle));
    if (matches.length > 0) {
      return { name: matches[0], strategy: 'name-match', candidates: matches, bestEffort: true };
    }
  }

  return { name: names[0], strategy: 'fallback', candidates: names, bestEffort: true };
}
