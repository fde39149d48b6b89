import { DEFAULT_ACTUAL_JSON, DEFAULT_DIFF_JSON, DEFAULT_EXPECTED_JSON } from '../core/compareArchitectureFiles';
import type { RunOutcome } from '../core/repairOrchestrator';

export const EXIT_OK = 0;
export const EXIT_NOT_REPAIRED = 1;
export const EXIT_ABORTED = 2;
export const EXIT_DIFF_FOUND = 3;

/**
 * Commander hands optional-value flags over as `true`, a string, or undefined.
 */
export function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

export function parseIntish(v: unknown): number | undefined {
  if (v === undefined || v === null || v === '') return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) return undefined;
  return Math.trunc(n);
}

/**
 * Integer option handed on to config validation: absent → undefined, anything that is not an
 * integer → NaN so the configuration check rejects it instead of falling back to a default.
 */
export function integerOption(v: unknown): number | undefined {
  if (v === undefined || v === null) return undefined;
  const s = String(v).trim();
  if (s === '') return Number.NaN;
  const n = Number(s);
  return Number.isInteger(n) ? n : Number.NaN;
}

/** Non-blank string option value, else undefined. */
export function optionalString(v: unknown): string | undefined {
  if (typeof v !== 'string') return undefined;
  return v.trim() === '' ? undefined : v;
}

/** Variadic option value (`--x a b`), blanks dropped. */
export function stringList(v: unknown): string[] | undefined {
  if (!Array.isArray(v)) return undefined;
  const out: string[] = [];
  for (const item of v) {
    if (typeof item === 'string' && item.trim() !== '') out.push(item);
  }
  return out.length > 0 ? out : undefined;
}

export type ComparePaths = {
  expected: string;
  actual: string;
  output: string;
};

/** Positional `compare [expected] [actual] [output]`, missing ones take the conventional names. */
export function resolveComparePaths(positionals: ReadonlyArray<string | undefined>): ComparePaths {
  return {
    expected: optionalString(positionals[0]) ?? DEFAULT_EXPECTED_JSON,
    actual: optionalString(positionals[1]) ?? DEFAULT_ACTUAL_JSON,
    output: optionalString(positionals[2]) ?? DEFAULT_DIFF_JSON,
  };
}

export function exitCodeForOutcome(outcome: RunOutcome): number {
  switch (outcome) {
    case 'Success':
      return EXIT_OK;
    case 'Exhausted':
    case 'StructurallyCleanButFailing':
      return EXIT_NOT_REPAIRED;
    case 'Aborted':
      return EXIT_ABORTED;
  }
}
