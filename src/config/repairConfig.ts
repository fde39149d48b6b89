import path from 'node:path';

import { DEFAULT_ACTUAL_JSON, DEFAULT_DIFF_JSON, DEFAULT_EXPECTED_JSON } from '../core/compareArchitectureFiles';
import { ConfigError } from '../errors';

export type RepairConfig = {
  /** Credential for the spec-inference and repair-inference services. */
  inferenceApiKey: string;
  model: string;
  /** OpenAI-compatible endpoint; the SDK default when undefined. */
  baseUrl?: string;
  maxIterations: number;
  /** Bound applied to every external call (elaboration, inference, validation). */
  timeoutMs: number;
  /** Directory the elaboration and validation commands run in; relative paths resolve here. */
  workDir: string;
  specPath: string;
  elaborateCommand: string;
  elaboratedXmlPath: string;
  validateCommand: string;
  logPath: string;
  expectedJsonPath: string;
  actualJsonPath: string;
  diffJsonPath: string;
  summaryJsonPath: string;
  /** RTL roots searched when a Diff Record's file does not exist as written. */
  sourceRoots: string[];
  /** Case-insensitive substrings that mark a passing validation log. */
  passMarkers: string[];
};

export type RepairConfigOverrides = Partial<RepairConfig>;

export const DEFAULT_PASS_MARKERS = ['sim passed', 'simulation passed'];

export const DEFAULTS = {
  model: 'gpt-4o',
  maxIterations: 5,
  timeoutMs: 10 * 60 * 1000,
  specPath: '../docs/spec.md',
  elaborateCommand: 'make xml',
  elaboratedXmlPath: './work/obj_dir/Vtop.xml',
  validateCommand: 'make all',
  logPath: './sim.log',
  expectedJsonPath: DEFAULT_EXPECTED_JSON,
  actualJsonPath: DEFAULT_ACTUAL_JSON,
  diffJsonPath: DEFAULT_DIFF_JSON,
  summaryJsonPath: 'Repair_Summary.json',
} as const;

type Env = Record<string, string | undefined>;

function envString(env: Env, key: string): string | undefined {
  const v = env[key];
  if (v === undefined) return undefined;
  const t = v.trim();
  return t === '' ? undefined : t;
}

function envInt(env: Env, key: string, problems: string[]): number | undefined {
  const raw = envString(env, key);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    problems.push(`${key} must be an integer (got "${raw}")`);
    return undefined;
  }
  return n;
}

/**
 * Merge explicit overrides, the environment and defaults (in that precedence) into a complete,
 * validated configuration. Every problem is reported at once, before any iteration runs.
 */
export function loadRepairConfig(overrides: RepairConfigOverrides = {}, env: Env = process.env): RepairConfig {
  const problems: string[] = [];

  const workDir = path.resolve(overrides.workDir ?? '.');
  const inWorkDir = (p: string): string => path.resolve(workDir, p);

  const inferenceApiKey = overrides.inferenceApiKey ?? envString(env, 'OPENAI_API_KEY') ?? '';
  const maxIterations = overrides.maxIterations ?? envInt(env, 'ARCHCHECK_MAX_ITER', problems) ?? DEFAULTS.maxIterations;
  const timeoutMs = overrides.timeoutMs ?? envInt(env, 'ARCHCHECK_TIMEOUT_MS', problems) ?? DEFAULTS.timeoutMs;

  const config: RepairConfig = {
    inferenceApiKey,
    model: overrides.model ?? envString(env, 'ARCHCHECK_MODEL') ?? DEFAULTS.model,
    baseUrl: overrides.baseUrl ?? envString(env, 'OPENAI_BASE_URL'),
    maxIterations,
    timeoutMs,
    workDir,
    specPath: inWorkDir(overrides.specPath ?? DEFAULTS.specPath),
    elaborateCommand: overrides.elaborateCommand ?? DEFAULTS.elaborateCommand,
    elaboratedXmlPath: inWorkDir(overrides.elaboratedXmlPath ?? DEFAULTS.elaboratedXmlPath),
    validateCommand: overrides.validateCommand ?? DEFAULTS.validateCommand,
    logPath: inWorkDir(overrides.logPath ?? DEFAULTS.logPath),
    expectedJsonPath: inWorkDir(overrides.expectedJsonPath ?? DEFAULTS.expectedJsonPath),
    actualJsonPath: inWorkDir(overrides.actualJsonPath ?? DEFAULTS.actualJsonPath),
    diffJsonPath: inWorkDir(overrides.diffJsonPath ?? DEFAULTS.diffJsonPath),
    summaryJsonPath: inWorkDir(overrides.summaryJsonPath ?? DEFAULTS.summaryJsonPath),
    sourceRoots: (overrides.sourceRoots && overrides.sourceRoots.length > 0 ? overrides.sourceRoots : ['.']).map(inWorkDir),
    passMarkers:
      overrides.passMarkers && overrides.passMarkers.length > 0 ? [...overrides.passMarkers] : [...DEFAULT_PASS_MARKERS],
  };

  if (!config.inferenceApiKey.trim()) {
    problems.push('inference API key is missing (set OPENAI_API_KEY or pass --api-key)');
  }
  if (!config.model.trim()) problems.push('model must not be empty');
  if (!Number.isInteger(config.maxIterations) || config.maxIterations < 1) {
    problems.push(`maxIterations must be a positive integer (got ${config.maxIterations})`);
  }
  if (!Number.isInteger(config.timeoutMs) || config.timeoutMs < 0) {
    problems.push(`timeoutMs must be a non-negative integer (got ${config.timeoutMs})`);
  }
  if (!config.elaborateCommand.trim()) problems.push('elaborate command must not be empty');
  if (!config.validateCommand.trim()) problems.push('validate command must not be empty');
  if (config.passMarkers.some((m) => m.trim() === '')) problems.push('pass markers must not be empty');

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}
