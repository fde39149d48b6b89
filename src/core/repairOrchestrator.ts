import fs from 'node:fs/promises';
import path from 'node:path';

import { compareArchitectures, type DiffRecord } from '../compare/architectureComparator';
import { serializeDiffReport } from '../compare/diffReport';
import type { RepairConfig } from '../config/repairConfig';
import {
  ArchCheckError,
  NonProgressError,
  SpecInterpretationError,
  TimeoutError,
  errorMessage,
  type PipelineStage,
} from '../errors';
import { stableStringify } from '../ir/deterministicJson';
import type { TreeNode } from '../ir/treeModel';
import { writeTreeJsonFile } from '../ir/writeTreeJson';
import { ensureBackup } from '../repair/backup';
import type { ElaborationTool, ValidationHarness, ValidationOutcome } from '../repair/commandTools';
import type { RepairService, SpecInterpreter } from '../repair/inferenceServices';
import { buildFileInventory, type FileInventory } from '../scan/inventory';
import { resolveSourceFile } from '../scan/resolveSourceFile';
import { silentLogger, type Logger } from '../util/logger';
import { withTimeout } from '../util/timeout';
import { extractHierarchyFromXml } from './extractHierarchyFromXml';

export type RunOutcome = 'Success' | 'Exhausted' | 'Aborted' | 'StructurallyCleanButFailing';

export type SkippedRecord = {
  file: string;
  reason: string;
};

export type IterationSummary = {
  iteration: number;
  diffCount: number;
  modifiedFiles: string[];
  skipped: SkippedRecord[];
  validation?: ValidationOutcome;
};

export type RepairRunResult = {
  outcome: RunOutcome;
  /** Iterations started (0 when the run stopped before the first one). */
  iterations: number;
  /** Failing stage, for Aborted runs. */
  stage?: PipelineStage;
  reason?: string;
  /** Every file overwritten during the run, first-modified order. */
  modifiedFiles: string[];
  backups: string[];
  history: IterationSummary[];
};

export type RepairLoopDeps = {
  config: RepairConfig;
  interpreter: SpecInterpreter;
  elaborator: ElaborationTool;
  repairer: RepairService;
  harness: ValidationHarness;
  logger?: Logger;
  /** Elaborated XML → actual tree; defaults to the hierarchy extractor writing the actual JSON. */
  extract?: (xmlPath: string) => Promise<TreeNode>;
};

class StageFailure extends Error {
  public constructor(
    public readonly stage: PipelineStage,
    public readonly original: unknown,
  ) {
    super(errorMessage(original));
    this.name = 'StageFailure';
  }
}

/**
 * Elaboration and validation run commands that are killed at `timeoutMs` by the process runner;
 * the outer bound waits this much longer so the tool reports its own timeout and leaves its log.
 */
export const PROCESS_GRACE_MS = 2000;

/** Run `work` under the configured bound; any failure is attributed to `stage` unless it names its own. */
async function stage<T>(
  name: PipelineStage,
  label: string,
  timeoutMs: number,
  work: () => Promise<T>,
  graceMs = 0,
): Promise<T> {
  try {
    return await withTimeout(label, timeoutMs, work, { graceMs });
  } catch (e) {
    const owner = e instanceof ArchCheckError ? e.stage : name;
    throw new StageFailure(owner, e);
  }
}

function defaultExtract(config: RepairConfig, log: Logger): (xmlPath: string) => Promise<TreeNode> {
  return async (xmlPath) => {
    const result = await extractHierarchyFromXml(xmlPath, { outDir: config.workDir, jsonPath: config.actualJsonPath });
    const { top } = result;
    if (top.bestEffort) {
      log.warn(`Top module ${top.name} was chosen by the ${top.strategy} heuristic; verify it is the intended root.`);
    } else {
      log.info(`Top module: ${top.name}`);
    }
    return result.tree;
  };
}

async function readSpec(specPath: string): Promise<string> {
  try {
    return await fs.readFile(specPath, 'utf8');
  } catch (e) {
    throw new SpecInterpretationError(`Cannot read specification ${specPath}: ${errorMessage(e)}`, { cause: e });
  }
}

/**
 * Bounded repair loop.
 *
 * The expected tree is inferred once; then each iteration runs
 * Extract → Compare → Decide → (Repair → Validate), strictly in sequence. Diff Records are
 * repaired one at a time in report order so a later repair reads the file as left by an earlier
 * one. All artifacts stay on disk whatever the outcome.
 */
export async function runRepairLoop(deps: RepairLoopDeps): Promise<RepairRunResult> {
  const { config } = deps;
  const log = deps.logger ?? silentLogger;
  const extract = deps.extract ?? defaultExtract(config, log);

  const history: IterationSummary[] = [];
  const modified = new Set<string>();
  const backups = new Set<string>();
  let iterations = 0;

  const snapshot = (outcome: RunOutcome, detail: { stage?: PipelineStage; reason?: string } = {}): RepairRunResult => ({
    outcome,
    iterations,
    ...detail,
    modifiedFiles: [...modified],
    backups: [...backups],
    history,
  });

  const finish = async (
    outcome: RunOutcome,
    detail: { stage?: PipelineStage; reason?: string } = {},
  ): Promise<RepairRunResult> => {
    const result = snapshot(outcome, detail);
    await writeRunSummary(config.summaryJsonPath, result, log);
    const where = detail.stage ? ` at ${detail.stage}` : '';
    const why = detail.reason ? `: ${detail.reason}` : '';
    if (outcome === 'Success') log.info(`Outcome: ${outcome}`);
    else log.error(`Outcome: ${outcome}${where}${why}`);
    return result;
  };

  const abort = (failure: StageFailure): Promise<RepairRunResult> => {
    const timedOut = failure.original instanceof TimeoutError ? ' (timeout)' : '';
    return finish('Aborted', { stage: failure.stage, reason: `${failure.message}${timedOut}` });
  };

  const validate = async (): Promise<ValidationOutcome> => {
    log.info('Running validation...');
    try {
      return await withTimeout('validation', config.timeoutMs, () => deps.harness.validate(), {
        graceMs: PROCESS_GRACE_MS,
      });
    } catch (e) {
      return { passed: false, reason: errorMessage(e) };
    }
  };

  log.info('Interpreting specification...');
  let expected: TreeNode;
  try {
    const specText = await readSpec(config.specPath);
    expected = await stage('interpret', 'spec inference', config.timeoutMs, () => deps.interpreter.interpret(specText));
    await writeTreeJsonFile(config.expectedJsonPath, expected, { includeFilePath: false });
    log.info(`Expected architecture written to ${config.expectedJsonPath}`);
  } catch (e) {
    return abort(e instanceof StageFailure ? e : new StageFailure('interpret', e));
  }

  for (let i = 1; i <= config.maxIterations; i++) {
    iterations = i;
    log.info(`\n${'='.repeat(20)} Iteration ${i}/${config.maxIterations} ${'='.repeat(20)}`);
    const summary: IterationSummary = { iteration: i, diffCount: 0, modifiedFiles: [], skipped: [] };
    history.push(summary);

    let diffs: DiffRecord[];
    try {
      log.info('Elaborating design...');
      const xmlPath = await stage(
        'elaborate',
        'elaboration',
        config.timeoutMs,
        () => deps.elaborator.elaborate(),
        PROCESS_GRACE_MS,
      );
      const actual = await stage('extract', 'extraction', 0, () => extract(xmlPath));
      log.info(`Actual architecture written to ${config.actualJsonPath}`);

      diffs = await stage('compare', 'comparison', 0, async () => {
        const records = compareArchitectures(expected, actual);
        await fs.mkdir(path.dirname(config.diffJsonPath), { recursive: true });
        await fs.writeFile(config.diffJsonPath, serializeDiffReport(records), 'utf8');
        return records;
      });
    } catch (e) {
      return abort(e instanceof StageFailure ? e : new StageFailure('extract', e));
    }

    summary.diffCount = diffs.length;

    if (diffs.length === 0) {
      log.info('No architectural differences found.');
      summary.validation = await validate();
      if (summary.validation.passed) {
        log.info('Validation passed.');
        return finish('Success');
      }
      return finish('StructurallyCleanButFailing', {
        stage: 'validate',
        reason: summary.validation.reason ?? 'validation failed despite a structurally clean hierarchy',
      });
    }

    log.info(`Found ${diffs.length} difference(s). Attempting repairs...`);
    const inventory = await loadInventory(config, log);

    for (const record of diffs) {
      const skipped = await repairOne(deps, record, inventory, summary, backups, log);
      if (skipped) summary.skipped.push(skipped);
    }
    for (const file of summary.modifiedFiles) modified.add(file);

    if (summary.modifiedFiles.length === 0) {
      const err = new NonProgressError(i);
      log.warn(err.message + '. Stopping.');
      return finish('Aborted', { stage: err.stage, reason: err.message });
    }

    summary.validation = await validate();
    if (summary.validation.passed) {
      log.info('Validation passed.');
      return finish('Success');
    }
    log.warn(`Validation failed: ${summary.validation.reason ?? 'no pass marker'}`);
    log.info('Modified this iteration (originals kept as .bak):');
    for (const file of summary.modifiedFiles) log.info(` - ${file}`);
    // Interim summary; the outcome is provisional until the loop ends.
    await writeRunSummary(config.summaryJsonPath, snapshot('Exhausted'), log);
  }

  return finish('Exhausted', { reason: `no success after ${config.maxIterations} iteration(s)` });
}

async function loadInventory(config: RepairConfig, log: Logger): Promise<FileInventory | undefined> {
  try {
    return await buildFileInventory(config.sourceRoots);
  } catch (e) {
    log.warn(`RTL source scan failed, only recorded paths will be used: ${errorMessage(e)}`);
    return undefined;
  }
}

/**
 * Repair the file implicated by one Diff Record. Returns the skip reason when nothing was written.
 */
async function repairOne(
  deps: RepairLoopDeps,
  record: DiffRecord,
  inventory: FileInventory | undefined,
  summary: IterationSummary,
  backups: Set<string>,
  log: Logger,
): Promise<SkippedRecord | undefined> {
  const { config } = deps;
  const resolved = await resolveSourceFile(record.file, { workDir: config.workDir, inventory });
  if (!resolved.ok) {
    log.warn(`Skipping record for ${record.file}: ${resolved.reason}`);
    return { file: record.file, reason: resolved.reason };
  }
  const file = resolved.path;
  log.info(`Fixing file: ${file}`);

  let fixed: string | undefined;
  try {
    const content = await fs.readFile(file, 'utf8');
    fixed = await withTimeout('repair inference', config.timeoutMs, () => deps.repairer.proposeFix(record, file, content));
  } catch (e) {
    log.warn(`Repair failed for ${file}: ${errorMessage(e)}`);
    return { file, reason: errorMessage(e) };
  }
  if (fixed === undefined || fixed.trim() === '') {
    log.warn(`Repair service returned no usable output for ${file}`);
    return { file, reason: 'repair service returned no usable output' };
  }

  try {
    const backup = await ensureBackup(file);
    if (backup.created) log.info(`Backed up to ${backup.backupPath}`);
    backups.add(backup.backupPath);
    await fs.writeFile(file, fixed, 'utf8');
  } catch (e) {
    log.error(`Could not write ${file}: ${errorMessage(e)}`);
    return { file, reason: `write failed: ${errorMessage(e)}` };
  }

  if (!summary.modifiedFiles.includes(file)) summary.modifiedFiles.push(file);
  log.info('Applied fix.');
  return undefined;
}

async function writeRunSummary(summaryPath: string, result: RepairRunResult, log: Logger): Promise<void> {
  try {
    await fs.mkdir(path.dirname(summaryPath), { recursive: true });
    await fs.writeFile(summaryPath, stableStringify(result), 'utf8');
  } catch (e) {
    log.warn(`Could not write run summary ${summaryPath}: ${errorMessage(e)}`);
  }
}
