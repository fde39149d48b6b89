/**
 * Error taxonomy for the extraction / comparison / repair pipeline.
 *
 * Every error carries the pipeline stage it belongs to so the orchestrator and the CLI can
 * report an unambiguous stage label without string matching.
 */

export type PipelineStage =
  | 'config'
  | 'interpret'
  | 'elaborate'
  | 'extract'
  | 'compare'
  | 'repair'
  | 'validate';

export class ArchCheckError extends Error {
  public readonly stage: PipelineStage;

  public constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArchCheckError';
    this.stage = stage;
  }
}

export class ConfigError extends ArchCheckError {
  public readonly problems: string[];

  public constructor(problems: string[]) {
    super('config', `Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class SpecInterpretationError extends ArchCheckError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('interpret', message, options);
    this.name = 'SpecInterpretationError';
  }
}

export class ElaborationError extends ArchCheckError {
  public readonly exitCode?: number | null;

  public constructor(message: string, options?: { cause?: unknown; exitCode?: number | null }) {
    super('elaborate', message, options);
    this.name = 'ElaborationError';
    this.exitCode = options?.exitCode;
  }
}

export class ExtractionError extends ArchCheckError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('extract', message, options);
    this.name = 'ExtractionError';
  }
}

export class CompareError extends ArchCheckError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super('compare', message, options);
    this.name = 'CompareError';
  }
}

/** Per-file, recoverable: the orchestrator skips the record and continues. */
export class RepairServiceError extends ArchCheckError {
  public readonly file: string;

  public constructor(file: string, message: string, options?: { cause?: unknown }) {
    super('repair', message, options);
    this.name = 'RepairServiceError';
    this.file = file;
  }
}

/** A repair pass that modified no file ends the run. */
export class NonProgressError extends ArchCheckError {
  public readonly iteration: number;

  public constructor(iteration: number) {
    super('repair', `No files were modified in iteration ${iteration}`);
    this.name = 'NonProgressError';
    this.iteration = iteration;
  }
}

export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
