import fs from 'node:fs/promises';
import path from 'node:path';

import { ElaborationError, errorMessage } from '../errors';
import { isFile } from '../util/path';
import { outputTail, runCommand, type CommandResult } from './processRunner';
import { classifyValidationLog } from './validationLog';

/** Produces the elaborated-design XML for the current sources and returns its path. */
export type ElaborationTool = {
  elaborate(): Promise<string>;
};

export type ValidationOutcome = {
  passed: boolean;
  reason?: string;
  logPath?: string;
  exitCode?: number | null;
};

/** Builds and simulates the current sources. */
export type ValidationHarness = {
  validate(): Promise<ValidationOutcome>;
};

export type CommandElaborationOptions = {
  command: string;
  cwd: string;
  /** Where the command leaves the elaborated XML. */
  xmlPath: string;
  timeoutMs: number;
};

export function createCommandElaborationTool(opts: CommandElaborationOptions): ElaborationTool {
  return {
    elaborate: async () => {
      let result: CommandResult;
      try {
        result = await runCommand(opts.command, { cwd: opts.cwd, timeoutMs: opts.timeoutMs });
      } catch (e) {
        throw new ElaborationError(`Cannot start elaboration command "${opts.command}": ${errorMessage(e)}`, {
          cause: e,
        });
      }
      if (result.timedOut) {
        throw new ElaborationError(`Elaboration command "${opts.command}" timed out after ${opts.timeoutMs}ms`);
      }
      if (result.exitCode !== 0) {
        throw new ElaborationError(
          `Elaboration command "${opts.command}" failed with exit code ${result.exitCode ?? result.signal}:\n${outputTail(result.output)}`,
          { exitCode: result.exitCode },
        );
      }
      if (!(await isFile(opts.xmlPath))) {
        throw new ElaborationError(`Elaboration succeeded but ${opts.xmlPath} was not produced`);
      }
      return opts.xmlPath;
    },
  };
}

export type CommandValidationOptions = {
  command: string;
  cwd: string;
  /** Receives the command's combined output verbatim; overwritten on every run. */
  logPath: string;
  timeoutMs: number;
  passMarkers: readonly string[];
};

/**
 * The verdict comes from the log alone: the exit status is reported but a failing status with a
 * pass marker in the log still passes.
 */
export function createCommandValidationHarness(opts: CommandValidationOptions): ValidationHarness {
  return {
    validate: async () => {
      let result: CommandResult;
      try {
        result = await runCommand(opts.command, { cwd: opts.cwd, timeoutMs: opts.timeoutMs });
      } catch (e) {
        return { passed: false, reason: `cannot start validation command: ${errorMessage(e)}`, logPath: opts.logPath };
      }

      await fs.mkdir(path.dirname(opts.logPath), { recursive: true });
      await fs.writeFile(opts.logPath, result.output, 'utf8');

      if (result.timedOut) {
        return {
          passed: false,
          reason: `validation command timed out after ${opts.timeoutMs}ms`,
          logPath: opts.logPath,
          exitCode: result.exitCode,
        };
      }

      const verdict = await classifyValidationLog(opts.logPath, opts.passMarkers);
      return { ...verdict, logPath: opts.logPath, exitCode: result.exitCode };
    },
  };
}
