import fs from 'node:fs/promises';

import { errorMessage } from '../errors';

export type ValidationVerdict = {
  passed: boolean;
  /** Why the run did not pass; absent on a pass. */
  reason?: string;
};

export function logHasPassMarker(log: string, markers: readonly string[]): boolean {
  const haystack = log.toLowerCase();
  return markers.some((m) => m.trim() !== '' && haystack.includes(m.toLowerCase()));
}

/**
 * Classify a build/simulation log. A missing or unreadable log is a failed validation, not an error.
 */
export async function classifyValidationLog(logPath: string, markers: readonly string[]): Promise<ValidationVerdict> {
  let text: string;
  try {
    text = await fs.readFile(logPath, 'utf8');
  } catch (e) {
    return { passed: false, reason: `log file ${logPath} could not be read: ${errorMessage(e)}` };
  }
  if (logHasPassMarker(text, markers)) return { passed: true };
  return { passed: false, reason: `no pass marker (${markers.join(' | ')}) in ${logPath}` };
}
