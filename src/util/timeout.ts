import { TimeoutError } from '../errors';

export type WithTimeoutOptions = {
  /**
   * Extra time granted past `timeoutMs` before the race is lost, for work that enforces the same
   * bound itself and needs a moment to report it. The error still names `timeoutMs`.
   */
  graceMs?: number;
};

/**
 * Race `work` against a timer. The timer is always cleared so a settled call leaves nothing
 * scheduled. `timeoutMs <= 0` disables the bound.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  work: () => Promise<T>,
  opts: WithTimeoutOptions = {},
): Promise<T> {
  if (!(timeoutMs > 0)) return work();

  const deadline = timeoutMs + Math.max(0, opts.graceMs ?? 0);
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), deadline);
  });

  try {
    return await Promise.race([work(), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
