import { spawn } from 'node:child_process';

export type CommandResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
};

export type RunCommandOptions = {
  cwd: string;
  /** Kill the command after this many ms; <= 0 disables the bound. */
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
};

/**
 * Run a shell command, capturing its combined output. Resolves once the process has exited,
 * including after a timeout kill; rejects only when the shell cannot be started.
 */
export function runCommand(command: string, opts: RunCommandOptions): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    const usesGroups = process.platform !== 'win32';
    const child = spawn(command, {
      cwd: opts.cwd,
      env: opts.env ?? process.env,
      shell: true,
      stdio: ['ignore', 'pipe', 'pipe'],
      // Own process group so a timeout kill reaches make's children as well.
      detached: usesGroups,
    });

    const chunks: Buffer[] = [];
    child.stdout.on('data', (c: Buffer) => chunks.push(c));
    child.stderr.on('data', (c: Buffer) => chunks.push(c));

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    if (opts.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        if (usesGroups && child.pid !== undefined) {
          try {
            process.kill(-child.pid, 'SIGKILL');
          } catch {
            child.kill('SIGKILL');
          }
        } else {
          child.kill('SIGKILL');
        }
      }, opts.timeoutMs);
    }

    child.on('error', (err) => {
      if (timer) clearTimeout(timer);
      reject(err);
    });
    child.on('close', (exitCode, signal) => {
      if (timer) clearTimeout(timer);
      resolve({ exitCode, signal, timedOut, output: Buffer.concat(chunks).toString('utf8') });
    });
  });
}

/** Last `maxLines` lines of a command's output, for error messages. */
export function outputTail(output: string, maxLines = 20): string {
  const lines = output.trimEnd().split(/\r?\n/);
  return lines.slice(-maxLines).join('\n');
}
