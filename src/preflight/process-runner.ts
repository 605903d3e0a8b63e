import { spawn } from 'child_process';

export interface RunOptions {
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * Outcome of a finished child process. `code` is null when the process was
 * killed by a signal.
 */
export interface ProcessOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProcessRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ProcessOutcome>;
}

/**
 * Runs commands with inherited stdio and resolves once they exit.
 * Rejects only when the process cannot be spawned.
 */
export class SpawnProcessRunner implements ProcessRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<ProcessOutcome> {
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: 'inherit'
      });

      proc.on('error', reject);
      proc.on('exit', (code, signal) => {
        resolve({ code, signal });
      });
    });
  }
}
