import { exec } from 'child_process';
import type { ILogger } from '../shared/types.js';
import { createConsoleLogger } from '../shared/logger.js';

const MAX_BUFFER = 1024 * 1024 * 10;

export interface HookEnvironment {
  WORKON_WORKTREE_PATH: string;
  WORKON_BRANCH_NAME: string;
  WORKON_BASE_BRANCH: string;
}

export interface HookRunOptions {
  cwd: string;
  env: HookEnvironment;
  /** Per command. `0` disables the limit. */
  timeoutMs: number;
}

export type HookStatus = 'ok' | 'failed' | 'timed-out' | 'skipped';

export interface HookResult {
  command: string;
  status: HookStatus;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs post-create commands in order and stops at the first one that does not
 * succeed. Command failures are reported, never thrown.
 */
export interface HookRunner {
  run(commands: readonly string[], options: HookRunOptions): Promise<HookResult[]>;
}

export class ShellHookRunner implements HookRunner {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createConsoleLogger('hooks');
  }

  async run(commands: readonly string[], options: HookRunOptions): Promise<HookResult[]> {
    const results: HookResult[] = [];
    let halted = false;

    for (const command of commands) {
      if (halted) {
        results.push({ command, status: 'skipped', exitCode: null, stdout: '', stderr: '' });
        continue;
      }

      this.logger.info(`running hook: ${command}`);
      const result = await this.runOne(command, options);
      if (result.status !== 'ok') {
        this.logger.warn(`hook ${result.status}: ${command}`, { exitCode: result.exitCode });
        halted = true;
      }
      results.push(result);
    }

    return results;
  }

  private runOne(command: string, options: HookRunOptions): Promise<HookResult> {
    return new Promise((resolve) => {
      exec(
        command,
        {
          cwd: options.cwd,
          env: { ...process.env, ...options.env },
          timeout: options.timeoutMs,
          killSignal: 'SIGTERM',
          maxBuffer: MAX_BUFFER,
          encoding: 'utf-8',
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ command, status: 'ok', exitCode: 0, stdout, stderr });
            return;
          }

          const timedOut = options.timeoutMs > 0 && error.killed === true && error.signal === 'SIGTERM';
          resolve({
            command,
            status: timedOut ? 'timed-out' : 'failed',
            exitCode: typeof error.code === 'number' ? error.code : null,
            stdout,
            stderr: stderr || error.message,
          });
        },
      );
    });
  }
}
