import { execFile } from 'child_process';
import type { ILogger } from '../shared/types.js';
import { GitBackendError } from '../shared/errors.js';

const MAX_BUFFER = 1024 * 1024 * 10;

export interface GitResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface GitRunOptions {
  cwd?: string;
  env?: Record<string, string>;
}

/**
 * Runs git and resolves with its exit code instead of rejecting on a non-zero
 * status. Rejects only when git cannot be started at all.
 */
export type GitRunner = (args: string[], options?: GitRunOptions) => Promise<GitResult>;

export interface CreateGitRunnerOptions {
  cwd?: string;
  gitPath?: string;
  logger?: ILogger;
}

export function createGitRunner(options: CreateGitRunnerOptions = {}): GitRunner {
  const gitPath = options.gitPath ?? 'git';

  return (args, runOptions = {}) =>
    new Promise<GitResult>((resolve, reject) => {
      const cwd = runOptions.cwd ?? options.cwd ?? process.cwd();
      options.logger?.debug(`git ${args.join(' ')}`, { cwd });

      execFile(
        gitPath,
        args,
        {
          cwd,
          encoding: 'utf-8',
          maxBuffer: MAX_BUFFER,
          env: runOptions.env ? { ...process.env, ...runOptions.env } : process.env,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout, stderr, exitCode: 0 });
            return;
          }

          if (typeof error.code === 'number') {
            resolve({ stdout, stderr, exitCode: error.code });
            return;
          }

          reject(new GitBackendError(args, null, stderr, error));
        },
      );
    });
}
