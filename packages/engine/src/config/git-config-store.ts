import type { ILogger } from '../shared/types.js';
import { GitBackendError } from '../shared/errors.js';
import { createGitRunner, type GitRunner } from '../git/runner.js';
import type { ConfigStore, StoreScope } from './store.js';

/** `git config` exits 1 when the key is not set. */
const KEY_NOT_FOUND = 1;

export interface GitConfigStoreOptions {
  cwd?: string;
  runner?: GitRunner;
  logger?: ILogger;
}

export class GitConfigStore implements ConfigStore {
  private readonly run: GitRunner;

  constructor(options: GitConfigStoreOptions = {}) {
    this.run = options.runner ?? createGitRunner({ cwd: options.cwd, logger: options.logger });
  }

  async getScoped(key: string, scope: StoreScope): Promise<string | undefined> {
    const values = await this.read(['config', `--${scope}`, '--get', key]);
    return values.at(-1);
  }

  async getAllScoped(key: string, scope: StoreScope): Promise<string[]> {
    return this.read(['config', `--${scope}`, '--get-all', key]);
  }

  private async read(args: string[]): Promise<string[]> {
    const result = await this.run(args);
    if (result.exitCode === KEY_NOT_FOUND) {
      return [];
    }
    if (result.exitCode !== 0) {
      throw new GitBackendError(args, result.exitCode, result.stderr);
    }
    return result.stdout.replace(/\n$/, '').split('\n');
  }
}
