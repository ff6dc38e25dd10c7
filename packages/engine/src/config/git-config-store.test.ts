import { describe, expect, it } from 'vitest';

import { GitBackendError } from '../shared/errors.js';
import type { GitRunner } from '../git/runner.js';
import { GitConfigStore } from './git-config-store.js';

describe('GitConfigStore', () => {
  it('reads scoped single and multi values through git config', async () => {
    const seen: string[] = [];
    const runner: GitRunner = async (args) => {
      seen.push(args.join(' '));
      if (args.includes('--get-all')) {
        return { stdout: 'npm install\nnpm run build\n', stderr: '', exitCode: 0 };
      }
      return { stdout: 'develop\n', stderr: '', exitCode: 0 };
    };
    const store = new GitConfigStore({ runner });

    await expect(store.getScoped('workon.defaultBranch', 'local')).resolves.toBe('develop');
    await expect(store.getAllScoped('workon.postCreateHook', 'global')).resolves.toEqual([
      'npm install',
      'npm run build',
    ]);
    expect(seen).toEqual([
      'config --local --get workon.defaultBranch',
      'config --global --get-all workon.postCreateHook',
    ]);
  });

  it('treats exit code 1 as an unset key', async () => {
    const store = new GitConfigStore({ runner: async () => ({ stdout: '', stderr: '', exitCode: 1 }) });

    await expect(store.getScoped('workon.prFormat', 'local')).resolves.toBeUndefined();
    await expect(store.getAllScoped('workon.copyPattern', 'local')).resolves.toEqual([]);
  });

  it('surfaces other failures', async () => {
    const store = new GitConfigStore({
      runner: async () => ({ stdout: '', stderr: 'fatal: not in a git directory', exitCode: 128 }),
    });

    await expect(store.getScoped('workon.prFormat', 'local')).rejects.toBeInstanceOf(GitBackendError);
  });
});
