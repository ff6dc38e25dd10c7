import fs from 'fs/promises';
import path from 'path';
import type { ILogger, UpstreamInfo, WorktreeInfo } from '../shared/types.js';
import { GitBackendError } from '../shared/errors.js';
import { parseWorktreeList } from './porcelain.js';
import { createGitRunner, type GitResult, type GitRunner } from './runner.js';
import type { AheadBehind, CreateWorktreeRequest, GitBackend } from './types.js';

const FALLBACK_DEFAULT_BRANCHES = ['main', 'master'];
const ORPHAN_COMMIT_MESSAGE = 'Initial commit';
const FALLBACK_IDENTITY = ['-c', 'user.name=workon', '-c', 'user.email=workon@localhost'];

export interface GitCliBackendOptions {
  /** Directory inside the repository (bare repository or any of its worktrees). */
  cwd?: string;
  runner?: GitRunner;
  logger?: ILogger;
}

export class GitCliBackend implements GitBackend {
  private readonly cwd: string;
  private readonly run: GitRunner;

  constructor(options: GitCliBackendOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.run = options.runner ?? createGitRunner({ cwd: this.cwd, logger: options.logger });
  }

  async worktreeRoot(): Promise<string> {
    const commonDir = await this.exec(['rev-parse', '--path-format=absolute', '--git-common-dir']);
    return path.dirname(commonDir);
  }

  async listWorktrees(): Promise<WorktreeInfo[]> {
    const root = await this.worktreeRoot();
    const { stdout } = await this.execRaw(['worktree', 'list', '--porcelain']);
    return parseWorktreeList(stdout, root);
  }

  async createWorktree(request: CreateWorktreeRequest): Promise<void> {
    const { mode, branchName, path: worktreePath } = request;

    switch (mode.kind) {
      case 'normal':
        await this.exec(await this.normalAddArgs(worktreePath, branchName, mode.baseBranch));
        return;

      case 'detached':
        await this.exec(['worktree', 'add', '--detach', worktreePath, mode.commitish ?? 'HEAD']);
        return;

      case 'orphan':
        await this.createOrphan(worktreePath, branchName);
        return;

      case 'prTracking': {
        if (!mode.remote) {
          throw new GitBackendError(['worktree', 'add', worktreePath], null, 'no remote resolved for pull request');
        }
        const startPoint = `${mode.remote}/pull/${mode.prNumber}/head`;
        const args = (await this.refExists(`refs/heads/${branchName}`))
          ? ['worktree', 'add', worktreePath, branchName]
          : ['worktree', 'add', '-b', branchName, worktreePath, startPoint];
        await this.exec(args);
        return;
      }
    }
  }

  /** Removes one registry entry. Also works when the directory is already gone. */
  async removeWorktree(worktree: WorktreeInfo): Promise<void> {
    // --force: the plan already cleared dirty state, and untracked files go with the directory
    await this.exec(['worktree', 'remove', '--force', worktree.path]);
  }

  async renameBranch(from: string, to: string): Promise<void> {
    await this.exec(['branch', '-m', from, to]);
  }

  async moveWorktree(worktree: WorktreeInfo, destination: string): Promise<void> {
    // git does not create the parent of the destination
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await this.exec(['worktree', 'move', worktree.path, destination]);
  }

  async currentBranchOf(worktreePath: string): Promise<string | null> {
    const args = ['symbolic-ref', '--quiet', '--short', 'HEAD'];
    const result = await this.run(args, { cwd: worktreePath });
    if (result.exitCode === 0) {
      return result.stdout.trim() || null;
    }
    if (result.exitCode === 1) {
      return null;
    }
    throw toBackendError(args, result);
  }

  async headCommit(worktreePath: string): Promise<string | null> {
    const result = await this.run(['rev-parse', '--verify', '--quiet', 'HEAD'], { cwd: worktreePath });
    return result.exitCode === 0 ? result.stdout.trim() || null : null;
  }

  async isDirty(worktreePath: string): Promise<boolean> {
    const output = await this.exec(['status', '--porcelain', '--untracked-files=no'], worktreePath);
    return output.length > 0;
  }

  async aheadBehind(localRef: string, remoteRef: string): Promise<AheadBehind> {
    const args = ['rev-list', '--left-right', '--count', `${localRef}...${remoteRef}`];
    const output = await this.exec(args);
    const [ahead, behind] = output.split(/\s+/).map((value) => Number.parseInt(value, 10));
    if (ahead === undefined || behind === undefined || !Number.isFinite(ahead) || !Number.isFinite(behind)) {
      throw new GitBackendError(args, 0, `unexpected output: ${output}`);
    }
    return { ahead, behind };
  }

  async isAncestor(ref: string, baseRef: string): Promise<boolean> {
    const args = ['merge-base', '--is-ancestor', ref, baseRef];
    const result = await this.run(args);
    if (result.exitCode === 0) {
      return true;
    }
    if (result.exitCode === 1) {
      return false;
    }
    throw toBackendError(args, result);
  }

  async isReachableFromRemotes(commit: string): Promise<boolean> {
    const output = await this.exec(['for-each-ref', '--contains', commit, '--format=%(refname)', 'refs/remotes']);
    return output.length > 0;
  }

  async fetchRef(remote: string, refspec: string): Promise<void> {
    await this.exec(['fetch', '--quiet', remote, refspec]);
  }

  async refExists(ref: string): Promise<boolean> {
    const result = await this.run(['show-ref', '--verify', '--quiet', ref]);
    return result.exitCode === 0;
  }

  async upstreamOf(branch: string): Promise<UpstreamInfo | null> {
    const ref = await this.exec(['for-each-ref', '--format=%(upstream)', `refs/heads/${branch}`]);
    if (!ref) {
      return null;
    }
    return { ref, gone: !(await this.refExists(ref)) };
  }

  async listRemotes(): Promise<string[]> {
    const output = await this.exec(['remote']);
    return output.split('\n').map((line) => line.trim()).filter(Boolean);
  }

  async defaultBranch(): Promise<string | null> {
    const configured = await this.run(['config', '--get', 'init.defaultBranch']);
    const configuredName = configured.exitCode === 0 ? configured.stdout.trim() : '';
    if (configuredName && (await this.refExists(`refs/heads/${configuredName}`))) {
      return configuredName;
    }

    const remoteHead = await this.run(['symbolic-ref', '--quiet', '--short', 'refs/remotes/origin/HEAD']);
    if (remoteHead.exitCode === 0) {
      const name = remoteHead.stdout.trim().replace(/^origin\//, '');
      if (name && (await this.refExists(`refs/heads/${name}`))) {
        return name;
      }
    }

    for (const candidate of FALLBACK_DEFAULT_BRANCHES) {
      if (await this.refExists(`refs/heads/${candidate}`)) {
        return candidate;
      }
    }

    return null;
  }

  private async normalAddArgs(worktreePath: string, branchName: string, baseBranch: string | null): Promise<string[]> {
    if (await this.refExists(`refs/heads/${branchName}`)) {
      return ['worktree', 'add', worktreePath, branchName];
    }

    const remote = await this.findRemoteWithBranch(branchName);
    if (remote) {
      return ['worktree', 'add', '--track', '-b', branchName, worktreePath, `${remote}/${branchName}`];
    }

    const startPoint = baseBranch ? await this.resolveStartPoint(baseBranch) : 'HEAD';
    return ['worktree', 'add', '-b', branchName, worktreePath, startPoint];
  }

  private async resolveStartPoint(baseBranch: string): Promise<string> {
    if (await this.refExists(`refs/heads/${baseBranch}`)) {
      return baseBranch;
    }
    const remote = await this.findRemoteWithBranch(baseBranch);
    return remote ? `${remote}/${baseBranch}` : baseBranch;
  }

  private async findRemoteWithBranch(branchName: string): Promise<string | undefined> {
    for (const remote of await this.listRemotes()) {
      if (await this.refExists(`refs/remotes/${remote}/${branchName}`)) {
        return remote;
      }
    }
    return undefined;
  }

  private async createOrphan(worktreePath: string, branchName: string): Promise<void> {
    await this.exec(['worktree', 'add', '--detach', worktreePath]);
    await this.exec(['checkout', '--quiet', '--orphan', branchName], worktreePath);
    await this.exec(['rm', '-r', '-f', '--quiet', '--ignore-unmatch', '.'], worktreePath);

    const identity = await this.run(['config', '--get', 'user.email'], { cwd: worktreePath });
    const commitArgs = ['commit', '--quiet', '--allow-empty', '-m', ORPHAN_COMMIT_MESSAGE];
    await this.exec(identity.exitCode === 0 ? commitArgs : [...FALLBACK_IDENTITY, ...commitArgs], worktreePath);
  }

  private async exec(args: string[], cwd?: string): Promise<string> {
    const result = await this.execRaw(args, cwd);
    return result.stdout.trim();
  }

  private async execRaw(args: string[], cwd?: string): Promise<GitResult> {
    const result = await this.run(args, cwd ? { cwd } : undefined);
    if (result.exitCode !== 0) {
      throw toBackendError(args, result);
    }
    return result;
  }
}

function toBackendError(args: string[], result: GitResult): GitBackendError {
  return new GitBackendError(args, result.exitCode, result.stderr);
}
