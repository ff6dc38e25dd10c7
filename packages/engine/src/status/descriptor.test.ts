import { describe, expect, it, vi } from 'vitest';

import { FakeGitBackend, createLogger, pushed, worktree } from '../__tests__/fakes.js';
import { WorktreeDescriptor } from './descriptor.js';

const describeOne = async (git: FakeGitBackend, name: string, baseBranch: string | null = 'main') => {
  const info = git.worktrees.find((candidate) => candidate.name === name);
  if (!info) {
    throw new Error(`no fake worktree ${name}`);
  }
  return new WorktreeDescriptor(git, createLogger()).describe(info, { baseBranch });
};

describe('WorktreeDescriptor', () => {
  it('reports a clean, pushed branch as safe', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('feature'), pushed('feature', { behind: 2 }));

    await expect(describeOne(git, 'feature')).resolves.toEqual({
      branch: 'feature',
      isDetached: false,
      isBranchMissing: false,
      isDirty: false,
      hasUnpushedCommits: false,
      isMerged: false,
      upstream: { ref: 'refs/remotes/origin/feature', gone: false },
      isUpstreamGone: false,
      ahead: 0,
      behind: 2,
    });
  });

  it('counts local commits ahead of the upstream as unpushed', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('feature'), pushed('feature', { ahead: 1 }));

    const status = await describeOne(git, 'feature');

    expect(status.hasUnpushedCommits).toBe(true);
    expect(status.ahead).toBe(1);
  });

  it('treats a branch without upstream as unpushed', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('local-only'));

    const status = await describeOne(git, 'local-only');

    expect(status.upstream).toBeNull();
    expect(status.hasUnpushedCommits).toBe(true);
    expect(status.ahead).toBeNull();
  });

  it('treats a deleted upstream as gone and unpushed', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('merged-away'), {
      upstream: { ref: 'refs/remotes/origin/merged-away', gone: true },
    });

    const status = await describeOne(git, 'merged-away');

    expect(status.isUpstreamGone).toBe(true);
    expect(status.hasUnpushedCommits).toBe(true);
  });

  it('ignores untracked files and reports tracked changes as dirty', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('feature'), pushed('feature'));
    git.dirty.add('/repos/app/feature');

    await expect(describeOne(git, 'feature')).resolves.toMatchObject({ isDirty: true });
  });

  it('detects a branch fully merged into the base', async () => {
    const git = new FakeGitBackend()
      .addWorktree(worktree('main'), pushed('main'))
      .addWorktree(worktree('done'), pushed('done', { mergedInto: ['main'] }));

    await expect(describeOne(git, 'done')).resolves.toMatchObject({ isMerged: true });
    await expect(describeOne(git, 'done', 'develop')).resolves.toMatchObject({ isMerged: false });
    await expect(describeOne(git, 'main')).resolves.toMatchObject({ isMerged: false });
  });

  it('never reports a detached worktree as merged', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('bisect', { branch: null, head: 'abc123' }));
    git.remoteCommits.add('abc123');

    await expect(describeOne(git, 'bisect')).resolves.toEqual({
      branch: null,
      isDetached: true,
      isBranchMissing: false,
      isDirty: false,
      hasUnpushedCommits: false,
      isMerged: false,
      upstream: null,
      isUpstreamGone: false,
      ahead: null,
      behind: null,
    });
  });

  it('treats a detached commit unknown to every remote as unpushed', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('spike', { branch: null, head: 'def456' }));

    await expect(describeOne(git, 'spike')).resolves.toMatchObject({ isDetached: true, hasUnpushedCommits: true });
  });

  it('reports a branch without a ref as missing, unmerged and unpushed', async () => {
    const git = new FakeGitBackend()
      .addWorktree(worktree('main'), pushed('main'))
      .addWorktree(worktree('scratch'), pushed('scratch'));
    git.refs.delete('refs/heads/scratch');
    const upstreamOf = vi.spyOn(git, 'upstreamOf');

    await expect(describeOne(git, 'scratch')).resolves.toEqual({
      branch: 'scratch',
      isDetached: false,
      isBranchMissing: true,
      isDirty: false,
      hasUnpushedCommits: true,
      isMerged: false,
      upstream: null,
      isUpstreamGone: false,
      ahead: null,
      behind: null,
    });
    expect(upstreamOf).not.toHaveBeenCalled();
  });

  it('returns frozen snapshots', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('feature'), pushed('feature'));

    expect(Object.isFrozen(await describeOne(git, 'feature'))).toBe(true);
  });

  it('does not run git inside a worktree whose directory is gone', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('stale', { prunable: true }), pushed('stale'));
    git.dirty.add('/repos/app/stale');

    await expect(describeOne(git, 'stale')).resolves.toMatchObject({ branch: 'stale', isDirty: false });
  });
});
