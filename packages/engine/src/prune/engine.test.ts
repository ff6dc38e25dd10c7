import { describe, expect, it } from 'vitest';

import type { DescribedWorktree, WorktreeStatus } from '../shared/types.js';
import { FakeGitBackend, createLogger, worktree } from '../__tests__/fakes.js';
import { executePrunePlan, planPrune } from './engine.js';
import type { PruneInput } from './types.js';

function described(name: string, status: Partial<WorktreeStatus> = {}): DescribedWorktree {
  const branch = status.branch === undefined ? name : status.branch;
  return {
    worktree: worktree(name, { branch }),
    status: {
      branch,
      isDetached: branch === null,
      isBranchMissing: false,
      isDirty: false,
      hasUnpushedCommits: false,
      isMerged: false,
      upstream: { ref: `refs/remotes/origin/${name}`, gone: false },
      isUpstreamGone: false,
      ahead: 0,
      behind: 0,
      ...status,
    },
  };
}

const baseInput = (worktrees: DescribedWorktree[], overrides: Partial<PruneInput> = {}): PruneInput => ({
  worktrees,
  selector: { all: true },
  protectedPatterns: [],
  defaultBranch: 'main',
  allowDirty: false,
  allowUnpushed: false,
  dryRun: false,
  ...overrides,
});

const names = (entries: { worktree: { name: string } }[]) => entries.map((entry) => entry.worktree.name);

describe('planPrune', () => {
  it('removes clean pushed worktrees and keeps dirty ones', () => {
    const plan = planPrune(baseInput([described('feature-a'), described('feature-b', { isDirty: true })]));

    expect(names(plan.toRemove)).toEqual(['feature-a']);
    expect(plan.skippedProtected).toEqual([]);
    expect(plan.skippedUnsafe.map((entry) => [entry.worktree.name, entry.unsafeReasons])).toEqual([
      ['feature-b', ['dirty']],
    ]);
  });

  it('stops protected worktrees before the safety gate', () => {
    const plan = planPrune(
      baseInput([described('release/1.0', { isMerged: true, isDirty: true })], {
        selector: { merged: true },
        protectedPatterns: ['release/*'],
      }),
    );

    expect(plan.toRemove).toEqual([]);
    expect(plan.skippedUnsafe).toEqual([]);
    expect(plan.skippedProtected.map((entry) => entry.protection)).toEqual([{ kind: 'pattern', pattern: 'release/*' }]);
  });

  it('never removes the worktree of the default branch', () => {
    const plan = planPrune(baseInput([described('main'), described('feature')]));

    expect(names(plan.toRemove)).toEqual(['feature']);
    expect(plan.skippedProtected.map((entry) => entry.protection)).toEqual([{ kind: 'default-branch', branch: 'main' }]);
  });

  it('tags both unsafe reasons and honours each override separately', () => {
    const risky = described('risky', { isDirty: true, hasUnpushedCommits: true });

    expect(planPrune(baseInput([risky])).skippedUnsafe[0]?.unsafeReasons).toEqual(['dirty', 'unpushed']);
    expect(planPrune(baseInput([risky], { allowDirty: true })).skippedUnsafe[0]?.unsafeReasons).toEqual(['unpushed']);
    expect(names(planPrune(baseInput([risky], { allowDirty: true, allowUnpushed: true })).toRemove)).toEqual(['risky']);
  });

  it('treats a branch without upstream as unsafe to remove', () => {
    const plan = planPrune(
      baseInput([described('local-only', { upstream: null, hasUnpushedCommits: true })], { selector: { names: ['local-only'] } }),
    );

    expect(plan.skippedUnsafe.map((entry) => entry.unsafeReasons)).toEqual([['unpushed']]);
  });

  it('selects by worktree name, directory or branch and reports unknown names', () => {
    const worktrees = [
      described('team/api'),
      { ...described('checkout-2'), status: { ...described('checkout-2').status, branch: 'bugfix' } },
      described('other'),
    ];

    const plan = planPrune(baseInput(worktrees, { selector: { names: ['api', 'bugfix', 'missing', 'missing'] } }));

    expect(names(plan.toRemove)).toEqual(['team/api', 'checkout-2']);
    expect(plan.toRemove.map((entry) => entry.reason)).toEqual(['explicit', 'explicit']);
    expect(plan.unmatchedNames).toEqual(['missing']);
  });

  it('selects gone and merged branches but never detached worktrees', () => {
    const worktrees = [
      described('gone', { isUpstreamGone: true, upstream: { ref: 'refs/remotes/origin/gone', gone: true } }),
      described('merged', { isMerged: true }),
      described('detached', { branch: null, isUpstreamGone: true, isMerged: true }),
      described('active'),
    ];

    const plan = planPrune(baseInput(worktrees, { selector: { gone: true, merged: true }, allowUnpushed: true }));

    expect(plan.toRemove.map((entry) => [entry.worktree.name, entry.reason])).toEqual([
      ['gone', 'gone'],
      ['merged', 'merged'],
    ]);
  });

  it('selects worktrees whose branch ref is missing on every prune', () => {
    const missing = { isBranchMissing: true, upstream: null, hasUnpushedCommits: true };
    const worktrees = [described('scratch', missing), described('active'), described('release/old', missing)];

    const plan = planPrune(baseInput(worktrees, { selector: {}, protectedPatterns: ['release/*'] }));

    expect(plan.toRemove).toEqual([]);
    expect(plan.skippedUnsafe.map((entry) => [entry.worktree.name, entry.reason, entry.unsafeReasons])).toEqual([
      ['scratch', 'branch-deleted', ['unpushed']],
    ]);
    expect(names(plan.skippedProtected)).toEqual(['release/old']);
    expect(names(planPrune(baseInput(worktrees, { selector: {}, allowUnpushed: true })).toRemove)).toEqual([
      'scratch',
      'release/old',
    ]);
  });

  it('prefers the explicit reason when a missing branch is also named', () => {
    const plan = planPrune(
      baseInput([described('scratch', { isBranchMissing: true, upstream: null })], { selector: { names: ['scratch'] } }),
    );

    expect(plan.toRemove.map((entry) => entry.reason)).toEqual(['explicit']);
  });

  it('keeps partitions disjoint and covering exactly the selection', () => {
    const worktrees = [
      described('main'),
      described('a'),
      described('b', { isDirty: true }),
      described('release/2', { isMerged: true }),
      described('c', { isMerged: true, hasUnpushedCommits: true }),
      described('d'),
    ];

    const plan = planPrune(
      baseInput(worktrees, { selector: { names: ['a', 'b'], merged: true }, protectedPatterns: ['release/*'] }),
    );
    const partitions = [...names(plan.toRemove), ...names(plan.skippedProtected), ...names(plan.skippedUnsafe)];

    expect(new Set(partitions).size).toBe(partitions.length);
    expect([...partitions].sort()).toEqual(['a', 'b', 'c', 'release/2']);
  });

  it('produces identical plans for repeated dry runs', () => {
    const input = baseInput([described('a'), described('b', { isDirty: true })], { dryRun: true });

    const first = planPrune(input);

    expect(planPrune(input)).toEqual(first);
    expect(first.isDryRun).toBe(true);
  });
});

describe('executePrunePlan', () => {
  it('removes in plan order and records failures without stopping', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('a')).addWorktree(worktree('b')).addWorktree(worktree('c'));
    git.failingRemovals.add('b');
    const plan = planPrune(baseInput([described('a'), described('b'), described('c')]));

    const results = await executePrunePlan(plan, git, createLogger());

    expect(git.operations).toEqual(['remove a', 'remove b', 'remove c']);
    expect(results.map((result) => [result.worktree.name, result.ok])).toEqual([
      ['a', true],
      ['b', false],
      ['c', true],
    ]);
    expect(results[1]).toMatchObject({
      ok: false,
      error: "git worktree remove --force /repos/app/b failed with exit code 128: fatal: '/repos/app/b' is locked",
    });
  });

  it('never touches the repository for a dry run', async () => {
    const git = new FakeGitBackend().addWorktree(worktree('a'));
    const plan = planPrune(baseInput([described('a')], { dryRun: true }));

    await expect(executePrunePlan(plan, git, createLogger())).resolves.toEqual([]);
    expect(git.operations).toEqual([]);
  });
});
