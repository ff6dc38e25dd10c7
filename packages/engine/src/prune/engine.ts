import path from 'path';
import type { DescribedWorktree, ILogger } from '../shared/types.js';
import { formatError } from '../shared/errors.js';
import { createConsoleLogger } from '../shared/logger.js';
import type { GitBackend } from '../git/types.js';
import { findProtectingPattern } from '../protection/matcher.js';
import type {
  PruneInput,
  PruneItemResult,
  PrunePlan,
  PruneSelector,
  Protection,
  SelectionReason,
  UnsafeReason,
} from './types.js';

/**
 * Partitions the selected worktrees into removable, protected and unsafe.
 * Pure: the same input always yields the same plan.
 */
export function planPrune(input: PruneInput): PrunePlan {
  const plan: PrunePlan = {
    toRemove: [],
    skippedProtected: [],
    skippedUnsafe: [],
    unmatchedNames: unmatchedNames(input.worktrees, input.selector.names ?? []),
    isDryRun: input.dryRun,
  };

  for (const described of input.worktrees) {
    const reason = selectionReason(described, input.selector);
    if (!reason) {
      continue;
    }

    const candidate = { ...described, reason };

    const protection = protectionOf(described, input);
    if (protection) {
      plan.skippedProtected.push({ ...candidate, protection });
      continue;
    }

    const unsafeReasons = unsafeReasonsOf(described, input);
    if (unsafeReasons.length > 0) {
      plan.skippedUnsafe.push({ ...candidate, unsafeReasons });
      continue;
    }

    plan.toRemove.push(candidate);
  }

  return plan;
}

/**
 * Removes planned worktrees one at a time, in plan order. A failed removal is
 * recorded and the rest still run. Dry-run plans are never executed.
 */
export async function executePrunePlan(
  plan: PrunePlan,
  git: GitBackend,
  logger: ILogger = createConsoleLogger('prune'),
): Promise<PruneItemResult[]> {
  if (plan.isDryRun) {
    return [];
  }

  const results: PruneItemResult[] = [];
  for (const { worktree } of plan.toRemove) {
    try {
      await git.removeWorktree(worktree);
      logger.info(`removed ${worktree.name}`);
      results.push({ worktree, ok: true });
    } catch (error) {
      logger.warn(`failed to remove ${worktree.name}: ${formatError(error)}`);
      results.push({ worktree, ok: false, error: formatError(error) });
    }
  }
  return results;
}

function matchesName(described: DescribedWorktree, name: string): boolean {
  const { worktree, status } = described;
  return worktree.name === name || path.basename(worktree.path) === name || (status.branch ?? worktree.branch) === name;
}

function selectionReason(described: DescribedWorktree, selector: PruneSelector): SelectionReason | undefined {
  const names = selector.names ?? [];
  if (names.some((name) => matchesName(described, name))) {
    return 'explicit';
  }

  const { status } = described;
  if (status.isBranchMissing) {
    return 'branch-deleted';
  }
  if (selector.gone && !status.isDetached && status.isUpstreamGone) {
    return 'gone';
  }
  if (selector.merged && !status.isDetached && status.isMerged) {
    return 'merged';
  }
  if (selector.all) {
    return 'all';
  }
  return undefined;
}

function protectionOf(described: DescribedWorktree, input: PruneInput): Protection | undefined {
  const branch = described.status.branch;
  if (branch === null) {
    return undefined;
  }

  const pattern = findProtectingPattern(branch, input.protectedPatterns);
  if (pattern !== undefined) {
    return { kind: 'pattern', pattern };
  }
  if (input.defaultBranch !== null && branch === input.defaultBranch) {
    return { kind: 'default-branch', branch };
  }
  return undefined;
}

function unsafeReasonsOf(described: DescribedWorktree, input: PruneInput): UnsafeReason[] {
  const reasons: UnsafeReason[] = [];
  if (described.status.isDirty && !input.allowDirty) {
    reasons.push('dirty');
  }
  if (described.status.hasUnpushedCommits && !input.allowUnpushed) {
    reasons.push('unpushed');
  }
  return reasons;
}

function unmatchedNames(worktrees: readonly DescribedWorktree[], names: readonly string[]): string[] {
  const unmatched: string[] = [];
  for (const name of names) {
    if (!unmatched.includes(name) && !worktrees.some((described) => matchesName(described, name))) {
      unmatched.push(name);
    }
  }
  return unmatched;
}
