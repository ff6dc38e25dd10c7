import type { DescribedWorktree, WorktreeInfo, WorktreeStatus } from '../shared/types.js';

/**
 * Which worktrees a prune considers. Criteria combine as a union: a worktree
 * is selected when it matches any of them. A worktree whose branch ref no
 * longer exists is selected by every prune.
 */
export interface PruneSelector {
  /** Worktree names, directory basenames or branch names. */
  names?: readonly string[];
  /** Upstream configured but its remote-tracking ref is deleted. */
  gone?: boolean;
  /** Fully merged into the base branch. */
  merged?: boolean;
  all?: boolean;
}

export type SelectionReason = 'explicit' | 'branch-deleted' | 'gone' | 'merged' | 'all';

export type UnsafeReason = 'dirty' | 'unpushed';

export type Protection = { kind: 'pattern'; pattern: string } | { kind: 'default-branch'; branch: string };

export interface PruneCandidate {
  worktree: WorktreeInfo;
  status: WorktreeStatus;
  reason: SelectionReason;
}

export interface ProtectedCandidate extends PruneCandidate {
  protection: Protection;
}

export interface UnsafeCandidate extends PruneCandidate {
  unsafeReasons: UnsafeReason[];
}

export interface PruneInput {
  /** In enumeration order; plan order follows it. */
  worktrees: readonly DescribedWorktree[];
  selector: PruneSelector;
  protectedPatterns: readonly string[];
  /** The repository's default branch; its worktree is never pruned. */
  defaultBranch: string | null;
  allowDirty: boolean;
  allowUnpushed: boolean;
  dryRun: boolean;
}

export interface PrunePlan {
  toRemove: PruneCandidate[];
  skippedProtected: ProtectedCandidate[];
  skippedUnsafe: UnsafeCandidate[];
  /** Explicit names that matched no worktree. */
  unmatchedNames: string[];
  isDryRun: boolean;
}

export type PruneItemResult =
  | { worktree: WorktreeInfo; ok: true }
  | { worktree: WorktreeInfo; ok: false; error: string };
