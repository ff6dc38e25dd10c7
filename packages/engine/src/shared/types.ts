export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
}

/**
 * One entry of git's worktree registry. The bare repository itself is never
 * represented.
 */
export interface WorktreeInfo {
  /** Absolute path of the working directory. */
  path: string;
  /** Path relative to the worktree root, `/`-separated (e.g. `team/feature`). */
  name: string;
  /** Checked-out branch, or `null` for a detached HEAD. */
  branch: string | null;
  head: string | null;
  locked: boolean;
  /** git reports the working directory as missing. */
  prunable: boolean;
}

export interface UpstreamInfo {
  /** Full ref name, e.g. `refs/remotes/origin/feature`. */
  ref: string;
  /** Upstream is configured but the remote-tracking ref no longer exists. */
  gone: boolean;
}

export interface WorktreeStatus {
  readonly branch: string | null;
  readonly isDetached: boolean;
  /** A branch is checked out but its ref does not exist (deleted, or no commit yet). */
  readonly isBranchMissing: boolean;
  readonly isDirty: boolean;
  readonly hasUnpushedCommits: boolean;
  readonly isMerged: boolean;
  readonly upstream: UpstreamInfo | null;
  readonly isUpstreamGone: boolean;
  readonly ahead: number | null;
  readonly behind: number | null;
}

export interface DescribedWorktree {
  worktree: WorktreeInfo;
  status: WorktreeStatus;
}

export type CreationMode =
  | { kind: 'normal'; baseBranch: string | null }
  | { kind: 'orphan' }
  | { kind: 'detached'; commitish: string | null }
  | { kind: 'prTracking'; prNumber: number; remote: string | null };

export type CreationModeKind = CreationMode['kind'];
