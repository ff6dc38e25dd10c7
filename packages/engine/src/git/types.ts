import type { CreationMode, UpstreamInfo, WorktreeInfo } from '../shared/types.js';

export interface CreateWorktreeRequest {
  path: string;
  /** Ignored for detached worktrees. */
  branchName: string;
  mode: CreationMode;
}

export interface AheadBehind {
  ahead: number;
  behind: number;
}

/**
 * Everything the engine needs from git. The engine never mutates repository
 * state except through `createWorktree`, `removeWorktree`, `renameBranch`,
 * `moveWorktree` and `fetchRef`.
 */
export interface GitBackend {
  worktreeRoot(): Promise<string>;
  listWorktrees(): Promise<WorktreeInfo[]>;
  createWorktree(request: CreateWorktreeRequest): Promise<void>;
  removeWorktree(worktree: WorktreeInfo): Promise<void>;
  /** Renames a local branch, including where it is checked out. */
  renameBranch(from: string, to: string): Promise<void>;
  /** Moves the working directory and updates git's registry to match. */
  moveWorktree(worktree: WorktreeInfo, destination: string): Promise<void>;
  currentBranchOf(path: string): Promise<string | null>;
  headCommit(path: string): Promise<string | null>;
  isDirty(path: string): Promise<boolean>;
  aheadBehind(localRef: string, remoteRef: string): Promise<AheadBehind>;
  /** True when every commit reachable from `ref` is reachable from `baseRef`. */
  isAncestor(ref: string, baseRef: string): Promise<boolean>;
  isReachableFromRemotes(commit: string): Promise<boolean>;
  fetchRef(remote: string, refspec: string): Promise<void>;
  refExists(ref: string): Promise<boolean>;
  upstreamOf(branch: string): Promise<UpstreamInfo | null>;
  listRemotes(): Promise<string[]>;
  defaultBranch(): Promise<string | null>;
}
