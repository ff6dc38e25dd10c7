import type { DescribedWorktree, ILogger, UpstreamInfo, WorktreeInfo, WorktreeStatus } from '../shared/types.js';
import { createConsoleLogger } from '../shared/logger.js';
import type { GitBackend } from '../git/types.js';

export interface DescribeOptions {
  /** Branch used for merge detection. `null` means nothing counts as merged. */
  baseBranch: string | null;
}

/**
 * Reads the live state of a worktree. Every call queries git again; snapshots
 * are frozen and never reused.
 */
export class WorktreeDescriptor {
  private readonly logger: ILogger;

  constructor(
    private readonly git: GitBackend,
    logger?: ILogger,
  ) {
    this.logger = logger ?? createConsoleLogger('status');
  }

  async describe(worktree: WorktreeInfo, options: DescribeOptions): Promise<WorktreeStatus> {
    // a prunable worktree has no directory to run git in
    const branch = worktree.prunable ? worktree.branch : await this.git.currentBranchOf(worktree.path);
    const isDirty = worktree.prunable ? false : await this.git.isDirty(worktree.path);

    const hasRef = branch ? await this.git.refExists(`refs/heads/${branch}`) : false;
    const upstream = branch && hasRef ? await this.git.upstreamOf(branch) : null;
    const counts = branch && upstream && !upstream.gone ? await this.git.aheadBehind(`refs/heads/${branch}`, upstream.ref) : null;

    // a missing ref leaves nothing to compare; treat the work as unpushed
    const hasUnpushedCommits = branch
      ? !hasRef || isBranchUnpushed(upstream, counts?.ahead ?? null)
      : await this.isDetachedHeadUnpushed(worktree);

    const isMerged = branch && hasRef ? await this.isMergedInto(branch, options.baseBranch) : false;

    const status: WorktreeStatus = {
      branch,
      isDetached: branch === null,
      isBranchMissing: branch !== null && !hasRef,
      isDirty,
      hasUnpushedCommits,
      isMerged,
      upstream,
      isUpstreamGone: upstream?.gone ?? false,
      ahead: counts?.ahead ?? null,
      behind: counts?.behind ?? null,
    };

    this.logger.debug(`described ${worktree.name}`, { ...status });
    return Object.freeze(status);
  }

  async describeAll(worktrees: readonly WorktreeInfo[], options: DescribeOptions): Promise<DescribedWorktree[]> {
    const described: DescribedWorktree[] = [];
    for (const worktree of worktrees) {
      described.push({ worktree, status: await this.describe(worktree, options) });
    }
    return described;
  }

  private async isDetachedHeadUnpushed(worktree: WorktreeInfo): Promise<boolean> {
    const head = worktree.head ?? (worktree.prunable ? null : await this.git.headCommit(worktree.path));
    if (!head) {
      return true;
    }
    return !(await this.git.isReachableFromRemotes(head));
  }

  private async isMergedInto(branch: string, baseBranch: string | null): Promise<boolean> {
    if (!baseBranch || branch === baseBranch) {
      return false;
    }

    const baseRef = await this.resolveBaseRef(baseBranch);
    if (!baseRef) {
      return false;
    }
    return this.git.isAncestor(`refs/heads/${branch}`, baseRef);
  }

  private async resolveBaseRef(baseBranch: string): Promise<string | undefined> {
    for (const ref of [`refs/heads/${baseBranch}`, `refs/remotes/${baseBranch}`]) {
      if (await this.git.refExists(ref)) {
        return ref;
      }
    }
    return undefined;
  }
}

/** No upstream, or one that was deleted, leaves nothing confirming the work is backed up. */
function isBranchUnpushed(upstream: UpstreamInfo | null, ahead: number | null): boolean {
  if (!upstream || upstream.gone) {
    return true;
  }
  return (ahead ?? 0) > 0;
}
