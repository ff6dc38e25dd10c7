import path from 'path';
import type { CreationMode, WorktreeInfo } from '../shared/types.js';
import { ResolutionError } from '../shared/errors.js';
import { DEFAULT_PR_FORMAT } from '../config/keys.js';
import { branchNameProblem } from './branch-name.js';
import { formatPullRequestBranch, parsePullRequestReference } from './pr-reference.js';

export interface NameResolutionFlags {
  orphan?: boolean;
  detach?: boolean;
  /** Branch to fork from, or the commit to detach at with `detach`. */
  base?: string;
}

export interface NameResolution {
  branchName: string;
  worktreePath: string;
  mode: CreationMode;
}

export interface NameResolverOptions {
  worktreeRoot: string;
  /** Defaults to `pr-{number}`. */
  prFormat?: string;
  /** Base used for new branches when no `base` flag is given. */
  defaultBaseBranch: string | null;
}

export type PathExists = (target: string) => Promise<boolean>;

export class NameResolver {
  constructor(private readonly options: NameResolverOptions) {}

  resolve(token: string, flags: NameResolutionFlags = {}): NameResolution {
    const trimmed = token.trim();
    if (flags.orphan && flags.detach) {
      throw new ResolutionError(trimmed, 'orphan and detached worktrees are mutually exclusive');
    }

    const pullRequest = parsePullRequestReference(trimmed);
    if (pullRequest) {
      const conflicting = flags.orphan ? 'orphan' : flags.detach ? 'detach' : flags.base ? 'base' : undefined;
      if (conflicting) {
        throw new ResolutionError(trimmed, `pull request references cannot be combined with --${conflicting}`);
      }

      const branchName = formatPullRequestBranch(this.options.prFormat ?? DEFAULT_PR_FORMAT, pullRequest.number);
      this.assertBranchName(trimmed, branchName);
      return {
        branchName,
        worktreePath: this.pathFor(branchName),
        mode: { kind: 'prTracking', prNumber: pullRequest.number, remote: pullRequest.remote },
      };
    }

    const target = this.resolveLiteral(trimmed);
    if (flags.base !== undefined && !flags.detach) {
      this.assertBranchName(flags.base, flags.base);
    }

    return { ...target, mode: this.modeFor(trimmed, flags) };
  }

  /** Branch name and worktree path for a literal name; pull request shorthand is not expanded. */
  resolveLiteral(token: string): Omit<NameResolution, 'mode'> {
    const trimmed = token.trim();
    this.assertBranchName(trimmed, trimmed);
    return { branchName: trimmed, worktreePath: this.pathFor(trimmed) };
  }

  /**
   * Refuses targets that would clash with existing worktrees. Runs before any
   * git mutation.
   */
  async checkCollision(resolution: NameResolution, worktrees: readonly WorktreeInfo[], pathExists: PathExists): Promise<void> {
    const target = path.resolve(resolution.worktreePath);
    const token = resolution.branchName;

    const registered = worktrees.find((worktree) => path.resolve(worktree.path) === target);
    if (registered) {
      throw new ResolutionError(token, `worktree '${registered.name}' already exists at ${target}`, 'NAME_COLLISION');
    }

    if (await pathExists(target)) {
      throw new ResolutionError(token, `${target} already exists`, 'NAME_COLLISION');
    }

    // the root itself is a worktree in a non-bare layout
    const root = path.resolve(this.options.worktreeRoot);
    const enclosing = worktrees.find((worktree) => path.resolve(worktree.path) !== root && isInside(target, worktree.path));
    if (enclosing) {
      throw new ResolutionError(token, `${target} would be nested inside worktree '${enclosing.name}'`, 'NAME_COLLISION');
    }

    if (resolution.mode.kind !== 'detached') {
      const owner = worktrees.find((worktree) => worktree.branch === resolution.branchName);
      if (owner) {
        throw new ResolutionError(
          token,
          `branch '${resolution.branchName}' is already checked out in worktree '${owner.name}'`,
          'NAME_COLLISION',
        );
      }
    }
  }

  private modeFor(token: string, flags: NameResolutionFlags): CreationMode {
    if (flags.orphan) {
      if (flags.base) {
        throw new ResolutionError(token, 'orphan worktrees have no base branch');
      }
      return { kind: 'orphan' };
    }
    if (flags.detach) {
      return { kind: 'detached', commitish: flags.base ?? null };
    }
    return { kind: 'normal', baseBranch: flags.base ?? this.options.defaultBaseBranch };
  }

  private pathFor(branchName: string): string {
    return path.join(this.options.worktreeRoot, ...branchName.split('/'));
  }

  private assertBranchName(token: string, name: string): void {
    const problem = branchNameProblem(name);
    if (problem) {
      throw new ResolutionError(token, problem);
    }
  }
}

function isInside(target: string, parent: string): boolean {
  const relative = path.relative(path.resolve(parent), target);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}
