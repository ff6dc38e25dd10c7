import fs from 'fs/promises';
import path from 'path';
import type { CreationMode, DescribedWorktree, ILogger, WorktreeInfo, WorktreeStatus } from '../shared/types.js';
import { ResolutionError, SafetyError, formatError } from '../shared/errors.js';
import { createConsoleLogger } from '../shared/logger.js';
import type { GitBackend } from '../git/types.js';
import { ConfigResolver, type ConfigOverrides } from '../config/resolver.js';
import { CONFIG_KEYS } from '../config/keys.js';
import type { ConfigStore } from '../config/store.js';
import { NameResolver, type NameResolutionFlags, type PathExists } from '../naming/name-resolver.js';
import { pullRequestRefspec, pullRequestRemoteRef } from '../naming/pr-reference.js';
import { findProtectingPattern } from '../protection/matcher.js';
import { WorktreeDescriptor } from '../status/descriptor.js';
import { executePrunePlan, planPrune } from '../prune/engine.js';
import type { PruneItemResult, PrunePlan, PruneSelector } from '../prune/types.js';
import { ShellHookRunner, type HookResult, type HookRunner } from '../hooks/runner.js';
import { DEFAULT_COPY_PATTERN, GlobCopyEngine, type CopyEngine, type CopyOutcome } from '../copy/engine.js';

const PREFERRED_PR_REMOTES = ['upstream', 'origin'];

export interface LifecycleDependencies {
  git: GitBackend;
  config: ConfigStore;
  /** Command-line values; they outrank every stored configuration scope. */
  overrides?: ConfigOverrides;
  hooks?: HookRunner;
  copy?: CopyEngine;
  logger?: ILogger;
  pathExists?: PathExists;
  /** Where the command runs; its worktree is the copy source when there is no base branch. */
  cwd?: string;
}

export interface CreateWorktreeOptions extends NameResolutionFlags {
  /** Defaults to true. */
  runHooks?: boolean;
}

export interface CreateWorktreeResult {
  branchName: string;
  worktreePath: string;
  mode: CreationMode;
  baseBranch: string | null;
  copy: CopyOutcome | null;
  hooks: HookResult[];
  /** Copy and hook problems. The worktree exists regardless. */
  warnings: string[];
}

export interface PruneOptions {
  allowDirty?: boolean;
  allowUnpushed?: boolean;
  dryRun?: boolean;
  /** Merge target for the `merged` selector. Defaults to the default branch. */
  mergedInto?: string;
  /** Asked before anything is removed; returning false cancels the prune. */
  confirm?: (plan: PrunePlan) => Promise<boolean>;
}

export interface PruneResult {
  plan: PrunePlan;
  results: PruneItemResult[];
  cancelled: boolean;
}

export interface ListFilters {
  dirty?: boolean;
  clean?: boolean;
  ahead?: boolean;
  behind?: boolean;
  gone?: boolean;
}

export interface CopyUntrackedOptions {
  force?: boolean;
}

export interface MoveWorktreeOptions {
  /** Skips the protection, dirty and unpushed checks. */
  force?: boolean;
  dryRun?: boolean;
}

export interface MoveWorktreeResult {
  worktree: WorktreeInfo;
  fromBranch: string;
  branchName: string;
  worktreePath: string;
  dryRun: boolean;
}

interface CopySettings {
  patterns: string[];
  excludes: string[];
}

interface HookSettings {
  commands: string[];
  timeoutSeconds: number;
}

export class LifecycleOrchestrator {
  private readonly git: GitBackend;
  private readonly config: ConfigResolver;
  private readonly hooks: HookRunner;
  private readonly copy: CopyEngine;
  private readonly logger: ILogger;
  private readonly descriptor: WorktreeDescriptor;
  private readonly pathExists: PathExists;
  private readonly cwd: string;

  constructor(deps: LifecycleDependencies) {
    this.git = deps.git;
    this.logger = deps.logger ?? createConsoleLogger('workon');
    this.config = new ConfigResolver(deps.config, { overrides: deps.overrides, logger: this.logger });
    this.hooks = deps.hooks ?? new ShellHookRunner(this.logger);
    this.copy = deps.copy ?? new GlobCopyEngine(this.logger);
    this.descriptor = new WorktreeDescriptor(this.git, this.logger);
    this.pathExists = deps.pathExists ?? exists;
    this.cwd = deps.cwd ?? process.cwd();
  }

  async createWorktree(token: string, options: CreateWorktreeOptions = {}): Promise<CreateWorktreeResult> {
    // every setting this needs is validated before anything is created
    const prFormat = (await this.config.resolve(CONFIG_KEYS.prFormat)).value;
    const defaultBranch = await this.defaultBranch();
    const autoCopy = (await this.config.resolve(CONFIG_KEYS.autoCopyUntracked)).value;
    const copySettings = autoCopy ? await this.copySettings() : null;
    const hookSettings = options.runHooks === false ? null : await this.hookSettings();

    const root = await this.git.worktreeRoot();
    const worktrees = await this.git.listWorktrees();

    const resolver = new NameResolver({ worktreeRoot: root, prFormat, defaultBaseBranch: defaultBranch });
    const resolution = resolver.resolve(token, options);
    await resolver.checkCollision(resolution, worktrees, this.pathExists);

    const mode: CreationMode =
      resolution.mode.kind === 'prTracking'
        ? { ...resolution.mode, remote: await this.preparePullRequest(token, resolution.mode.prNumber, resolution.mode.remote) }
        : resolution.mode;

    this.logger.info(`creating ${mode.kind} worktree ${resolution.branchName} at ${resolution.worktreePath}`);
    await this.git.createWorktree({ path: resolution.worktreePath, branchName: resolution.branchName, mode });

    const baseBranch = mode.kind === 'normal' ? mode.baseBranch : mode.kind === 'prTracking' ? defaultBranch : null;
    const result: CreateWorktreeResult = {
      branchName: resolution.branchName,
      worktreePath: resolution.worktreePath,
      mode,
      baseBranch,
      copy: null,
      hooks: [],
      warnings: [],
    };

    if (copySettings) {
      await this.copyFromBase(result, worktrees, copySettings);
    }
    if (hookSettings && hookSettings.commands.length > 0) {
      await this.runHooks(result, hookSettings);
    }

    return result;
  }

  async pruneWorktrees(selector: PruneSelector, options: PruneOptions = {}): Promise<PruneResult> {
    const protectedPatterns = (await this.config.resolveMulti(CONFIG_KEYS.protectedPatterns)).value;
    const defaultBranch = await this.defaultBranch();
    const worktrees = await this.git.listWorktrees();
    const described = await this.descriptor.describeAll(worktrees, { baseBranch: options.mergedInto ?? defaultBranch });

    const plan = planPrune({
      worktrees: described,
      selector,
      protectedPatterns,
      defaultBranch,
      allowDirty: options.allowDirty ?? false,
      allowUnpushed: options.allowUnpushed ?? false,
      dryRun: options.dryRun ?? false,
    });

    for (const name of plan.unmatchedNames) {
      this.logger.warn(`worktree '${name}' not found, skipping`);
    }

    if (plan.isDryRun || plan.toRemove.length === 0) {
      return { plan, results: [], cancelled: false };
    }
    if (options.confirm && !(await options.confirm(plan))) {
      this.logger.info('prune cancelled');
      return { plan, results: [], cancelled: true };
    }

    return { plan, results: await executePrunePlan(plan, this.git, this.logger), cancelled: false };
  }

  async listWorktrees(filters: ListFilters = {}): Promise<DescribedWorktree[]> {
    if (filters.dirty && filters.clean) {
      throw new ResolutionError('--dirty --clean', 'a worktree cannot be both dirty and clean', 'FILTER_CONFLICT');
    }

    const defaultBranch = await this.defaultBranch();
    const described = await this.descriptor.describeAll(await this.git.listWorktrees(), { baseBranch: defaultBranch });

    return described.filter(({ status }) => {
      if (filters.dirty && !status.isDirty) return false;
      if (filters.clean && status.isDirty) return false;
      if (filters.ahead && !((status.ahead ?? 0) > 0)) return false;
      if (filters.behind && !((status.behind ?? 0) > 0)) return false;
      if (filters.gone && !status.isUpstreamGone) return false;
      return true;
    });
  }

  async copyUntracked(from: string, to: string, options: CopyUntrackedOptions = {}): Promise<CopyOutcome> {
    const { patterns, excludes } = await this.copySettings();
    const worktrees = await this.git.listWorktrees();
    const source = findWorktree(worktrees, from);
    const destination = findWorktree(worktrees, to);

    return this.copy.copyMatching(source.path, destination.path, patterns, excludes, options.force ?? false);
  }

  /**
   * Renames a worktree's branch and moves its directory to match, across
   * namespaces if needed. The branch rename is undone when the move fails.
   */
  async moveWorktree(from: string, to: string, options: MoveWorktreeOptions = {}): Promise<MoveWorktreeResult> {
    const worktrees = await this.git.listWorktrees();
    const source = findWorktree(worktrees, from);
    const status = await this.descriptor.describe(source, { baseBranch: null });
    if (status.branch === null) {
      throw new ResolutionError(from, 'a detached worktree has no branch to rename');
    }
    const fromBranch = status.branch;

    const resolver = new NameResolver({ worktreeRoot: await this.git.worktreeRoot(), defaultBaseBranch: null });
    const target = resolver.resolveLiteral(to);
    await resolver.checkCollision({ ...target, mode: { kind: 'normal', baseBranch: null } }, worktrees, this.pathExists);
    if (await this.git.refExists(`refs/heads/${target.branchName}`)) {
      throw new ResolutionError(to, `branch '${target.branchName}' already exists`, 'NAME_COLLISION');
    }

    if (!options.force) {
      const refusals = await this.moveRefusals(fromBranch, status);
      if (refusals.length > 0) {
        throw new SafetyError(source.name, 'move', refusals);
      }
    }

    const result: MoveWorktreeResult = {
      worktree: source,
      fromBranch,
      branchName: target.branchName,
      worktreePath: target.worktreePath,
      dryRun: options.dryRun ?? false,
    };
    if (result.dryRun) {
      return result;
    }

    this.logger.info(`moving ${source.name} to ${target.worktreePath}`);
    await this.git.renameBranch(fromBranch, target.branchName);
    try {
      await this.git.moveWorktree(source, target.worktreePath);
    } catch (error) {
      await this.restoreBranchName(target.branchName, fromBranch);
      throw error;
    }
    return result;
  }

  private async moveRefusals(branch: string, status: WorktreeStatus): Promise<string[]> {
    const refusals: string[] = [];
    const protectedPatterns = (await this.config.resolveMulti(CONFIG_KEYS.protectedPatterns)).value;
    const pattern = findProtectingPattern(branch, protectedPatterns);
    if (pattern !== undefined) {
      refusals.push(`protected by ${pattern}`);
    } else if (branch === (await this.defaultBranch())) {
      refusals.push(`${branch} is the default branch`);
    }
    if (status.isDirty) {
      refusals.push('uncommitted changes');
    }
    if (status.hasUnpushedCommits) {
      refusals.push('unpushed commits');
    }
    return refusals;
  }

  private async restoreBranchName(current: string, original: string): Promise<void> {
    try {
      await this.git.renameBranch(current, original);
    } catch (error) {
      this.logger.error(
        `could not rename ${current} back to ${original}`,
        error instanceof Error ? error : new Error(formatError(error)),
      );
    }
  }

  private async defaultBranch(): Promise<string | null> {
    return (await this.config.resolve(CONFIG_KEYS.defaultBranch)).value ?? (await this.git.defaultBranch());
  }

  private async copySettings(): Promise<CopySettings> {
    const patterns = (await this.config.resolveMulti(CONFIG_KEYS.copyPatterns)).value;
    return {
      patterns: patterns.length > 0 ? patterns : [DEFAULT_COPY_PATTERN],
      excludes: (await this.config.resolveMulti(CONFIG_KEYS.copyExcludes)).value,
    };
  }

  private async hookSettings(): Promise<HookSettings> {
    const commands = (await this.config.resolveMulti(CONFIG_KEYS.postCreateHooks)).value;
    if (commands.length === 0) {
      return { commands, timeoutSeconds: 0 };
    }
    return { commands, timeoutSeconds: (await this.config.resolve(CONFIG_KEYS.hookTimeoutSeconds)).value };
  }

  /** Picks the remote to read the pull request from and fetches its ref when missing. */
  private async preparePullRequest(token: string, prNumber: number, requested: string | null): Promise<string> {
    const remotes = await this.git.listRemotes();
    const remote = requested ?? PREFERRED_PR_REMOTES.find((name) => remotes.includes(name)) ?? remotes[0];

    if (!remote || !remotes.includes(remote)) {
      throw new ResolutionError(
        token,
        requested ? `remote '${requested}' is not configured` : 'no remote is configured to fetch the pull request from',
        'NO_REMOTE',
      );
    }

    if (!(await this.git.refExists(pullRequestRemoteRef(remote, prNumber)))) {
      this.logger.info(`fetching pull request #${prNumber} from ${remote}`);
      await this.git.fetchRef(remote, pullRequestRefspec(remote, prNumber));
    }
    return remote;
  }

  /** Copies from the worktree holding the base branch, or from the current one when there is no base. */
  private async copyFromBase(result: CreateWorktreeResult, worktrees: WorktreeInfo[], settings: CopySettings) {
    const source = result.baseBranch
      ? worktrees.find((worktree) => worktree.branch === result.baseBranch)
      : enclosingWorktree(worktrees, this.cwd);
    if (!source) {
      result.warnings.push(
        result.baseBranch
          ? `copy skipped: no worktree has ${result.baseBranch} checked out`
          : 'copy skipped: not inside a worktree to copy from',
      );
      return;
    }

    try {
      result.copy = await this.copy.copyMatching(source.path, result.worktreePath, settings.patterns, settings.excludes, false);
    } catch (error) {
      result.warnings.push(`copy from ${source.name} failed: ${formatError(error)}`);
    }
  }

  private async runHooks(result: CreateWorktreeResult, settings: HookSettings) {
    try {
      result.hooks = await this.hooks.run(settings.commands, {
        cwd: result.worktreePath,
        env: {
          WORKON_WORKTREE_PATH: result.worktreePath,
          WORKON_BRANCH_NAME: result.mode.kind === 'detached' ? '' : result.branchName,
          WORKON_BASE_BRANCH: result.baseBranch ?? '',
        },
        timeoutMs: settings.timeoutSeconds * 1000,
      });
    } catch (error) {
      result.warnings.push(`post-create hooks could not run: ${formatError(error)}`);
      return;
    }

    for (const hook of result.hooks) {
      if (hook.status === 'failed' || hook.status === 'timed-out') {
        result.warnings.push(`post-create hook ${hook.status}: ${hook.command}`);
      }
    }
  }
}

function findWorktree(worktrees: readonly WorktreeInfo[], name: string): WorktreeInfo {
  const match = worktrees.find(
    (worktree) => worktree.name === name || worktree.branch === name || path.basename(worktree.path) === name,
  );
  if (!match) {
    throw new ResolutionError(name, 'no worktree with that name or branch');
  }
  return match;
}

/** Deepest worktree containing `directory`. */
function enclosingWorktree(worktrees: readonly WorktreeInfo[], directory: string): WorktreeInfo | undefined {
  const target = path.resolve(directory);
  return worktrees
    .filter((worktree) => {
      const relative = path.relative(path.resolve(worktree.path), target);
      return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
    })
    .sort((a, b) => b.path.length - a.path.length)[0];
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}
