export type {
  ILogger,
  WorktreeInfo,
  UpstreamInfo,
  WorktreeStatus,
  DescribedWorktree,
  CreationMode,
  CreationModeKind,
} from './shared/types.js';
export {
  WorkonError,
  ConfigError,
  ResolutionError,
  SafetyError,
  GitBackendError,
  isWorkonError,
  formatError,
} from './shared/errors.js';
export type { WorkonErrorCode, ConfigScope, ResolutionErrorCode } from './shared/errors.js';
export { createConsoleLogger, parseLogLevel } from './shared/logger.js';
export type { LogLevel, ConsoleLoggerOptions } from './shared/logger.js';

export type { GitBackend, CreateWorktreeRequest, AheadBehind } from './git/types.js';
export { GitCliBackend } from './git/cli-backend.js';
export type { GitCliBackendOptions } from './git/cli-backend.js';
export { createGitRunner } from './git/runner.js';
export type { GitRunner, GitResult, GitRunOptions } from './git/runner.js';

export { CONFIG_KEYS, DEFAULT_PR_FORMAT, DEFAULT_HOOK_TIMEOUT_SECONDS } from './config/keys.js';
export type { ConfigKeyName, WorkonSettings, SingleKeyDefinition, MultiKeyDefinition } from './config/keys.js';
export { ConfigResolver } from './config/resolver.js';
export type { ConfigOverrides, ResolvedValue } from './config/resolver.js';
export type { ConfigStore, StoreScope } from './config/store.js';
export { GitConfigStore } from './config/git-config-store.js';

export { branchNameProblem, isValidBranchName } from './naming/branch-name.js';
export { parsePullRequestReference, formatPullRequestBranch } from './naming/pr-reference.js';
export type { PullRequestReference } from './naming/pr-reference.js';
export { NameResolver } from './naming/name-resolver.js';
export type { NameResolution, NameResolutionFlags, NameResolverOptions } from './naming/name-resolver.js';

export { isProtected, findProtectingPattern, protectedPatternProblem } from './protection/matcher.js';
export { WorktreeDescriptor } from './status/descriptor.js';
export type { DescribeOptions } from './status/descriptor.js';

export { planPrune, executePrunePlan } from './prune/engine.js';
export type {
  PruneSelector,
  PrunePlan,
  PruneInput,
  PruneCandidate,
  ProtectedCandidate,
  UnsafeCandidate,
  UnsafeReason,
  SelectionReason,
  Protection,
  PruneItemResult,
} from './prune/types.js';

export { ShellHookRunner } from './hooks/runner.js';
export type { HookRunner, HookResult, HookStatus, HookRunOptions, HookEnvironment } from './hooks/runner.js';
export { GlobCopyEngine, DEFAULT_COPY_PATTERN } from './copy/engine.js';
export type { CopyEngine, CopyOutcome } from './copy/engine.js';

export { LifecycleOrchestrator } from './lifecycle/orchestrator.js';
export type {
  LifecycleDependencies,
  CreateWorktreeOptions,
  CreateWorktreeResult,
  PruneOptions,
  PruneResult,
  ListFilters,
  CopyUntrackedOptions,
  MoveWorktreeOptions,
  MoveWorktreeResult,
} from './lifecycle/orchestrator.js';
