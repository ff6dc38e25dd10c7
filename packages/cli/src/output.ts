import type {
  CopyOutcome,
  CreateWorktreeResult,
  DescribedWorktree,
  MoveWorktreeResult,
  PruneCandidate,
  PruneItemResult,
  PruneResult,
  Protection,
  UnsafeReason,
  WorktreeStatus,
} from 'workon-engine';

const INDENT = '  ';

export function formatCreateResult(result: CreateWorktreeResult): string[] {
  const lines = [`✅ Created ${describeMode(result)} at ${result.worktreePath}`];

  if (result.copy) {
    lines.push(`${INDENT}copied ${result.copy.copied.length} file(s), skipped ${result.copy.skipped.length}`);
  }
  for (const hook of result.hooks) {
    lines.push(`${INDENT}hook ${hook.status}: ${hook.command}`);
  }
  for (const warning of result.warnings) {
    lines.push(`⚠️  ${warning}`);
  }
  return lines;
}

function describeMode(result: CreateWorktreeResult): string {
  switch (result.mode.kind) {
    case 'normal':
      return `branch ${result.branchName}`;
    case 'orphan':
      return `orphan branch ${result.branchName}`;
    case 'detached':
      return `detached worktree ${result.branchName}`;
    case 'prTracking':
      return `pull request #${result.mode.prNumber} as ${result.branchName}`;
  }
}

export function formatPruneResult({ plan, results, cancelled }: PruneResult): string[] {
  const lines: string[] = [];

  if (plan.toRemove.length > 0) {
    lines.push(plan.isDryRun ? 'Would remove:' : 'To remove:');
    lines.push(...plan.toRemove.map((candidate) => `${INDENT}${label(candidate)}`));
  }
  if (plan.skippedProtected.length > 0) {
    lines.push('Skipped (protected):');
    lines.push(
      ...plan.skippedProtected.map((candidate) => `${INDENT}${label(candidate)}: ${protectionText(candidate.protection)}`),
    );
  }
  if (plan.skippedUnsafe.length > 0) {
    lines.push('Skipped (unsafe):');
    lines.push(
      ...plan.skippedUnsafe.map(
        (candidate) => `${INDENT}${label(candidate)}: ${candidate.unsafeReasons.map(unsafeText).join(', ')}`,
      ),
    );
  }
  for (const name of plan.unmatchedNames) {
    lines.push(`⚠️  worktree '${name}' not found`);
  }

  if (lines.length === 0) {
    lines.push('Nothing to prune.');
  } else if (cancelled) {
    lines.push('Cancelled, nothing removed.');
  }

  lines.push(...results.map(resultText));
  return lines;
}

function label({ worktree, status }: PruneCandidate): string {
  const branch = status.branch ?? worktree.branch;
  return branch && branch !== worktree.name ? `${worktree.name} (${branch})` : worktree.name;
}

function protectionText(protection: Protection): string {
  return protection.kind === 'pattern'
    ? `matches ${protection.pattern}`
    : `${protection.branch} is the default branch`;
}

function unsafeText(reason: UnsafeReason): string {
  return reason === 'dirty' ? 'uncommitted changes' : 'unpushed commits';
}

function resultText(result: PruneItemResult): string {
  return result.ok ? `✅ Removed ${result.worktree.name}` : `❌ Failed to remove ${result.worktree.name}: ${result.error}`;
}

export function pruneResultToJson({ plan, results, cancelled }: PruneResult) {
  const entry = ({ worktree, status, reason }: PruneCandidate) => ({
    name: worktree.name,
    path: worktree.path,
    branch: status.branch,
    reason,
  });

  return {
    dryRun: plan.isDryRun,
    cancelled,
    toRemove: plan.toRemove.map(entry),
    skippedProtected: plan.skippedProtected.map((candidate) => ({
      ...entry(candidate),
      protection: candidate.protection,
    })),
    skippedUnsafe: plan.skippedUnsafe.map((candidate) => ({
      ...entry(candidate),
      unsafeReasons: candidate.unsafeReasons,
    })),
    unmatchedNames: plan.unmatchedNames,
    results: results.map((result) =>
      result.ok
        ? { name: result.worktree.name, ok: true }
        : { name: result.worktree.name, ok: false, error: result.error },
    ),
  };
}

export function formatWorktreeList(worktrees: readonly DescribedWorktree[]): string[] {
  const width = Math.max(0, ...worktrees.map(({ worktree }) => worktree.name.length));
  return worktrees.map(({ worktree, status }) => {
    const flags = statusFlags(status, worktree.prunable);
    const branch = status.branch ?? '(detached)';
    const line = `${worktree.name.padEnd(width)}  ${branch}`;
    return flags.length > 0 ? `${line}  [${flags.join(', ')}]` : line;
  });
}

export function statusFlags(status: WorktreeStatus, prunable = false): string[] {
  const flags: string[] = [];
  if (prunable) flags.push('missing');
  if (status.isDirty) flags.push('dirty');
  if (status.ahead) flags.push(`ahead ${status.ahead}`);
  if (status.behind) flags.push(`behind ${status.behind}`);
  if (status.isBranchMissing) flags.push('branch missing');
  else if (status.isUpstreamGone) flags.push('gone');
  else if (!status.isDetached && !status.upstream) flags.push('no upstream');
  if (status.isMerged) flags.push('merged');
  return flags;
}

export function formatMoveResult(result: MoveWorktreeResult): string[] {
  const target = `${result.branchName} at ${result.worktreePath}`;
  if (result.dryRun) {
    return [`Would move ${result.worktree.name} (${result.fromBranch}) to ${target}`];
  }
  return [`✅ Moved ${result.worktree.name} to ${target}`];
}

export function formatCopyOutcome(outcome: CopyOutcome): string[] {
  return [
    ...outcome.copied.map((file) => `copied  ${file}`),
    ...outcome.skipped.map((file) => `exists  ${file}`),
    `${outcome.copied.length} copied, ${outcome.skipped.length} skipped`,
  ];
}
