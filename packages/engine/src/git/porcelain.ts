import path from 'path';
import type { WorktreeInfo } from '../shared/types.js';

const BRANCH_PREFIX = 'refs/heads/';

/**
 * Parses `git worktree list --porcelain`. Bare entries are dropped; names are
 * paths relative to `root`.
 */
export function parseWorktreeList(output: string, root: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = [];

  for (const block of output.split(/\n\s*\n/)) {
    const lines = block.split('\n').map((line) => line.trimEnd()).filter(Boolean);
    const pathLine = lines.find((line) => line.startsWith('worktree '));
    if (!pathLine) {
      continue;
    }

    if (lines.includes('bare')) {
      continue;
    }

    const worktreePath = pathLine.slice('worktree '.length);
    const head = valueOf(lines, 'HEAD');
    const branchRef = valueOf(lines, 'branch');

    worktrees.push({
      path: worktreePath,
      name: toWorktreeName(root, worktreePath),
      branch: branchRef?.startsWith(BRANCH_PREFIX) ? branchRef.slice(BRANCH_PREFIX.length) : null,
      head: head ?? null,
      locked: lines.some((line) => line === 'locked' || line.startsWith('locked ')),
      prunable: lines.some((line) => line === 'prunable' || line.startsWith('prunable ')),
    });
  }

  return worktrees;
}

export function toWorktreeName(root: string, worktreePath: string): string {
  const relative = path.relative(root, worktreePath);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return path.basename(worktreePath);
  }
  return relative.split(path.sep).join('/');
}

function valueOf(lines: string[], key: string): string | undefined {
  const prefix = `${key} `;
  const line = lines.find((candidate) => candidate.startsWith(prefix));
  return line?.slice(prefix.length);
}
