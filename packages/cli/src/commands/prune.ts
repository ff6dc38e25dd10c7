import { defineCommand } from 'citty';
import type { PrunePlan, PruneSelector } from 'workon-engine';
import { createCommandContext, createLogger, reportCommandError } from '../context.js';
import { formatPruneResult, pruneResultToJson } from '../output.js';
import { confirm } from '../prompt.js';

export const pruneCommand = defineCommand({
  meta: {
    name: 'prune',
    description: 'Remove worktrees by name, those whose upstream is gone or that are merged, and those whose branch was deleted',
  },
  args: {
    gone: { type: 'boolean', description: 'Select worktrees whose upstream branch was deleted' },
    merged: { type: 'boolean', description: 'Select worktrees merged into the default branch' },
    'merged-into': { type: 'string', description: 'Select worktrees merged into this branch' },
    all: { type: 'boolean', description: 'Select every worktree' },
    'allow-dirty': { type: 'boolean', description: 'Also remove worktrees with uncommitted changes' },
    'allow-unpushed': { type: 'boolean', description: 'Also remove worktrees with unpushed commits' },
    'dry-run': { type: 'boolean', description: 'Show the plan without removing anything' },
    yes: { type: 'boolean', alias: 'y', description: 'Do not ask for confirmation' },
    json: { type: 'boolean', description: 'Print the plan and results as JSON; implies --yes' },
    verbose: { type: 'boolean', alias: 'v', description: 'Log git commands' },
  },
  async run({ args }) {
    const logger = createLogger(args.verbose);
    const mergedInto = args['merged-into'] || undefined;
    const names = args._.filter((value): value is string => typeof value === 'string');
    const selector: PruneSelector = {
      names,
      gone: args.gone,
      merged: args.merged || mergedInto !== undefined,
      all: args.all,
    };

    try {
      const { orchestrator } = createCommandContext({ verbose: args.verbose });
      const result = await orchestrator.pruneWorktrees(selector, {
        allowDirty: args['allow-dirty'],
        allowUnpushed: args['allow-unpushed'],
        dryRun: args['dry-run'],
        mergedInto,
        // JSON output is for scripts, which cannot answer a prompt
        confirm: args.yes || args.json ? undefined : askToRemove,
      });

      if (args.json) {
        console.log(JSON.stringify(pruneResultToJson(result), null, 2));
      } else {
        for (const line of formatPruneResult(result)) {
          console.log(line);
        }
      }
      if (result.results.some((item) => !item.ok)) {
        process.exitCode = 1;
      }
    } catch (error) {
      reportCommandError(error, logger);
    }
  },
});

async function askToRemove(plan: PrunePlan): Promise<boolean> {
  if (!process.stdin.isTTY) {
    console.error('not a terminal; pass --yes to prune without confirmation');
    return false;
  }
  const names = plan.toRemove.map((candidate) => candidate.worktree.name).join(', ');
  return confirm(`Remove ${plan.toRemove.length} worktree(s): ${names}?`);
}
