import { defineCommand } from 'citty';
import { createCommandContext, createLogger, reportCommandError } from '../context.js';
import { formatMoveResult } from '../output.js';

export const moveCommand = defineCommand({
  meta: {
    name: 'move',
    description: 'Rename a worktree and its branch, moving it to the matching directory',
  },
  args: {
    from: { type: 'positional', description: 'Worktree name or branch to move', required: true },
    to: { type: 'positional', description: 'New branch name, which is also the new worktree name', required: true },
    force: { type: 'boolean', alias: 'f', description: 'Move protected, dirty or unpushed worktrees too' },
    'dry-run': { type: 'boolean', description: 'Show the move without performing it' },
    verbose: { type: 'boolean', alias: 'v', description: 'Log git commands' },
  },
  async run({ args }) {
    const logger = createLogger(args.verbose);
    try {
      const { orchestrator } = createCommandContext({ verbose: args.verbose });
      const result = await orchestrator.moveWorktree(args.from, args.to, {
        force: args.force,
        dryRun: args['dry-run'],
      });
      for (const line of formatMoveResult(result)) {
        console.log(line);
      }
    } catch (error) {
      reportCommandError(error, logger);
    }
  },
});
