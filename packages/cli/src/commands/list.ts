import { defineCommand } from 'citty';
import { createCommandContext, createLogger, reportCommandError } from '../context.js';
import { formatWorktreeList } from '../output.js';

export const listCommand = defineCommand({
  meta: {
    name: 'list',
    description: 'List worktrees with their status; filters combine with AND',
  },
  args: {
    dirty: { type: 'boolean', description: 'Only worktrees with uncommitted changes' },
    clean: { type: 'boolean', description: 'Only worktrees without uncommitted changes' },
    ahead: { type: 'boolean', description: 'Only worktrees ahead of their upstream' },
    behind: { type: 'boolean', description: 'Only worktrees behind their upstream' },
    gone: { type: 'boolean', description: 'Only worktrees whose upstream was deleted' },
    verbose: { type: 'boolean', alias: 'v', description: 'Log git commands' },
  },
  async run({ args }) {
    const logger = createLogger(args.verbose);
    try {
      const { orchestrator } = createCommandContext({ verbose: args.verbose });
      const worktrees = await orchestrator.listWorktrees({
        dirty: args.dirty,
        clean: args.clean,
        ahead: args.ahead,
        behind: args.behind,
        gone: args.gone,
      });
      for (const line of formatWorktreeList(worktrees)) {
        console.log(line);
      }
    } catch (error) {
      reportCommandError(error, logger);
    }
  },
});
