import { defineCommand } from 'citty';
import type { ConfigOverrides } from 'workon-engine';
import { collectOption } from '../args.js';
import { createCommandContext, createLogger, reportCommandError } from '../context.js';
import { formatCopyOutcome } from '../output.js';

export const copyUntrackedCommand = defineCommand({
  meta: {
    name: 'copy-untracked',
    description: 'Copy untracked files (env files, local config) from one worktree to another',
  },
  args: {
    from: { type: 'positional', description: 'Source worktree name or branch', required: true },
    to: { type: 'positional', description: 'Destination worktree name or branch', required: true },
    pattern: { type: 'string', description: 'Glob to copy, repeatable (defaults to workon.copyPattern, then **/*)' },
    force: { type: 'boolean', description: 'Overwrite files that already exist' },
    verbose: { type: 'boolean', alias: 'v', description: 'Log git commands' },
  },
  async run({ args, rawArgs }) {
    const overrides: ConfigOverrides = {};
    const patterns = collectOption(rawArgs, 'pattern');
    if (patterns.length > 0) {
      overrides['workon.copyPattern'] = patterns;
    }

    const logger = createLogger(args.verbose);
    try {
      const { orchestrator } = createCommandContext({ verbose: args.verbose, overrides });
      const outcome = await orchestrator.copyUntracked(args.from, args.to, { force: args.force });
      for (const line of formatCopyOutcome(outcome)) {
        console.log(line);
      }
    } catch (error) {
      reportCommandError(error, logger);
    }
  },
});
