import { defineCommand } from 'citty';
import type { ConfigOverrides } from 'workon-engine';
import { toggleOption } from '../args.js';
import { createCommandContext, createLogger, reportCommandError } from '../context.js';
import { formatCreateResult } from '../output.js';

export const newCommand = defineCommand({
  meta: {
    name: 'new',
    description: 'Create a worktree for a branch, namespaced branch or pull request (#123, pr-123, URL)',
  },
  args: {
    name: { type: 'positional', description: 'Branch name or pull request reference', required: true },
    base: { type: 'string', description: 'Branch to fork from (commit to detach at with --detach)' },
    orphan: { type: 'boolean', description: 'Start a branch with no history' },
    detach: { type: 'boolean', description: 'Check out a commit without a branch' },
    'copy-untracked': { type: 'boolean', description: 'Copy untracked files from the base worktree' },
    hooks: { type: 'boolean', default: true, description: 'Run workon.postCreateHook commands (--no-hooks to skip)' },
    'pr-format': { type: 'string', description: 'Branch name template for pull requests, e.g. pr-{number}' },
    verbose: { type: 'boolean', alias: 'v', description: 'Log git commands' },
  },
  async run({ args, rawArgs }) {
    const overrides: ConfigOverrides = {};
    const copyUntracked = toggleOption(rawArgs, 'copy-untracked');
    if (copyUntracked !== undefined) {
      overrides['workon.autoCopyUntracked'] = String(copyUntracked);
    }
    if (args['pr-format']) {
      overrides['workon.prFormat'] = args['pr-format'];
    }

    const logger = createLogger(args.verbose);
    try {
      const { orchestrator } = createCommandContext({ verbose: args.verbose, overrides });
      const result = await orchestrator.createWorktree(args.name, {
        base: args.base,
        orphan: args.orphan,
        detach: args.detach,
        runHooks: toggleOption(rawArgs, 'hooks') ?? true,
      });
      for (const line of formatCreateResult(result)) {
        console.log(line);
      }
    } catch (error) {
      reportCommandError(error, logger);
    }
  },
});
