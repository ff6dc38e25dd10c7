import { defineCommand, runMain } from 'citty';
import { copyUntrackedCommand } from './commands/copy-untracked.js';
import { listCommand } from './commands/list.js';
import { moveCommand } from './commands/move.js';
import { newCommand } from './commands/new.js';
import { pruneCommand } from './commands/prune.js';

const main = defineCommand({
  meta: {
    name: 'git-workon',
    version: '0.1.0',
    description: 'Manage one worktree per branch next to a bare repository',
  },
  subCommands: {
    new: newCommand,
    prune: pruneCommand,
    list: listCommand,
    move: moveCommand,
    'copy-untracked': copyUntrackedCommand,
  },
});

void runMain(main);
