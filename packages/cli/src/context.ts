import {
  GitCliBackend,
  GitConfigStore,
  LifecycleOrchestrator,
  createConsoleLogger,
  createGitRunner,
  formatError,
  isWorkonError,
  parseLogLevel,
  type ConfigOverrides,
  type ILogger,
} from 'workon-engine';

export interface CommandContext {
  orchestrator: LifecycleOrchestrator;
  logger: ILogger;
}

export interface CommandContextOptions {
  verbose?: boolean;
  overrides?: ConfigOverrides;
  cwd?: string;
}

export function createLogger(verbose = false): ILogger {
  const level = verbose ? 'debug' : parseLogLevel(process.env.WORKON_LOG_LEVEL, 'warn');
  return createConsoleLogger('workon', { level });
}

/** One orchestrator per command invocation; configuration is re-read each time. */
export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  const logger = createLogger(options.verbose);
  const cwd = options.cwd ?? process.cwd();
  const runner = createGitRunner({ cwd, logger });

  const orchestrator = new LifecycleOrchestrator({
    git: new GitCliBackend({ cwd, runner, logger }),
    config: new GitConfigStore({ runner, logger }),
    overrides: options.overrides,
    logger,
    cwd,
  });

  return { orchestrator, logger };
}

/** Workon errors print as one line; anything else is unexpected and keeps its stack. */
export function reportCommandError(error: unknown, logger: ILogger): void {
  if (isWorkonError(error)) {
    console.error(`error: ${error.message}`);
  } else {
    logger.error('unexpected failure', error instanceof Error ? error : new Error(formatError(error)));
  }
  process.exitCode = 1;
}
