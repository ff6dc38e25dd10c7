import { constants } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { glob } from 'glob';
import type { ILogger } from '../shared/types.js';
import { createConsoleLogger } from '../shared/logger.js';

export const DEFAULT_COPY_PATTERN = '**/*';

/** A worktree's `.git` file links it to the repository and must never be copied. */
const ALWAYS_EXCLUDED = ['.git', '.git/**', '**/.git', '**/.git/**'];

export interface CopyOutcome {
  /** Paths relative to the source, `/`-separated. */
  copied: string[];
  /** Already present in the destination and left alone. */
  skipped: string[];
}

export interface CopyEngine {
  copyMatching(
    sourceDir: string,
    destDir: string,
    include: readonly string[],
    exclude: readonly string[],
    overwrite: boolean,
  ): Promise<CopyOutcome>;
}

/** A pattern ending in `/` stands for everything under that directory. */
export function expandDirectoryPattern(pattern: string): string {
  return pattern.endsWith('/') ? `${pattern}**/*` : pattern;
}

export class GlobCopyEngine implements CopyEngine {
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createConsoleLogger('copy');
  }

  async copyMatching(
    sourceDir: string,
    destDir: string,
    include: readonly string[],
    exclude: readonly string[],
    overwrite: boolean,
  ): Promise<CopyOutcome> {
    const files = await glob(include.map(expandDirectoryPattern), {
      cwd: sourceDir,
      dot: true,
      nodir: true,
      posix: true,
      ignore: [...ALWAYS_EXCLUDED, ...exclude.map(expandDirectoryPattern)],
    });

    const outcome: CopyOutcome = { copied: [], skipped: [] };
    for (const relative of [...new Set(files)].sort()) {
      const target = path.join(destDir, relative);
      if (!overwrite && (await exists(target))) {
        this.logger.debug(`skipping existing ${relative}`);
        outcome.skipped.push(relative);
        continue;
      }

      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(path.join(sourceDir, relative), target, constants.COPYFILE_FICLONE);
      outcome.copied.push(relative);
    }

    this.logger.info(`copied ${outcome.copied.length} file(s) into ${destDir}`, { skipped: outcome.skipped.length });
    return outcome;
  }
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}
