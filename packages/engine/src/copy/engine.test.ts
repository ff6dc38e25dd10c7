import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { GlobCopyEngine, expandDirectoryPattern } from './engine.js';

const createdDirs: string[] = [];

const createLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

async function createTree(files: Record<string, string>) {
  const dir = await mkdtemp(join(tmpdir(), 'workon-copy-test-'));
  createdDirs.push(dir);
  for (const [relative, content] of Object.entries(files)) {
    await mkdir(dirname(join(dir, relative)), { recursive: true });
    await writeFile(join(dir, relative), content);
  }
  return dir;
}

afterEach(async () => {
  await Promise.all(createdDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe('GlobCopyEngine', () => {
  it('copies matching files, keeps existing ones and never copies the .git link', async () => {
    const source = await createTree({
      '.git': 'gitdir: /repos/app/.bare/worktrees/main',
      '.env': 'TOKEN=test-secret',
      'config/local.json': '{"debug":true}',
      'node_modules/pkg/index.js': 'module.exports = 1;',
      'README.md': 'source readme',
    });
    const dest = await createTree({ 'README.md': 'dest readme' });

    const outcome = await new GlobCopyEngine(createLogger()).copyMatching(
      source,
      dest,
      ['**/*'],
      ['node_modules/'],
      false,
    );

    expect(outcome).toEqual({ copied: ['.env', 'config/local.json'], skipped: ['README.md'] });
    await expect(readFile(join(dest, 'config/local.json'), 'utf-8')).resolves.toBe('{"debug":true}');
    await expect(readFile(join(dest, 'README.md'), 'utf-8')).resolves.toBe('dest readme');
    await expect(readFile(join(dest, '.git'), 'utf-8')).rejects.toThrow();
  });

  it('overwrites existing files when asked', async () => {
    const source = await createTree({ '.env': 'TOKEN=new-placeholder' });
    const dest = await createTree({ '.env': 'TOKEN=old-placeholder' });

    const outcome = await new GlobCopyEngine(createLogger()).copyMatching(source, dest, ['.env'], [], true);

    expect(outcome).toEqual({ copied: ['.env'], skipped: [] });
    await expect(readFile(join(dest, '.env'), 'utf-8')).resolves.toBe('TOKEN=new-placeholder');
  });

  it('treats a trailing slash as the whole directory', async () => {
    const source = await createTree({ 'fixtures/a.txt': 'a', 'fixtures/nested/b.txt': 'b', 'other.txt': 'c' });
    const dest = await createTree({});

    const outcome = await new GlobCopyEngine(createLogger()).copyMatching(source, dest, ['fixtures/'], [], false);

    expect(outcome.copied).toEqual(['fixtures/a.txt', 'fixtures/nested/b.txt']);
  });
});

describe('expandDirectoryPattern', () => {
  it('only rewrites patterns ending in a slash', () => {
    expect(expandDirectoryPattern('.cache/')).toBe('.cache/**/*');
    expect(expandDirectoryPattern('*.env')).toBe('*.env');
  });
});
