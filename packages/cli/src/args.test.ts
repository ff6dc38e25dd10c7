import { describe, expect, it } from 'vitest';
import { collectOption, toggleOption } from './args.js';

describe('collectOption', () => {
  it('collects separate and inline values in order', () => {
    const rawArgs = ['a', 'b', '--pattern', '.env', '--force', '--pattern=config/*.json'];
    expect(collectOption(rawArgs, 'pattern')).toEqual(['.env', 'config/*.json']);
  });

  it('ignores a flag with no value after it', () => {
    expect(collectOption(['--pattern', '--force'], 'pattern')).toEqual([]);
    expect(collectOption(['--pattern'], 'pattern')).toEqual([]);
  });

  it('does not match options that share a prefix', () => {
    expect(collectOption(['--patterns', 'x', '--pattern-file=y'], 'pattern')).toEqual([]);
  });
});

describe('toggleOption', () => {
  it('is undefined when neither form is present', () => {
    expect(toggleOption(['feature', '--base', 'main'], 'copy-untracked')).toBeUndefined();
  });

  it('reads the positive and negative forms', () => {
    expect(toggleOption(['--copy-untracked'], 'copy-untracked')).toBe(true);
    expect(toggleOption(['--no-copy-untracked'], 'copy-untracked')).toBe(false);
  });

  it('lets the last occurrence win', () => {
    expect(toggleOption(['--no-hooks', '--hooks'], 'hooks')).toBe(true);
    expect(toggleOption(['--hooks', '--no-hooks'], 'hooks')).toBe(false);
  });
});
