import { describe, expect, it } from 'vitest';

import { ResolutionError } from '../shared/errors.js';
import { formatPullRequestBranch, parsePullRequestReference, pullRequestRefspec } from './pr-reference.js';

describe('parsePullRequestReference', () => {
  it.each([
    ['#123', 123],
    ['pr#45', 45],
    ['PR#45', 45],
    ['pr-7', 7],
    ['https://github.com/acme/widgets/pull/981', 981],
    ['https://github.com/acme/widgets/pull/981/files', 981],
  ])('reads %s as pull request %i', (token, number) => {
    expect(parsePullRequestReference(token)).toEqual({ number, remote: null });
  });

  it('keeps the remote named in a pull ref', () => {
    expect(parsePullRequestReference('upstream/pull/12/head')).toEqual({ number: 12, remote: 'upstream' });
  });

  it('treats other tokens as plain branch names', () => {
    expect(parsePullRequestReference('feature/login')).toBeUndefined();
    expect(parsePullRequestReference('pr-foo')).toBeUndefined();
    expect(parsePullRequestReference('https://example.com/issues/3')).toBeUndefined();
  });

  it.each(['#abc', 'pr#', '#0', 'https://github.com/acme/widgets/pull/latest'])('rejects malformed %s', (token) => {
    expect(() => parsePullRequestReference(token)).toThrow(ResolutionError);
    expect(() => parsePullRequestReference(token)).toThrow(
      `Cannot resolve '${token}': pull request number must be a positive integer`,
    );
  });
});

describe('formatPullRequestBranch', () => {
  it('substitutes every number placeholder', () => {
    expect(formatPullRequestBranch('pr-{number}', 123)).toBe('pr-123');
    expect(formatPullRequestBranch('review/{number}-{number}', 5)).toBe('review/5-5');
  });
});

describe('pullRequestRefspec', () => {
  it('maps the hosted pull ref into the remote namespace', () => {
    expect(pullRequestRefspec('origin', 9)).toBe('+refs/pull/9/head:refs/remotes/origin/pull/9/head');
  });
});
