import { describe, expect, it } from 'vitest';

import { branchNameProblem, isValidBranchName } from './branch-name.js';

describe('branchNameProblem', () => {
  it('accepts plain and namespaced names', () => {
    expect(isValidBranchName('feature')).toBe(true);
    expect(isValidBranchName('team/feature/login-form')).toBe(true);
    expect(isValidBranchName('pr-123')).toBe(true);
  });

  it.each([
    ['', 'branch name must not be empty'],
    ['-x', 'branch name must not start with "-"'],
    ['@', '"@" is reserved'],
    ['has space', 'branch name must not contain spaces, control characters or any of ~ ^ : ? * [ \\'],
    ['what?', 'branch name must not contain spaces, control characters or any of ~ ^ : ? * [ \\'],
    ['a..b', 'branch name must not contain ".."'],
    ['a@{1}', 'branch name must not contain "@{"'],
    ['feature.', 'branch name must not end with "."'],
    ['team//feature', 'branch name must not contain empty path segments'],
    ['team/', 'branch name must not contain empty path segments'],
    ['team/.hidden', 'segment ".hidden" must not start with "."'],
    ['refs.lock', 'segment "refs.lock" must not end with ".lock"'],
  ])('rejects %j', (name, rule) => {
    expect(branchNameProblem(name)).toBe(rule);
  });
});
