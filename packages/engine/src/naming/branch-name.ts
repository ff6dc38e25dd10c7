const FORBIDDEN_CHARACTERS = /[\u0000- \u007f~^:?*[\\]/;

/**
 * Checks `name` against git's branch naming rules (`git check-ref-format --branch`).
 * Returns the violated rule, or `undefined` when the name is usable.
 */
export function branchNameProblem(name: string): string | undefined {
  if (!name) {
    return 'branch name must not be empty';
  }
  if (name === '@' || name === 'HEAD') {
    return `"${name}" is reserved`;
  }
  if (name.startsWith('-')) {
    return 'branch name must not start with "-"';
  }
  if (FORBIDDEN_CHARACTERS.test(name)) {
    return 'branch name must not contain spaces, control characters or any of ~ ^ : ? * [ \\';
  }
  if (name.includes('..')) {
    return 'branch name must not contain ".."';
  }
  if (name.includes('@{')) {
    return 'branch name must not contain "@{"';
  }
  if (name.endsWith('.')) {
    return 'branch name must not end with "."';
  }

  for (const segment of name.split('/')) {
    if (!segment) {
      return 'branch name must not contain empty path segments';
    }
    if (segment.startsWith('.')) {
      return `segment "${segment}" must not start with "."`;
    }
    if (segment.endsWith('.lock')) {
      return `segment "${segment}" must not end with ".lock"`;
    }
  }

  return undefined;
}

export function isValidBranchName(name: string): boolean {
  return branchNameProblem(name) === undefined;
}
