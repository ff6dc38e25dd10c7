export type WorkonErrorCode =
  | 'CONFIG_INVALID'
  | 'NAME_INVALID'
  | 'NAME_COLLISION'
  | 'PR_REFERENCE_INVALID'
  | 'NO_REMOTE'
  | 'FILTER_CONFLICT'
  | 'UNSAFE_OPERATION'
  | 'GIT_FAILED';

export class WorkonError extends Error {
  constructor(
    message: string,
    public readonly code: WorkonErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'WorkonError';
  }
}

export type ConfigScope = 'cli' | 'local' | 'global' | 'default';

export class ConfigError extends WorkonError {
  constructor(
    public readonly key: string,
    public readonly scope: ConfigScope,
    public readonly value: string,
    public readonly rule: string,
  ) {
    super(`Invalid value ${JSON.stringify(value)} for ${key} (${scope} scope): ${rule}`, 'CONFIG_INVALID', {
      key,
      scope,
      value,
      rule,
    });
    this.name = 'ConfigError';
  }
}

export type ResolutionErrorCode = Extract<
  WorkonErrorCode,
  'NAME_INVALID' | 'NAME_COLLISION' | 'PR_REFERENCE_INVALID' | 'NO_REMOTE' | 'FILTER_CONFLICT'
>;

export class ResolutionError extends WorkonError {
  constructor(
    public readonly token: string,
    public readonly rule: string,
    code: ResolutionErrorCode = 'NAME_INVALID',
  ) {
    super(`Cannot resolve '${token}': ${rule}`, code, { token, rule });
    this.name = 'ResolutionError';
  }
}

/** A mutation refused by the protection or safety gates; `force` overrides it. */
export class SafetyError extends WorkonError {
  constructor(
    public readonly target: string,
    public readonly operation: string,
    public readonly reasons: readonly string[],
  ) {
    super(`Refusing to ${operation} '${target}': ${reasons.join(', ')}`, 'UNSAFE_OPERATION', {
      target,
      operation,
      reasons: [...reasons],
    });
    this.name = 'SafetyError';
  }
}

export class GitBackendError extends WorkonError {
  constructor(
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
    cause?: unknown,
  ) {
    super(formatGitFailure(args, exitCode, stderr, cause), 'GIT_FAILED', {
      args: [...args],
      exitCode,
      stderr,
    });
    this.name = 'GitBackendError';
  }
}

export function isWorkonError(error: unknown): error is WorkonError {
  return error instanceof WorkonError;
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

function formatGitFailure(
  args: readonly string[],
  exitCode: number | null,
  stderr: string,
  cause: unknown,
): string {
  const command = `git ${args.join(' ')}`;
  const detail = stderr.trim() || (cause !== undefined ? formatError(cause) : '');
  const status = exitCode === null ? 'could not be run' : `failed with exit code ${exitCode}`;
  return detail ? `${command} ${status}: ${detail}` : `${command} ${status}`;
}
