import { ResolutionError } from '../shared/errors.js';
import { PR_NUMBER_PLACEHOLDER } from '../config/keys.js';

export interface PullRequestReference {
  number: number;
  /** Set when the token named the remote itself (`origin/pull/7/head`). */
  remote: string | null;
}

const SHORTHAND = /^(?:pr)?#(.*)$/i;
const DASHED = /^pr-(\d+)$/i;
const REMOTE_REF = /^([^/\s]+)\/pull\/(\d+)\/head$/;
const URL_PREFIX = /^https?:\/\//i;
const URL_PULL = /\/pull\/(\d+)(?:[/?#].*)?$/;

/**
 * Recognises `#N`, `pr#N`, `pr-N`, `<remote>/pull/N/head` and hosted
 * `.../pull/N` URLs. Returns `undefined` for anything that is not a pull
 * request reference; throws when the token is clearly meant as one but the
 * number is malformed.
 */
export function parsePullRequestReference(token: string): PullRequestReference | undefined {
  const shorthand = SHORTHAND.exec(token);
  if (shorthand) {
    return { number: parseNumber(token, shorthand[1] ?? ''), remote: null };
  }

  const dashed = DASHED.exec(token);
  if (dashed) {
    return { number: parseNumber(token, dashed[1] ?? ''), remote: null };
  }

  const remoteRef = REMOTE_REF.exec(token);
  if (remoteRef) {
    return { number: parseNumber(token, remoteRef[2] ?? ''), remote: remoteRef[1] ?? null };
  }

  if (URL_PREFIX.test(token) && token.includes('/pull/')) {
    const url = URL_PULL.exec(token);
    return { number: parseNumber(token, url?.[1] ?? ''), remote: null };
  }

  return undefined;
}

export function formatPullRequestBranch(template: string, prNumber: number): string {
  return template.replaceAll(PR_NUMBER_PLACEHOLDER, String(prNumber));
}

/** Refspec that makes `refs/remotes/<remote>/pull/<n>/head` available locally. */
export function pullRequestRefspec(remote: string, prNumber: number): string {
  return `+refs/pull/${prNumber}/head:${pullRequestRemoteRef(remote, prNumber)}`;
}

export function pullRequestRemoteRef(remote: string, prNumber: number): string {
  return `refs/remotes/${remote}/pull/${prNumber}/head`;
}

function parseNumber(token: string, digits: string): number {
  const value = /^\d+$/.test(digits) ? Number.parseInt(digits, 10) : Number.NaN;
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ResolutionError(token, 'pull request number must be a positive integer', 'PR_REFERENCE_INVALID');
  }
  return value;
}
