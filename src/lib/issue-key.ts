/**
 * Issue identity helpers: `owner/repo#number` keys and GitHub URLs
 */

import { IssueKey, IssueRef } from './types';

const KEY_PATTERN = /^([\w.-]+)\/([\w.-]+)#(\d+)$/;
const URL_PATTERN = /^https?:\/\/github\.com\/([\w.-]+)\/([\w.-]+)\/(?:issues?|pull)\/(\d+)/;

export function formatIssueKey(ref: IssueRef): IssueKey {
  return `${ref.owner}/${ref.repo}#${ref.number}`;
}

/**
 * Parse `owner/repo#N` or a GitHub issue/pull URL.
 * Returns null when the reference cannot be resolved.
 */
export function parseIssueRef(value: string): IssueRef | null {
  const trimmed = value.trim();
  const match = trimmed.match(KEY_PATTERN) ?? trimmed.match(URL_PATTERN);
  if (!match) {
    return null;
  }
  return { owner: match[1], repo: match[2], number: parseInt(match[3], 10) };
}

export function toIssueRef(value: unknown): IssueRef | null {
  if (typeof value === 'string') {
    return parseIssueRef(value);
  }
  if (typeof value !== 'object' || value === null) {
    return null;
  }
  if (
    'owner' in value && typeof value.owner === 'string' &&
    'repo' in value && typeof value.repo === 'string' &&
    'number' in value && typeof value.number === 'number' &&
    Number.isInteger(value.number)
  ) {
    return { owner: value.owner, repo: value.repo, number: value.number };
  }
  if ('url' in value && typeof value.url === 'string') {
    return parseIssueRef(value.url);
  }
  return null;
}

export function compareIssueKeys(a: IssueKey, b: IssueKey): number {
  const left = parseIssueRef(a);
  const right = parseIssueRef(b);
  if (!left || !right) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (left.owner !== right.owner) return left.owner < right.owner ? -1 : 1;
  if (left.repo !== right.repo) return left.repo < right.repo ? -1 : 1;
  return left.number - right.number;
}

/**
 * Short reference as seen from `base`: `#N` inside the same repository,
 * `owner/repo#N` otherwise.
 */
export function shortRef(target: IssueRef, base: IssueRef): string {
  if (target.owner === base.owner && target.repo === base.repo) {
    return `#${target.number}`;
  }
  return formatIssueKey(target);
}
