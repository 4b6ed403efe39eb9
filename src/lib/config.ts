/**
 * Runtime configuration: environment files, tokens and option parsing
 */

import path from 'path';
import { execSync } from 'child_process';
import { config } from 'dotenv';
import { ConfigurationError } from './errors';
import { canonicalField } from './sources/normalizer';
import { ExclusionRule, matchesGlob } from './workspace-merger';

export const DEFAULT_TIMEOUT_SECONDS = 180;
export const DEFAULT_CONCURRENCY = 4;

/**
 * Load `.env.local` then `.env` from the working directory; the first value wins
 */
export function loadEnv(cwd: string = process.cwd()): void {
  config({ path: path.join(cwd, '.env.local') });
  config({ path: path.join(cwd, '.env') });
}

/**
 * Token from the flag, then GITHUB_TOKEN, then the gh CLI's keyring
 */
export function resolveGitHubToken(explicit?: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (explicit) return explicit;
  if (env.GITHUB_TOKEN) return env.GITHUB_TOKEN;

  try {
    const token = execSync('gh auth token', {
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
    return token || null;
  } catch {
    // gh CLI not installed or not logged in
    return null;
  }
}

export function resolveZenHubToken(explicit?: string, env: NodeJS.ProcessEnv = process.env): string | null {
  return explicit || env.ZENHUB_TOKEN || null;
}

/**
 * Parse `FIELD:PATTERN`; the pattern may itself contain colons
 */
export function parseExclusion(spec: string): ExclusionRule {
  const separator = spec.indexOf(':');
  if (separator <= 0) {
    throw new ConfigurationError(`Invalid exclusion "${spec}". Expected FIELD:PATTERN`);
  }
  const name = spec.slice(0, separator).trim();
  const field = canonicalField(name);
  if (!field) {
    throw new ConfigurationError(`Unknown field "${name}" in exclusion "${spec}"`);
  }
  return { field, pattern: spec.slice(separator + 1) };
}

/** Workspace names excluded by any `Workspace:` rule */
export function workspaceExcluded(rules: ExclusionRule[]): (name: string) => boolean {
  const patterns = rules.filter((rule) => rule.field === 'Workspace').map((rule) => rule.pattern);
  return (name) => patterns.some((pattern) => matchesGlob(name, pattern));
}

function positiveInteger(value: string, option: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${option} must be a positive whole number, got "${value}"`);
  }
  return parsed;
}

/** `--timeout` in seconds to milliseconds */
export function parseTimeout(value: string | undefined): number {
  return (value === undefined ? DEFAULT_TIMEOUT_SECONDS : positiveInteger(value, '--timeout')) * 1000;
}

export function parseConcurrency(value: string | undefined): number {
  return value === undefined ? DEFAULT_CONCURRENCY : positiveInteger(value, '--concurrency');
}
