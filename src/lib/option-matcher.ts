/**
 * Translates a source value into one of a destination field's options
 */

import { MatchStrategy } from './types';

/**
 * Story point scale assumed when a source can't tell us its own ordinal scale.
 * ZenHub's estimate scale is not exposed by its API, so this is a guess.
 */
export const DEFAULT_SCALE: readonly string[] = ['1', '2', '3', '5', '8', '13', '21', '40'];

export type MatchCondition = 'no-options' | 'no-match';

export interface MatchResult {
  chosen: string | null;
  /** 1 for an exact hit, similarity score for closest, rank agreement for scale */
  confidence: number;
  condition?: MatchCondition;
}

export type SimilarityFn = (a: string, b: string) => number;

function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(current[j - 1] + 1, previous[j] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

function asNumber(value: string): number | null {
  if (!/^-?\d+(\.\d+)?$/.test(value)) return null;
  return parseFloat(value);
}

/**
 * Normalized edit-distance similarity in [0, 1]. Two numbers are compared by
 * magnitude instead, so "6" lands next to "5" rather than "16".
 */
export const similarity: SimilarityFn = (a, b) => {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();

  const x = asNumber(left);
  const y = asNumber(right);
  if (x !== null && y !== null) {
    return 1 - Math.abs(x - y) / Math.max(Math.abs(x), Math.abs(y), 1);
  }

  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(left, right) / longest;
};

export function matchExact(value: string, options: readonly string[]): MatchResult {
  const wanted = value.trim().toLowerCase();
  const chosen = options.find((option) => option.trim().toLowerCase() === wanted);
  if (chosen === undefined) {
    return { chosen: null, confidence: 0, condition: 'no-match' };
  }
  return { chosen, confidence: 1 };
}

export function matchClosest(
  value: string,
  options: readonly string[],
  score: SimilarityFn = similarity
): MatchResult {
  if (options.length === 0) {
    return { chosen: null, confidence: 0, condition: 'no-options' };
  }

  let best = 0;
  let bestScore = -Infinity;
  options.forEach((option, index) => {
    const current = score(value, option);
    // strict > keeps the earliest option on ties
    if (current > bestScore) {
      best = index;
      bestScore = current;
    }
  });
  return { chosen: options[best], confidence: bestScore };
}

export function rankToRank(rank: number, sourceSize: number, destinationSize: number): number {
  if (sourceSize <= 1) return 0;
  return Math.round((rank / (sourceSize - 1)) * (destinationSize - 1));
}

export function matchScale(
  value: string,
  options: readonly string[],
  sourceScale: readonly string[] = DEFAULT_SCALE,
  score: SimilarityFn = similarity
): MatchResult {
  const scale = sourceScale.length > 0 ? sourceScale : DEFAULT_SCALE;
  const placed = matchClosest(value, scale, score);
  const rank = placed.chosen === null ? 0 : scale.indexOf(placed.chosen);
  const chosen = options[rankToRank(rank, scale.length, options.length)];
  return { chosen, confidence: placed.confidence };
}

/**
 * Pick a destination option for `value`.
 * An empty option set is reported as `no-options` so the caller can skip the field.
 */
export function match(
  value: string,
  options: readonly string[],
  strategy: MatchStrategy,
  sourceScale?: readonly string[],
  score: SimilarityFn = similarity
): MatchResult {
  if (options.length === 0) {
    return { chosen: null, confidence: 0, condition: 'no-options' };
  }

  switch (strategy) {
    case 'exact':
      return matchExact(value, options);
    case 'scale':
      return matchScale(value, options, sourceScale, score);
    case 'closest':
      return matchClosest(value, options, score);
  }
}

export function parseStrategy(value: string | undefined): MatchStrategy {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'exact' || normalized === 'scale' || normalized === 'closest') {
    return normalized;
  }
  return 'closest';
}
