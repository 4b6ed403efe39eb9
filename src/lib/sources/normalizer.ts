/**
 * Converts raw source items into canonical source records
 */

import { formatIssueKey, toIssueRef } from '../issue-key';
import {
  CanonicalField,
  IssueKey,
  Notice,
  RelationField,
  ScalarValue,
  SourceRecord,
} from '../types';
import { RawItem } from './types';

const CANONICAL_FIELDS: readonly CanonicalField[] = [
  'Estimate',
  'Priority',
  'Pipeline',
  'Epic',
  'Blocking',
  'LinkedPR',
  'Sprint',
  'Position',
  'Workspace',
];

const RELATION_FIELDS: readonly RelationField[] = ['Epic', 'Blocking', 'LinkedPR'];

// Source-native names (ZenHub's raw keys and their display labels)
const FIELD_ALIASES: Record<string, CanonicalField> = {
  status: 'Pipeline',
  pipeline: 'Pipeline',
  estimate: 'Estimate',
  priority: 'Priority',
  sprint: 'Sprint',
  sprints: 'Sprint',
  position: 'Position',
  workspace: 'Workspace',
  epic: 'Epic',
  epicissues: 'Epic',
  blocking: 'Blocking',
  blockedby: 'Blocking',
  linkedpr: 'LinkedPR',
  linkedissues: 'LinkedPR',
  pr: 'LinkedPR',
  connectedissues: 'LinkedPR',
};

/**
 * Resolve a field name to the canonical vocabulary; null for unsupported names
 */
export function canonicalField(name: string): CanonicalField | null {
  const exact = CANONICAL_FIELDS.find((field) => field === name);
  if (exact) return exact;
  return FIELD_ALIASES[name.replace(/[\s_-]/g, '').toLowerCase()] ?? null;
}

export function isRelationField(field: CanonicalField): field is RelationField {
  return RELATION_FIELDS.some((relation) => relation === field);
}

/**
 * Reduce a raw value to a scalar. Lists keep their last element (only one
 * sprint can be set), objects their `name` or `value`.
 */
function toScalar(value: unknown): ScalarValue | null {
  if (typeof value === 'string') {
    return value.trim() === '' ? null : value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? toScalar(value[value.length - 1]) : null;
  }
  if (typeof value === 'object' && value !== null) {
    if ('name' in value) return toScalar(value.name);
    if ('value' in value) return toScalar(value.value);
  }
  return null;
}

export interface NormalizeOptions {
  /** Priority rank of the source, 0 is highest */
  rank: number;
  scales?: Partial<Record<CanonicalField, string[]>>;
}

export interface NormalizeResult {
  records: SourceRecord[];
  notices: Notice[];
}

export function normalize(sourceId: string, rawItems: RawItem[], options: NormalizeOptions): NormalizeResult {
  const records: SourceRecord[] = [];
  const notices: Notice[] = [];
  const seen = new Set<IssueKey>();
  const scales = options.scales ?? {};

  for (const item of rawItems) {
    const ref = { owner: item.owner, repo: item.repo, number: item.number };
    const key = formatIssueKey(ref);

    if (seen.has(key)) {
      notices.push({ kind: 'duplicate', key, message: `${key} listed more than once in ${sourceId}; keeping the first` });
      continue;
    }
    seen.add(key);

    const fields: SourceRecord['fields'] = {};
    for (const [name, raw] of Object.entries(item.fields)) {
      const field = canonicalField(name);
      if (!field || isRelationField(field)) continue;
      const value = toScalar(raw);
      if (value !== null) {
        fields[field] = value;
      }
    }

    const relations: SourceRecord['relations'] = {};
    for (const [name, refs] of Object.entries(item.relations)) {
      const field = canonicalField(name);
      if (!field || !isRelationField(field)) continue;
      const keys = refs
        .map((value) => toIssueRef(value))
        .flatMap((target) => (target ? [formatIssueKey(target)] : []))
        .filter((target) => target !== key);
      if (keys.length > 0) {
        relations[field] = [...new Set([...(relations[field] ?? []), ...keys])];
      }
    }

    records.push({
      key,
      ref,
      sourceId,
      rank: options.rank,
      updatedAt: item.updatedAt ?? null,
      title: item.title,
      isPullRequest: item.isPullRequest,
      contentId: item.contentId,
      fields,
      relations,
      scales,
    });
  }

  return { records, notices };
}
