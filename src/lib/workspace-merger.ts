/**
 * Merges source records for the same issue across prioritized workspaces
 */

import { compareIssueKeys } from './issue-key';
import {
  CanonicalField,
  IssueKey,
  MergedIssue,
  Notice,
  Relation,
  RelationField,
  ResolvedField,
  ResolvedRelations,
  SourceRecord,
} from './types';

export interface ExclusionRule {
  field: CanonicalField;
  pattern: string;
}

export interface MergeResult {
  issues: MergedIssue[];
  notices: Notice[];
  /** Keys left out of this pass because of an identity conflict */
  skipped: IssueKey[];
}

const SCALAR_FIELDS: readonly CanonicalField[] = ['Estimate', 'Priority', 'Pipeline', 'Sprint', 'Position', 'Workspace'];
const RELATION_FIELDS: readonly RelationField[] = ['Epic', 'Blocking', 'LinkedPR'];

/**
 * Compile an fnmatch-style pattern: `*`, `?`, `[abc]`, `[!abc]`. Case-sensitive.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      let set = pattern.slice(i + 1, close).replace(/\\/g, '\\\\');
      if (set.startsWith('!')) set = `^${set.slice(1)}`;
      source += `[${set}]`;
      i = close;
    } else {
      source += char.replace(/[.+^${}()|\\/]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 's');
}

export function matchesGlob(value: string, pattern: string): boolean {
  return globToRegExp(pattern).test(value);
}

function relationValue(record: SourceRecord, field: CanonicalField): string[] {
  if (field === 'Epic' || field === 'Blocking' || field === 'LinkedPR') {
    return record.relations[field] ?? [];
  }
  const value = record.fields[field];
  return value === undefined ? [] : [String(value)];
}

/**
 * A record is dropped entirely when any exclusion rule matches one of its values
 */
export function isExcluded(record: SourceRecord, rules: ExclusionRule[]): ExclusionRule | null {
  for (const rule of rules) {
    if (relationValue(record, rule.field).some((value) => matchesGlob(value, rule.pattern))) {
      return rule;
    }
  }
  return null;
}

function toRelations(field: RelationField, owner: IssueKey, targets: IssueKey[]): Relation[] {
  switch (field) {
    case 'Epic':
      return targets.map((to): Relation => ({ kind: 'Epic', from: owner, to }));
    case 'Blocking':
      return targets.map((from): Relation => ({ kind: 'Blocks', from, to: owner }));
    case 'LinkedPR':
      return targets.map((to): Relation => ({ kind: 'LinkedPR', from: owner, to }));
  }
}

function resolveField(records: SourceRecord[], field: CanonicalField): ResolvedField | undefined {
  for (const record of records) {
    const value = record.fields[field];
    if (value !== undefined && value !== '') {
      return { value, sourceId: record.sourceId, scale: record.scales[field] };
    }
  }
  return undefined;
}

function resolveRelations(records: SourceRecord[], key: IssueKey, field: RelationField): ResolvedRelations | undefined {
  for (const record of records) {
    const targets = record.relations[field];
    if (targets && targets.length > 0) {
      return { field, sourceId: record.sourceId, relations: toRelations(field, key, targets) };
    }
  }
  return undefined;
}

function findIdentityConflict(records: SourceRecord[]): string[] | null {
  const ids = new Map<string, string>();
  for (const record of records) {
    if (record.contentId !== undefined) ids.set(record.contentId, record.sourceId);
  }
  return ids.size > 1 ? Array.from(ids.values()) : null;
}

/**
 * Merge per-source record sets, given highest priority first.
 *
 * Exclusions are applied before grouping. For each field, the first source in
 * priority order holding a non-empty value wins; later sources are ignored.
 */
export function merge(orderedSources: SourceRecord[][], exclusions: ExclusionRule[] = []): MergeResult {
  const notices: Notice[] = [];
  const skipped: IssueKey[] = [];
  const groups = new Map<IssueKey, SourceRecord[]>();

  orderedSources.forEach((records) => {
    for (const record of records) {
      const rule = isExcluded(record, exclusions);
      if (rule) {
        notices.push({
          kind: 'excluded',
          key: record.key,
          message: `${record.key} from ${record.sourceId} excluded by ${rule.field}:${rule.pattern}`,
        });
        continue;
      }
      const group = groups.get(record.key) ?? [];
      group.push(record);
      groups.set(record.key, group);
    }
  });

  const issues: MergedIssue[] = [];
  for (const key of Array.from(groups.keys()).sort(compareIssueKeys)) {
    const records = groups.get(key) ?? [];
    if (records.length === 0) continue;

    const conflict = findIdentityConflict(records);
    if (conflict) {
      notices.push({
        kind: 'identity-conflict',
        key,
        message: `${key} refers to different issues in ${conflict.join(', ')}; skipped this pass`,
      });
      skipped.push(key);
      continue;
    }

    const first = records[0];
    const fields: MergedIssue['fields'] = {};
    for (const field of SCALAR_FIELDS) {
      const resolved = resolveField(records, field);
      if (resolved) fields[field] = resolved;
    }

    const relations: MergedIssue['relations'] = {};
    for (const field of RELATION_FIELDS) {
      const resolved = resolveRelations(records, key, field);
      if (resolved) relations[field] = resolved;
    }

    issues.push({
      key,
      ref: first.ref,
      title: first.title,
      isPullRequest: records.some((record) => record.isPullRequest),
      contentId: records.find((record) => record.contentId !== undefined)?.contentId,
      records,
      fields,
      relations,
    });
  }

  return { issues, notices, skipped };
}
