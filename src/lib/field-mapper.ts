/**
 * Maps merged issues onto the target project's fields
 */

import { ConfigurationError } from './errors';
import { match, parseStrategy } from './option-matcher';
import { encode, TextSection } from './relation-encoder';
import { canonicalField, isRelationField } from './sources/normalizer';
import {
  FieldDefinition,
  FieldMappingRule,
  FieldSchema,
  MergedIssue,
  Notice,
  Relation,
  ResolvedField,
  ScalarValue,
  TargetPayload,
} from './types';

/** Destination that renders into the issue body */
export const TEXT_DESTINATION = 'Text';
/** Destination that places the item on the board */
export const POSITION_DESTINATION = 'Position';
/** GitHub's read-only linked PR field; links are made by editing the PR body instead */
export const LINKED_PRS_DESTINATION = 'Linked pull requests';

export const DEFAULT_MAPPING: readonly string[] = [
  'Estimate:Size:Scale',
  'Priority:Priority',
  'Pipeline:Status',
  'LinkedPR:Text',
  'Epic:Text',
  'Blocking:Text',
  'Sprint:Iteration',
  'Position:Position',
];

/**
 * Parse `SRC:DST[:STRATEGY]`. `SRC:` disables the source field, a bare `SRC` maps it to itself.
 */
export function parseRule(spec: string): FieldMappingRule {
  const [rawSource, ...rest] = spec.split(':');
  const source = canonicalField(rawSource.trim());
  if (!source) {
    throw new ConfigurationError(`Unknown source field "${rawSource}" in mapping "${spec}"`);
  }
  const destination = rest.length === 0 ? rawSource.trim() : rest[0].trim();
  return {
    source,
    destination: destination === '' ? null : destination,
    strategy: parseStrategy(rest[1]),
  };
}

/**
 * Defaults first; overrides for a source field replace every default rule for it
 * while keeping its place in evaluation order.
 */
export function buildRules(overrides: readonly string[] = [], defaults: readonly string[] = DEFAULT_MAPPING): FieldMappingRule[] {
  const bySource = new Map<string, FieldMappingRule[]>();
  for (const layer of [defaults, overrides]) {
    const parsed = new Map<string, FieldMappingRule[]>();
    for (const spec of layer) {
      const rule = parseRule(spec);
      parsed.set(rule.source, [...(parsed.get(rule.source) ?? []), rule]);
    }
    for (const [source, rules] of parsed) {
      bySource.set(source, rules);
    }
  }
  return Array.from(bySource.values())
    .flat()
    .filter((rule) => rule.destination !== null);
}

export interface FieldMapperOptions {
  /** Organization owning the project; only its issues get body edits */
  targetOrg: string;
  schema: FieldSchema;
}

export class FieldMapper {
  private reported = new Set<string>();
  private notices: Notice[] = [];

  /** destination field → "source value → option" → count */
  readonly translations: Record<string, Record<string, number>> = {};

  constructor(private options: FieldMapperOptions) {}

  /**
   * Configuration problems are reported once per rule, not per issue
   */
  private reportOnce(id: string, error: ConfigurationError): void {
    if (this.reported.has(id)) return;
    this.reported.add(id);
    this.notices.push({ kind: 'configuration', message: error.message });
  }

  /** Notices collected since the last call */
  drainNotices(): Notice[] {
    const notices = this.notices;
    this.notices = [];
    return notices;
  }

  private recordTranslation(field: string, from: ScalarValue, to: string | null): void {
    const stats = this.translations[field] ?? {};
    this.translations[field] = stats;
    const label = `${from} → ${to ?? '(none)'}`;
    stats[label] = (stats[label] ?? 0) + 1;
  }

  private translate(resolved: ResolvedField, definition: FieldDefinition, rule: FieldMappingRule): ScalarValue | null {
    switch (definition.type) {
      case 'single_select':
      case 'iteration': {
        const options = definition.options ?? [];
        const result = match(String(resolved.value), options, rule.strategy, resolved.scale);
        if (result.condition === 'no-options') {
          this.reportOnce(
            `options:${definition.name}`,
            new ConfigurationError(`Field "${definition.name}" has no options to match ${rule.source} against`)
          );
          return null;
        }
        this.recordTranslation(definition.name, resolved.value, result.chosen);
        return result.chosen;
      }
      case 'number': {
        const value = typeof resolved.value === 'number' ? resolved.value : parseFloat(resolved.value);
        return Number.isFinite(value) ? value : null;
      }
      case 'text':
      case 'date':
        return String(resolved.value);
    }
  }

  map(issue: MergedIssue, rules: readonly FieldMappingRule[]): TargetPayload {
    const { schema, targetOrg } = this.options;
    const fields: Record<string, ScalarValue> = {};
    const sections: TextSection[] = [];
    const relations: Relation[] = [];
    let textRequested = false;
    let position: number | undefined;

    for (const rule of rules) {
      const destination = rule.destination;
      if (!destination) continue;

      if (destination === TEXT_DESTINATION || (destination === LINKED_PRS_DESTINATION && rule.source === 'LinkedPR')) {
        textRequested = true;
        if (isRelationField(rule.source)) {
          relations.push(...(issue.relations[rule.source]?.relations ?? []));
        } else {
          const resolved = issue.fields[rule.source];
          if (resolved) sections.push({ title: rule.source, lines: [`- ${resolved.value}`] });
        }
        continue;
      }

      if (destination === POSITION_DESTINATION) {
        const resolved = issue.fields[rule.source];
        if (resolved && typeof resolved.value === 'number') position = resolved.value;
        continue;
      }

      if (isRelationField(rule.source)) {
        this.reportOnce(
          `relation:${rule.source}:${destination}`,
          new ConfigurationError(`${rule.source} can only be mapped to ${TEXT_DESTINATION}, not "${destination}"`)
        );
        continue;
      }

      // first rule yielding a value wins the destination
      if (Object.prototype.hasOwnProperty.call(fields, destination)) continue;

      const definition = Object.prototype.hasOwnProperty.call(schema, destination) ? schema[destination] : undefined;
      if (!definition) {
        this.reportOnce(
          `missing:${destination}`,
          new ConfigurationError(`Field "${destination}" does not exist in the target project`)
        );
        continue;
      }

      const resolved = issue.fields[rule.source];
      if (!resolved) continue;

      const value = this.translate(resolved, definition, rule);
      if (value !== null) {
        fields[destination] = value;
      }
    }

    const payload: TargetPayload = {
      key: issue.key,
      ref: issue.ref,
      title: issue.title,
      isPullRequest: issue.isPullRequest,
      fields,
    };
    if (position !== undefined) {
      payload.position = position;
    }

    const fixes = issue.relations.LinkedPR?.relations ?? [];
    if (issue.isPullRequest && fixes.some((relation) => relation.from === issue.key)) {
      payload.offBoard = true;
    }

    if (textRequested) {
      const encoded = encode(issue.key, relations, { targetOrg, sections });
      if (issue.ref.owner === targetOrg) {
        if (!payload.offBoard) payload.bodyBlock = encoded.checklistBlock;
        if (issue.isPullRequest) {
          payload.prLinkDirectives = encoded.prLinkDirectives;
        }
      } else if (encoded.checklistBlock || encoded.prLinkDirectives.length > 0) {
        this.notices.push({
          kind: 'different-org',
          key: issue.key,
          message: `${issue.key} is outside ${targetOrg}; body not updated`,
        });
      }
    }

    return payload;
  }

  mapAll(issues: readonly MergedIssue[], rules: readonly FieldMappingRule[]): TargetPayload[] {
    return issues.map((issue) => this.map(issue, rules));
  }
}
