/**
 * Core merge engine: read every workspace, merge by priority, map onto the
 * project's fields and reconcile the project with the result
 */

import chalk from 'chalk';
import { pMap } from './concurrency';
import { FieldMapper, buildRules } from './field-mapper';
import { apply, reconcile } from './reconciler';
import { RetryOptions, withRetry } from './retry';
import { normalize } from './sources/normalizer';
import { SourceRegistry } from './sources/registry';
import { SourceAdapter } from './sources/types';
import { ExclusionRule, merge } from './workspace-merger';
import {
  Action,
  CanonicalField,
  ContentState,
  IssueKey,
  Notice,
  SourceRecord,
  SyncPlan,
  SyncResult,
  TargetAdapter,
  TargetItem,
  TargetPayload,
} from './types';

/** Ordinal fields whose source scale is worth asking for */
const SCALE_FIELDS: readonly CanonicalField[] = ['Estimate', 'Priority', 'Pipeline', 'Sprint'];

export interface ReviewOutcome {
  actions: Action[];
  skipped: IssueKey[];
}

export interface SyncEngineOptions {
  /** Organization whose issues may have their bodies edited */
  targetOrg: string;
  /** `SRC:DST[:STRATEGY]` rules layered over the default mapping */
  mapping?: string[];
  exclusions?: ExclusionRule[];
  removeEnabled?: boolean;
  concurrency?: number;
  retry?: RetryOptions;
  /** Confirms removals and body rewrites before they are applied */
  review?: (actions: Action[]) => Promise<ReviewOutcome>;
  quiet?: boolean;
}

export class SyncEngine {
  private registry: SourceRegistry;
  private target: TargetAdapter;
  private options: SyncEngineOptions;

  constructor(registry: SourceRegistry, target: TargetAdapter, options: SyncEngineOptions) {
    this.registry = registry;
    this.target = target;
    this.options = options;
  }

  private log(message: string): void {
    if (!this.options.quiet) {
      console.log(message);
    }
  }

  /**
   * Read one source; its rank is its position in the registry
   */
  private async readSource(source: SourceAdapter): Promise<{ records: SourceRecord[]; notices: Notice[] }> {
    const items = await withRetry(() => source.fetchWorkspace(), `Read ${source.sourceId}`, this.options.retry);

    const scales: Partial<Record<CanonicalField, string[]>> = {};
    for (const field of SCALE_FIELDS) {
      const labels = await source.listOrderedScaleLabels(field);
      if (labels && labels.length > 0) {
        scales[field] = labels;
      }
    }

    this.log(chalk.gray(`Found ${items.length} items in ${source.sourceId}`));
    return normalize(source.sourceId, items, { rank: this.registry.rankOf(source.sourceId), scales });
  }

  /**
   * Bodies of linked pull requests that are kept off the board
   */
  private async readLinkedContent(
    payloads: TargetPayload[],
    items: TargetItem[],
    concurrency: number
  ): Promise<Map<IssueKey, ContentState>> {
    const onBoard = new Set(items.map((item) => item.key));
    const wanted = payloads.filter(
      (payload) => payload.offBoard && payload.prLinkDirectives !== undefined && !onBoard.has(payload.key)
    );

    const contents = new Map<IssueKey, ContentState>();
    await pMap(
      wanted,
      async (payload) => {
        const content = await this.target.readContent(payload.key);
        if (content) contents.set(payload.key, content);
      },
      concurrency
    );
    return contents;
  }

  /**
   * Compute the actions that would bring the project in line with the workspaces.
   * Nothing is written.
   */
  async plan(): Promise<SyncPlan> {
    // bad rules abort before anything is read
    const rules = buildRules(this.options.mapping);
    const sources = this.registry.getAll();
    if (sources.length === 0) {
      throw new Error('No workspaces to read');
    }

    const concurrency = this.options.concurrency ?? 4;
    const read = await pMap(sources, (source) => this.readSource(source), concurrency);
    const merged = merge(
      read.map((source) => source.records),
      this.options.exclusions ?? []
    );
    this.log(chalk.gray(`Merged into ${merged.issues.length} issues`));

    const [schema, items] = await Promise.all([this.target.listFieldSchema(), this.target.listItems()]);
    this.log(chalk.gray(`Found ${items.length} items in the project`));

    const mapper = new FieldMapper({ targetOrg: this.options.targetOrg, schema });
    const payloads = mapper.mapAll(merged.issues, rules);
    const contents = await this.readLinkedContent(payloads, items, concurrency);
    const reconciled = reconcile(payloads, items, {
      removeEnabled: this.options.removeEnabled ?? false,
      skip: merged.skipped,
      contents,
    });

    return {
      payloads,
      actions: reconciled.actions,
      notices: [...read.flatMap((source) => source.notices), ...merged.notices, ...mapper.drainNotices(), ...reconciled.notices],
      translations: mapper.translations,
    };
  }

  /**
   * Plan, optionally review, then apply
   */
  async sync(): Promise<SyncResult> {
    const plan = await this.plan();

    let actions = plan.actions;
    let skipped: IssueKey[] = [];
    if (this.options.review) {
      const outcome = await this.options.review(actions);
      actions = outcome.actions;
      skipped = outcome.skipped;
    }

    const report = await apply(actions, this.target, {
      concurrency: this.options.concurrency,
      retry: this.options.retry,
    });

    return { ...report, plan, skipped };
  }
}
