/**
 * Diffs mapped payloads against the target project and applies the result
 */

import { pMap } from './concurrency';
import { errorMessage } from './errors';
import { compareIssueKeys } from './issue-key';
import {
  DEPENDENCIES_HEADING,
  LINKED_ISSUES_HEADING,
  extractBlock,
  renderDirectiveBlock,
  spliceBlock,
} from './relation-encoder';
import { RetryOptions, withRetry } from './retry';
import {
  Action,
  ApplyReport,
  BodyDiff,
  ContentState,
  CreateAction,
  FieldDiff,
  IssueKey,
  ItemChange,
  Notice,
  PositionChange,
  RemoveAction,
  ScalarValue,
  TargetAdapter,
  TargetItem,
  TargetPayload,
  UpdateAction,
} from './types';

/** Board columns are the values of this field */
export const STATUS_FIELD = 'Status';

export interface ReconcileOptions {
  removeEnabled: boolean;
  statusField?: string;
  /** Keys left out of this pass; their items are neither changed nor removed */
  skip?: readonly IssueKey[];
  /** Content of off-board pull requests that aren't in the project */
  contents?: ReadonlyMap<IssueKey, ContentState>;
}

export interface ReconcileResult {
  actions: Action[];
  notices: Notice[];
}

function sameValue(current: ScalarValue | null | undefined, wanted: ScalarValue): boolean {
  if (current === null || current === undefined) return false;
  if (typeof current === 'number' || typeof wanted === 'number') {
    return Number(current) === Number(wanted);
  }
  return current === wanted;
}

export function diffFields(current: TargetItem['fields'], wanted: TargetPayload['fields']): FieldDiff[] {
  const diffs: FieldDiff[] = [];
  for (const [field, value] of Object.entries(wanted)) {
    const existing = current[field];
    if (!sameValue(existing, value)) {
      diffs.push({ field, from: existing ?? null, to: value });
    }
  }
  return diffs;
}

function diffBody(item: TargetItem, payload: TargetPayload): BodyDiff | undefined {
  if (payload.bodyBlock === undefined) return undefined;
  const to = spliceBlock(item.body, DEPENDENCIES_HEADING, payload.bodyBlock);
  return to === item.body ? undefined : { from: item.body, to };
}

function directivesChanged(body: string, directives: string[]): boolean {
  return extractBlock(body, LINKED_ISSUES_HEADING) !== renderDirectiveBlock(directives);
}

function archivedNotice(key: IssueKey, title: string): Notice {
  return { kind: 'archived', key, message: `'${key}':'${title}' - body not updated - archived repository` };
}

function columnOf(payload: TargetPayload, item: TargetItem | undefined, statusField: string): string {
  const wanted = payload.fields[statusField];
  if (wanted !== undefined) return String(wanted);
  const current = item?.fields[statusField];
  return current === null || current === undefined ? '' : String(current);
}

function boardOrder(a: TargetPayload, b: TargetPayload): number {
  const left = a.position ?? Number.POSITIVE_INFINITY;
  const right = b.position ?? Number.POSITIVE_INFINITY;
  if (left !== right) return left < right ? -1 : 1;
  return compareIssueKeys(a.key, b.key);
}

/**
 * Moves needed so each column reads in payload order. The column is simulated
 * as moves are chosen, so a single pass converges.
 */
export function planMoves(
  payloads: TargetPayload[],
  items: Map<IssueKey, TargetItem>,
  statusField: string = STATUS_FIELD
): Map<IssueKey, PositionChange> {
  const columns = new Map<string, TargetPayload[]>();
  for (const payload of payloads) {
    if (payload.position === undefined) continue;
    const column = columnOf(payload, items.get(payload.key), statusField);
    columns.set(column, [...(columns.get(column) ?? []), payload]);
  }

  const moves = new Map<IssueKey, PositionChange>();
  for (const [column, members] of columns) {
    const desired = members.sort(boardOrder).map((payload) => payload.key);
    const wanted = new Set(desired);
    const simulated = desired
      .flatMap((key) => {
        const item = items.get(key);
        if (!item) return [];
        const status = item.fields[statusField];
        const current = status === null || status === undefined ? '' : String(status);
        return current === column ? [item] : [];
      })
      .sort((a, b) => a.position - b.position)
      .map((item) => item.key)
      .filter((key): key is IssueKey => key !== null && wanted.has(key));

    desired.forEach((key, index) => {
      const after = index === 0 ? null : desired[index - 1];
      const at = simulated.indexOf(key);
      const actual = at < 0 ? undefined : at === 0 ? null : simulated[at - 1];
      if (actual === after) return;

      moves.set(key, { after });
      if (at >= 0) simulated.splice(at, 1);
      const insertAt = after === null ? 0 : simulated.indexOf(after) + 1;
      simulated.splice(insertAt, 0, key);
    });
  }
  return moves;
}

/**
 * Compute create/update/remove actions. Output order is deterministic: creates and
 * updates in board order (column, rank, key), then off-board pull request links
 * and removes, each by key.
 */
export function reconcile(payloads: TargetPayload[], currentItems: TargetItem[], options: ReconcileOptions): ReconcileResult {
  const statusField = options.statusField ?? STATUS_FIELD;
  const notices: Notice[] = [];

  const items = new Map<IssueKey, TargetItem>();
  for (const item of currentItems) {
    if (item.key === null) {
      notices.push({ kind: 'draft', message: `'${item.title}' - NOT REMOVED - draft issue` });
      continue;
    }
    if (!items.has(item.key)) items.set(item.key, item);
  }

  const onBoard = payloads.filter((payload) => !payload.offBoard);
  const ordered = [...onBoard].sort((a, b) => {
    const left = columnOf(a, items.get(a.key), statusField);
    const right = columnOf(b, items.get(b.key), statusField);
    if (left !== right) return left < right ? -1 : 1;
    return boardOrder(a, b);
  });

  const moves = planMoves(ordered, items, statusField);
  const actions: Action[] = [];

  for (const payload of ordered) {
    const item = items.get(payload.key);
    const position = moves.get(payload.key);

    if (!item) {
      const create: CreateAction = { type: 'create', key: payload.key, title: payload.title, payload };
      if (position) create.position = position;
      actions.push(create);
      continue;
    }

    const update: UpdateAction = {
      type: 'update',
      key: payload.key,
      title: payload.title,
      fields: diffFields(item.fields, payload.fields),
    };
    const body = diffBody(item, payload);
    const relink = payload.prLinkDirectives !== undefined && directivesChanged(item.body, payload.prLinkDirectives);
    if (item.archived) {
      if (body || relink) notices.push(archivedNotice(payload.key, payload.title));
    } else {
      if (body) update.body = body;
      if (relink) update.prLinkDirectives = payload.prLinkDirectives;
    }
    if (position) update.position = position;

    if (update.fields.length > 0 || update.body || update.position || update.prLinkDirectives) {
      actions.push(update);
    }
  }

  // linked pull requests keep their place (or absence) on the board; only the fixes block is written
  const linked = payloads
    .filter((payload) => payload.offBoard && payload.prLinkDirectives !== undefined)
    .sort((a, b) => compareIssueKeys(a.key, b.key));
  for (const payload of linked) {
    const content = items.get(payload.key) ?? options.contents?.get(payload.key);
    const directives = payload.prLinkDirectives;
    if (!content || directives === undefined || !directivesChanged(content.body, directives)) continue;
    if (content.archived) {
      notices.push(archivedNotice(payload.key, payload.title));
      continue;
    }
    actions.push({ type: 'update', key: payload.key, title: payload.title, fields: [], prLinkDirectives: directives });
  }

  const wanted = new Set([...payloads.map((payload) => payload.key), ...(options.skip ?? [])]);
  const orphans = Array.from(items.values())
    .filter((item): item is TargetItem & { key: IssueKey } => item.key !== null && !wanted.has(item.key))
    .sort((a, b) => compareIssueKeys(a.key, b.key));

  for (const item of orphans) {
    if (options.removeEnabled) {
      const remove: RemoveAction = { type: 'remove', key: item.key, title: item.title };
      actions.push(remove);
    } else {
      notices.push({
        kind: 'orphaned',
        key: item.key,
        message: `'${item.key}':'${item.title}' - NOT REMOVED - removal disabled`,
      });
    }
  }

  return { actions, notices };
}

export interface ApplyOptions {
  concurrency?: number;
  retry?: RetryOptions;
}

/**
 * Apply actions: creates and updates first (each key's steps in sequence, keys
 * concurrently), then position moves in board order, then removes.
 * A failed step is recorded and never stops unrelated actions.
 */
export async function apply(actions: Action[], target: TargetAdapter, options: ApplyOptions = {}): Promise<ApplyReport> {
  const concurrency = options.concurrency ?? 4;
  const report: ApplyReport = {
    created: [],
    updated: [],
    moved: [],
    removed: [],
    linkedPRs: [],
    failed: [],
    notices: [],
  };
  const broken = new Set<IssueKey>();

  const run = async <T>(action: Action, step: string, fn: () => Promise<T>): Promise<{ ok: true; value: T } | { ok: false }> => {
    let attempts = 0;
    try {
      const value = await withRetry(
        () => {
          attempts++;
          return fn();
        },
        `${step} ${action.key}`,
        options.retry
      );
      return { ok: true, value };
    } catch (error) {
      broken.add(action.key);
      report.failed.push({ action, step, error: errorMessage(error), attempts });
      return { ok: false };
    }
  };

  const linkPR = async (action: Action, directives: string[] | undefined): Promise<void> => {
    if (directives === undefined) return;
    const result = await run(action, 'link', () => target.updatePRBody(action.key, directives));
    if (result.ok && result.value) report.linkedPRs.push(action.key);
  };

  const upserts = actions.filter((action): action is CreateAction | UpdateAction => action.type !== 'remove');

  await pMap(
    upserts,
    async (action) => {
      if (action.type === 'create') {
        const created = await run(action, 'create', () => target.createItem(action.payload));
        if (!created.ok) return;
        report.created.push(action.key);

        const item = created.value;
        const change: ItemChange = {};
        const fields = diffFields(item.fields, action.payload.fields);
        if (fields.length > 0) change.fields = fields;
        const body = diffBody(item, action.payload);
        const relink =
          action.payload.prLinkDirectives !== undefined && directivesChanged(item.body, action.payload.prLinkDirectives);
        if (item.archived && (body || relink)) {
          report.notices.push(archivedNotice(action.key, action.title));
        } else if (body) {
          change.body = body.to;
        }
        if (change.fields || change.body !== undefined) {
          const updated = await run(action, 'update', () => target.updateItem(action.key, change));
          if (!updated.ok) return;
        }
        if (!item.archived) {
          await linkPR(action, action.payload.prLinkDirectives);
        }
        return;
      }

      if (action.fields.length > 0 || action.body) {
        const change: ItemChange = {};
        if (action.fields.length > 0) change.fields = action.fields;
        if (action.body) change.body = action.body.to;
        const updated = await run(action, 'update', () => target.updateItem(action.key, change));
        if (!updated.ok) return;
        report.updated.push(action.key);
      }
      await linkPR(action, action.prLinkDirectives);
    },
    concurrency
  );

  // placement may depend on other items existing, so it goes last and in order
  for (const action of upserts) {
    const position = action.position;
    if (!position || broken.has(action.key)) continue;
    const moved = await run(action, 'move', () => target.updateItem(action.key, { position }));
    if (moved.ok) report.moved.push(action.key);
  }

  const removes = actions.filter((action): action is RemoveAction => action.type === 'remove');
  await pMap(
    removes,
    async (action) => {
      const removed = await run(action, 'remove', () => target.removeItem(action.key));
      if (removed.ok) report.removed.push(action.key);
    },
    concurrency
  );

  return report;
}
