/**
 * Shared types for the workspace merge pipeline
 */

/** Canonical `owner/repo#number` string */
export type IssueKey = string;

export interface IssueRef {
  owner: string;
  repo: string;
  number: number;
}

export type CanonicalField =
  | 'Estimate'
  | 'Priority'
  | 'Pipeline'
  | 'Epic'
  | 'Blocking'
  | 'LinkedPR'
  | 'Sprint'
  | 'Position'
  | 'Workspace';

export type RelationField = 'Epic' | 'Blocking' | 'LinkedPR';

export type ScalarValue = string | number;

export type RelationKind = 'Epic' | 'Blocks' | 'LinkedPR';

/**
 * Directed edge between two issues.
 * Epic: from = epic, to = child. Blocks: from = blocker, to = blocked.
 * LinkedPR: from = pull request, to = the issue it fixes.
 */
export interface Relation {
  kind: RelationKind;
  from: IssueKey;
  to: IssueKey;
}

export interface SourceRecord {
  key: IssueKey;
  ref: IssueRef;
  sourceId: string;
  rank: number;
  updatedAt: string | null;
  title: string;
  isPullRequest: boolean;
  contentId?: string;
  fields: Partial<Record<CanonicalField, ScalarValue>>;
  relations: Partial<Record<RelationField, IssueKey[]>>;
  scales: Partial<Record<CanonicalField, string[]>>;
}

export interface ResolvedField {
  value: ScalarValue;
  sourceId: string;
  scale?: string[];
}

export interface ResolvedRelations {
  field: RelationField;
  sourceId: string;
  relations: Relation[];
}

export interface MergedIssue {
  key: IssueKey;
  ref: IssueRef;
  title: string;
  isPullRequest: boolean;
  contentId?: string;
  /** Contributing records, highest priority first */
  records: SourceRecord[];
  fields: Partial<Record<CanonicalField, ResolvedField>>;
  relations: Partial<Record<RelationField, ResolvedRelations>>;
}

export type MatchStrategy = 'exact' | 'closest' | 'scale';

export interface FieldMappingRule {
  source: CanonicalField;
  /** Destination field name; `Text` is the issue body, `Position` the board placement, null disables */
  destination: string | null;
  strategy: MatchStrategy;
}

export type FieldType = 'text' | 'number' | 'date' | 'single_select' | 'iteration';

export interface FieldDefinition {
  name: string;
  type: FieldType;
  /** Option names (single select) or iteration titles, in board order */
  options?: string[];
}

export type FieldSchema = Record<string, FieldDefinition>;

export interface TargetPayload {
  key: IssueKey;
  ref: IssueRef;
  title: string;
  isPullRequest: boolean;
  fields: Record<string, ScalarValue>;
  /** Regenerated dependency block; undefined leaves the body alone */
  bodyBlock?: string;
  prLinkDirectives?: string[];
  /** Rank within the source column, present when Position is mapped */
  position?: number;
  /** A pull request linked to an issue: it only gets its fixes block and stays off the board */
  offBoard?: boolean;
}

export interface TargetItem {
  itemId: string;
  key: IssueKey | null;
  title: string;
  contentType: 'Issue' | 'PullRequest' | 'DraftIssue';
  fields: Record<string, ScalarValue | null>;
  body: string;
  /** Ordinal of the item in the project's position order */
  position: number;
  /** The content lives in an archived repository and its body can't be written */
  archived?: boolean;
}

/** Issue or pull request content read outside the project */
export interface ContentState {
  body: string;
  archived: boolean;
}

export interface FieldDiff {
  field: string;
  from: ScalarValue | null;
  to: ScalarValue | null;
}

export interface BodyDiff {
  from: string;
  to: string;
}

/** `after: null` puts the item at the top of its column */
export interface PositionChange {
  after: IssueKey | null;
}

export interface CreateAction {
  type: 'create';
  key: IssueKey;
  title: string;
  payload: TargetPayload;
  position?: PositionChange;
}

export interface UpdateAction {
  type: 'update';
  key: IssueKey;
  title: string;
  fields: FieldDiff[];
  body?: BodyDiff;
  position?: PositionChange;
  prLinkDirectives?: string[];
}

export interface RemoveAction {
  type: 'remove';
  key: IssueKey;
  title: string;
}

export type Action = CreateAction | UpdateAction | RemoveAction;

export interface ItemChange {
  fields?: FieldDiff[];
  /** Full replacement body */
  body?: string;
  position?: PositionChange;
}

/**
 * The single project that receives merged data
 */
export interface TargetAdapter {
  listItems(): Promise<TargetItem[]>;
  listFieldSchema(): Promise<FieldSchema>;
  /** Add the issue or pull request to the project */
  createItem(payload: TargetPayload): Promise<TargetItem>;
  updateItem(key: IssueKey, change: ItemChange): Promise<void>;
  removeItem(key: IssueKey): Promise<void>;
  /** Regenerate the "fixes" block in a pull request body; false when already current */
  updatePRBody(prKey: IssueKey, directives: string[]): Promise<boolean>;
  /** Body and archive state of content that may not be on the board; null when it doesn't exist */
  readContent(key: IssueKey): Promise<ContentState | null>;
}

export type NoticeKind =
  | 'orphaned'
  | 'draft'
  | 'identity-conflict'
  | 'duplicate'
  | 'excluded'
  | 'different-org'
  | 'archived'
  | 'configuration';

export interface Notice {
  kind: NoticeKind;
  key?: IssueKey;
  message: string;
}

export interface FailedAction {
  action: Action;
  step: string;
  error: string;
  attempts: number;
}

export interface ApplyReport {
  created: IssueKey[];
  updated: IssueKey[];
  moved: IssueKey[];
  removed: IssueKey[];
  linkedPRs: IssueKey[];
  failed: FailedAction[];
  notices: Notice[];
}

export interface SyncPlan {
  payloads: TargetPayload[];
  actions: Action[];
  notices: Notice[];
  /** destination field → "source value → option" → count */
  translations: Record<string, Record<string, number>>;
}

export interface SyncResult extends ApplyReport {
  plan: SyncPlan;
  skipped: IssueKey[];
}
