/**
 * GitHub Projects (v2) client wrapper using Octokit
 */

import { Octokit } from '@octokit/rest';
import { ConfigurationError } from './errors';
import { formatIssueKey, parseIssueRef } from './issue-key';
import { LINKED_ISSUES_HEADING, renderDirectiveBlock, spliceBlock } from './relation-encoder';
import { withRetry } from './retry';
import {
  ContentState,
  FieldDefinition,
  FieldDiff,
  FieldSchema,
  FieldType,
  IssueKey,
  IssueRef,
  ItemChange,
  ScalarValue,
  TargetAdapter,
  TargetItem,
  TargetPayload,
} from './types';

export type GraphQLFunction = <T>(query: string, variables?: Record<string, unknown>) => Promise<T>;

export type ProjectOwnerType = 'organization' | 'user';

export interface ProjectLocator {
  ownerType: ProjectOwnerType;
  owner: string;
  number: number;
}

/**
 * Parse `https://github.com/orgs/ORG/projects/N` (or `/users/NAME/...`), with or without a view suffix
 */
export function parseProjectUrl(url: string): ProjectLocator {
  const match = url.trim().match(/^(?:https?:\/\/)?github\.com\/(orgs|users)\/([^/]+)\/projects\/(\d+)(?:\/.*)?$/);
  if (!match) {
    throw new ConfigurationError(`Invalid project URL: ${url}. Expected "https://github.com/orgs/ORG/projects/N"`);
  }
  return {
    ownerType: match[1] === 'orgs' ? 'organization' : 'user',
    owner: match[2],
    number: parseInt(match[3], 10),
  };
}

interface FieldNode {
  __typename?: string;
  id?: string;
  name?: string;
  dataType?: string;
  options?: Array<{ id: string; name: string }>;
  configuration?: {
    iterations: Array<{ id: string; title: string }>;
    completedIterations: Array<{ id: string; title: string }>;
  };
}

interface ProjectNode {
  id: string;
  title: string;
  fields: { nodes: FieldNode[] };
}

type ProjectOwnerData = Partial<Record<ProjectOwnerType, { projectV2: ProjectNode | null } | null>>;

interface RepositoryNode {
  name: string;
  isArchived?: boolean;
  owner: { login: string };
}

interface ContentNode {
  __typename: 'Issue' | 'PullRequest' | 'DraftIssue';
  id: string;
  number?: number;
  title: string;
  body: string;
  repository?: RepositoryNode;
}

interface FieldValueNode {
  __typename?: string;
  text?: string;
  number?: number;
  date?: string;
  name?: string;
  title?: string;
  field?: { name?: string };
}

interface ItemNode {
  id: string;
  content: ContentNode | null;
  fieldValues: { nodes: FieldValueNode[] };
}

interface ItemsPage {
  node: {
    items: {
      pageInfo: { hasNextPage: boolean; endCursor: string | null };
      nodes: ItemNode[];
    };
  };
}

interface ResolvedField {
  id: string;
  definition: FieldDefinition;
  optionIds: Map<string, string>;
}

interface TrackedItem {
  itemId: string;
  contentId: string;
  contentType: TargetItem['contentType'];
  body: string;
}

const FIELD_TYPES: Record<string, FieldType> = {
  TEXT: 'text',
  NUMBER: 'number',
  DATE: 'date',
  SINGLE_SELECT: 'single_select',
  ITERATION: 'iteration',
};

const CONTENT_FIELDS = `
  __typename
  ... on Issue { id number title body repository { name isArchived owner { login } } }
  ... on PullRequest { id number title body repository { name isArchived owner { login } } }
  ... on DraftIssue { id title body }
`;

function projectQuery(ownerType: ProjectOwnerType): string {
  return `
    query Project($owner: String!, $number: Int!) {
      ${ownerType}(login: $owner) {
        projectV2(number: $number) {
          id
          title
          fields(first: 50) {
            nodes {
              __typename
              ... on ProjectV2FieldCommon { id name dataType }
              ... on ProjectV2SingleSelectField { options { id name } }
              ... on ProjectV2IterationField {
                configuration {
                  iterations { id title }
                  completedIterations { id title }
                }
              }
            }
          }
        }
      }
    }
  `;
}

const ITEMS_QUERY = `
  query ProjectItems($projectId: ID!, $cursor: String) {
    node(id: $projectId) {
      ... on ProjectV2 {
        items(first: 100, after: $cursor) {
          pageInfo { hasNextPage endCursor }
          nodes {
            id
            content { ${CONTENT_FIELDS} }
            fieldValues(first: 30) {
              nodes {
                __typename
                ... on ProjectV2ItemFieldTextValue { text field { ... on ProjectV2FieldCommon { name } } }
                ... on ProjectV2ItemFieldNumberValue { number field { ... on ProjectV2FieldCommon { name } } }
                ... on ProjectV2ItemFieldDateValue { date field { ... on ProjectV2FieldCommon { name } } }
                ... on ProjectV2ItemFieldSingleSelectValue { name field { ... on ProjectV2FieldCommon { name } } }
                ... on ProjectV2ItemFieldIterationValue { title field { ... on ProjectV2FieldCommon { name } } }
              }
            }
          }
        }
      }
    }
  }
`;

const CONTENT_QUERY = `
  query Content($owner: String!, $repo: String!, $number: Int!) {
    repository(owner: $owner, name: $repo) {
      issueOrPullRequest(number: $number) { ${CONTENT_FIELDS} }
    }
  }
`;

const ADD_ITEM_MUTATION = `
  mutation AddItem($projectId: ID!, $contentId: ID!) {
    addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) { item { id } }
  }
`;

const SET_FIELD_MUTATION = `
  mutation SetField($projectId: ID!, $itemId: ID!, $fieldId: ID!, $value: ProjectV2FieldValue!) {
    updateProjectV2ItemFieldValue(
      input: { projectId: $projectId, itemId: $itemId, fieldId: $fieldId, value: $value }
    ) { projectV2Item { id } }
  }
`;

const CLEAR_FIELD_MUTATION = `
  mutation ClearField($projectId: ID!, $itemId: ID!, $fieldId: ID!) {
    clearProjectV2ItemFieldValue(input: { projectId: $projectId, itemId: $itemId, fieldId: $fieldId }) {
      projectV2Item { id }
    }
  }
`;

const MOVE_ITEM_MUTATION = `
  mutation MoveItem($projectId: ID!, $itemId: ID!, $afterId: ID) {
    updateProjectV2ItemPosition(input: { projectId: $projectId, itemId: $itemId, afterId: $afterId }) {
      clientMutationId
    }
  }
`;

const DELETE_ITEM_MUTATION = `
  mutation DeleteItem($projectId: ID!, $itemId: ID!) {
    deleteProjectV2Item(input: { projectId: $projectId, itemId: $itemId }) { deletedItemId }
  }
`;

const UPDATE_ISSUE_BODY_MUTATION = `
  mutation UpdateIssueBody($id: ID!, $body: String!) {
    updateIssue(input: { id: $id, body: $body }) { issue { id } }
  }
`;

const UPDATE_PR_BODY_MUTATION = `
  mutation UpdatePullRequestBody($id: ID!, $body: String!) {
    updatePullRequest(input: { pullRequestId: $id, body: $body }) { pullRequest { id } }
  }
`;

function toKey(content: ContentNode | null): IssueKey | null {
  if (!content || content.__typename === 'DraftIssue' || !content.repository || content.number === undefined) {
    return null;
  }
  return formatIssueKey({ owner: content.repository.owner.login, repo: content.repository.name, number: content.number });
}

function fieldValue(node: FieldValueNode): ScalarValue | null {
  if (node.text !== undefined) return node.text;
  if (node.number !== undefined) return node.number;
  if (node.date !== undefined) return node.date;
  if (node.name !== undefined) return node.name;
  if (node.title !== undefined) return node.title;
  return null;
}

export interface GitHubProjectClientOptions {
  /** Per-request timeout */
  timeoutMs?: number;
  /** GraphQL transport; defaults to Octokit's */
  graphql?: GraphQLFunction;
}

export class GitHubProjectClient implements TargetAdapter {
  private graphql: GraphQLFunction;
  private project: Promise<ProjectNode> | null = null;
  private fields = new Map<string, ResolvedField>();
  private items = new Map<IssueKey, TrackedItem>();
  private nextPosition = 0;

  constructor(
    token: string,
    private locator: ProjectLocator,
    options: GitHubProjectClientOptions = {}
  ) {
    const timeoutMs = options.timeoutMs ?? 180_000;
    if (options.graphql) {
      this.graphql = options.graphql;
    } else {
      const octokit = new Octokit({
        auth: token,
        log: {
          debug: () => {},
          info: () => {},
          warn: () => {},
          error: console.error,
        },
      });
      this.graphql = <T>(query: string, variables: Record<string, unknown> = {}) =>
        octokit.graphql<T>(query, { ...variables, request: { signal: AbortSignal.timeout(timeoutMs) } });
    }
  }

  private read<T>(query: string, variables: Record<string, unknown>, label: string): Promise<T> {
    return withRetry(() => this.graphql<T>(query, variables), label);
  }

  /**
   * Load the project once; later calls share the same request
   */
  private loadProject(): Promise<ProjectNode> {
    if (!this.project) {
      this.project = this.read<ProjectOwnerData>(
        projectQuery(this.locator.ownerType),
        { owner: this.locator.owner, number: this.locator.number },
        `Read project ${this.locator.owner}/${this.locator.number}`
      ).then((data) => {
        const project = data[this.locator.ownerType]?.projectV2;
        if (!project) {
          throw new ConfigurationError(`Project ${this.locator.number} not found for ${this.locator.owner}`);
        }
        this.indexFields(project.fields.nodes);
        return project;
      });
    }
    return this.project;
  }

  private indexFields(nodes: FieldNode[]): void {
    for (const node of nodes) {
      if (!node.id || !node.name || !node.dataType) continue;
      const type = FIELD_TYPES[node.dataType];
      if (!type) continue;

      const choices =
        type === 'single_select'
          ? node.options ?? []
          : type === 'iteration' && node.configuration
            ? [...node.configuration.iterations, ...node.configuration.completedIterations].map((it) => ({ id: it.id, name: it.title }))
            : [];

      const definition: FieldDefinition = { name: node.name, type };
      if (type === 'single_select' || type === 'iteration') {
        definition.options = choices.map((choice) => choice.name);
      }
      this.fields.set(node.name, {
        id: node.id,
        definition,
        optionIds: new Map(choices.map((choice) => [choice.name, choice.id])),
      });
    }
  }

  async listFieldSchema(): Promise<FieldSchema> {
    await this.loadProject();
    const schema: FieldSchema = {};
    for (const [name, field] of this.fields) {
      schema[name] = field.definition;
    }
    return schema;
  }

  /**
   * All project items in board order, draft issues included
   */
  async listItems(): Promise<TargetItem[]> {
    const project = await this.loadProject();
    const result: TargetItem[] = [];
    let cursor: string | null = null;

    do {
      const page: ItemsPage = await this.read<ItemsPage>(
        ITEMS_QUERY,
        { projectId: project.id, cursor },
        `Read items of ${project.title}`
      );
      for (const node of page.node.items.nodes) {
        result.push(this.track(node, result.length));
      }
      cursor = page.node.items.pageInfo.hasNextPage ? page.node.items.pageInfo.endCursor : null;
    } while (cursor);

    this.nextPosition = result.length;
    return result;
  }

  private track(node: ItemNode, position: number): TargetItem {
    const key = toKey(node.content);
    const fields: Record<string, ScalarValue | null> = {};
    for (const value of node.fieldValues.nodes) {
      const name = value.field?.name;
      if (name) fields[name] = fieldValue(value);
    }

    const item: TargetItem = {
      itemId: node.id,
      key,
      title: node.content?.title ?? '',
      contentType: node.content?.__typename ?? 'DraftIssue',
      fields,
      body: node.content?.body ?? '',
      position,
    };
    if (node.content?.repository?.isArchived) {
      item.archived = true;
    }
    if (key && node.content) {
      this.items.set(key, { itemId: node.id, contentId: node.content.id, contentType: item.contentType, body: item.body });
    }
    return item;
  }

  private async lookupContent(ref: IssueRef): Promise<ContentNode | null> {
    const data = await this.read<{ repository: { issueOrPullRequest: ContentNode | null } | null }>(
      CONTENT_QUERY,
      { owner: ref.owner, repo: ref.repo, number: ref.number },
      `Read ${formatIssueKey(ref)}`
    );
    return data.repository?.issueOrPullRequest ?? null;
  }

  private async fetchContent(ref: IssueRef): Promise<ContentNode> {
    const content = await this.lookupContent(ref);
    if (!content) {
      throw new Error(`${formatIssueKey(ref)} not found`);
    }
    return content;
  }

  private tracked(key: IssueKey): TrackedItem {
    const item = this.items.get(key);
    if (!item) {
      throw new Error(`${key} is not in the project`);
    }
    return item;
  }

  async createItem(payload: TargetPayload): Promise<TargetItem> {
    const project = await this.loadProject();
    const content = await this.fetchContent(payload.ref);
    const data = await this.graphql<{ addProjectV2ItemById: { item: { id: string } } }>(ADD_ITEM_MUTATION, {
      projectId: project.id,
      contentId: content.id,
    });

    const item: TargetItem = {
      itemId: data.addProjectV2ItemById.item.id,
      key: payload.key,
      title: content.title,
      contentType: content.__typename,
      fields: {},
      body: content.body,
      position: this.nextPosition++,
    };
    if (content.repository?.isArchived) {
      item.archived = true;
    }
    this.items.set(payload.key, { itemId: item.itemId, contentId: content.id, contentType: content.__typename, body: content.body });
    return item;
  }

  async updateItem(key: IssueKey, change: ItemChange): Promise<void> {
    const project = await this.loadProject();
    const item = this.tracked(key);

    for (const diff of change.fields ?? []) {
      await this.setField(project.id, item.itemId, diff);
    }

    if (change.body !== undefined) {
      await this.setBody(item, change.body);
    }

    if (change.position) {
      const after = change.position.after === null ? null : this.tracked(change.position.after).itemId;
      await this.graphql(MOVE_ITEM_MUTATION, { projectId: project.id, itemId: item.itemId, afterId: after });
    }
  }

  private async setField(projectId: string, itemId: string, diff: FieldDiff): Promise<void> {
    const field = this.fields.get(diff.field);
    if (!field) {
      throw new ConfigurationError(`Field "${diff.field}" does not exist in the target project`);
    }

    if (diff.to === null) {
      await this.graphql(CLEAR_FIELD_MUTATION, { projectId, itemId, fieldId: field.id });
      return;
    }

    let value: Record<string, ScalarValue>;
    switch (field.definition.type) {
      case 'text':
        value = { text: String(diff.to) };
        break;
      case 'number':
        value = { number: Number(diff.to) };
        break;
      case 'date':
        value = { date: String(diff.to) };
        break;
      case 'single_select':
      case 'iteration': {
        const optionId = field.optionIds.get(String(diff.to));
        if (!optionId) {
          throw new ConfigurationError(`"${diff.to}" is not an option of field "${diff.field}"`);
        }
        value = field.definition.type === 'single_select' ? { singleSelectOptionId: optionId } : { iterationId: optionId };
        break;
      }
    }

    await this.graphql(SET_FIELD_MUTATION, { projectId, itemId, fieldId: field.id, value });
  }

  private async setBody(item: TrackedItem, body: string): Promise<void> {
    const mutation = item.contentType === 'PullRequest' ? UPDATE_PR_BODY_MUTATION : UPDATE_ISSUE_BODY_MUTATION;
    await this.graphql(mutation, { id: item.contentId, body });
    item.body = body;
  }

  async removeItem(key: IssueKey): Promise<void> {
    const project = await this.loadProject();
    const item = this.tracked(key);
    await this.graphql(DELETE_ITEM_MUTATION, { projectId: project.id, itemId: item.itemId });
    this.items.delete(key);
  }

  async readContent(key: IssueKey): Promise<ContentState | null> {
    const ref = parseIssueRef(key);
    if (!ref) {
      throw new Error(`Invalid issue reference: ${key}`);
    }
    const content = await this.lookupContent(ref);
    if (!content) {
      return null;
    }
    return { body: content.body, archived: content.repository?.isArchived ?? false };
  }

  /**
   * Rewrite the "Linked issues" block of a pull request body from a fresh read,
   * so edits made since listing are kept.
   */
  async updatePRBody(prKey: IssueKey, directives: string[]): Promise<boolean> {
    const ref = parseIssueRef(prKey);
    if (!ref) {
      throw new Error(`Invalid pull request reference: ${prKey}`);
    }
    const content = await this.fetchContent(ref);
    if (content.__typename !== 'PullRequest') {
      throw new Error(`${prKey} is not a pull request`);
    }

    const body = spliceBlock(content.body, LINKED_ISSUES_HEADING, renderDirectiveBlock(directives));
    if (body === content.body) {
      return false;
    }

    await this.graphql(UPDATE_PR_BODY_MUTATION, { id: content.id, body });
    const item = this.items.get(prKey);
    if (item) item.body = body;
    return true;
  }
}
