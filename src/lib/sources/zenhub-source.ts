/**
 * ZenHub workspace source using the public GraphQL API
 */

import { GraphQLClient, gql } from 'graphql-request';
import { ConfigurationError } from '../errors';
import { matchClosest } from '../option-matcher';
import { withRetry } from '../retry';
import { CanonicalField } from '../types';
import { RawItem, SourceAdapter } from './types';

export const ZENHUB_ENDPOINT = 'https://api.zenhub.com/public/graphql';

/** ZenHub's fixed priority levels, lowest first */
export const ZENHUB_PRIORITIES: readonly string[] = ['Normal', 'High Priority'];

export interface GraphQLTransport {
  request<T>(document: string, variables?: Record<string, unknown>): Promise<T>;
}

export function createZenHubTransport(token: string, timeoutMs: number, endpoint: string = ZENHUB_ENDPOINT): GraphQLTransport {
  const client = new GraphQLClient(endpoint, {
    headers: { Authorization: `Bearer ${token}` },
  });
  return {
    request: <T>(document: string, variables: Record<string, unknown> = {}) =>
      client.request<T>({ document, variables, signal: AbortSignal.timeout(timeoutMs) }),
  };
}

export interface ZenHubPipeline {
  id: string;
  name: string;
}

export interface ZenHubWorkspace {
  id: string;
  name: string;
  pipelines: ZenHubPipeline[];
}

interface ZenHubRepository {
  name: string;
  owner: { login: string };
}

interface ZenHubIssueRef {
  id: string;
  number: number;
  htmlUrl?: string;
  repository: ZenHubRepository;
}

interface ZenHubIssue {
  id: string;
  ghId: number | null;
  number: number;
  title: string;
  pullRequest: boolean;
  repository: ZenHubRepository;
  pipelineIssue: { priority: { name: string } | null } | null;
  estimate: { value: number } | null;
  sprints: { nodes: Array<{ name: string }> };
  connections?: { nodes: ZenHubIssueRef[] };
}

const WORKSPACES_QUERY = gql`
  query RecentlyViewedWorkspaces {
    recentlyViewedWorkspaces {
      nodes {
        id
        name
        pipelines {
          id
          name
        }
      }
    }
  }
`;

const ISSUE_FIELDS = `
  id
  ghId
  number
  title
  pullRequest
  repository {
    name
    owner {
      login
    }
  }
  pipelineIssue(workspaceId: $workspaceId) {
    priority {
      name
    }
  }
  estimate {
    value
  }
  sprints(first: 10) {
    nodes {
      name
    }
  }
`;

const PIPELINE_ISSUES_QUERY = gql`
  query PipelineIssues($pipelineId: ID!, $workspaceId: ID!) {
    searchIssuesByPipeline(pipelineId: $pipelineId, filters: { displayType: all }) {
      nodes {
        ${ISSUE_FIELDS}
      }
    }
  }
`;

const PIPELINE_PRS_QUERY = gql`
  query PipelinePullRequests($pipelineId: ID!, $workspaceId: ID!) {
    searchIssuesByPipeline(pipelineId: $pipelineId, filters: { displayType: prs }) {
      nodes {
        ${ISSUE_FIELDS}
        connections(first: 20) {
          nodes {
            id
            number
            repository {
              name
              owner {
                login
              }
            }
          }
        }
      }
    }
  }
`;

const EPICS_QUERY = gql`
  query WorkspaceEpics($workspaceId: ID!) {
    workspace(id: $workspaceId) {
      epics(first: 100) {
        nodes {
          id
          issue {
            id
          }
        }
      }
    }
  }
`;

const EPIC_CHILDREN_QUERY = gql`
  query EpicChildren($epicId: ID!) {
    node(id: $epicId) {
      ... on Epic {
        childIssues {
          nodes {
            id
            number
            htmlUrl
            repository {
              name
              owner {
                login
              }
            }
          }
        }
      }
    }
  }
`;

const DEPENDENCIES_QUERY = gql`
  query WorkspaceDependencies($workspaceId: ID!) {
    workspace(id: $workspaceId) {
      issueDependencies(first: 100) {
        nodes {
          blockedIssue {
            id
          }
          blockingIssue {
            id
            number
            htmlUrl
            repository {
              name
              owner {
                login
              }
            }
          }
        }
      }
    }
  }
`;

function toRef(issue: ZenHubIssueRef): { owner: string; repo: string; number: number } {
  return { owner: issue.repository.owner.login, repo: issue.repository.name, number: issue.number };
}

/**
 * Thin wrapper over the ZenHub API shared by every workspace source
 */
export class ZenHubClient {
  constructor(private transport: GraphQLTransport) {}

  async query<T>(document: string, variables: Record<string, unknown>, label: string): Promise<T> {
    return withRetry(() => this.transport.request<T>(document, variables), label);
  }

  /**
   * Workspaces the token's user viewed recently, most recent first
   */
  async listWorkspaces(): Promise<ZenHubWorkspace[]> {
    const data = await this.query<{ recentlyViewedWorkspaces: { nodes: ZenHubWorkspace[] } }>(
      WORKSPACES_QUERY,
      {},
      'List ZenHub workspaces'
    );
    return data.recentlyViewedWorkspaces.nodes;
  }
}

/**
 * Pick workspaces by name, in the order given; no names means every recently
 * viewed workspace. Names resolve to the closest workspace name, and names
 * matching an exclusion pattern are dropped.
 */
export function selectWorkspaces(
  available: ZenHubWorkspace[],
  names: string[],
  isExcluded: (name: string) => boolean = () => false
): ZenHubWorkspace[] {
  if (available.length === 0) {
    throw new ConfigurationError('No ZenHub workspaces visible to this token');
  }

  const wanted =
    names.length === 0
      ? available
      : names.map((name) => {
          const result = matchClosest(
            name,
            available.map((workspace) => workspace.name)
          );
          const workspace = available.find((candidate) => candidate.name === result.chosen);
          if (!workspace) {
            throw new ConfigurationError(`No ZenHub workspace matches "${name}"`);
          }
          return workspace;
        });

  const seen = new Set<string>();
  return wanted.filter((workspace) => {
    if (seen.has(workspace.id) || isExcluded(workspace.name)) return false;
    seen.add(workspace.id);
    return true;
  });
}

export class ZenHubSource implements SourceAdapter {
  readonly sourceId: string;

  constructor(
    private client: ZenHubClient,
    private workspace: ZenHubWorkspace
  ) {
    this.sourceId = workspace.name;
  }

  async listOrderedScaleLabels(field: CanonicalField): Promise<string[] | null> {
    if (field === 'Pipeline') {
      return this.workspace.pipelines.map((p) => p.name);
    }
    if (field === 'Priority') {
      return [...ZENHUB_PRIORITIES];
    }
    // the estimate scale isn't exposed by the API
    return null;
  }

  async fetchWorkspace(): Promise<RawItem[]> {
    const workspaceId = this.workspace.id;
    const epics = await this.fetchEpics();
    const blockers = await this.fetchBlockers();

    const items: RawItem[] = [];
    for (const pipeline of this.workspace.pipelines) {
      const variables = { pipelineId: pipeline.id, workspaceId };
      const issues = await this.client.query<{ searchIssuesByPipeline: { nodes: ZenHubIssue[] } }>(
        PIPELINE_ISSUES_QUERY,
        variables,
        `Read ${this.workspace.name}/${pipeline.name}`
      );
      const prs = await this.client.query<{ searchIssuesByPipeline: { nodes: ZenHubIssue[] } }>(
        PIPELINE_PRS_QUERY,
        variables,
        `Read PRs in ${this.workspace.name}/${pipeline.name}`
      );

      // PR results carry the connections; prefer them over the plain listing
      const byId = new Map<string, ZenHubIssue>();
      for (const issue of issues.searchIssuesByPipeline.nodes) byId.set(issue.id, issue);
      for (const pr of prs.searchIssuesByPipeline.nodes) byId.set(pr.id, pr);

      let position = 0;
      for (const issue of byId.values()) {
        items.push(this.toRawItem(issue, pipeline, position++, epics, blockers));
      }
    }

    return items;
  }

  private toRawItem(
    issue: ZenHubIssue,
    pipeline: ZenHubPipeline,
    position: number,
    epics: Map<string, string[]>,
    blockers: Map<string, string[]>
  ): RawItem {
    const sprints = issue.sprints.nodes;
    return {
      owner: issue.repository.owner.login,
      repo: issue.repository.name,
      number: issue.number,
      title: issue.title,
      isPullRequest: issue.pullRequest,
      contentId: issue.ghId === null ? undefined : String(issue.ghId),
      updatedAt: null,
      fields: {
        pipeline: pipeline.name,
        estimate: issue.estimate?.value,
        priority: issue.pipelineIssue?.priority?.name,
        sprint: sprints.length > 0 ? sprints[sprints.length - 1].name : undefined,
        position,
        workspace: this.workspace.name,
      },
      relations: {
        epicIssues: epics.get(issue.id) ?? [],
        blockedBy: blockers.get(issue.id) ?? [],
        connectedIssues: (issue.connections?.nodes ?? []).map(toRef),
      },
    };
  }

  /** Epic issue id -> child issue URLs */
  private async fetchEpics(): Promise<Map<string, string[]>> {
    const data = await this.client.query<{
      workspace: { epics: { nodes: Array<{ id: string; issue: { id: string } }> } };
    }>(EPICS_QUERY, { workspaceId: this.workspace.id }, `Read epics of ${this.workspace.name}`);

    const epics = new Map<string, string[]>();
    for (const epic of data.workspace.epics.nodes) {
      const children = await this.client.query<{
        node: { childIssues: { nodes: ZenHubIssueRef[] } };
      }>(EPIC_CHILDREN_QUERY, { epicId: epic.id }, `Read epic ${epic.id}`);
      epics.set(
        epic.issue.id,
        children.node.childIssues.nodes.map((child) => child.htmlUrl ?? `${child.repository.owner.login}/${child.repository.name}#${child.number}`)
      );
    }
    return epics;
  }

  /** Blocked issue id -> blocking issue URLs */
  private async fetchBlockers(): Promise<Map<string, string[]>> {
    const data = await this.client.query<{
      workspace: {
        issueDependencies: {
          nodes: Array<{ blockedIssue: { id: string }; blockingIssue: ZenHubIssueRef }>;
        };
      };
    }>(DEPENDENCIES_QUERY, { workspaceId: this.workspace.id }, `Read dependencies of ${this.workspace.name}`);

    const blockers = new Map<string, string[]>();
    for (const dependency of data.workspace.issueDependencies.nodes) {
      const list = blockers.get(dependency.blockedIssue.id) ?? [];
      const blocking = dependency.blockingIssue;
      list.push(blocking.htmlUrl ?? `${blocking.repository.owner.login}/${blocking.repository.name}#${blocking.number}`);
      blockers.set(dependency.blockedIssue.id, list);
    }
    return blockers;
  }
}
