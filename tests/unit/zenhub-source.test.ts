import { ConfigurationError } from '../../src/lib/errors';
import { ZenHubClient, ZenHubSource, ZenHubWorkspace, selectWorkspaces } from '../../src/lib/sources/zenhub-source';

const web = { name: 'web', owner: { login: 'acme' } };
const api = { name: 'api', owner: { login: 'acme' } };

const dev: ZenHubWorkspace = {
  id: 'W1',
  name: 'Dev',
  pipelines: [
    { id: 'p1', name: 'Todo' },
    { id: 'p2', name: 'Done' },
  ],
};

function issue(id: string, number: number, extra: Record<string, unknown> = {}) {
  return {
    id,
    ghId: null,
    number,
    title: `Issue ${number}`,
    pullRequest: false,
    repository: web,
    pipelineIssue: null,
    estimate: null,
    sprints: { nodes: [] },
    ...extra,
  };
}

const responses: Record<string, (variables: Record<string, unknown>) => unknown> = {
  RecentlyViewedWorkspaces: () => ({ recentlyViewedWorkspaces: { nodes: [dev] } }),
  WorkspaceEpics: () => ({ workspace: { epics: { nodes: [{ id: 'E1', issue: { id: 'Z1' } }] } } }),
  EpicChildren: () => ({
    node: {
      childIssues: {
        nodes: [
          { id: 'Z2', number: 2, htmlUrl: 'https://github.com/acme/web/issues/2', repository: web },
          { id: 'Z3', number: 3, repository: api },
        ],
      },
    },
  }),
  WorkspaceDependencies: () => ({
    workspace: {
      issueDependencies: {
        nodes: [{ blockedIssue: { id: 'Z2' }, blockingIssue: { id: 'Z3', number: 3, repository: api } }],
      },
    },
  }),
  PipelineIssues: (variables) => ({
    searchIssuesByPipeline: {
      nodes:
        variables.pipelineId === 'p1'
          ? [
              issue('Z1', 1, {
                ghId: 101,
                title: 'Login',
                pipelineIssue: { priority: { name: 'High' } },
                estimate: { value: 5 },
                sprints: { nodes: [{ name: 'Sprint 1' }, { name: 'Sprint 2' }] },
              }),
              issue('Z4', 4, { pullRequest: true }),
            ]
          : [issue('Z2', 2)],
    },
  }),
  PipelinePullRequests: (variables) => ({
    searchIssuesByPipeline: {
      nodes:
        variables.pipelineId === 'p1'
          ? [issue('Z4', 4, { pullRequest: true, connections: { nodes: [{ id: 'Z1', number: 1, repository: web }] } })]
          : [],
    },
  }),
};

describe('ZenHub source', () => {
  let request: jest.Mock;
  let client: ZenHubClient;

  beforeEach(() => {
    request = jest.fn().mockImplementation(async (document: string, variables: Record<string, unknown> = {}) => {
      const name = document.trim().split(/[\s(]/)[1];
      const respond = responses[name];
      if (!respond) {
        throw new Error(`Unexpected query ${name}`);
      }
      return respond(variables);
    });
    client = new ZenHubClient({ request });
  });

  describe('ZenHubClient', () => {
    it('should list recently viewed workspaces', async () => {
      await expect(client.listWorkspaces()).resolves.toEqual([dev]);
    });
  });

  describe('selectWorkspaces', () => {
    const available: ZenHubWorkspace[] = [
      dev,
      { id: 'W2', name: 'Ops', pipelines: [] },
      { id: 'W3', name: 'Archive', pipelines: [] },
    ];

    it('should take every workspace when none are named', () => {
      const chosen = selectWorkspaces(available, [], (name) => name.startsWith('Arch'));

      expect(chosen.map((workspace) => workspace.name)).toEqual(['Dev', 'Ops']);
    });

    it('should resolve names in the order given and drop repeats', () => {
      const chosen = selectWorkspaces(available, ['ops', 'Dev', 'dev']);

      expect(chosen.map((workspace) => workspace.id)).toEqual(['W2', 'W1']);
    });

    it('should fail when the token sees no workspaces', () => {
      expect(() => selectWorkspaces([], [])).toThrow(ConfigurationError);
      expect(() => selectWorkspaces([], [])).toThrow('No ZenHub workspaces visible to this token');
    });
  });

  describe('ZenHubSource', () => {
    let source: ZenHubSource;

    beforeEach(() => {
      source = new ZenHubSource(client, dev);
    });

    it('should be identified by the workspace name', () => {
      expect(source.sourceId).toBe('Dev');
    });

    it('should expose the pipeline order and the fixed priority levels', async () => {
      await expect(source.listOrderedScaleLabels('Pipeline')).resolves.toEqual(['Todo', 'Done']);
      await expect(source.listOrderedScaleLabels('Priority')).resolves.toEqual(['Normal', 'High Priority']);
      await expect(source.listOrderedScaleLabels('Estimate')).resolves.toBeNull();
    });

    it('should read every pipeline with its relations', async () => {
      const items = await source.fetchWorkspace();

      expect(items.map((item) => `${item.number}:${item.fields.pipeline}:${item.fields.position}`)).toEqual([
        '1:Todo:0',
        '4:Todo:1',
        '2:Done:0',
      ]);
      expect(items[0]).toEqual({
        owner: 'acme',
        repo: 'web',
        number: 1,
        title: 'Login',
        isPullRequest: false,
        contentId: '101',
        updatedAt: null,
        fields: { pipeline: 'Todo', estimate: 5, priority: 'High', sprint: 'Sprint 2', position: 0, workspace: 'Dev' },
        relations: {
          epicIssues: ['https://github.com/acme/web/issues/2', 'acme/api#3'],
          blockedBy: [],
          connectedIssues: [],
        },
      });
      expect(items[2].relations.blockedBy).toEqual(['acme/api#3']);
      expect(items[2].contentId).toBeUndefined();
    });

    it('should take pull request connections from the pull request listing', async () => {
      const items = await source.fetchWorkspace();

      expect(items[1].isPullRequest).toBe(true);
      expect(items[1].relations.connectedIssues).toEqual([{ owner: 'acme', repo: 'web', number: 1 }]);
    });
  });
});
