import { GitHubProjectClient, parseProjectUrl } from '../../src/lib/github-client';
import { ConfigurationError } from '../../src/lib/errors';
import { TargetPayload } from '../../src/lib/types';

const repository = { name: 'web', owner: { login: 'acme' } };

const projectData = {
  organization: {
    projectV2: {
      id: 'P1',
      title: 'Roadmap',
      fields: {
        nodes: [
          { __typename: 'ProjectV2Field', id: 'F_title', name: 'Title', dataType: 'TITLE' },
          {
            __typename: 'ProjectV2SingleSelectField',
            id: 'F_status',
            name: 'Status',
            dataType: 'SINGLE_SELECT',
            options: [
              { id: 's1', name: 'Todo' },
              { id: 's2', name: 'Done' },
            ],
          },
          { __typename: 'ProjectV2Field', id: 'F_points', name: 'Points', dataType: 'NUMBER' },
          {
            __typename: 'ProjectV2IterationField',
            id: 'F_sprint',
            name: 'Sprint',
            dataType: 'ITERATION',
            configuration: {
              iterations: [{ id: 'i2', title: 'Sprint 2' }],
              completedIterations: [{ id: 'i1', title: 'Sprint 1' }],
            },
          },
          { __typename: 'ProjectV2Field' },
        ],
      },
    },
  },
};

const itemPages = [
  {
    node: {
      items: {
        pageInfo: { hasNextPage: true, endCursor: 'c1' },
        nodes: [
          {
            id: 'I1',
            content: { __typename: 'Issue', id: 'C1', number: 1, title: 'Login', body: 'Body', repository },
            fieldValues: {
              nodes: [
                { __typename: 'ProjectV2ItemFieldSingleSelectValue', name: 'Todo', field: { name: 'Status' } },
                { __typename: 'ProjectV2ItemFieldNumberValue', number: 3, field: { name: 'Points' } },
                { __typename: 'ProjectV2ItemFieldRepositoryValue' },
              ],
            },
          },
        ],
      },
    },
  },
  {
    node: {
      items: {
        pageInfo: { hasNextPage: false, endCursor: null },
        nodes: [
          {
            id: 'I2',
            content: { __typename: 'DraftIssue', id: 'D1', title: 'Idea', body: '' },
            fieldValues: { nodes: [] },
          },
        ],
      },
    },
  },
];

function pullRequest(body: string) {
  return {
    repository: {
      issueOrPullRequest: { __typename: 'PullRequest', id: 'C5', number: 5, title: 'Fix login', body, repository },
    },
  };
}

const payload: TargetPayload = {
  key: 'acme/web#5',
  ref: { owner: 'acme', repo: 'web', number: 5 },
  title: 'Fix login',
  isPullRequest: true,
  fields: {},
};

describe('GitHubProjectClient', () => {
  let graphql: jest.Mock;
  let content: unknown;
  let client: GitHubProjectClient;

  function mutations(): Array<[string, unknown]> {
    return graphql.mock.calls
      .filter(([query]) => String(query).includes('mutation'))
      .map(([query, variables]): [string, unknown] => [String(query).trim().split(/[\s(]/)[1], variables]);
  }

  beforeEach(() => {
    let page = 0;
    content = pullRequest('Fixes things');
    graphql = jest.fn().mockImplementation(async (query: string) => {
      if (query.includes('projectV2(number')) return projectData;
      if (query.includes('query ProjectItems')) return itemPages[page++];
      if (query.includes('query Content')) return content;
      if (query.includes('mutation AddItem')) return { addProjectV2ItemById: { item: { id: 'I5' } } };
      return {};
    });
    client = new GitHubProjectClient('test-secret', { ownerType: 'organization', owner: 'acme', number: 7 }, { graphql });
  });

  describe('parseProjectUrl', () => {
    it('should parse organization and user project URLs', () => {
      expect(parseProjectUrl('https://github.com/orgs/acme/projects/7/views/2')).toEqual({
        ownerType: 'organization',
        owner: 'acme',
        number: 7,
      });
      expect(parseProjectUrl('github.com/users/jo/projects/3')).toEqual({ ownerType: 'user', owner: 'jo', number: 3 });
    });

    it('should throw error for anything else', () => {
      expect(() => parseProjectUrl('https://github.com/acme/web')).toThrow(ConfigurationError);
      expect(() => parseProjectUrl('https://github.com/acme/web')).toThrow(
        'Invalid project URL: https://github.com/acme/web. Expected "https://github.com/orgs/ORG/projects/N"'
      );
    });
  });

  describe('listFieldSchema', () => {
    it('should describe supported fields with their options', async () => {
      const schema = await client.listFieldSchema();

      expect(schema).toEqual({
        Status: { name: 'Status', type: 'single_select', options: ['Todo', 'Done'] },
        Points: { name: 'Points', type: 'number' },
        Sprint: { name: 'Sprint', type: 'iteration', options: ['Sprint 2', 'Sprint 1'] },
      });
    });

    it('should load the project only once', async () => {
      await client.listFieldSchema();
      await client.listFieldSchema();

      expect(graphql).toHaveBeenCalledTimes(1);
      expect(graphql).toHaveBeenCalledWith(expect.stringContaining('organization(login: $owner)'), {
        owner: 'acme',
        number: 7,
      });
    });

    it('should report a project that does not exist', async () => {
      graphql.mockResolvedValueOnce({ organization: { projectV2: null } });

      await expect(client.listFieldSchema()).rejects.toThrow('Project 7 not found for acme');
    });
  });

  describe('listItems', () => {
    it('should page through items in board order', async () => {
      const items = await client.listItems();

      expect(items).toEqual([
        {
          itemId: 'I1',
          key: 'acme/web#1',
          title: 'Login',
          contentType: 'Issue',
          fields: { Status: 'Todo', Points: 3 },
          body: 'Body',
          position: 0,
        },
        { itemId: 'I2', key: null, title: 'Idea', contentType: 'DraftIssue', fields: {}, body: '', position: 1 },
      ]);
      expect(graphql).toHaveBeenLastCalledWith(expect.stringContaining('query ProjectItems'), {
        projectId: 'P1',
        cursor: 'c1',
      });
    });
  });

  describe('updateItem', () => {
    it('should send one mutation per change', async () => {
      await client.listItems();

      await client.updateItem('acme/web#1', {
        fields: [
          { field: 'Status', from: 'Todo', to: 'Done' },
          { field: 'Points', from: 3, to: null },
          { field: 'Sprint', from: null, to: 'Sprint 1' },
        ],
        body: 'New body',
        position: { after: null },
      });

      expect(mutations()).toEqual([
        ['SetField', { projectId: 'P1', itemId: 'I1', fieldId: 'F_status', value: { singleSelectOptionId: 's2' } }],
        ['ClearField', { projectId: 'P1', itemId: 'I1', fieldId: 'F_points' }],
        ['SetField', { projectId: 'P1', itemId: 'I1', fieldId: 'F_sprint', value: { iterationId: 'i1' } }],
        ['UpdateIssueBody', { id: 'C1', body: 'New body' }],
        ['MoveItem', { projectId: 'P1', itemId: 'I1', afterId: null }],
      ]);
    });

    it('should reject values the project does not know', async () => {
      await client.listItems();

      await expect(
        client.updateItem('acme/web#1', { fields: [{ field: 'Status', from: 'Todo', to: 'Blocked' }] })
      ).rejects.toThrow('"Blocked" is not an option of field "Status"');
      await expect(
        client.updateItem('acme/web#1', { fields: [{ field: 'Urgency', from: null, to: 'High' }] })
      ).rejects.toThrow('Field "Urgency" does not exist in the target project');
      await expect(client.updateItem('acme/web#9', {})).rejects.toThrow('acme/web#9 is not in the project');
    });
  });

  describe('createItem', () => {
    it('should add the content to the project', async () => {
      const item = await client.createItem(payload);

      expect(item).toEqual({
        itemId: 'I5',
        key: 'acme/web#5',
        title: 'Fix login',
        contentType: 'PullRequest',
        fields: {},
        body: 'Fixes things',
        position: 0,
      });
      expect(mutations()).toEqual([['AddItem', { projectId: 'P1', contentId: 'C5' }]]);
    });

    it('should update pull request bodies with the pull request mutation', async () => {
      await client.createItem(payload);

      await client.updateItem('acme/web#5', { body: 'Rewritten' });

      expect(mutations()[1]).toEqual(['UpdatePullRequestBody', { id: 'C5', body: 'Rewritten' }]);
    });
  });

  describe('readContent', () => {
    it('should read the body and archive state of content outside the project', async () => {
      await expect(client.readContent('acme/web#5')).resolves.toEqual({ body: 'Fixes things', archived: false });

      const query = String(graphql.mock.calls[0][0]);
      expect(query).toContain('isArchived');
    });

    it('should report archived repositories', async () => {
      content = {
        repository: {
          issueOrPullRequest: {
            __typename: 'PullRequest',
            id: 'C5',
            number: 5,
            title: 'Fix login',
            body: 'Old',
            repository: { ...repository, isArchived: true },
          },
        },
      };

      await expect(client.readContent('acme/web#5')).resolves.toEqual({ body: 'Old', archived: true });
      const item = await client.createItem(payload);
      expect(item.archived).toBe(true);
    });

    it('should return null for content that does not exist', async () => {
      content = { repository: { issueOrPullRequest: null } };

      await expect(client.readContent('acme/web#5')).resolves.toBeNull();
    });
  });

  describe('removeItem', () => {
    it('should delete the project item and forget it', async () => {
      await client.listItems();

      await client.removeItem('acme/web#1');

      expect(mutations()).toEqual([['DeleteItem', { projectId: 'P1', itemId: 'I1' }]]);
      await expect(client.removeItem('acme/web#1')).rejects.toThrow('acme/web#1 is not in the project');
    });
  });

  describe('updatePRBody', () => {
    it('should append the linked issues block', async () => {
      const changed = await client.updatePRBody('acme/web#5', ['fixes acme/web#1']);

      expect(changed).toBe(true);
      expect(mutations()).toEqual([
        ['UpdatePullRequestBody', { id: 'C5', body: 'Fixes things\n\n# Linked issues\n\nfixes acme/web#1\n' }],
      ]);
    });

    it('should leave a current body alone', async () => {
      content = pullRequest('Fixes things\n\n# Linked issues\n\nfixes acme/web#1\n');

      const changed = await client.updatePRBody('acme/web#5', ['fixes acme/web#1']);

      expect(changed).toBe(false);
      expect(mutations()).toEqual([]);
    });

    it('should refuse issues', async () => {
      content = { repository: { issueOrPullRequest: { __typename: 'Issue', id: 'C1', number: 1, title: 'Login', body: '', repository } } };

      await expect(client.updatePRBody('acme/web#1', [])).rejects.toThrow('acme/web#1 is not a pull request');
    });
  });
});
