import { ConfigurationError } from '../../src/lib/errors';
import { DEFAULT_MAPPING, FieldMapper, buildRules, parseRule } from '../../src/lib/field-mapper';
import { parseIssueRef } from '../../src/lib/issue-key';
import { FieldSchema, MergedIssue } from '../../src/lib/types';

const schema: FieldSchema = {
  Status: { name: 'Status', type: 'single_select', options: ['Todo', 'In Progress', 'Done'] },
  Priority: { name: 'Priority', type: 'single_select', options: ['Low', 'Medium', 'High'] },
  Size: { name: 'Size', type: 'single_select', options: ['XS', 'S', 'M', 'L', 'XL'] },
  Iteration: { name: 'Iteration', type: 'iteration', options: ['Sprint 1', 'Sprint 2'] },
  Points: { name: 'Points', type: 'number' },
  Empty: { name: 'Empty', type: 'single_select', options: [] },
};

function issue(
  key: string,
  fields: MergedIssue['fields'],
  relations: MergedIssue['relations'] = {},
  isPullRequest = false
): MergedIssue {
  const ref = parseIssueRef(key);
  if (!ref) {
    throw new Error(`bad key ${key}`);
  }
  return { key, ref, title: `Title of ${key}`, isPullRequest, records: [], fields, relations };
}

describe('FieldMapper', () => {
  describe('buildRules', () => {
    it('should start from the default mapping', () => {
      const rules = buildRules();

      expect(rules).toHaveLength(DEFAULT_MAPPING.length);
      expect(rules[0]).toEqual({ source: 'Estimate', destination: 'Size', strategy: 'scale' });
    });

    it('should let an override replace every default for the same source', () => {
      const rules = buildRules(['Estimate:Points']);

      expect(rules.filter((rule) => rule.source === 'Estimate')).toEqual([
        { source: 'Estimate', destination: 'Points', strategy: 'closest' },
      ]);
      expect(rules[0].source).toBe('Estimate');
    });

    it('should disable a source with an empty destination', () => {
      const rules = buildRules(['Sprint:']);

      expect(rules.some((rule) => rule.source === 'Sprint')).toBe(false);
      expect(rules).toHaveLength(DEFAULT_MAPPING.length - 1);
    });

    it('should reject unknown source fields', () => {
      expect(() => parseRule('Color:Label')).toThrow(ConfigurationError);
      expect(() => parseRule('Color:Label')).toThrow('Unknown source field "Color" in mapping "Color:Label"');
    });

    it('should map a bare field to itself', () => {
      expect(parseRule('Priority')).toEqual({ source: 'Priority', destination: 'Priority', strategy: 'closest' });
    });
  });

  describe('map', () => {
    let mapper: FieldMapper;

    beforeEach(() => {
      mapper = new FieldMapper({ targetOrg: 'acme', schema });
    });

    it('should translate every default field onto the target options', () => {
      const merged = issue(
        'acme/web#1',
        {
          Estimate: { value: 8, sourceId: 'A' },
          Priority: { value: 'Hihg', sourceId: 'A' },
          Pipeline: { value: 'in progress', sourceId: 'A' },
          Sprint: { value: 'Sprint 2', sourceId: 'B' },
          Position: { value: 3, sourceId: 'A' },
        },
        { Epic: { field: 'Epic', sourceId: 'A', relations: [{ kind: 'Epic', from: 'acme/web#1', to: 'acme/web#2' }] } }
      );

      const payload = mapper.map(merged, buildRules());

      expect(payload).toEqual({
        key: 'acme/web#1',
        ref: { owner: 'acme', repo: 'web', number: 1 },
        title: 'Title of acme/web#1',
        isPullRequest: false,
        fields: { Size: 'M', Priority: 'High', Status: 'In Progress', Iteration: 'Sprint 2' },
        position: 3,
        bodyBlock: '# Dependencies\n\n## Epic\n\n- [ ] #2',
      });
      expect(mapper.translations).toEqual({
        Size: { '8 → M': 1 },
        Priority: { 'Hihg → High': 1 },
        Status: { 'in progress → In Progress': 1 },
        Iteration: { 'Sprint 2 → Sprint 2': 1 },
      });
      expect(mapper.drainNotices()).toEqual([]);
    });

    it('should use the source scale when one is known', () => {
      const merged = issue('acme/web#1', {
        Priority: { value: 'P2', sourceId: 'A', scale: ['P0', 'P1', 'P2', 'P3', 'P4'] },
      });

      const payload = mapper.map(merged, buildRules(['Priority:Priority:Scale']));

      expect(payload.fields.Priority).toBe('Medium');
    });

    it('should place ZenHub priorities on the target scale', () => {
      const scale = ['Normal', 'High Priority'];
      const rules = buildRules(['Priority:Priority:Scale']);

      const high = mapper.map(issue('acme/web#1', { Priority: { value: 'High Priority', sourceId: 'A', scale } }), rules);
      const normal = mapper.map(issue('acme/web#2', { Priority: { value: 'Normal', sourceId: 'A', scale } }), rules);

      expect(high.fields.Priority).toBe('High');
      expect(normal.fields.Priority).toBe('Low');
    });

    it('should give a destination to the first rule that yields a value', () => {
      const rules = buildRules(['Priority:Status']);

      const both = mapper.map(
        issue('acme/web#1', {
          Priority: { value: 'Done', sourceId: 'A' },
          Pipeline: { value: 'Todo', sourceId: 'A' },
        }),
        rules
      );
      const pipelineOnly = mapper.map(issue('acme/web#2', { Pipeline: { value: 'Todo', sourceId: 'A' } }), rules);

      expect(both.fields.Status).toBe('Done');
      expect(pipelineOnly.fields.Status).toBe('Todo');
    });

    it('should write numbers into number fields', () => {
      const payload = mapper.map(issue('acme/web#1', { Estimate: { value: 5, sourceId: 'A' } }), buildRules(['Estimate:Points']));

      expect(payload.fields).toEqual({ Points: 5 });
    });

    it('should render scalar fields mapped to Text as body sections', () => {
      const payload = mapper.map(issue('acme/web#1', { Priority: { value: 'High', sourceId: 'A' } }), buildRules(['Priority:Text']));

      expect(payload.bodyBlock).toBe('# Dependencies\n\n## Priority\n\n- High');
      expect(payload.fields).toEqual({});
    });

    it('should turn linked issues of a pull request into fixes directives', () => {
      const pr = issue(
        'acme/web#10',
        {},
        { LinkedPR: { field: 'LinkedPR', sourceId: 'A', relations: [{ kind: 'LinkedPR', from: 'acme/web#10', to: 'acme/web#1' }] } },
        true
      );

      const payload = mapper.map(pr, buildRules());

      expect(payload.prLinkDirectives).toEqual(['fixes acme/web#1']);
      expect(payload.offBoard).toBe(true);
      expect(payload.bodyBlock).toBeUndefined();
    });

    it('should keep a pull request without linked issues on the board', () => {
      const payload = mapper.map(issue('acme/web#11', {}, {}, true), buildRules());

      expect(payload.offBoard).toBeUndefined();
      expect(payload.prLinkDirectives).toEqual([]);
      expect(payload.bodyBlock).toBe('');
    });

    it('should not edit bodies outside the target organization', () => {
      const outsider = issue(
        'other/lib#1',
        {},
        { Epic: { field: 'Epic', sourceId: 'A', relations: [{ kind: 'Epic', from: 'other/lib#1', to: 'other/lib#2' }] } }
      );

      const payload = mapper.map(outsider, buildRules());

      expect(payload.bodyBlock).toBeUndefined();
      expect(mapper.drainNotices()).toEqual([
        { kind: 'different-org', key: 'other/lib#1', message: 'other/lib#1 is outside acme; body not updated' },
      ]);
    });

    it('should report a missing destination field once', () => {
      const rules = buildRules(['Priority:Urgency']);

      mapper.mapAll(
        [issue('acme/web#1', { Priority: { value: 'High', sourceId: 'A' } }), issue('acme/web#2', {})],
        rules
      );

      expect(mapper.drainNotices()).toEqual([
        { kind: 'configuration', message: 'Field "Urgency" does not exist in the target project' },
      ]);
      expect(mapper.drainNotices()).toEqual([]);
    });

    it('should not mistake inherited object members for fields', () => {
      const payload = mapper.map(
        issue('acme/web#1', { Priority: { value: 'High', sourceId: 'A' } }),
        buildRules(['Priority:constructor'])
      );

      expect(payload.fields.Priority).toBeUndefined();
      expect(Object.prototype.hasOwnProperty.call(payload.fields, 'constructor')).toBe(false);
      expect(mapper.drainNotices()).toEqual([
        { kind: 'configuration', message: 'Field "constructor" does not exist in the target project' },
      ]);
    });

    it('should report a select field without options and leave it unset', () => {
      const payload = mapper.map(issue('acme/web#1', { Priority: { value: 'High', sourceId: 'A' } }), buildRules(['Priority:Empty']));

      expect(payload.fields).toEqual({});
      expect(mapper.drainNotices()).toEqual([
        { kind: 'configuration', message: 'Field "Empty" has no options to match Priority against' },
      ]);
    });

    it('should refuse relations mapped to a regular field', () => {
      mapper.map(issue('acme/web#1', {}), buildRules(['Epic:Status']));

      expect(mapper.drainNotices()).toEqual([
        { kind: 'configuration', message: 'Epic can only be mapped to Text, not "Status"' },
      ]);
    });
  });
});
