import { describe, it, expect } from 'vitest';
import {
  capitalize,
  formatDependencies,
  formatGaps,
  formatNarrative,
  formatNodeGroups,
  formatReport,
  formatTable
} from '../../src/report/reportFormatter';
import { Criticality, type Assessment } from '../../src/types/impact';
import { makeRecord } from '../helpers';

const c1 = makeRecord({
  namespace: 'x',
  container: 'c1',
  pod: 'p1',
  node: 'n1',
  description: 'first',
  dependencies: ['x/c2'],
  criticality: Criticality.HIGH
});

const c2 = makeRecord({
  namespace: 'x',
  container: 'c2',
  pod: 'p2',
  node: 'n1',
  description: 'second',
  criticality: Criticality.LOW
});

describe('reportFormatter', () => {
  describe('formatTable', () => {
    it('should size columns from the rendered records', () => {
      const table = formatTable([c1, makeRecord({ ...c2, dependencies: [] })]);

      expect(table.split('\n')).toEqual([
        'Container | Criticality | Dependencies',
        '----------+-------------+-------------',
        'x/c1      | High        | x/c2',
        'x/c2      | Low         | None'
      ]);
    });

    it('should add a node column when requested', () => {
      const records = [
        makeRecord({
          namespace: 'shop',
          container: 'api',
          node: 'node-1',
          dependencies: ['shop/db', 'auth/login'],
          criticality: Criticality.HIGH
        }),
        makeRecord({ namespace: 'auth', container: 'login', node: 'node-22', criticality: Criticality.LOW })
      ];

      expect(formatTable(records, { showNode: true }).split('\n')).toEqual([
        'Container  | Node    | Criticality | Dependencies',
        '-----------+---------+-------------+--------------------',
        'shop/api   | node-1  | High        | shop/db, auth/login',
        'auth/login | node-22 | Low         | None'
      ]);
    });

    it('should not leave trailing spaces', () => {
      const table = formatTable([c1, c2], { showNode: true });

      table.split('\n').forEach(line => {
        expect(line).toBe(line.trimEnd());
      });
    });

    it('should render identical text for the same records', () => {
      const records = [c1, c2];

      expect(formatTable(records)).toBe(formatTable(records));
      expect(formatNodeGroups(records)).toBe(formatNodeGroups(records));
    });

    it('should report an empty record set', () => {
      expect(formatTable([])).toBe('No containers found.');
    });
  });

  describe('formatNarrative', () => {
    it('should render one block per record', () => {
      expect(formatNarrative([c1])).toBe(
        [
          'Namespace: x',
          'Pod: p1',
          'Container: c1',
          'Description: first',
          'Dependencies: x/c2',
          'Criticality: high',
          'Impact: High impact',
          '----------------------------------------'
        ].join('\n')
      );
    });
  });

  describe('formatNodeGroups', () => {
    it('should group records by node in ascending node order', () => {
      const records = [
        makeRecord({ namespace: 'a', container: 'one', node: 'zeta', criticality: Criticality.HIGH }),
        makeRecord({ namespace: 'a', container: 'two', node: 'alpha', criticality: Criticality.LOW })
      ];

      expect(formatNodeGroups(records)).toBe(
        [
          'Node: alpha',
          'Container | Criticality | Dependencies',
          '----------+-------------+-------------',
          'a/two     | Low         | None',
          '',
          'Node: zeta',
          'Container | Criticality | Dependencies',
          '----------+-------------+-------------',
          'a/one     | High        | None'
        ].join('\n')
      );
    });
  });

  describe('formatGaps', () => {
    it('should list every gap', () => {
      const text = formatGaps([
        { namespace: 'ns1', container: 'b', pod: 'b-1', node: 'n1' },
        { namespace: 'ns1', container: 'b', pod: 'b-2', node: 'n2' }
      ]);

      expect(text).toBe(['Catalog gaps (2):', '- ns1/b (pod b-1, node n1)', '- ns1/b (pod b-2, node n2)'].join('\n'));
    });

    it('should render nothing without gaps', () => {
      expect(formatGaps([])).toBe('');
    });
  });

  describe('formatReport', () => {
    it('should render narrative and summary for a single node', () => {
      const assessment: Assessment = {
        scope: { kind: 'single-node', node: 'n1' },
        records: [c1, c2],
        gaps: []
      };

      expect(formatReport(assessment, '2024-01-01T00:00:00.000Z')).toBe(
        [
          'Impact Assessment Report: node n1',
          'Generated: 2024-01-01T00:00:00.000Z',
          '========================================',
          'Namespace: x',
          'Pod: p1',
          'Container: c1',
          'Description: first',
          'Dependencies: x/c2',
          'Criticality: high',
          'Impact: High impact',
          '----------------------------------------',
          'Namespace: x',
          'Pod: p2',
          'Container: c2',
          'Description: second',
          'Dependencies: None',
          'Criticality: low',
          'Impact: Low impact',
          '----------------------------------------',
          '',
          'Summary:',
          'Container | Criticality | Dependencies',
          '----------+-------------+-------------',
          'x/c1      | High        | x/c2',
          'x/c2      | Low         | None',
          ''
        ].join('\n')
      );
    });

    it('should group by node for all nodes and append gaps', () => {
      const unknown = makeRecord({
        namespace: 'ns1',
        container: 'b',
        pod: 'b-1',
        node: 'n2',
        description: 'No information available',
        criticality: Criticality.UNKNOWN
      });
      const assessment: Assessment = {
        scope: { kind: 'all-nodes' },
        records: [c1, unknown],
        gaps: [{ namespace: 'ns1', container: 'b', pod: 'b-1', node: 'n2' }]
      };

      const report = formatReport(assessment, 'now');

      expect(report.split('\n')).toEqual([
        'Impact Assessment Report: all nodes',
        'Generated: now',
        '========================================',
        'Node: n1',
        'Container | Criticality | Dependencies',
        '----------+-------------+-------------',
        'x/c1      | High        | x/c2',
        '',
        'Node: n2',
        'Container | Criticality | Dependencies',
        '----------+-------------+-------------',
        'ns1/b     | Unknown     | None',
        '',
        'Catalog gaps (1):',
        '- ns1/b (pod b-1, node n2)',
        ''
      ]);
    });

    it('should say so when a node runs no containers', () => {
      const report = formatReport({ scope: { kind: 'single-node', node: 'idle' }, records: [], gaps: [] }, 'now');

      expect(report).toBe(
        'Impact Assessment Report: node idle\nGenerated: now\n========================================\nNo containers running on node idle.\n'
      );
    });
  });

  describe('helpers', () => {
    it('should capitalize criticality values', () => {
      expect(capitalize('medium')).toBe('Medium');
    });

    it('should join dependencies or say None', () => {
      expect(formatDependencies(['a/b', 'c/d'])).toBe('a/b, c/d');
      expect(formatDependencies([])).toBe('None');
    });
  });
});
