import { describe, it, expect } from 'vitest';
import { countByCriticality, countHighCriticality, formatStatistics } from '../../src/report/statistics';
import { Criticality } from '../../src/types/impact';
import { makeRecord } from '../helpers';

describe('statistics', () => {
  const c1 = makeRecord({ namespace: 'x', container: 'c1', node: 'n1', criticality: Criticality.HIGH });
  const c2 = makeRecord({ namespace: 'x', container: 'c2', node: 'n1', criticality: Criticality.LOW });

  it('should count high criticality records', () => {
    expect(countHighCriticality([c1, c2])).toBe(1);
    expect(countHighCriticality([])).toBe(0);
  });

  it('should count every criticality', () => {
    const records = [c1, c2, makeRecord({ criticality: Criticality.LOW }), makeRecord({ criticality: Criticality.UNKNOWN })];

    expect(countByCriticality(records)).toEqual({ high: 1, medium: 0, low: 2, unknown: 1 });
  });

  it('should format counts followed by the detail table', () => {
    const text = formatStatistics({ scope: { kind: 'single-node', node: 'n1' }, records: [c1, c2], gaps: [] });

    expect(text.split('\n')).toEqual([
      'Statistics: node n1',
      'Total containers: 2',
      'High criticality: 1',
      'Medium criticality: 0',
      'Low criticality: 1',
      'Unknown criticality: 0',
      'Catalog gaps: 0',
      '',
      'Container | Criticality | Dependencies',
      '----------+-------------+-------------',
      'x/c1      | High        | None',
      'x/c2      | Low         | None'
    ]);
  });

  it('should show the node column across all nodes', () => {
    const text = formatStatistics({ scope: { kind: 'all-nodes' }, records: [c1], gaps: [] });

    expect(text.split('\n').slice(-3)).toEqual([
      'Container | Node | Criticality | Dependencies',
      '----------+------+-------------+-------------',
      'x/c1      | n1   | High        | None'
    ]);
  });
});
