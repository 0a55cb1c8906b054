import { Criticality, type Assessment, type ImpactRecord } from '../types/impact';
import { capitalize, describeScope, formatTable } from './reportFormatter';

export type CriticalityCounts = Record<Criticality, number>;

const CRITICALITY_ORDER: readonly Criticality[] = [
  Criticality.HIGH,
  Criticality.MEDIUM,
  Criticality.LOW,
  Criticality.UNKNOWN
];

export function countByCriticality(records: readonly ImpactRecord[]): CriticalityCounts {
  const counts: CriticalityCounts = {
    [Criticality.HIGH]: 0,
    [Criticality.MEDIUM]: 0,
    [Criticality.LOW]: 0,
    [Criticality.UNKNOWN]: 0
  };
  for (const record of records) {
    counts[record.criticality] += 1;
  }
  return counts;
}

export function countHighCriticality(records: readonly ImpactRecord[]): number {
  return records.filter(r => r.criticality === Criticality.HIGH).length;
}

export function formatStatistics(assessment: Assessment): string {
  const { scope, records, gaps } = assessment;
  const counts = countByCriticality(records);
  const lines: string[] = [];

  lines.push(`Statistics: ${describeScope(scope)}`);
  lines.push(`Total containers: ${records.length}`);
  CRITICALITY_ORDER.forEach(criticality => {
    lines.push(`${capitalize(criticality)} criticality: ${counts[criticality]}`);
  });
  lines.push(`Catalog gaps: ${gaps.length}`);
  lines.push('');
  lines.push(formatTable(records, { showNode: scope.kind === 'all-nodes' }));

  return lines.join('\n');
}
