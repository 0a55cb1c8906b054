import type { Assessment, CatalogGap, ImpactRecord, Scope } from '../types/impact';
import { groupByNode } from './partition';

const RULE_WIDTH = 40;
const COLUMN_SEPARATOR = ' | ';

export interface TableOptions {
  showNode?: boolean | undefined;
}

export function fullName(record: Pick<ImpactRecord, 'namespace' | 'container'>): string {
  return `${record.namespace}/${record.container}`;
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function formatDependencies(dependencies: readonly string[]): string {
  return dependencies.length > 0 ? dependencies.join(', ') : 'None';
}

function renderRow(cells: string[], widths: number[]): string {
  const last = cells.length - 1;
  return cells.map((cell, i) => (i === last ? cell : cell.padEnd(widths[i] ?? cell.length))).join(COLUMN_SEPARATOR);
}

/**
 * Fixed-width table of the given records, in the order given.
 *
 * Column widths are derived from the records being rendered, so the same
 * record set always renders to the same text.
 */
export function formatTable(records: readonly ImpactRecord[], options: TableOptions = {}): string {
  if (records.length === 0) return 'No containers found.';

  const headers = options.showNode
    ? ['Container', 'Node', 'Criticality', 'Dependencies']
    : ['Container', 'Criticality', 'Dependencies'];

  const rows = records.map(r => {
    const cells = [fullName(r)];
    if (options.showNode) cells.push(r.node);
    cells.push(capitalize(r.criticality), formatDependencies(r.dependencies));
    return cells;
  });

  const widths = headers.map((header, i) => Math.max(header.length, ...rows.map(row => (row[i] ?? '').length)));

  const lines: string[] = [];
  lines.push(renderRow(headers, widths));
  lines.push(widths.map(w => '-'.repeat(w)).join('-+-'));
  rows.forEach(row => {
    lines.push(renderRow(row, widths));
  });

  return lines.join('\n');
}

function formatRecordBlock(record: ImpactRecord): string {
  const lines: string[] = [];

  lines.push(`Namespace: ${record.namespace}`);
  lines.push(`Pod: ${record.pod}`);
  lines.push(`Container: ${record.container}`);
  lines.push(`Description: ${record.description}`);
  lines.push(`Dependencies: ${formatDependencies(record.dependencies)}`);
  lines.push(`Criticality: ${record.criticality}`);
  lines.push(`Impact: ${record.impactLabel}`);
  lines.push('-'.repeat(RULE_WIDTH));

  return lines.join('\n');
}

export function formatNarrative(records: readonly ImpactRecord[]): string {
  return records.map(formatRecordBlock).join('\n');
}

export function formatNodeGroups(records: readonly ImpactRecord[]): string {
  if (records.length === 0) return 'No containers found.';

  const sections: string[] = [];
  for (const [node, group] of groupByNode(records)) {
    sections.push(`Node: ${node}\n${formatTable(group)}`);
  }
  return sections.join('\n\n');
}

export function formatGaps(gaps: readonly CatalogGap[]): string {
  if (gaps.length === 0) return '';

  const lines: string[] = [];
  lines.push(`Catalog gaps (${gaps.length}):`);
  gaps.forEach(gap => {
    lines.push(`- ${fullName(gap)} (pod ${gap.pod}, node ${gap.node})`);
  });

  return lines.join('\n');
}

export function describeScope(scope: Scope): string {
  return scope.kind === 'single-node' ? `node ${scope.node}` : 'all nodes';
}

export function formatReport(assessment: Assessment, generatedAt: string): string {
  const { scope, records, gaps } = assessment;
  const lines: string[] = [];

  // Header
  lines.push(`Impact Assessment Report: ${describeScope(scope)}`);
  lines.push(`Generated: ${generatedAt}`);
  lines.push('='.repeat(RULE_WIDTH));

  if (scope.kind === 'single-node') {
    if (records.length === 0) {
      lines.push(`No containers running on node ${scope.node}.`);
    } else {
      lines.push(formatNarrative(records));
      lines.push('', 'Summary:', formatTable(records));
    }
  } else {
    lines.push(formatNodeGroups(records));
  }

  if (gaps.length > 0) {
    lines.push('', formatGaps(gaps));
  }

  return lines.join('\n') + '\n';
}
