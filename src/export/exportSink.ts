import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { getLogger } from '@fluidware-it/saddlebag';
import { ExportWriteFailure, formatErrorMessage } from '../errors';
import type { ConsolidatedExport } from '../report/exports';
import type { GraphExport } from '../types/graph';

const logger = getLogger();

export const GRAPH_FILE_NAME = 'graph_data.json';

export type ExportArtifact =
  | { kind: 'report'; content: string }
  | { kind: 'consolidated'; content: ConsolidatedExport }
  | { kind: 'graph'; content: GraphExport };

export type ExportKind = ExportArtifact['kind'];

// Keep letters, digits, space, underscore and hyphen
export function sanitizeLabel(label: string): string {
  return label.replace(/[^A-Za-z0-9 _-]/g, '');
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

// Local time truncated to the minute: YYYYMMDD_HHMM
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
  return `${day}_${pad2(date.getHours())}${pad2(date.getMinutes())}`;
}

export function exportFileName(kind: ExportKind, contextLabel: string, date: Date): string {
  const timestamp = formatTimestamp(date);
  switch (kind) {
    case 'report':
      return `${sanitizeLabel(contextLabel)}_${timestamp}.txt`;
    case 'consolidated':
      return `consolidated_${timestamp}.json`;
    case 'graph':
      return GRAPH_FILE_NAME;
  }
}

function serialize(artifact: ExportArtifact): string {
  if (artifact.kind === 'report') return artifact.content;
  return `${JSON.stringify(artifact.content, null, 2)}\n`;
}

export class ExportSink {
  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  // Resolves with the written path; rejects with ExportWriteFailure
  async write(artifact: ExportArtifact, contextLabel: string): Promise<string> {
    const filePath = path.join(this.outputDir, exportFileName(artifact.kind, contextLabel, this.now()));

    try {
      await mkdir(this.outputDir, { recursive: true });
      await writeFile(filePath, serialize(artifact), 'utf8');
    } catch (error: unknown) {
      logger.error(`Failed to write ${artifact.kind} export to ${filePath}: ${formatErrorMessage(error)}`);
      throw new ExportWriteFailure(filePath, `Could not write ${filePath}: ${formatErrorMessage(error)}`, {
        cause: error
      });
    }

    logger.info(`Wrote ${artifact.kind} export to ${filePath}`);
    return filePath;
  }
}
