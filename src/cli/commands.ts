import { getLogger } from '@fluidware-it/saddlebag';
import { assess, type ResolveOptions } from '../analysis/impactResolver';
import type { Catalog } from '../catalog/catalog';
import { InvalidSelection } from '../errors';
import type { ExportSink } from '../export/exportSink';
import { listNodeNames, scopeLabel } from '../inventory/inventoryExtractor';
import { buildConsolidated, buildGraphExport } from '../report/exports';
import { formatReport } from '../report/reportFormatter';
import { formatStatistics } from '../report/statistics';
import type { Assessment, Scope } from '../types/impact';
import type { RawInventory } from '../types/k8s';

const logger = getLogger();

export type Action = 'report' | 'stats' | 'consolidated' | 'graph';

export const ACTIONS: readonly Action[] = ['report', 'stats', 'consolidated', 'graph'];

// Everything a command may read. `assessment` is replaced only by selectScope.
export interface AppState {
  catalog: Catalog;
  inventory: RawInventory;
  resolveOptions: ResolveOptions;
  assessment?: Assessment | undefined;
}

export interface CommandContext {
  sink: ExportSink;
  print: (text: string) => void;
  now: () => Date;
}

export interface CommandResult {
  path?: string | undefined;
}

type CommandHandler = (assessment: Assessment, ctx: CommandContext) => Promise<CommandResult>;

const COMMANDS: Record<Action, CommandHandler> = {
  report: async (assessment, ctx) => {
    const text = formatReport(assessment, ctx.now().toISOString());
    ctx.print(text);
    const path = await ctx.sink.write({ kind: 'report', content: text }, scopeLabel(assessment.scope));
    return { path };
  },
  stats: async (assessment, ctx) => {
    ctx.print(formatStatistics(assessment));
    return {};
  },
  consolidated: async (assessment, ctx) => {
    const content = buildConsolidated(assessment.records);
    const path = await ctx.sink.write({ kind: 'consolidated', content }, scopeLabel(assessment.scope));
    return { path };
  },
  graph: async (assessment, ctx) => {
    const content = buildGraphExport(assessment.records);
    const path = await ctx.sink.write({ kind: 'graph', content }, scopeLabel(assessment.scope));
    return { path };
  }
};

export function parseAction(input: string): Action {
  const normalized = input.trim().toLowerCase();
  const action = ACTIONS.find(a => a === normalized);
  if (!action) {
    throw new InvalidSelection(input, `Unknown action "${input}". Expected one of: ${ACTIONS.join(', ')}`);
  }
  return action;
}

// Recompute the shared snapshot for a new scope
export function selectScope(state: AppState, scope: Scope): Assessment {
  if (scope.kind === 'single-node') {
    const nodes = listNodeNames(state.inventory);
    if (!nodes.includes(scope.node)) {
      throw new InvalidSelection(scope.node, `Node "${scope.node}" not found. Available nodes: ${nodes.join(', ')}`);
    }
  }

  const assessment = assess(state.inventory, scope, state.catalog, state.resolveOptions);
  state.assessment = assessment;

  logger.info(`Assessed ${assessment.records.length} container(s) on ${scopeLabel(scope)}`);
  if (assessment.gaps.length > 0) {
    logger.warn(`${assessment.gaps.length} container(s) missing from the catalog`);
    for (const gap of assessment.gaps) {
      logger.warn(`Missing catalog entry: ${gap.namespace}/${gap.container} (pod ${gap.pod}, node ${gap.node})`);
    }
  }

  return assessment;
}

export async function runCommand(action: Action, state: AppState, ctx: CommandContext): Promise<CommandResult> {
  if (!state.assessment) {
    throw new InvalidSelection(action, 'Select a node or all nodes before running a command');
  }
  return COMMANDS[action](state.assessment, ctx);
}
