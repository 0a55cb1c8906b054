import * as readline from 'readline';
import { getLogger } from '@fluidware-it/saddlebag';
import { ExportWriteFailure, InvalidSelection, formatErrorMessage } from '../errors';
import { listNodeNames } from '../inventory/inventoryExtractor';
import { describeScope } from '../report/reportFormatter';
import type { Scope } from '../types/impact';
import { runCommand, selectScope, type Action, type AppState, type CommandContext } from './commands';

const logger = getLogger();

export interface MenuIO {
  ask: (question: string) => Promise<string>;
  print: (text: string) => void;
  close: () => void;
}

type MenuStep = 'continue' | 'change-scope' | 'quit';

interface MenuEntry {
  label: string;
  run: (state: AppState, ctx: CommandContext) => Promise<MenuStep>;
}

function commandEntry(label: string, action: Action): MenuEntry {
  return {
    label,
    run: async (state, ctx) => {
      const result = await runCommand(action, state, ctx);
      if (result.path) ctx.print(`Saved to ${result.path}`);
      return 'continue';
    }
  };
}

const quitEntry: MenuEntry = { label: 'Quit', run: async () => 'quit' };

const MENU = new Map<string, MenuEntry>([
  ['1', commandEntry('Render impact report', 'report')],
  ['2', commandEntry('Show statistics', 'stats')],
  ['3', commandEntry('Export consolidated JSON', 'consolidated')],
  ['4', commandEntry('Export dependency graph', 'graph')],
  ['5', { label: 'Change scope', run: async () => 'change-scope' }],
  ['6', quitEntry]
]);

const QUIT_INPUTS = ['q', 'quit', 'exit'];

export function createConsoleIO(): MenuIO {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  let closed = false;
  const pending: ((answer: string) => void)[] = [];

  // End of input behaves like "quit"
  rl.on('close', () => {
    closed = true;
    pending.splice(0).forEach(resolve => resolve('q'));
  });

  return {
    ask: question =>
      new Promise<string>(resolve => {
        if (closed) {
          resolve('q');
          return;
        }
        pending.push(resolve);
        rl.question(question, answer => {
          const idx = pending.indexOf(resolve);
          if (idx !== -1) pending.splice(idx, 1);
          resolve(answer);
        });
      }),
    print: text => console.log(text),
    close: () => rl.close()
  };
}

// Accepts a 1-based node number or "A" for all nodes; undefined means quit
export function parseScopeSelection(input: string, nodes: readonly string[]): Scope | undefined {
  const trimmed = input.trim();
  if (QUIT_INPUTS.includes(trimmed.toLowerCase())) return undefined;
  if (trimmed.toLowerCase() === 'a') return { kind: 'all-nodes' };

  const choice = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : NaN;
  const node = nodes[choice - 1];
  if (!node) {
    throw new InvalidSelection(input, `Please enter a number between 1 and ${nodes.length}, or A for all nodes.`);
  }
  return { kind: 'single-node', node };
}

function formatScopeMenu(nodes: readonly string[]): string {
  const lines = ['Available nodes:'];
  nodes.forEach((name, idx) => {
    lines.push(`${idx + 1}. ${name}`);
  });
  lines.push('A. All nodes');
  return lines.join('\n');
}

function formatActionMenu(state: AppState): string {
  const scope = state.assessment ? describeScope(state.assessment.scope) : 'none';
  const lines = [`\nScope: ${scope}`];
  for (const [key, entry] of MENU) {
    lines.push(`${key}. ${entry.label}`);
  }
  return lines.join('\n');
}

// Returns false when the user quits instead of choosing
async function promptScope(state: AppState, io: MenuIO): Promise<boolean> {
  const nodes = listNodeNames(state.inventory);

  for (;;) {
    io.print(formatScopeMenu(nodes));
    const input = await io.ask('Select a node by number, or A for all nodes: ');
    try {
      const scope = parseScopeSelection(input, nodes);
      if (!scope) return false;
      selectScope(state, scope);
      return true;
    } catch (error: unknown) {
      if (!(error instanceof InvalidSelection)) throw error;
      io.print(error.message);
    }
  }
}

async function runEntry(entry: MenuEntry, state: AppState, ctx: CommandContext, io: MenuIO): Promise<MenuStep> {
  try {
    return await entry.run(state, ctx);
  } catch (error: unknown) {
    if (error instanceof ExportWriteFailure) {
      io.print(`Export failed: ${error.message}`);
      return 'continue';
    }
    if (error instanceof InvalidSelection) {
      io.print(error.message);
      return 'change-scope';
    }
    throw error;
  }
}

/**
 * Interactive loop: choose a scope, then run commands against it until quit.
 * The assessment is recomputed only when the scope changes.
 */
export async function runMenuMode(state: AppState, ctx: CommandContext, io: MenuIO): Promise<void> {
  try {
    if (!state.assessment && !(await promptScope(state, io))) return;

    for (;;) {
      io.print(formatActionMenu(state));
      const input = (await io.ask('Choose an action: ')).trim().toLowerCase();
      const entry = QUIT_INPUTS.includes(input) ? quitEntry : MENU.get(input);
      if (!entry) {
        io.print(`Invalid selection "${input}". Choose one of the listed options.`);
        continue;
      }

      const step = await runEntry(entry, state, ctx, io);
      if (step === 'quit') break;
      if (step === 'change-scope' && !(await promptScope(state, io))) break;
    }
  } catch (error: unknown) {
    logger.error(`Menu aborted: ${formatErrorMessage(error)}`);
    throw error;
  } finally {
    io.close();
  }
}
