import { existsSync } from 'fs';
import { getLogger } from '@fluidware-it/saddlebag';
import { loadCatalog } from '../catalog/catalog';
import { buildCatalogTemplate, templatePathFor, writeCatalogTemplate } from '../catalog/template';
import { createCoreApi } from '../cluster/k8sClient';
import { fetchInventory, loadInventorySnapshot } from '../cluster/inventorySource';
import type { AppConfig } from '../config/config';
import { ExportWriteFailure, InvalidSelection, SourceUnavailable, formatErrorMessage } from '../errors';
import { ExportSink } from '../export/exportSink';
import { extractInstances } from '../inventory/inventoryExtractor';
import type { Scope } from '../types/impact';
import type { RawInventory } from '../types/k8s';
import { parseAction, runCommand, selectScope, type AppState, type CommandContext } from './commands';
import { createConsoleIO, runMenuMode, type MenuIO } from './menuMode';
import type { CliArgs } from './parser';

const logger = getLogger();

export const EXIT_OK = 0;
export const EXIT_PRECONDITION = 1;
export const EXIT_EXPORT_FAILED = 2;

export interface AppDeps {
  loadInventory?: ((args: CliArgs, config: AppConfig) => Promise<RawInventory>) | undefined;
  print?: ((text: string) => void) | undefined;
  now?: (() => Date) | undefined;
  io?: MenuIO | undefined;
}

async function defaultLoadInventory(args: CliArgs, config: AppConfig): Promise<RawInventory> {
  if (args.inventory) {
    return loadInventorySnapshot(args.inventory);
  }
  return fetchInventory(createCoreApi(args.context), args.timeoutMs ?? config.inventoryTimeoutMs);
}

function requestedScope(args: CliArgs): Scope | undefined {
  if (args.allNodes) return { kind: 'all-nodes' };
  if (args.node) return { kind: 'single-node', node: args.node };
  return undefined;
}

// The live catalog is never overwritten: the template goes to a file of its own
async function runTemplate(catalogPath: string, inventory: RawInventory): Promise<number> {
  const existing = existsSync(catalogPath) ? await loadCatalog(catalogPath) : undefined;
  const template = buildCatalogTemplate(extractInstances(inventory, { kind: 'all-nodes' }), existing);
  const templatePath = templatePathFor(catalogPath);
  try {
    await writeCatalogTemplate(templatePath, template);
  } catch (error: unknown) {
    if (error instanceof ExportWriteFailure) {
      logger.error(error.message);
      return EXIT_EXPORT_FAILED;
    }
    throw error;
  }
  logger.info(`Template saved to ${templatePath}. Fill in every entry, then save it as ${catalogPath}.`);
  return EXIT_OK;
}

/**
 * Load the catalog and inventory, then either run a single action or start
 * the interactive menu. Resolves with the process exit code.
 */
export async function runApp(args: CliArgs, config: AppConfig, deps: AppDeps = {}): Promise<number> {
  const catalogPath = args.catalog ?? config.catalogPath;
  const print = deps.print ?? ((text: string) => console.log(text));
  const loadInventory = deps.loadInventory ?? defaultLoadInventory;

  try {
    if (args.template) {
      return await runTemplate(catalogPath, await loadInventory(args, config));
    }

    // Catalog first: no point querying the cluster without it
    const catalog = await loadCatalog(catalogPath);
    const inventory = await loadInventory(args, config);

    const state: AppState = {
      catalog,
      inventory,
      resolveOptions: { dedupeGaps: args.dedupeGaps || config.dedupeGaps }
    };
    const ctx: CommandContext = {
      sink: new ExportSink(args.output ?? config.outputDir, deps.now),
      print,
      now: deps.now ?? (() => new Date())
    };

    const scope = requestedScope(args);
    if (scope) selectScope(state, scope);

    if (!args.action) {
      await runMenuMode(state, ctx, deps.io ?? createConsoleIO());
      return EXIT_OK;
    }

    const action = parseAction(args.action);
    const result = await runCommand(action, state, ctx);
    if (result.path) print(`Saved to ${result.path}`);
    return EXIT_OK;
  } catch (error: unknown) {
    if (error instanceof SourceUnavailable || error instanceof InvalidSelection) {
      logger.error(error.message);
      return EXIT_PRECONDITION;
    }
    if (error instanceof ExportWriteFailure) {
      logger.error(`Export failed: ${error.message}`);
      return EXIT_EXPORT_FAILED;
    }
    logger.error(`Unexpected failure: ${formatErrorMessage(error)}`);
    throw error;
  }
}
