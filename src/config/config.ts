export interface AppConfig {
  catalogPath: string;
  outputDir: string;
  inventoryTimeoutMs: number;
  dedupeGaps: boolean;
}

const DEFAULT_INVENTORY_TIMEOUT_MS = 30_000;

export function getConfig(): AppConfig {
  return {
    catalogPath: process.env.IMPACT_CATALOG_PATH || 'container_info.json',
    outputDir: process.env.IMPACT_OUTPUT_DIR || '.',
    inventoryTimeoutMs: parsePositiveInt(process.env.IMPACT_INVENTORY_TIMEOUT_MS, DEFAULT_INVENTORY_TIMEOUT_MS),
    dedupeGaps: process.env.IMPACT_DEDUPE_GAPS === 'true'
  };
}

export function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

