import { writeFile } from 'fs/promises';
import * as path from 'path';
import { ExportWriteFailure, formatErrorMessage } from '../errors';
import type { CatalogCriticality, ContainerInstance } from '../types/impact';
import type { Catalog } from './catalog';

export const TEMPLATE_DESCRIPTION = 'Enter description here';
// Not a valid criticality: the template only loads as a catalog once edited
export const TEMPLATE_CRITICALITY = 'low/medium/high';

export interface TemplateEntry {
  description: string;
  dependencies: string[];
  criticality: CatalogCriticality | typeof TEMPLATE_CRITICALITY;
}

export type CatalogTemplate = Record<string, Record<string, TemplateEntry>>;

// container_info.json -> container_info_template.json
export function templatePathFor(catalogPath: string): string {
  const { dir, name, ext } = path.parse(catalogPath);
  return path.join(dir, `${name}_template${ext || '.json'}`);
}

// Skeleton catalog covering every container in the inventory.
// Entries already described in `existing` are carried over unchanged.
export function buildCatalogTemplate(
  instances: readonly ContainerInstance[],
  existing?: Catalog | undefined
): CatalogTemplate {
  const merged: CatalogTemplate = existing ? existing.toDocument() : {};

  for (const instance of instances) {
    const containers = merged[instance.namespace] ?? {};
    if (!containers[instance.container]) {
      containers[instance.container] = {
        description: TEMPLATE_DESCRIPTION,
        dependencies: [],
        criticality: TEMPLATE_CRITICALITY
      };
    }
    merged[instance.namespace] = containers;
  }

  const template: CatalogTemplate = {};
  for (const namespace of Object.keys(merged).sort()) {
    const containers = merged[namespace] ?? {};
    const ordered: CatalogTemplate[string] = {};
    for (const name of Object.keys(containers).sort()) {
      const entry = containers[name];
      if (entry) ordered[name] = entry;
    }
    template[namespace] = ordered;
  }
  return template;
}

export async function writeCatalogTemplate(file: string, template: CatalogTemplate): Promise<void> {
  try {
    await writeFile(file, `${JSON.stringify(template, null, 2)}\n`, 'utf8');
  } catch (error: unknown) {
    throw new ExportWriteFailure(file, `Could not write catalog template ${file}: ${formatErrorMessage(error)}`, {
      cause: error
    });
  }
}
