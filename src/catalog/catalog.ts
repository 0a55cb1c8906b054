import { readFile } from 'fs/promises';
import { z } from 'zod';
import { getLogger } from '@fluidware-it/saddlebag';
import { Criticality, type CatalogEntry } from '../types/impact';
import { SourceUnavailable, formatErrorMessage } from '../errors';

const logger = getLogger();

const catalogEntrySchema = z.object({
  description: z.string(),
  dependencies: z.array(z.string()).default([]),
  criticality: z.enum([Criticality.HIGH, Criticality.MEDIUM, Criticality.LOW])
});

// { [namespace]: { [container]: entry } }
export const catalogDocumentSchema = z.record(z.string(), z.record(z.string(), catalogEntrySchema));

export type CatalogDocument = z.infer<typeof catalogDocumentSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

/**
 * Read-only index of known containers keyed by (namespace, container name).
 *
 * Lookups are exact. The catalog never invents a default for a missing entry;
 * deciding what an unknown container means is left to the caller.
 */
export class Catalog {
  private readonly entries: ReadonlyMap<string, ReadonlyMap<string, CatalogEntry>>;

  private constructor(entries: Map<string, Map<string, CatalogEntry>>) {
    this.entries = entries;
  }

  // Validates the whole document first: one bad entry rejects the catalog
  static fromDocument(document: unknown, source = 'catalog'): Catalog {
    const parsed = catalogDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new SourceUnavailable(source, `Invalid catalog ${source}: ${describeIssues(parsed.error)}`, {
        cause: parsed.error
      });
    }

    const entries = new Map<string, Map<string, CatalogEntry>>();
    for (const [namespace, containers] of Object.entries(parsed.data)) {
      const byName = new Map<string, CatalogEntry>();
      for (const [name, info] of Object.entries(containers)) {
        byName.set(
          name,
          Object.freeze({
            namespace,
            name,
            description: info.description,
            dependencies: Object.freeze([...info.dependencies]),
            criticality: info.criticality
          })
        );
      }
      entries.set(namespace, byName);
    }

    return new Catalog(entries);
  }

  lookup(namespace: string, name: string): CatalogEntry | undefined {
    return this.entries.get(namespace)?.get(name);
  }

  get size(): number {
    let count = 0;
    for (const byName of this.entries.values()) {
      count += byName.size;
    }
    return count;
  }

  namespaces(): string[] {
    return [...this.entries.keys()].sort();
  }

  toDocument(): CatalogDocument {
    const document: CatalogDocument = {};
    for (const [namespace, byName] of this.entries) {
      const containers: CatalogDocument[string] = {};
      for (const [name, entry] of byName) {
        containers[name] = {
          description: entry.description,
          dependencies: [...entry.dependencies],
          criticality: entry.criticality
        };
      }
      document[namespace] = containers;
    }
    return document;
  }
}

export async function loadCatalog(path: string): Promise<Catalog> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error: unknown) {
    throw new SourceUnavailable(path, `Catalog file ${path} could not be read: ${formatErrorMessage(error)}`, {
      cause: error
    });
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error: unknown) {
    throw new SourceUnavailable(path, `Catalog file ${path} is not valid JSON: ${formatErrorMessage(error)}`, {
      cause: error
    });
  }

  const catalog = Catalog.fromDocument(document, path);
  logger.info(`Catalog loaded from ${path}: ${catalog.size} container(s) in ${catalog.namespaces().length} namespace(s)`);
  return catalog;
}
