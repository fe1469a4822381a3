import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { CatalogError, errorMessage } from '../errors.js';
import { TestDescriptor, Category } from '../types/descriptor.js';
import { CatalogEntry, CatalogFileSchema } from './schema.js';

export * from './schema.js';

function toDescriptor(entry: CatalogEntry): TestDescriptor {
  const descriptor: TestDescriptor = {
    name: entry.name,
    category: entry.category,
    timeoutSeconds: entry.timeout,
    ...(entry.expected_output !== undefined ? { expectedOutput: entry.expected_output } : {}),
    ...(entry.command ? { command: Object.freeze([...entry.command]) } : {}),
  };
  return Object.freeze(descriptor);
}

/**
 * Validates a parsed catalog document and returns its descriptors in file
 * order. Names must be unique.
 */
export function parseCatalog(doc: unknown, source = 'catalog'): readonly TestDescriptor[] {
  const parsed = CatalogFileSchema.safeParse(doc);
  if (!parsed.success) {
    const details = parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CatalogError(`Invalid catalog ${source}`, details);
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const entry of parsed.data.examples) {
    if (seen.has(entry.name)) duplicates.push(entry.name);
    seen.add(entry.name);
  }
  if (duplicates.length > 0) {
    throw new CatalogError(`Duplicate example names in ${source}`, duplicates);
  }

  return Object.freeze(parsed.data.examples.map(toDescriptor));
}

export async function loadCatalog(path: string): Promise<readonly TestDescriptor[]> {
  const fullPath = resolve(path);
  let text: string;
  try {
    text = await readFile(fullPath, 'utf8');
  } catch (e) {
    throw new CatalogError(`Failed to read catalog ${fullPath}`, [errorMessage(e)]);
  }

  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (e) {
    throw new CatalogError(`Failed to parse catalog ${fullPath}`, [errorMessage(e)]);
  }
  return parseCatalog(doc, fullPath);
}

export interface Selection {
  only?: readonly string[];
  category?: Category;
}

export function isSelected(descriptor: TestDescriptor, selection: Selection): boolean {
  if (selection.only && selection.only.length > 0 && !selection.only.includes(descriptor.name)) return false;
  return !selection.category || descriptor.category === selection.category;
}

/** Names passed to `--only` that the catalog does not contain. */
export function unknownNames(descriptors: readonly TestDescriptor[], only: readonly string[] = []): string[] {
  const known = new Set(descriptors.map((d) => d.name));
  return only.filter((n) => !known.has(n));
}
