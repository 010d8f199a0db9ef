/**
 * Category table and extension classifier.
 *
 * The table is an ordered list. When an extension appears under more than one
 * category (".dmg" is both an archive and an executable), the category listed
 * first wins.
 */

import { readFileSync } from 'fs';

export interface CategoryDefinition {
  name: string;
  extensions: string[];
}

export interface Category {
  readonly name: string;
  readonly extensions: ReadonlySet<string>;
}

export type CategoryTable = readonly Category[];

const DEFAULT_CATEGORIES_URL = new URL('./data/default-categories.json', import.meta.url);

export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  if (!trimmed) return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Validate raw category definitions (from JSON or YAML) and collect every problem found.
 */
export function parseCategoryDefinitions(value: unknown): { definitions: CategoryDefinition[]; errors: string[] } {
  const errors: string[] = [];
  const definitions: CategoryDefinition[] = [];

  if (!Array.isArray(value)) {
    return { definitions, errors: ['categories must be a list of { name, extensions } entries'] };
  }

  value.forEach((item: unknown, index) => {
    if (typeof item !== 'object' || item === null) {
      errors.push(`categories[${index}] must be an object`);
      return;
    }

    const name = 'name' in item ? item.name : undefined;
    const extensions = 'extensions' in item ? item.extensions : undefined;

    if (typeof name !== 'string' || !name.trim()) {
      errors.push(`categories[${index}].name must be a non-empty string`);
      return;
    }
    if (/[\\/]/.test(name) || name.trim() === '.' || name.trim() === '..') {
      errors.push(`categories[${index}].name "${name}" is not a valid folder name`);
      return;
    }
    if (!Array.isArray(extensions) || extensions.some((ext: unknown) => typeof ext !== 'string')) {
      errors.push(`categories[${index}].extensions must be a list of strings`);
      return;
    }

    definitions.push({
      name: name.trim(),
      extensions: extensions.filter((ext): ext is string => typeof ext === 'string'),
    });
  });

  const seen = new Set<string>();
  for (const definition of definitions) {
    if (seen.has(definition.name)) {
      errors.push(`category "${definition.name}" is defined more than once`);
    }
    seen.add(definition.name);
  }

  return { definitions, errors };
}

export function createCategoryTable(definitions: CategoryDefinition[]): CategoryTable {
  const table = definitions.map((definition): Category => Object.freeze({
    name: definition.name,
    extensions: new Set(definition.extensions.map(normalizeExtension).filter(Boolean)),
  }));
  return Object.freeze(table);
}

export function loadDefaultCategoryDefinitions(): CategoryDefinition[] {
  const raw: unknown = JSON.parse(readFileSync(DEFAULT_CATEGORIES_URL, 'utf-8'));
  const { definitions, errors } = parseCategoryDefinitions(raw);
  if (errors.length > 0) {
    throw new Error(`Default category table is malformed: ${errors.join('; ')}`);
  }
  return definitions;
}

export function loadDefaultCategoryTable(): CategoryTable {
  return createCategoryTable(loadDefaultCategoryDefinitions());
}

/**
 * First category (in table order) whose extension set contains the lowercased extension.
 */
export function classify(extension: string, table: CategoryTable): string | null {
  for (const category of table) {
    if (category.extensions.has(extension)) {
      return category.name;
    }
  }
  return null;
}

/**
 * Compound suffixes of a basename, longest first: "backup.tar.gz" -> [".tar.gz", ".gz"].
 */
export function candidateExtensions(fileName: string): string[] {
  const parts = fileName.toLowerCase().replace(/^\.+/, '').split('.');
  const candidates: string[] = [];

  for (let i = 1; i < parts.length; i++) {
    const suffixParts = parts.slice(i);
    if (suffixParts.some(part => part.length === 0)) {
      continue;
    }
    candidates.push(`.${suffixParts.join('.')}`);
  }

  return candidates;
}

export function classifyFile(fileName: string, table: CategoryTable): string | null {
  for (const extension of candidateExtensions(fileName)) {
    const category = classify(extension, table);
    if (category) {
      return category;
    }
  }
  return null;
}
