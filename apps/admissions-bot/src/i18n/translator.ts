import { z } from 'zod';
import type { Locale } from '@admissions/shared-kernel';
import rawCatalog from '../../locales/translations.json';

type CatalogNode = string | { [key: string]: CatalogNode };

const CatalogNodeSchema: z.ZodType<CatalogNode> = z.lazy(() => z.union([z.string(), z.record(CatalogNodeSchema)]));

export const CatalogSchema = z.record(CatalogNodeSchema);
export type Catalog = z.infer<typeof CatalogSchema>;

export type Substitutions = Record<string, string | number>;

export interface Translator {
  readonly defaultLocale: Locale;
  t(key: string, locale: Locale, substitutions?: Substitutions): string;
}

function resolve(catalog: Catalog, path: string[]): CatalogNode | undefined {
  let node: CatalogNode | undefined = catalog;
  for (const segment of path) {
    if (node === undefined || typeof node === 'string') return undefined;
    node = node[segment];
  }
  return node;
}

function substitute(template: string, substitutions: Substitutions): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in substitutions ? String(substitutions[name]) : match,
  );
}

/**
 * Dotted-key lookup over a nested catalog whose leaves are keyed by locale.
 * Falls back to the default locale, then to the key itself.
 */
export class CatalogTranslator implements Translator {
  constructor(
    private readonly catalog: Catalog,
    readonly defaultLocale: Locale,
    private readonly globals: Substitutions = {},
  ) {}

  t(key: string, locale: Locale, substitutions: Substitutions = {}): string {
    const node = resolve(this.catalog, key.split('.'));
    if (node === undefined || typeof node === 'string') return key;

    const localized = node[locale] ?? node[this.defaultLocale];
    if (typeof localized !== 'string') return key;
    return substitute(localized, { ...this.globals, ...substitutions });
  }
}

export function loadCatalog(): Catalog {
  return CatalogSchema.parse(rawCatalog);
}
