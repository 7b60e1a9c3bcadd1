import { isRecord } from '../config/schema.js';

export type CatalogTree = { [key: string]: string | CatalogTree };

/** The view of a translation file the engine needs. */
export interface CatalogTransformer {
  /** Every string, keyed by its flattened key. */
  flatten(): Record<string, string>;
  isTranslated(key: string): boolean;
  updateString(key: string, value: string): void;
  entries(): Array<[string, string]>;
}

function flattenInto(value: unknown, prefix: string, out: Map<string, string>): void {
  if (typeof value === 'string') {
    if (prefix) out.set(prefix, value);
    return;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    if (prefix) out.set(prefix, String(value));
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item, index) => flattenInto(item, prefix ? `${prefix}.${index}` : String(index), out));
    return;
  }
  if (isRecord(value)) {
    for (const [key, child] of Object.entries(value)) {
      flattenInto(child, prefix ? `${prefix}.${key}` : key, out);
    }
  }
}

/** In-memory JSON catalog with dot-separated keys for nested objects. */
export class JsonCatalogTransformer implements CatalogTransformer {
  private readonly strings = new Map<string, string>();

  constructor(content: unknown = {}) {
    flattenInto(content, '', this.strings);
  }

  static parse(json: string): JsonCatalogTransformer {
    return new JsonCatalogTransformer(JSON.parse(json));
  }

  flatten(): Record<string, string> {
    return Object.fromEntries(this.strings);
  }

  isTranslated(key: string): boolean {
    const value = this.strings.get(key);
    return value !== undefined && value.trim() !== '';
  }

  updateString(key: string, value: string): void {
    this.strings.set(key, value);
  }

  entries(): Array<[string, string]> {
    return [...this.strings.entries()];
  }

  get size(): number {
    return this.strings.size;
  }

  toJSON(): CatalogTree {
    const tree: CatalogTree = {};
    for (const [key, value] of this.strings) {
      const parts = key.split('.');
      let node = tree;
      let index = 0;
      for (; index < parts.length - 1; index++) {
        const child = node[parts[index]];
        if (typeof child === 'string') break;
        if (child === undefined) {
          const created: CatalogTree = {};
          node[parts[index]] = created;
          node = created;
        } else {
          node = child;
        }
      }
      // A string already sits on the path, so the rest stays dotted.
      node[parts.slice(index).join('.')] = value;
    }
    return tree;
  }

  stringify(indent = 2): string {
    return JSON.stringify(this.toJSON(), null, indent);
  }
}

/** Finds the catalog for a target locale. */
export type CatalogResolver = (locale: string) => CatalogTransformer | undefined;

export function catalogResolver(
  catalogs: CatalogResolver | Readonly<Record<string, CatalogTransformer>>
): CatalogResolver {
  return typeof catalogs === 'function' ? catalogs : (locale) => catalogs[locale];
}
