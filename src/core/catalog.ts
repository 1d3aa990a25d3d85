/**
 * Kind catalog: static lookup from a node's kind tag to its glyph
 */

import kinds from './data/kinds.json';
import { DEFAULT_KIND } from './graph';
import type { DiagramChild, Graph, KindGlyph } from './types';

export type KindCatalog = Readonly<Record<string, KindGlyph>>;

export const DEFAULT_CATALOG: KindCatalog = kinds;

const GENERIC_GLYPH: KindGlyph = kinds.generic;

/**
 * Look up the glyph for a kind. Unknown kinds get the catalog's generic
 * glyph, never an error.
 */
export function glyphFor(
  kind: string,
  catalog: KindCatalog = DEFAULT_CATALOG,
): KindGlyph {
  if (Object.prototype.hasOwnProperty.call(catalog, kind)) {
    return catalog[kind];
  }
  if (Object.prototype.hasOwnProperty.call(catalog, DEFAULT_KIND)) {
    return catalog[DEFAULT_KIND];
  }
  return GENERIC_GLYPH;
}

/**
 * Built-in catalog with entries added or replaced
 */
export function extendCatalog(
  overrides: Record<string, KindGlyph>,
): KindCatalog {
  return { ...DEFAULT_CATALOG, ...overrides };
}

export function isKnownKind(
  kind: string,
  catalog: KindCatalog = DEFAULT_CATALOG,
): boolean {
  return Object.prototype.hasOwnProperty.call(catalog, kind);
}

/**
 * Kinds used in a graph that the catalog has no entry for, in first-use order
 */
export function unknownKinds(
  graph: Graph,
  catalog: KindCatalog = DEFAULT_CATALOG,
): string[] {
  const unknown = new Set<string>();
  const visit = (children: readonly DiagramChild[]) => {
    for (const child of children) {
      if (child.type === 'cluster') {
        visit(child.children);
      } else if (!isKnownKind(child.kind, catalog)) {
        unknown.add(child.kind);
      }
    }
  };
  visit(graph.children);
  return [...unknown];
}
