import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CATALOG,
  extendCatalog,
  glyphFor,
  isKnownKind,
  unknownKinds,
} from './catalog';
import { openGraph } from './graph';

describe('glyphFor', () => {
  it('returns the catalog entry for a known kind', () => {
    expect(glyphFor('relational-store')).toEqual({
      shape: 'cylinder',
      fillcolor: '#C5CAE9',
      fontcolor: '#1A237E',
    });
  });

  it('falls back to the generic glyph for unknown kinds', () => {
    expect(glyphFor('mainframe')).toEqual(DEFAULT_CATALOG.generic);
  });

  it('does not treat Object.prototype members as kinds', () => {
    expect(glyphFor('constructor')).toEqual(DEFAULT_CATALOG.generic);
    expect(isKnownKind('toString')).toBe(false);
  });

  it('falls back to the built-in generic glyph when a custom catalog has none', () => {
    const catalog = {
      compute: { shape: 'box', fillcolor: '#111111', fontcolor: '#EEEEEE' },
    };
    expect(glyphFor('queue', catalog)).toEqual(DEFAULT_CATALOG.generic);
  });
});

describe('extendCatalog', () => {
  it('adds and replaces entries without touching the built-in catalog', () => {
    const catalog = extendCatalog({
      queue: { shape: 'box', fillcolor: '#000000', fontcolor: '#FFFFFF' },
      mainframe: { shape: 'box3d', fillcolor: '#CCCCCC', fontcolor: '#000000' },
    });

    expect(glyphFor('queue', catalog).shape).toBe('box');
    expect(glyphFor('mainframe', catalog).shape).toBe('box3d');
    expect(glyphFor('cache', catalog).shape).toBe('cylinder');
    expect(glyphFor('queue').shape).toBe('cds');
  });
});

describe('unknownKinds', () => {
  it('lists unknown kinds once, in first-use order, including nested nodes', () => {
    const g = openGraph('T');
    g.createNode('a', 'mainframe');
    g.cluster('C', (c) => {
      c.createNode('b', 'compute');
      c.cluster('D', (d) => d.createNode('c', 'punch-cards'));
    });
    g.createNode('d', 'mainframe');

    expect(unknownKinds(g.close())).toEqual(['mainframe', 'punch-cards']);
  });
});
