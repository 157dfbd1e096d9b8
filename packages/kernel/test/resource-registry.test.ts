/**
 * Resforge Kernel — ResourceRegistry Tests
 *
 *   RR-U1: ensureEntry registers `<resource>.<extension>` on first access
 *   RR-U2: ensureEntry is idempotent and never overwrites a stored path
 *   RR-U3: remove throws UnknownResourceError for unknown module or resource
 *   RR-U4: after remove, ensureEntry re-registers a fresh default entry
 *   RR-U5: construction copies the initial map; toRecord snapshots
 */

import { describe, it, expect } from 'vitest';
import { ResourceRegistry, UnknownResourceError, defaultResourceFilename } from '../src/index.js';

describe('ResourceRegistry — RR-U1: lazy default entries', () => {
  it('uses the dat extension when none is given', () => {
    const registry = new ResourceRegistry();

    expect(registry.ensureEntry('eb.TextModule', 'text_data').relativePath).toBe('text_data.dat');
    expect(registry.toRecord()).toEqual({ 'eb.TextModule': { text_data: 'text_data.dat' } });
  });

  it('uses the requested extension', () => {
    const registry = new ResourceRegistry();

    expect(registry.ensureEntry('eb.MapModule', 'map_tiles', 'map').relativePath).toBe('map_tiles.map');
  });

  it('reports whether the entry was created', () => {
    const registry = new ResourceRegistry();

    expect(registry.ensureEntry('m', 'r', 'yml')).toEqual({ relativePath: 'r.yml', created: true });
    expect(registry.ensureEntry('m', 'r', 'yml')).toEqual({ relativePath: 'r.yml', created: false });
  });

  it('defaultResourceFilename joins name and extension', () => {
    expect(defaultResourceFilename('Fonts/0')).toBe('Fonts/0.dat');
    expect(defaultResourceFilename('Fonts/0', 'png')).toBe('Fonts/0.png');
  });
});

describe('ResourceRegistry — RR-U2: idempotent access', () => {
  it('returns the same path twice and registers once', () => {
    const registry = new ResourceRegistry();

    const first = registry.ensureEntry('m', 'r', 'yml').relativePath;
    const second = registry.ensureEntry('m', 'r', 'yml').relativePath;

    expect(first).toBe(second);
    expect(registry.size()).toBe(1);
  });

  it('keeps a stored path even when a different extension is requested', () => {
    const registry = new ResourceRegistry({ m: { r: 'custom/dir/r.bin' } });

    expect(registry.ensureEntry('m', 'r', 'yml').relativePath).toBe('custom/dir/r.bin');
  });
});

describe('ResourceRegistry — RR-U3: remove on unknown keys', () => {
  it('throws for an unknown module', () => {
    const registry = new ResourceRegistry();

    expect(() => registry.remove('m', 'r')).toThrow('No such module: m');
  });

  it('throws for an unknown resource in a known module', () => {
    const registry = new ResourceRegistry({ m: { other: 'other.dat' } });

    let caught: unknown;
    try {
      registry.remove('m', 'r');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(UnknownResourceError);
    expect(caught).toMatchObject({ kind: 'not_found', moduleName: 'm', resourceName: 'r' });
  });
});

describe('ResourceRegistry — RR-U4: remove then ensureEntry', () => {
  it('returns the removed path and re-registers the default afterwards', () => {
    const registry = new ResourceRegistry({ m: { r: 'custom/r.bin' } });

    expect(registry.remove('m', 'r')).toBe('custom/r.bin');
    expect(registry.lookup('m', 'r')).toBeUndefined();
    expect(registry.ensureEntry('m', 'r').relativePath).toBe('r.dat');
  });

  it('keeps the emptied module key', () => {
    const registry = new ResourceRegistry({ m: { r: 'r.dat' } });

    registry.remove('m', 'r');

    expect(registry.modules()).toEqual(['m']);
    expect(registry.toRecord()).toEqual({ m: {} });
  });
});

describe('ResourceRegistry — RR-U5: construction and snapshots', () => {
  it('copies the initial map', () => {
    const initial: Record<string, Record<string, string>> = { m: { r: 'r.dat' } };
    const registry = new ResourceRegistry(initial);
    initial['m'] = {};

    expect(registry.lookup('m', 'r')).toBe('r.dat');
  });

  it('lists modules, including empty ones, and counts resources', () => {
    const registry = new ResourceRegistry({ a: { x: 'x.dat', y: 'y.dat' }, b: {} });

    expect(registry.modules()).toEqual(['a', 'b']);
    expect(registry.size()).toBe(2);
  });

  it('toRecord is detached from later mutation', () => {
    const registry = new ResourceRegistry();
    registry.ensureEntry('m', 'r');
    const snapshot = registry.toRecord();

    registry.ensureEntry('m', 's');

    expect(snapshot).toEqual({ m: { r: 'r.dat' } });
  });
});
