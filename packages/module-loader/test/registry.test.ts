/**
 * Resforge Module Loader — ModuleRegistry Tests
 *
 *   RG-U1: discovery is lazy
 *   RG-U2: discovery yields manifest order
 *   RG-U3: concurrent first calls share one discovery
 *   RG-U4: a failed entry rejects with ModuleResolutionError, and stays failed
 *   RG-U5: file-backed source reads a manifest and a built-in directory
 */

import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { ModuleNotFoundError, ModuleResolutionError } from '@resforge/kernel';
import type { EditingModuleType } from '@resforge/kernel';
import { ModuleRegistry, createFileModuleSource } from '../src/index.js';
import type { ModuleSource } from '../src/index.js';

const FIXTURES = fileURLToPath(new URL('./fixtures', import.meta.url));

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function stubType(name: string): EditingModuleType {
  return { name, isCompatibleWithTargetType: () => true };
}

/** In-memory source that counts manifest reads. */
class CountingSource implements ModuleSource {
  manifestReads = 0;

  constructor(
    private readonly names: ReadonlyArray<string>,
    private readonly missing: ReadonlySet<string> = new Set(),
  ) {}

  async readManifest(): Promise<ReadonlyArray<string>> {
    this.manifestReads += 1;
    await Promise.resolve();
    return this.names;
  }

  async resolveBuiltin(name: string): Promise<EditingModuleType> {
    if (this.missing.has(name)) {
      throw new ModuleNotFoundError(name);
    }
    return stubType(name.slice(name.lastIndexOf('.') + 1));
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ModuleRegistry', () => {
  it('RG-U1: nothing is discovered until first use', async () => {
    const source = new CountingSource(['a.One']);
    const registry = new ModuleRegistry(source);

    expect(registry.isLoaded()).toBe(false);
    expect(source.manifestReads).toBe(0);

    await registry.getDefaultModules();

    expect(registry.isLoaded()).toBe(true);
    expect(source.manifestReads).toBe(1);
  });

  it('RG-U2: modules come back in manifest order', async () => {
    const registry = new ModuleRegistry(new CountingSource(['b.Two', 'a.One', 'c.Three']));

    const modules = await registry.getDefaultModules();

    expect(modules.map((m) => m.name)).toEqual(['b.Two', 'a.One', 'c.Three']);
    expect(modules.map((m) => m.moduleType.name)).toEqual(['Two', 'One', 'Three']);
  });

  it('RG-U3: concurrent first calls trigger exactly one discovery', async () => {
    const source = new CountingSource(['a.One', 'b.Two']);
    const registry = new ModuleRegistry(source);

    const results = await Promise.all([
      registry.getDefaultModules(),
      registry.getDefaultModules(),
      registry.getDefaultModules(),
    ]);

    expect(source.manifestReads).toBe(1);
    expect(registry.discoveryCount).toBe(1);
    expect(results[1]).toBe(results[0]);
    expect(results[2]).toBe(results[0]);
  });

  it('RG-U4: an unresolvable entry fails discovery for good', async () => {
    const source = new CountingSource(['a.One', 'b.Gone'], new Set(['b.Gone']));
    const registry = new ModuleRegistry(source);

    const first = registry.getDefaultModules();
    await expect(first).rejects.toBeInstanceOf(ModuleResolutionError);
    await expect(first).rejects.toThrow(
      "Cannot resolve built-in module 'b.Gone': Cannot locate module 'b.Gone'",
    );
    await expect(registry.getDefaultModules()).rejects.toBeInstanceOf(ModuleResolutionError);
    expect(source.manifestReads).toBe(1);
  });

  it('RG-U4: a manifest read failure is wrapped with its cause', async () => {
    const cause = new Error('disk on fire');
    const registry = new ModuleRegistry({
      readManifest: () => Promise.reject(cause),
      resolveBuiltin: (name) => Promise.resolve(stubType(name)),
    });

    const err: unknown = await registry.getDefaultModules().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModuleResolutionError);
    expect(err).toMatchObject({
      moduleName: '<manifest>',
      message: 'Cannot read module manifest: disk on fire',
      cause,
    });
  });

  describe('RG-U5: file-backed source', () => {
    it('loads built-ins listed in a manifest file', async () => {
      const registry = new ModuleRegistry(
        createFileModuleSource({
          manifestPath: join(FIXTURES, 'modulelist.txt'),
          builtinDir: join(FIXTURES, 'builtin'),
        }),
      );

      const modules = await registry.getDefaultModules();

      expect(modules.map((m) => m.name)).toEqual(['common.Usage', 'x.Text']);
      expect(modules[0]?.moduleType.isCompatibleWithTargetType('Y')).toBe(true);
      expect(modules[1]?.moduleType.isCompatibleWithTargetType('Y')).toBe(false);
    });

    it('rejects when a listed built-in has no code', async () => {
      const registry = new ModuleRegistry(
        createFileModuleSource({
          manifestPath: join(FIXTURES, 'broken-modulelist.txt'),
          builtinDir: join(FIXTURES, 'builtin'),
        }),
      );

      await expect(registry.getDefaultModules()).rejects.toMatchObject({
        name: 'ModuleResolutionError',
        moduleName: 'x.Missing',
      });
    });

    it('the bundled source discovers without error', async () => {
      const registry = new ModuleRegistry();
      await expect(registry.getDefaultModules()).resolves.toBeDefined();
    });
  });
});
