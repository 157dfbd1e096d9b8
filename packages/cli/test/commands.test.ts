/**
 * Resforge CLI — Command Tests
 *
 *   CMD-U1: project create writes a descriptor with compatible defaults enabled
 *   CMD-U2: modules commands change and save the configuration
 *   CMD-U3: resource delete removes the entry
 *   CMD-U4: failures print [resforge <command>] and exit 1
 *   CMD-U5: log reads the events the commands recorded
 *
 * Each test gets a temp RESFORGE_HOME whose host-config.json points at the
 * module-loader test fixtures.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { FORMAT_VERSION } from '@resforge/kernel';
import { DESCRIPTOR_FILENAME, FileStateIO, HOST_CONFIG_FILE, decodeDescriptor } from '@resforge/runtime-host';
import { createProgram } from '../src/commands/index.js';

const FIXTURES = fileURLToPath(new URL('../../module-loader/test/fixtures/', import.meta.url));

let home: string;
let workDir: string;
let descriptor: string;
let logged: string[];
let errors: string[];

beforeEach(() => {
  home = mkdtempSync(join(tmpdir(), 'resforge-cli-home-'));
  workDir = mkdtempSync(join(tmpdir(), 'resforge-cli-work-'));
  descriptor = join(workDir, 'game', DESCRIPTOR_FILENAME);
  new FileStateIO(home).writeJson(HOST_CONFIG_FILE, {
    manifestPath: join(FIXTURES, 'modulelist.txt'),
    builtinModulesDir: join(FIXTURES, 'builtin'),
  });
  vi.stubEnv('RESFORGE_MODULE_MANIFEST', '');
  vi.stubEnv('RESFORGE_BUILTIN_MODULES', '');

  logged = [];
  errors = [];
  vi.spyOn(console, 'log').mockImplementation((message: unknown) => {
    logged.push(String(message));
  });
  vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
    errors.push(String(message));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  rmSync(home, { recursive: true, force: true });
  rmSync(workDir, { recursive: true, force: true });
});

async function run(...args: string[]): Promise<void> {
  await createProgram().parseAsync(['--home', home, ...args], { from: 'user' });
}

function lastLogged(): string {
  return logged[logged.length - 1] ?? '';
}

describe('project commands', () => {
  it('CMD-U1: create accepts a directory and writes the descriptor inside it', async () => {
    await run('project', 'create', join(workDir, 'game'), '--target', 'X');

    expect(lastLogged()).toBe(`Created ${descriptor} (X, version ${FORMAT_VERSION})`);
    const document = decodeDescriptor(readFileSync(descriptor, 'utf-8'), descriptor);
    expect(document.targetType).toBe('X');
    expect(document.version).toBe(FORMAT_VERSION);
    expect(document.moduleConfiguration).toEqual({
      enabled: ['common.Usage', 'x.Text'],
      disabled: [],
      projectSpecific: [],
    });
  });

  it('CMD-U1: upgrade reports a current project as up to date', async () => {
    await run('project', 'create', descriptor, '--target', 'X');
    await run('project', 'upgrade', descriptor);

    expect(lastLogged()).toBe(`${descriptor} is already at version ${FORMAT_VERSION} (NEXT)`);
  });
});

describe('modules commands', () => {
  it('CMD-U2: list shows the active modules in run order', async () => {
    await run('project', 'create', descriptor, '--target', 'X');
    await run('modules', 'list', descriptor, '--json');

    expect(JSON.parse(lastLogged())).toEqual(['common.Usage', 'x.Text']);
  });

  it('CMD-U2: disable is saved and drops the module from the active list', async () => {
    await run('project', 'create', descriptor, '--target', 'X');
    await run('modules', 'disable', descriptor, 'x.Text');
    expect(lastLogged()).toBe('Disabled x.Text');

    await run('modules', 'list', descriptor, '--configured', '--json');
    expect(JSON.parse(lastLogged())).toEqual({
      enabled: ['common.Usage'],
      disabled: ['x.Text'],
      projectSpecific: [],
    });

    await run('modules', 'list', descriptor, '--json');
    expect(JSON.parse(lastLogged())).toEqual(['common.Usage']);
  });

  it('CMD-U2: add-custom then remove-custom', async () => {
    await run('project', 'create', descriptor, '--target', 'X');
    await run('modules', 'add-custom', descriptor, 'acme.Patch');
    expect(lastLogged()).toBe('Added project-specific module acme.Patch');

    await run('modules', 'remove-custom', descriptor, 'acme.Patch');
    const document = decodeDescriptor(readFileSync(descriptor, 'utf-8'), descriptor);
    expect(document.moduleConfiguration?.projectSpecific).toEqual([]);
  });

  it('CMD-U2: add-defaults finds nothing new on a fresh project', async () => {
    await run('project', 'create', descriptor, '--target', 'X');
    await run('modules', 'add-defaults', descriptor);

    expect(lastLogged()).toBe('No new default modules');
  });
});

describe('resource commands', () => {
  it('CMD-U3: delete of an unregistered resource fails', async () => {
    await run('project', 'create', descriptor, '--target', 'X');
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    await expect(run('resource', 'delete', descriptor, 'x.Text', 'dialogue')).rejects.toThrow('exit 1');
    expect(errors[0]).toMatch(/^\[resforge resource delete\] /);
  });
});

describe('failures', () => {
  it('CMD-U4: enabling an unknown module prints the error and exits 1', async () => {
    await run('project', 'create', descriptor, '--target', 'X');
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    await expect(run('modules', 'enable', descriptor, 'y.Maps')).rejects.toThrow('exit 1');
    expect(errors).toEqual(["[resforge modules enable] No built-in module named 'y.Maps'"]);
  });

  it('CMD-U4: opening a missing descriptor without a target type fails', async () => {
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    await expect(run('project', 'show', descriptor)).rejects.toThrow('exit 1');
    expect(errors).toEqual([`[resforge project show] Can't make new project of unknown type: ${descriptor}`]);
  });
});

describe('log command', () => {
  it('CMD-U5: events recorded by earlier commands are listed', async () => {
    await run('project', 'create', descriptor, '--target', 'X');
    await run('modules', 'disable', descriptor, 'x.Text');
    await run('log', '--json');

    const output: unknown = JSON.parse(lastLogged());
    expect(output).toMatchObject({ stats: { parseErrors: 0, duplicates: 0 } });
    const kinds = readEventTypes(output);
    expect(kinds.filter((k) => k === 'project_created')).toHaveLength(1);
    expect(kinds.filter((k) => k === 'project_opened')).toHaveLength(1);
    expect(kinds.filter((k) => k === 'project_saved')).toHaveLength(2);
  });

  it('CMD-U5: --project keeps only that descriptor\'s events', async () => {
    const other = join(workDir, 'other', DESCRIPTOR_FILENAME);
    await run('project', 'create', descriptor, '--target', 'X');
    await run('project', 'create', other, '--target', 'Y');
    await run('log', '--json', '--project', other);

    const output: unknown = JSON.parse(lastLogged());
    expect(readEventTypes(output).sort()).toEqual(['project_created', 'project_saved']);
  });
});

function readEventTypes(output: unknown): string[] {
  if (typeof output !== 'object' || output === null || !('events' in output) || !Array.isArray(output.events)) {
    throw new Error('log output has no events array');
  }
  return output.events.map((e: unknown) =>
    typeof e === 'object' && e !== null && 'event_type' in e ? String(e.event_type) : '');
}
