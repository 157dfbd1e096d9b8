/**
 * Resforge Runtime Host — RESFORGE_HOME Resolution
 *
 * Resolves the Resforge home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. RESFORGE_HOME environment variable
 *   3. OS application config file (last home chosen with persist: true)
 *   4. Default: ~/.resforge
 *
 * The home holds host-wide state, never project data:
 *
 *   <RESFORGE_HOME>/
 *     state/
 *       host-config.json
 *     logs/
 *       project-events.jsonl
 *
 * Projects live wherever their descriptor file is.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir, platform } from 'node:os';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Platform-specific path to the Resforge application config file.
 *
 *   macOS:   ~/Library/Preferences/resforge/config.json
 *   Windows: %APPDATA%\resforge\config.json (fallback: ~/AppData/Roaming/resforge/config.json)
 *   Linux:   ~/.config/resforge/config.json
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'resforge', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'resforge', 'config.json');
    }
    default:
      return join(home, '.config', 'resforge', 'config.json');
  }
}

// ---------------------------------------------------------------------------
// OS Config Read / Write
// ---------------------------------------------------------------------------

const OsConfigSchema = z.object({
  resforgeHome: z.string().min(1).optional(),
});

/**
 * Read the persisted home path from the OS config file.
 *
 * Returns null if the file is absent, unreadable, or has no usable
 * `resforgeHome` entry.
 */
export function readHomeFromConfig(configPath: string = getOsConfigPath()): string | null {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch {
    return null;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = OsConfigSchema.safeParse(json);
  return parsed.success ? (parsed.data.resforgeHome ?? null) : null;
}

/** Persist a home path to the OS config file, creating its directory. */
export function writeHomeToConfig(resforgeHome: string, configPath: string = getOsConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ resforgeHome }, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

export interface ResolveHomeOptions {
  /** Explicit override; highest precedence. */
  readonly home?: string | undefined;
  /**
   * Persist the resolved home to the OS config file so later invocations
   * without --home use it. Default: false.
   */
  readonly persist?: boolean | undefined;
  /** OS config file location; tests point this at a temp directory. */
  readonly configPath?: string | undefined;
}

/**
 * Resolve the Resforge home directory, creating it if needed.
 *
 * @returns The resolved home directory
 */
export function resolveResforgeHome(opts?: ResolveHomeOptions): string {
  const configPath = opts?.configPath ?? getOsConfigPath();
  const fromEnv = process.env['RESFORGE_HOME'];
  let resforgeHome: string;

  if (typeof opts?.home === 'string' && opts.home !== '') {
    resforgeHome = opts.home;
  } else if (typeof fromEnv === 'string' && fromEnv !== '') {
    resforgeHome = fromEnv;
  } else {
    resforgeHome = readHomeFromConfig(configPath) ?? join(homedir(), '.resforge');
  }

  if (!existsSync(resforgeHome)) {
    mkdirSync(resforgeHome, { recursive: true });
  }

  if (opts?.persist === true) {
    writeHomeToConfig(resforgeHome, configPath);
  }

  return resforgeHome;
}
