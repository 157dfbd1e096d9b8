/**
 * commands/context.ts — per-invocation wiring shared by every command.
 *
 * Resolves RESFORGE_HOME from the global --home option, loads the host
 * configuration, and builds the module registry, resolver and event sink a
 * Project needs. One CLI invocation is one process, so the registry built
 * here is the process-wide registry.
 */

import type { Command } from 'commander';
import { isResforgeError } from '@resforge/kernel';
import { FileModuleResolver } from '@resforge/module-loader';
import {
  FileLogSink,
  FileStateIO,
  Project,
  createModuleRegistry,
  loadHostConfig,
  resolveResforgeHome,
} from '@resforge/runtime-host';
import type { HostConfig, StateIO } from '@resforge/runtime-host';

export interface CliContext {
  readonly home: string;
  readonly stateIO: StateIO;
  readonly config: HostConfig;
  open(descriptorPath: string, targetType?: string): Promise<Project>;
}

/** Build the context for the command being run, honoring the root --home option. */
export function buildContext(command: Command): CliContext {
  const home = resolveResforgeHome({ home: globalHome(command) });
  const stateIO = new FileStateIO(home);
  const config = loadHostConfig(stateIO);
  const registry = createModuleRegistry(config);
  const resolver = new FileModuleResolver({ searchRoots: config.moduleSearchRoots });
  const logSink = config.eventLog ? new FileLogSink(stateIO) : undefined;

  return {
    home,
    stateIO,
    config,
    open: (descriptorPath, targetType) =>
      Project.open(descriptorPath, { targetType, registry, resolver, logSink }),
  };
}

/**
 * Report a failed command as `[resforge <command>] <message>` and exit 1.
 * Errors that are not ResforgeErrors also print their stack.
 */
export function fail(commandLabel: string, err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  // eslint-disable-next-line no-console
  console.error(`[resforge ${commandLabel}] ${message}`);
  if (err instanceof Error && !isResforgeError(err) && err.stack !== undefined) {
    // eslint-disable-next-line no-console
    console.error(err.stack);
  }
  process.exit(1);
}

/** Wrap an async action so failures go through fail(). */
export function guarded<A extends unknown[]>(
  commandLabel: string,
  action: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err: unknown) {
      fail(commandLabel, err);
    }
  };
}

function globalHome(command: Command): string | undefined {
  let root = command;
  while (root.parent !== null) {
    root = root.parent;
  }
  const home: unknown = root.opts()['home'];
  return typeof home === 'string' ? home : undefined;
}
