/**
 * Resforge Kernel — Resource Registry
 *
 * In-memory map from (module name, resource name) to a file path relative to
 * the project directory. Entries are created lazily with the default filename
 * `<resource name>.<extension>`.
 *
 * The registry knows nothing about the filesystem. The runtime host resolves
 * paths, creates directories and removes files; registry state and file state
 * are not transactionally linked.
 */

import { UnknownResourceError } from '../errors.js';
import type { ResourceMap } from '../types/resource.js';
import { DEFAULT_RESOURCE_EXTENSION } from '../types/resource.js';

/** Result of ensureEntry(). */
export interface ResourceEntry {
  readonly relativePath: string;
  /** True if this call registered the entry. */
  readonly created: boolean;
}

/** Default filename for a resource that has no registered path yet. */
export function defaultResourceFilename(
  resourceName: string,
  extension: string = DEFAULT_RESOURCE_EXTENSION,
): string {
  return `${resourceName}.${extension}`;
}

export class ResourceRegistry {
  private readonly entries: Map<string, Map<string, string>> = new Map();

  /**
   * @param initial - Resource map decoded from a descriptor. Copied; later
   *   mutation of `initial` does not affect the registry.
   */
  constructor(initial: ResourceMap = {}) {
    for (const [moduleName, resources] of Object.entries(initial)) {
      this.entries.set(moduleName, new Map(Object.entries(resources)));
    }
  }

  /**
   * Return the registered path for a resource, registering the default
   * filename first if the pair is absent.
   */
  ensureEntry(
    moduleName: string,
    resourceName: string,
    extension: string = DEFAULT_RESOURCE_EXTENSION,
  ): ResourceEntry {
    let resources = this.entries.get(moduleName);
    if (resources === undefined) {
      resources = new Map();
      this.entries.set(moduleName, resources);
    }
    const existing = resources.get(resourceName);
    if (existing !== undefined) {
      return { relativePath: existing, created: false };
    }
    const relativePath = defaultResourceFilename(resourceName, extension);
    resources.set(resourceName, relativePath);
    return { relativePath, created: true };
  }

  lookup(moduleName: string, resourceName: string): string | undefined {
    return this.entries.get(moduleName)?.get(resourceName);
  }

  /**
   * Remove a registered resource and return its relative path.
   *
   * The module key stays in place even when its last resource is removed.
   *
   * @throws {UnknownResourceError} If the module or the resource is not registered
   */
  remove(moduleName: string, resourceName: string): string {
    const resources = this.entries.get(moduleName);
    if (resources === undefined) {
      throw new UnknownResourceError(moduleName);
    }
    const relativePath = resources.get(resourceName);
    if (relativePath === undefined) {
      throw new UnknownResourceError(moduleName, resourceName);
    }
    resources.delete(resourceName);
    return relativePath;
  }

  /** Module names with a resource map, including empty ones. */
  modules(): ReadonlyArray<string> {
    return Array.from(this.entries.keys());
  }

  /** Total number of registered resources across all modules. */
  size(): number {
    let total = 0;
    for (const resources of this.entries.values()) {
      total += resources.size;
    }
    return total;
  }

  /** Plain-object snapshot suitable for encoding. */
  toRecord(): ResourceMap {
    const record: Record<string, Record<string, string>> = {};
    for (const [moduleName, resources] of this.entries) {
      record[moduleName] = Object.fromEntries(resources);
    }
    return record;
  }
}
