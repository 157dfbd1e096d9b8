/**
 * Resforge Module Loader — Module Search Path
 *
 * An ordered list of directories searched for module code. Search paths are
 * immutable: scoping a project directory onto a resolver's path yields a new
 * ModuleSearchPath for the duration of one resolution, so the resolver's own
 * path is the same before and after, whether resolution succeeds, fails to
 * find the module, or throws. Concurrent resolutions for different projects
 * never see each other's directories.
 */

import { resolve } from 'node:path';

export class ModuleSearchPath {
  private readonly roots: ReadonlyArray<string>;

  /** @param roots - Directories in search order; resolved to absolute paths */
  constructor(roots: Iterable<string> = []) {
    this.roots = Object.freeze(Array.from(roots, (root) => resolve(root)));
  }

  get entries(): ReadonlyArray<string> {
    return this.roots;
  }

  /** A new search path that looks in `root` before this path's roots. */
  prepend(root: string): ModuleSearchPath {
    return new ModuleSearchPath([root, ...this.roots]);
  }
}
