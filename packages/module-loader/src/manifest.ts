/**
 * Resforge Module Loader — Module Manifest
 *
 * The manifest is a static, ordered, line-based list of built-in module
 * names. Order is significant: it defines default enable order.
 *
 *   # comment
 *   common.UsedRangeModule
 *   eb.TextModule
 *
 * Blank lines and lines whose first non-blank character is '#' are skipped.
 */

import { fileURLToPath } from 'node:url';
import { ModuleResolutionError, isModuleIdentifier } from '@resforge/kernel';

/** Marks a comment line in the manifest. */
const COMMENT_MARKER = '#';

/** Manifest shipped with this package. */
export const BUNDLED_MANIFEST_PATH = fileURLToPath(
  new URL('../assets/modulelist.txt', import.meta.url),
);

/** Directory holding the built-in module implementations named by the bundled manifest. */
export const BUNDLED_MODULES_DIR = fileURLToPath(new URL('../assets/modules', import.meta.url));

/**
 * Parse manifest text into the ordered list of module names.
 *
 * @throws {ModuleResolutionError} If a line is not a dotted identifier or a
 *   name is listed twice
 */
export function parseModuleManifest(text: string): ReadonlyArray<string> {
  const names: string[] = [];
  const seen = new Set<string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith(COMMENT_MARKER)) {
      continue;
    }
    if (!isModuleIdentifier(line)) {
      throw new ModuleResolutionError(line, `Invalid module name in manifest: '${line}'`);
    }
    if (seen.has(line)) {
      throw new ModuleResolutionError(line, `Duplicate module name in manifest: '${line}'`);
    }
    seen.add(line);
    names.push(line);
  }

  return names;
}
