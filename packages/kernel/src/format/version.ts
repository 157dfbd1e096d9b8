/**
 * Resforge Kernel — Descriptor Format Versions
 *
 * The format version tells a reader which layout a project's data files use.
 * It increases whenever the layout of any data file changes between tool
 * releases; `save()` always stamps the current value.
 */

/** Latest project format version. */
export const FORMAT_VERSION = 13;

/**
 * First format version whose descriptors carry a module configuration block.
 * Projects older than this were created before modules could be configured.
 */
export const MODULE_CONFIGURATION_EPOCH = 13;

/** Version assumed for descriptors written before versioning existed. */
export const DEFAULT_DESCRIPTOR_VERSION = 1;

/** Human-readable release name for each known format version. */
export const VERSION_NAMES: Readonly<Record<number, string>> = {
  1: '1.0',
  2: '1.1',
  3: '1.2',
  4: '1.3',
  5: '2.0.4',
  6: '2.1',
  7: '2.2',
  8: '2.3.1',
  9: '3.33',
  10: '4.0',
  11: '4.1',
  12: '4.2',
  13: 'NEXT',
};

export const UNKNOWN_VERSION_NAME = 'Unknown Version';

export function getVersionName(version: number): string {
  return VERSION_NAMES[version] ?? UNKNOWN_VERSION_NAME;
}

/** True if a project at `version` must be upgraded before use. */
export function needsUpgrade(version: number): boolean {
  return version < FORMAT_VERSION;
}

/** True if `version` was written by a newer release than this one. */
export function isNewerThanSupported(version: number): boolean {
  return version > FORMAT_VERSION;
}
