import { FORMAT_VERSION, VERSION_NAMES } from '@resforge/kernel'
import { t } from '../theme.js'

/**
 * renderVersions — the descriptor format version table, oldest first.
 * The current version is marked.
 */
export function renderVersions(): string {
  let out = '\n'
  const versions = Object.keys(VERSION_NAMES).map(Number).sort((a, b) => a - b)
  for (const version of versions) {
    const name = VERSION_NAMES[version] ?? ''
    const current = version === FORMAT_VERSION
    out += (
      '  ' +
      t.muted(String(version).padStart(3)) +
      '  ' +
      (current ? t.white(name) + '  ' + t.blue('current') : t.text(name)) +
      '\n'
    )
  }
  return out + '\n'
}
