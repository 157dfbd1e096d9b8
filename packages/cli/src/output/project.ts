import { getVersionName, isNewerThanSupported, needsUpgrade } from '@resforge/kernel'
import type { ModuleConfigurationRecord, ResourceMap, TargetType } from '@resforge/kernel'
import { t } from '../theme.js'

export interface ProjectSummary {
  readonly descriptorPath: string
  readonly targetType: TargetType
  readonly version: number
  readonly resources: ResourceMap
  readonly modules: ModuleConfigurationRecord
}

const labelW = 20
const label = (s: string) => t.muted(s + ' '.repeat(Math.max(1, labelW - s.length)))

/**
 * renderProject — descriptor summary for `resforge project show`.
 */
export function renderProject(summary: ProjectSummary): string {
  const resourceCount = Object.values(summary.resources)
    .reduce((n, entries) => n + Object.keys(entries).length, 0)
  const moduleCount = Object.keys(summary.resources).length

  let out = '\n'
  out += '  ' + t.white(summary.descriptorPath) + '\n\n'
  out += '  ' + label('target type') + t.blue(summary.targetType) + '\n'
  out += (
    '  ' +
    label('version') +
    t.text(`${summary.version} (${getVersionName(summary.version)})`) +
    versionNote(summary.version) +
    '\n'
  )
  out += '  ' + label('resources') + t.text(`${resourceCount} in ${moduleCount} module(s)`) + '\n'

  out += renderList('enabled modules', summary.modules.enabled, t.green('●'))
  out += renderList('disabled modules', summary.modules.disabled, t.dim('○'))
  out += renderList('project-specific modules', summary.modules.projectSpecific, t.blue('◆'))
  return out + '\n'
}

function versionNote(version: number): string {
  if (needsUpgrade(version)) return '  ' + t.amber('upgrade available')
  if (isNewerThanSupported(version)) return '  ' + t.red('written by a newer release')
  return ''
}

function renderList(title: string, names: ReadonlyArray<string>, marker: string): string {
  let out = '\n  ' + t.muted(title) + '\n'
  if (names.length === 0) {
    return out + '    ' + t.dim('(none)') + '\n'
  }
  for (const name of names) {
    out += '    ' + marker + ' ' + t.text(name) + '\n'
  }
  return out
}
