import type { LogEvent } from '@resforge/runtime-host'
import { eventColor, t } from '../theme.js'

/**
 * renderLog — one line per project event, oldest first.
 *
 *   2026-01-02T03:04:05.000Z  resource_deleted  /p/Project.resforge  module=x.Text resource=dialogue
 */
export function renderLog(events: ReadonlyArray<LogEvent>): string {
  if (events.length === 0) {
    return '  ' + t.dim('(no events)') + '\n'
  }
  let out = ''
  for (const event of events) {
    const details = Object.entries(event.details)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(' ')
    out += (
      '  ' +
      t.muted(event.timestamp) +
      '  ' +
      eventColor(event.event_type)(event.event_type) +
      '  ' +
      t.text(event.project) +
      (details === '' ? '' : '  ' + t.dim(details)) +
      '\n'
    )
  }
  return out
}
