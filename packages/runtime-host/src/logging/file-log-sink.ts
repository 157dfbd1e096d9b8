/**
 * Resforge Runtime Host — File-backed Project Event Sink
 *
 * Implements the LogSink interface from @resforge/kernel by appending JSONL
 * entries to `logs/project-events.jsonl` under the Resforge home, via an
 * injected StateIO.
 *
 * Each line carries a random UUID `event_id`, the key readLog() deduplicates
 * on. The sink is synchronous: the line is written before append() returns.
 */

import { randomUUID } from 'node:crypto';
import type { LogSink, ProjectEvent } from '@resforge/kernel';
import type { StateIO } from '../state/state-io.js';

/** Log file written by FileLogSink and read by the `resforge log` command. */
export const PROJECT_EVENTS_LOG = 'project-events.jsonl';

export class FileLogSink implements LogSink {
  constructor(private readonly stateIO: StateIO) {}

  append(event: ProjectEvent): void {
    const line = JSON.stringify({
      event_id: randomUUID(),
      timestamp: event.timestamp,
      event_type: event.kind,
      project: event.project,
      details: event.details,
    });
    this.stateIO.appendLine(PROJECT_EVENTS_LOG, line);
  }
}
