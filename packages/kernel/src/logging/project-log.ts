/**
 * Resforge Kernel — Project Event Logger
 *
 * Stamps and forwards project events to an injected LogSink. When no sink is
 * injected (tests, embedded use) record() is a no-op.
 */

import type { ProjectEventDetail, ProjectEventKind } from '../types/event.js';
import type { LogSink } from './log-sink.js';

export class ProjectEventLogger {
  /**
   * @param project - Descriptor path stamped on every event
   * @param sink - Optional persistence target
   * @param now - Clock, injectable for deterministic tests
   */
  constructor(
    private readonly project: string,
    private readonly sink?: LogSink | undefined,
    private readonly now: () => Date = () => new Date(),
  ) {}

  record(kind: ProjectEventKind, details: Readonly<Record<string, ProjectEventDetail>> = {}): void {
    this.sink?.append({
      kind,
      project: this.project,
      timestamp: this.now().toISOString(),
      details,
    });
  }
}
