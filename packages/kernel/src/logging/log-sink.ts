/**
 * Resforge Kernel — Log Sink Interface
 *
 * Defines the injection point for project event persistence.
 *
 * The kernel owns the contract (this interface) and the ProjectEventLogger.
 * Concrete implementations live in the runtime host and are injected at
 * construction time; the kernel never writes to disk directly.
 */

import type { ProjectEvent } from '../types/event.js';

/**
 * A sink that receives and persists project events.
 *
 * append() is synchronous: the event is durable when the call returns.
 * Implementations must not silently discard events.
 */
export interface LogSink {
  append(event: ProjectEvent): void;
}
