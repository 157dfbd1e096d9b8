/**
 * Resforge Runtime Host — LogReader
 *
 * Pure function for reading project-events.jsonl with dedupe-on-read.
 *
 *   LOGR-U1: parse every well-formed line; count malformed ones in parseErrors
 *   LOGR-U2: deduplicate by event_id; first seen wins
 *   LOGR-U3: content not ending in '\n' has a partial trailing line, which is dropped
 *   LOGR-U4: output is sorted by timestamp; equal timestamps keep file order
 *   LOGR-U5: empty input returns an empty result with zero stats
 *
 * No I/O. Callers obtain raw content via StateIO.readLogRaw().
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const LogEventSchema = z.object({
  /** Random UUID; the deduplication key. */
  event_id: z.string().min(1),
  timestamp: z.string(),
  event_type: z.string(),
  project: z.string(),
  details: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
});

/** One persisted project event line. */
export type LogEvent = z.infer<typeof LogEventSchema>;

export interface LogReadStats {
  /** Non-empty complete lines processed. */
  totalLines: number;
  /** Events included in the output, after dedup. */
  parsedEvents: number;
  /** Lines dropped because their event_id was already seen. */
  duplicates: number;
  /** Lines dropped as invalid JSON or not matching the event shape. */
  parseErrors: number;
  /** True if the content did not end with '\n'; the last line was dropped. */
  partialTrailingLine: boolean;
}

export interface LogReadResult {
  events: ReadonlyArray<LogEvent>;
  stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readLog(rawContent: string): LogReadResult {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
      },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  // Normal case: the trailing '\n' leaves an empty last element.
  // Partial case: the last element is an incomplete line.
  const lineList = rawLines.slice(0, -1).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Map<string, LogEvent>();

  for (const line of lineList) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const result = LogEventSchema.safeParse(parsed);
    if (!result.success) {
      parseErrors++;
      continue;
    }

    if (seen.has(result.data.event_id)) {
      duplicates++;
    } else {
      seen.set(result.data.event_id, result.data);
    }
  }

  // Array.prototype.sort is stable: same-millisecond events stay in append order.
  const sorted = [...seen.values()].sort((a, b) => {
    if (a.timestamp < b.timestamp) return -1;
    if (a.timestamp > b.timestamp) return 1;
    return 0;
  });

  return {
    events: sorted,
    stats: {
      totalLines: lineList.length,
      parsedEvents: sorted.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
