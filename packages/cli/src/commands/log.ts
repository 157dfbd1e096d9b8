/**
 * resforge log — query the project event log
 *
 * Reads <RESFORGE_HOME>/logs/project-events.jsonl. Events are shown oldest
 * first; --limit keeps the most recent n.
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import { PROJECT_EVENTS_LOG, readLog } from '@resforge/runtime-host';
import { buildContext, guarded } from './context.js';
import { renderLog } from '../output/log.js';

export function logCommand(): Command {
  return new Command('log')
    .description('Show recorded project events')
    .option('--project <descriptor>', 'Only events for this descriptor path')
    .option('--limit <n>', 'Maximum number of events to show', '50')
    .option('--json', 'Output as JSON')
    .action(guarded('log', async (options: { project?: string; limit: string; json?: boolean }, command: Command) => {
      const limit = Number.parseInt(options.limit, 10);
      if (!Number.isInteger(limit) || limit < 0) {
        throw new Error(`--limit must be a non-negative integer, got '${options.limit}'`);
      }

      const ctx = buildContext(command);
      const { events, stats } = readLog(ctx.stateIO.readLogRaw(PROJECT_EVENTS_LOG));
      const project = options.project === undefined ? undefined : resolve(options.project);
      const matching = project === undefined ? events : events.filter((e) => e.project === project);
      const shown = limit === 0 ? [] : matching.slice(-limit);

      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ events: shown, stats }, null, 2));
        return;
      }
      process.stdout.write(renderLog(shown));
      if (stats.parseErrors > 0) {
        // eslint-disable-next-line no-console
        console.error(`[resforge log] skipped ${stats.parseErrors} unreadable line(s)`);
      }
    }));
}
