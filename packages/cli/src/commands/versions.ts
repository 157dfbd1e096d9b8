/**
 * resforge versions — list descriptor format versions
 */

import { Command } from 'commander';
import { FORMAT_VERSION, VERSION_NAMES } from '@resforge/kernel';
import { renderVersions } from '../output/versions.js';

export function versionsCommand(): Command {
  return new Command('versions')
    .description('List descriptor format versions and mark the current one')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify({ current: FORMAT_VERSION, versions: VERSION_NAMES }, null, 2));
        return;
      }
      process.stdout.write(renderVersions());
    });
}
