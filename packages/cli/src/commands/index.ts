/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * Imported by:
 *   src/bin/resforge.ts   (the `resforge` executable)
 *   src/index.ts          (library entry, tests)
 *
 * Each call builds a fresh program, so option values never carry over
 * between parses.
 */

import { Command } from 'commander'
import { projectCommand } from './project.js'
import { modulesCommand } from './modules.js'
import { resourceCommand } from './resource.js'
import { versionsCommand } from './versions.js'
import { logCommand } from './log.js'

export function createProgram(): Command {
  return new Command('resforge')
    .description(
      'Resforge — project descriptors, module configuration and resources\n' +
      'for editing the data of a target binary.',
    )
    .version('0.1.0')
    .option('--home <dir>', 'Resforge home directory (overrides RESFORGE_HOME)')
    .addCommand(projectCommand())
    .addCommand(modulesCommand())
    .addCommand(resourceCommand())
    .addCommand(versionsCommand())
    .addCommand(logCommand())
}
