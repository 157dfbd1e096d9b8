/**
 * resforge modules — module configuration commands
 *
 * Subcommands:
 *   resforge modules list <descriptor> [--configured] [--json]
 *   resforge modules enable <descriptor> <name>
 *   resforge modules disable <descriptor> <name>
 *   resforge modules add-defaults <descriptor> [--enable]
 *   resforge modules add-custom <descriptor> <identifier>
 *   resforge modules remove-custom <descriptor> <identifier>
 *
 * Changes are saved to the descriptor immediately.
 */

import { Command } from 'commander';
import type { Project } from '@resforge/runtime-host';
import { buildContext, guarded } from './context.js';
import { t } from '../theme.js';

type Change = (project: Project) => string;

/** A subcommand that opens the project, applies one change and saves. */
function changeCommand(
  name: string,
  description: string,
  argument: { name: string; description: string },
  change: (project: Project, value: string) => string,
): Command {
  return new Command(name)
    .description(description)
    .argument('<descriptor>', 'Descriptor path')
    .argument(`<${argument.name}>`, argument.description)
    .action(guarded(`modules ${name}`, async (descriptor: string, value: string, _options: unknown, command: Command) => {
      await applyAndSave(command, descriptor, (project) => change(project, value));
    }));
}

async function applyAndSave(command: Command, descriptor: string, change: Change): Promise<void> {
  const project = await buildContext(command).open(descriptor);
  const message = change(project);
  await project.save();
  // eslint-disable-next-line no-console
  console.log(message);
}

// ---------------------------------------------------------------------------
// resforge modules list <descriptor>
// ---------------------------------------------------------------------------

function listModulesCommand(): Command {
  return new Command('list')
    .description('List the active modules in run order, or with --configured the stored lists')
    .argument('<descriptor>', 'Descriptor path')
    .option('--configured', 'List enabled, disabled and project-specific modules without resolving them')
    .option('--json', 'Output as JSON')
    .action(guarded('modules list', async (
      descriptor: string,
      options: { configured?: boolean; json?: boolean },
      command: Command,
    ) => {
      const project = await buildContext(command).open(descriptor);

      if (options.configured !== true) {
        const active = await project.loadModules();
        const names = active.map((m) => m.name);
        // eslint-disable-next-line no-console
        console.log(options.json === true ? JSON.stringify(names, null, 2) : names.map((n) => `  ${n}`).join('\n'));
        return;
      }

      const record = project.moduleConfiguration.toRecord();
      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(record, null, 2));
        return;
      }
      for (const name of record.enabled) {
        // eslint-disable-next-line no-console
        console.log(`  ${t.green('●')} ${name}`);
      }
      for (const name of record.disabled) {
        // eslint-disable-next-line no-console
        console.log(`  ${t.dim('○')} ${name}`);
      }
      for (const identifier of record.projectSpecific) {
        // eslint-disable-next-line no-console
        console.log(`  ${t.blue('◆')} ${identifier}`);
      }
    }));
}

// ---------------------------------------------------------------------------
// Configuration changes
// ---------------------------------------------------------------------------

function enableModuleCommand(): Command {
  return changeCommand(
    'enable',
    'Enable a default module',
    { name: 'name', description: 'Default module name' },
    (project, name) => {
      project.moduleConfiguration.enableModule(name);
      return `Enabled ${name}`;
    },
  );
}

function disableModuleCommand(): Command {
  return changeCommand(
    'disable',
    'Disable a default module',
    { name: 'name', description: 'Default module name' },
    (project, name) => {
      project.moduleConfiguration.disableModule(name);
      return `Disabled ${name}`;
    },
  );
}

function addCustomModuleCommand(): Command {
  return changeCommand(
    'add-custom',
    'Add a project-specific module',
    { name: 'identifier', description: 'Dotted module identifier, e.g. acme.Patch' },
    (project, identifier) => {
      project.moduleConfiguration.addProjectSpecificModule(identifier);
      return `Added project-specific module ${identifier}`;
    },
  );
}

function removeCustomModuleCommand(): Command {
  return changeCommand(
    'remove-custom',
    'Remove a project-specific module',
    { name: 'identifier', description: 'Dotted module identifier' },
    (project, identifier) => {
      project.moduleConfiguration.removeProjectSpecificModule(identifier);
      return `Removed project-specific module ${identifier}`;
    },
  );
}

function addDefaultsCommand(): Command {
  return new Command('add-defaults')
    .description('Add compatible default modules not yet listed (disabled unless --enable)')
    .argument('<descriptor>', 'Descriptor path')
    .option('--enable', 'Add them to the enabled list')
    .action(guarded('modules add-defaults', async (descriptor: string, options: { enable?: boolean }, command: Command) => {
      await applyAndSave(command, descriptor, (project) => {
        const added = project.addMissingDefaults(options.enable === true);
        if (added.length === 0) {
          return 'No new default modules';
        }
        const where = options.enable === true ? 'enabled' : 'disabled';
        return `Added ${added.length} ${where} module(s): ${added.join(', ')}`;
      });
    }));
}

export function modulesCommand(): Command {
  return new Command('modules')
    .description('Inspect and change a project\'s module configuration')
    .addCommand(listModulesCommand())
    .addCommand(enableModuleCommand())
    .addCommand(disableModuleCommand())
    .addCommand(addDefaultsCommand())
    .addCommand(addCustomModuleCommand())
    .addCommand(removeCustomModuleCommand());
}
