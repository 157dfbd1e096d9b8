/**
 * resforge resource — registered resource commands
 *
 * Subcommands:
 *   resforge resource list <descriptor> [--json]
 *   resforge resource path <descriptor> <module> <resource>
 *   resforge resource delete <descriptor> <module> <resource>
 */

import { Command } from 'commander';
import { buildContext, guarded } from './context.js';
import { t } from '../theme.js';

function listResourcesCommand(): Command {
  return new Command('list')
    .description('List registered resources by module')
    .argument('<descriptor>', 'Descriptor path')
    .option('--json', 'Output as JSON')
    .action(guarded('resource list', async (descriptor: string, options: { json?: boolean }, command: Command) => {
      const project = await buildContext(command).open(descriptor);
      const resources = project.resources;
      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(resources, null, 2));
        return;
      }
      const modules = Object.keys(resources).sort();
      if (modules.length === 0) {
        // eslint-disable-next-line no-console
        console.log(`  ${t.dim('(no resources)')}`);
        return;
      }
      for (const moduleName of modules) {
        // eslint-disable-next-line no-console
        console.log(`  ${t.blue(moduleName)}`);
        for (const [resourceName, relativePath] of Object.entries(resources[moduleName] ?? {})) {
          // eslint-disable-next-line no-console
          console.log(`    ${resourceName}  ${t.muted(relativePath)}`);
        }
      }
    }));
}

function resourcePathCommand(): Command {
  return new Command('path')
    .description('Print the absolute path of a registered resource')
    .argument('<descriptor>', 'Descriptor path')
    .argument('<module>', 'Module name')
    .argument('<resource>', 'Resource name')
    .action(guarded('resource path', async (descriptor: string, moduleName: string, resourceName: string, _options: unknown, command: Command) => {
      const project = await buildContext(command).open(descriptor);
      const path = project.resourcePath(moduleName, resourceName);
      if (path === undefined) {
        throw new Error(`No resource ${resourceName} registered for module ${moduleName}`);
      }
      // eslint-disable-next-line no-console
      console.log(path);
    }));
}

function deleteResourceCommand(): Command {
  return new Command('delete')
    .description('Delete a resource file and its registry entry, then save')
    .argument('<descriptor>', 'Descriptor path')
    .argument('<module>', 'Module name')
    .argument('<resource>', 'Resource name')
    .action(guarded('resource delete', async (descriptor: string, moduleName: string, resourceName: string, _options: unknown, command: Command) => {
      const project = await buildContext(command).open(descriptor);
      await project.deleteResource(moduleName, resourceName);
      await project.save();
      // eslint-disable-next-line no-console
      console.log(`Deleted ${moduleName}/${resourceName}`);
    }));
}

export function resourceCommand(): Command {
  return new Command('resource')
    .description('Inspect and delete registered resources')
    .addCommand(listResourcesCommand())
    .addCommand(resourcePathCommand())
    .addCommand(deleteResourceCommand());
}
