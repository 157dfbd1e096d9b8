/**
 * resforge project — project descriptor commands
 *
 * Subcommands:
 *   resforge project create <descriptor> --target <type>   — create a project descriptor
 *   resforge project show <descriptor> [--json]            — show a descriptor's contents
 *   resforge project upgrade <descriptor>                  — upgrade to the current format version
 *
 * <descriptor> is the path of a Project.resforge file. Every subcommand that
 * changes the project saves the descriptor before returning.
 */

import { join } from 'node:path';
import { Command } from 'commander';
import { FORMAT_VERSION, getVersionName } from '@resforge/kernel';
import { DESCRIPTOR_FILENAME } from '@resforge/runtime-host';
import type { Project } from '@resforge/runtime-host';
import { buildContext, guarded } from './context.js';
import { renderProject } from '../output/project.js';
import type { ProjectSummary } from '../output/project.js';

export function summarize(project: Project): ProjectSummary {
  return {
    descriptorPath: project.descriptorPath,
    targetType: project.targetType,
    version: project.version,
    resources: project.resources,
    modules: project.moduleConfiguration.toRecord(),
  };
}

// ---------------------------------------------------------------------------
// resforge project create <descriptor>
// ---------------------------------------------------------------------------

function createProjectCommand(): Command {
  return new Command('create')
    .description('Create a project descriptor with every compatible default module enabled')
    .argument('<descriptor>', `Descriptor path, or a directory to hold ${DESCRIPTOR_FILENAME}`)
    .requiredOption('-t, --target <type>', 'Target type the project edits')
    .action(guarded('project create', async (descriptor: string, options: { target: string }, command: Command) => {
      const ctx = buildContext(command);
      const path = descriptor.endsWith('.resforge') ? descriptor : join(descriptor, DESCRIPTOR_FILENAME);
      const project = await ctx.open(path, options.target);
      await project.save();
      // eslint-disable-next-line no-console
      console.log(`Created ${project.descriptorPath} (${project.targetType}, version ${FORMAT_VERSION})`);
    }));
}

// ---------------------------------------------------------------------------
// resforge project show <descriptor>
// ---------------------------------------------------------------------------

function showProjectCommand(): Command {
  return new Command('show')
    .description('Show the target type, version, modules and resources of a project')
    .argument('<descriptor>', 'Descriptor path')
    .option('--json', 'Output as JSON')
    .action(guarded('project show', async (descriptor: string, options: { json?: boolean }, command: Command) => {
      const project = await buildContext(command).open(descriptor);
      const summary = summarize(project);
      if (options.json === true) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(summary, null, 2));
        return;
      }
      process.stdout.write(renderProject(summary));
    }));
}

// ---------------------------------------------------------------------------
// resforge project upgrade <descriptor>
// ---------------------------------------------------------------------------

function upgradeProjectCommand(): Command {
  return new Command('upgrade')
    .description(`Upgrade a project to format version ${FORMAT_VERSION} and save it`)
    .argument('<descriptor>', 'Descriptor path')
    .action(guarded('project upgrade', async (descriptor: string, _options: unknown, command: Command) => {
      const project = await buildContext(command).open(descriptor);
      if (!project.needsUpgrade()) {
        // eslint-disable-next-line no-console
        console.log(`${project.descriptorPath} is already at version ${project.version} (${getVersionName(project.version)})`);
        return;
      }
      const from = project.version;
      project.upgrade(from, FORMAT_VERSION);
      await project.save();
      // eslint-disable-next-line no-console
      console.log(
        `Upgraded ${project.descriptorPath} from ${from} (${getVersionName(from)}) ` +
        `to ${FORMAT_VERSION} (${getVersionName(FORMAT_VERSION)})`,
      );
    }));
}

export function projectCommand(): Command {
  return new Command('project')
    .description('Create, inspect and upgrade project descriptors')
    .addCommand(createProjectCommand())
    .addCommand(showProjectCommand())
    .addCommand(upgradeProjectCommand());
}
