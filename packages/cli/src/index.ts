/**
 * @resforge/cli
 *
 * Operator command-line interface over @resforge/runtime-host. The program
 * factory is exported unparsed; main() runs it against an argv.
 */

export { createProgram } from './commands/index.js';
export { main } from './main.js';
export { summarize } from './commands/project.js';
export { renderLog } from './output/log.js';
export type { ProjectSummary } from './output/project.js';
export { renderProject } from './output/project.js';
export { renderVersions } from './output/versions.js';
