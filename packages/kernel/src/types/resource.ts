/**
 * Resforge Kernel — Resource Types
 *
 * A project's resource map associates (module name, resource name) pairs with
 * file paths relative to the project directory.
 *
 *   resources:
 *     eb.TextModule:
 *       text_data: text_data.yml
 *       text_table: Text/table.yml
 *
 * Keys are unique within each level. Insertion order carries no meaning.
 */

/** resource name → relative file path */
export type ModuleResourceMap = Readonly<Record<string, string>>;

/** module name → resource name → relative file path */
export type ResourceMap = Readonly<Record<string, ModuleResourceMap>>;

/** Extension used when a caller does not name one. */
export const DEFAULT_RESOURCE_EXTENSION = 'dat';
