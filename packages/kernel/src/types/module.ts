/**
 * Resforge Kernel — Module Types
 *
 * Defines the target type tag, the editing-module type contract, module
 * descriptors, and the persisted module configuration record.
 *
 * Editing modules themselves (their read/write logic) are external to the
 * kernel. The kernel only needs to know a module's name and whether it can
 * operate on a given target binary type.
 */

// ---------------------------------------------------------------------------
// Target Type
// ---------------------------------------------------------------------------

/**
 * Opaque identifier of the binary format a project edits (e.g. 'Earthbound').
 */
export type TargetType = string;

/** Reserved sentinel: the target type could not be determined. */
export const UNKNOWN_TARGET_TYPE: TargetType = 'unknown';

/** True if `targetType` is a concrete (non-empty, non-sentinel) type tag. */
export function isConcreteTargetType(targetType: TargetType | undefined): targetType is TargetType {
  return targetType !== undefined && targetType !== '' && targetType !== UNKNOWN_TARGET_TYPE;
}

// ---------------------------------------------------------------------------
// Editing Module Type
// ---------------------------------------------------------------------------

/**
 * The implementing type of an editing module.
 *
 * In practice this is a class whose static side carries the compatibility
 * predicate. Any object with a `name` and the predicate satisfies the contract,
 * which keeps test doubles trivial.
 */
export interface EditingModuleType {
  readonly name: string;
  isCompatibleWithTargetType(targetType: TargetType): boolean;
}

/**
 * Narrow an unknown value (typically a dynamically imported export) to an
 * EditingModuleType.
 */
export function isEditingModuleType(value: unknown): value is EditingModuleType {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'isCompatibleWithTargetType' in value &&
    typeof value.isCompatibleWithTargetType === 'function'
  );
}

// ---------------------------------------------------------------------------
// Module Descriptor
// ---------------------------------------------------------------------------

/** Dotted identifier: one or more identifier segments joined by '.'. */
const MODULE_IDENTIFIER_PATTERN = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

/** True if `identifier` is a well-formed dotted module identifier. */
export function isModuleIdentifier(identifier: string): boolean {
  return MODULE_IDENTIFIER_PATTERN.test(identifier);
}

/**
 * Final component of a dotted identifier: the name of the export that
 * implements the module ('acme.patches.TitleScreen' → 'TitleScreen').
 */
export function exportNameOf(identifier: string): string {
  const dot = identifier.lastIndexOf('.');
  return dot === -1 ? identifier : identifier.slice(dot + 1);
}

/**
 * One built-in editing module as listed in the module registry.
 *
 * `name` is the dotted manifest path (e.g. 'eb.TextModule') and is unique
 * within the registry.
 */
export interface ModuleDescriptor {
  readonly name: string;
  readonly moduleType: EditingModuleType;
}

/**
 * A module selected to run against a project, in run order.
 *
 * Built-in modules and project-specific modules share this shape; for the
 * latter, `name` is the fully-qualified identifier from the descriptor.
 */
export type ActiveModule = ModuleDescriptor;

// ---------------------------------------------------------------------------
// Module Configuration Record
// ---------------------------------------------------------------------------

/**
 * The persisted state of a project's module configuration.
 *
 * Invariant: a name appears in at most one of `enabled` / `disabled`.
 * `projectSpecific` is a disjoint namespace of identifiers resolved outside
 * the registry.
 */
export interface ModuleConfigurationRecord {
  /** Enabled module names. Order defines run order. */
  readonly enabled: ReadonlyArray<string>;
  readonly disabled: ReadonlyArray<string>;
  /** Fully-qualified identifiers of project-specific modules. */
  readonly projectSpecific: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Collaborator Contracts
// ---------------------------------------------------------------------------

/**
 * Resolves project-specific module identifiers to implementing types.
 *
 * Implementations search a conventional subdirectory of `projectRoot` and
 * must not leave any search-path change behind once `resolve` settles.
 *
 * Rejects with ModuleNotFoundError if the identifier cannot be located, or
 * MalformedModuleError if the located code lacks an export named by the
 * identifier's final component.
 */
export interface ModuleResolver {
  resolve(projectRoot: string, identifier: string): Promise<EditingModuleType>;
}

/**
 * Source of the ordered built-in module list.
 *
 * Implemented by the process-wide ModuleRegistry in @resforge/module-loader.
 */
export interface DefaultModuleCatalog {
  getDefaultModules(): Promise<ReadonlyArray<ModuleDescriptor>>;
}
