/**
 * Resforge Kernel — Module Configuration
 *
 * Owns the three module lists of one project and resolves them into the
 * ordered list of modules to run.
 *
 *   enabled          — built-in module names, in run order
 *   disabled         — built-in module names the operator switched off
 *   projectSpecific  — identifiers of externally supplied modules, resolved
 *                      through a ModuleResolver rather than the registry
 *
 * Invariants:
 * - A name appears in at most one of enabled / disabled. Every mutating
 *   method here preserves this; lists adopted from a stored descriptor are
 *   trusted as-is.
 * - Names derived from the registry defaults are compatible with the target
 *   type. Stored lists are not re-validated on load, so resolution re-checks
 *   compatibility every time.
 * - Built-in modules always precede project-specific modules in the resolved
 *   list.
 */

import {
  ModuleNotFoundError,
  PreconditionError,
  UnsupportedUpgradeError,
  UpgradePreconditionError,
} from '../errors.js';
import { MODULE_CONFIGURATION_EPOCH } from '../format/version.js';
import { compatibleNames, isCompatible } from '../compatibility/filter.js';
import type {
  ActiveModule,
  EditingModuleType,
  ModuleConfigurationRecord,
  ModuleDescriptor,
  ModuleResolver,
  TargetType,
} from '../types/module.js';
import { isModuleIdentifier } from '../types/module.js';

export class ModuleConfiguration {
  private readonly enabled: string[];
  private readonly disabled: string[];
  private readonly projectSpecific: string[];

  /**
   * @param targetType - Target type of the owning project
   * @param projectRoot - Directory searched for project-specific module code
   * @param defaults - The registry's ordered built-in module list
   * @param resolver - Resolves project-specific identifiers
   * @param stored - Lists decoded from the descriptor. When present they are
   *   adopted verbatim (copied) with no compatibility re-check. When absent,
   *   `enabled` is derived as the compatible subset of `defaults`.
   */
  constructor(
    readonly targetType: TargetType,
    readonly projectRoot: string,
    private readonly defaults: ReadonlyArray<ModuleDescriptor>,
    private readonly resolver: ModuleResolver,
    stored?: ModuleConfigurationRecord | undefined,
  ) {
    if (stored !== undefined) {
      this.enabled = [...stored.enabled];
      this.disabled = [...stored.disabled];
      this.projectSpecific = [...stored.projectSpecific];
    } else {
      this.enabled = this.compatibleDefaultNames();
      this.disabled = [];
      this.projectSpecific = [];
    }
  }

  // -------------------------------------------------------------------------
  // Read access
  // -------------------------------------------------------------------------

  get enabledModules(): ReadonlyArray<string> {
    return [...this.enabled];
  }

  get disabledModules(): ReadonlyArray<string> {
    return [...this.disabled];
  }

  get projectSpecificModules(): ReadonlyArray<string> {
    return [...this.projectSpecific];
  }

  /** Registry names compatible with the target type, in registry order. */
  compatibleDefaultNames(): string[] {
    return compatibleNames(this.targetType, this.defaults);
  }

  /** True if the lists equal a fresh default derivation for the target type. */
  isDefault(): boolean {
    return (
      sameOrder(this.enabled, this.compatibleDefaultNames()) &&
      this.disabled.length === 0 &&
      this.projectSpecific.length === 0
    );
  }

  toRecord(): ModuleConfigurationRecord {
    return {
      enabled: [...this.enabled],
      disabled: [...this.disabled],
      projectSpecific: [...this.projectSpecific],
    };
  }

  // -------------------------------------------------------------------------
  // Defaults reconciliation
  // -------------------------------------------------------------------------

  /**
   * Append compatible registry modules that appear in neither enabled nor
   * disabled, in registry order.
   *
   * Reconciles a project created under an older registry against modules
   * introduced since. Idempotent: a second call finds nothing missing.
   *
   * @param targetEnabled - Append to `enabled` if true, else to `disabled`
   * @returns The names appended by this call
   */
  addMissingDefaults(targetEnabled: boolean = false): ReadonlyArray<string> {
    const present = new Set<string>([...this.enabled, ...this.disabled]);
    const missing = this.compatibleDefaultNames().filter((name) => !present.has(name));
    const target = targetEnabled ? this.enabled : this.disabled;
    target.push(...missing);
    return missing;
  }

  // -------------------------------------------------------------------------
  // Operator edits
  // -------------------------------------------------------------------------

  /**
   * Enable a built-in module, moving it out of `disabled`.
   * Newly enabled modules run after the ones already enabled.
   *
   * @throws {ModuleNotFoundError} If no built-in module has this name
   * @throws {PreconditionError} If the module is incompatible with the target type
   */
  enableModule(name: string): void {
    const descriptor = this.requireBuiltin(name);
    if (!isCompatible(this.targetType, descriptor)) {
      throw new PreconditionError(
        `Module ${name} is not compatible with target type ${this.targetType}`,
      );
    }
    removeFrom(this.disabled, name);
    if (!this.enabled.includes(name)) {
      this.enabled.push(name);
    }
  }

  /**
   * Disable a built-in module, moving it out of `enabled`.
   *
   * @throws {ModuleNotFoundError} If no built-in module has this name
   */
  disableModule(name: string): void {
    this.requireBuiltin(name);
    removeFrom(this.enabled, name);
    if (!this.disabled.includes(name)) {
      this.disabled.push(name);
    }
  }

  /**
   * Add a project-specific module identifier. Adding one already listed is a
   * no-op. The identifier is not resolved here; resolution happens when the
   * active modules are loaded.
   *
   * @throws {PreconditionError} If the identifier is malformed or names a built-in module
   */
  addProjectSpecificModule(identifier: string): void {
    if (!isModuleIdentifier(identifier)) {
      throw new PreconditionError(`Invalid module identifier: '${identifier}'`);
    }
    if (this.defaults.some((d) => d.name === identifier)) {
      throw new PreconditionError(
        `'${identifier}' is a built-in module; enable it instead of adding it as project-specific`,
      );
    }
    if (!this.projectSpecific.includes(identifier)) {
      this.projectSpecific.push(identifier);
    }
  }

  /** @throws {ModuleNotFoundError} If the identifier is not listed */
  removeProjectSpecificModule(identifier: string): void {
    if (!removeFrom(this.projectSpecific, identifier)) {
      throw new ModuleNotFoundError(
        identifier,
        `Project-specific module '${identifier}' is not configured`,
      );
    }
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  /**
   * Resolve the modules to run, in run order.
   *
   * Built-ins come first, in registry order: a registry module is included
   * iff it is enabled AND compatible with the target type right now (a stale
   * descriptor may list a module that no longer applies). Project-specific
   * modules follow in list order.
   *
   * @throws {ModuleNotFoundError} A project-specific identifier cannot be located
   * @throws {MalformedModuleError} A located module lacks its implementation export
   */
  async resolveActiveModules(): Promise<ReadonlyArray<ActiveModule>> {
    const enabled = new Set(this.enabled);
    const active: ActiveModule[] = this.defaults.filter(
      (d) => enabled.has(d.name) && isCompatible(this.targetType, d),
    );
    for (const identifier of this.projectSpecific) {
      active.push({ name: identifier, moduleType: await this.resolveProjectSpecific(identifier) });
    }
    return active;
  }

  resolveProjectSpecific(identifier: string): Promise<EditingModuleType> {
    return this.resolver.resolve(this.projectRoot, identifier);
  }

  // -------------------------------------------------------------------------
  // Upgrade
  // -------------------------------------------------------------------------

  /**
   * Migrate the configuration from `oldVersion` to `newVersion`.
   *
   * Projects older than MODULE_CONFIGURATION_EPOCH had no stored module
   * configuration, so the lists must equal the default derivation and nothing
   * changes. Any other difference means the on-disk state is inconsistent.
   *
   * @throws {UpgradePreconditionError} Pre-epoch configuration differs from the defaults
   * @throws {UnsupportedUpgradeError} No migration exists from `oldVersion`
   */
  upgrade(oldVersion: number, newVersion: number): void {
    if (oldVersion >= MODULE_CONFIGURATION_EPOCH) {
      throw new UnsupportedUpgradeError(oldVersion, newVersion);
    }
    if (!sameOrder(this.enabled, this.compatibleDefaultNames())) {
      throw new UpgradePreconditionError(
        oldVersion,
        newVersion,
        'enabled modules differ from the default module list',
      );
    }
    if (this.disabled.length > 0) {
      throw new UpgradePreconditionError(oldVersion, newVersion, 'disabled modules must be empty');
    }
    if (this.projectSpecific.length > 0) {
      throw new UpgradePreconditionError(
        oldVersion,
        newVersion,
        'project-specific modules must be empty',
      );
    }
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  private requireBuiltin(name: string): ModuleDescriptor {
    const descriptor = this.defaults.find((d) => d.name === name);
    if (descriptor === undefined) {
      throw new ModuleNotFoundError(name, `No built-in module named '${name}'`);
    }
    return descriptor;
  }
}

function sameOrder(a: ReadonlyArray<string>, b: ReadonlyArray<string>): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

/** Remove `value` from `list` in place. Returns false if it was absent. */
function removeFrom(list: string[], value: string): boolean {
  const index = list.indexOf(value);
  if (index === -1) return false;
  list.splice(index, 1);
  return true;
}
