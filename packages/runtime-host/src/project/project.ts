/**
 * Resforge Runtime Host — Project
 *
 * Owns one on-disk project descriptor: load or create, save, the resource
 * path registry, and the project's module configuration.
 *
 * A Project exclusively owns its ModuleConfiguration and ResourceRegistry.
 * The module registry is shared and outlives every Project.
 *
 * No locking: two Project instances on the same descriptor race, and the
 * last save() wins. Registry state and file state are not transactionally
 * linked; getResource() registers a path even when the open then fails.
 */

import { mkdir, readFile, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import {
  DEFAULT_RESOURCE_EXTENSION,
  FORMAT_VERSION,
  ModuleConfiguration,
  PreconditionError,
  ProjectEventKind,
  ProjectEventLogger,
  ResourceRegistry,
  UnknownResourceError,
  isConcreteTargetType,
  needsUpgrade,
} from '@resforge/kernel';
import type {
  ActiveModule,
  DefaultModuleCatalog,
  LogSink,
  ModuleConfigurationRecord,
  ModuleResolver,
  ResourceMap,
  TargetType,
} from '@resforge/kernel';
import { FileModuleResolver, isNodeError } from '@resforge/module-loader';
import { getSharedModuleRegistry } from '../config/host-config.js';
import { decodeDescriptor, encodeDescriptor } from './descriptor-codec.js';
import { ResourceFile } from './resource-file.js';
import type { ResourceFileOptions } from './resource-file.js';

export interface OpenProjectOptions {
  /**
   * Target type requested by the caller. Required to create a project.
   * When it differs from an existing descriptor's type, the project is
   * reopened fresh under this type (see Project.open).
   */
  readonly targetType?: TargetType | undefined;
  /**
   * Built-in module catalog. Default: getSharedModuleRegistry(), which
   * resolves RESFORGE_HOME on first use and creates that directory
   * (`~/.resforge` when nothing else is configured) if it does not exist.
   * Pass a registry to open a project without touching the home directory.
   */
  readonly registry?: DefaultModuleCatalog | undefined;
  /** Resolver for project-specific modules. Default: a FileModuleResolver. */
  readonly resolver?: ModuleResolver | undefined;
  /** Receives project events. Default: none. */
  readonly logSink?: LogSink | undefined;
}

export interface GetResourceOptions extends ResourceFileOptions {
  /** Extension used when registering a default filename. Default 'dat'. */
  readonly extension?: string | undefined;
}

interface LoadedState {
  readonly targetType: TargetType;
  readonly version: number;
  readonly resources: ResourceMap;
  readonly moduleConfiguration?: ModuleConfigurationRecord | undefined;
  readonly created: boolean;
  readonly mismatchedFrom?: TargetType | undefined;
}

export class Project {
  readonly descriptorPath: string;
  /** Directory containing the descriptor; resource paths are relative to it. */
  readonly directory: string;
  readonly targetType: TargetType;
  readonly moduleConfiguration: ModuleConfiguration;
  private currentVersion: number;
  private readonly registry: ResourceRegistry;
  private readonly log: ProjectEventLogger;

  private constructor(
    descriptorPath: string,
    state: LoadedState,
    moduleConfiguration: ModuleConfiguration,
    log: ProjectEventLogger,
  ) {
    this.descriptorPath = descriptorPath;
    this.directory = dirname(descriptorPath);
    this.targetType = state.targetType;
    this.currentVersion = state.version;
    this.registry = new ResourceRegistry(state.resources);
    this.moduleConfiguration = moduleConfiguration;
    this.log = log;
  }

  /**
   * Open the descriptor at `descriptorPath`, or create a new project there.
   *
   * Existing file, `targetType` absent or equal to the stored type: the
   * stored type, version (1 if absent), resources and module configuration
   * (if present) are adopted.
   *
   * Existing file, `targetType` differs: the project is reopened fresh under
   * the requested type. Stored resources and module configuration are
   * ignored and will be dropped from the descriptor on the next save. Their
   * files stay on disk.
   *
   * Missing file: a new project. The containing directory is created.
   *
   * @throws {PreconditionError} Creating a project without a concrete target type
   * @throws {DescriptorFormatError} The existing descriptor is malformed
   * @throws {ModuleResolutionError} The module registry cannot be discovered
   */
  static async open(descriptorPath: string, options: OpenProjectOptions = {}): Promise<Project> {
    const path = resolve(descriptorPath);
    const log = new ProjectEventLogger(path, options.logSink);
    const state = await loadState(path, options.targetType);

    const registry = options.registry ?? getSharedModuleRegistry();
    const resolver = options.resolver ?? new FileModuleResolver();
    const defaults = await registry.getDefaultModules();
    const moduleConfiguration = new ModuleConfiguration(
      state.targetType,
      dirname(path),
      defaults,
      resolver,
      state.moduleConfiguration,
    );

    if (state.created) {
      log.record(ProjectEventKind.ProjectCreated, { target_type: state.targetType });
    } else if (state.mismatchedFrom !== undefined) {
      log.record(ProjectEventKind.TargetTypeMismatch, {
        stored_target_type: state.mismatchedFrom,
        requested_target_type: state.targetType,
      });
    } else {
      log.record(ProjectEventKind.ProjectOpened, {
        target_type: state.targetType,
        version: state.version,
      });
    }

    return new Project(path, state, moduleConfiguration, log);
  }

  /** Format version of the loaded descriptor, or the version set by upgrade(). */
  get version(): number {
    return this.currentVersion;
  }

  /** Snapshot of the resource registry. */
  get resources(): ResourceMap {
    return this.registry.toRecord();
  }

  /** True if the loaded descriptor predates the current format version. */
  needsUpgrade(): boolean {
    return needsUpgrade(this.currentVersion);
  }

  /**
   * Write the descriptor, overwriting the file. Always stamps the current
   * format version, whatever version was loaded.
   */
  async save(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const text = encodeDescriptor(
      this.targetType,
      FORMAT_VERSION,
      this.moduleConfiguration.toRecord(),
      this.registry.toRecord(),
    );
    await writeFile(this.descriptorPath, text, 'utf-8');
    this.log.record(ProjectEventKind.ProjectSaved, { resources: this.registry.size() });
  }

  /**
   * Open a resource file, registering `<resource>.<extension>` first if the
   * pair is unknown. Merely reading an unregistered resource therefore adds
   * it to the project, persisted on the next save().
   *
   * Missing parent directories are created. The returned file is owned by
   * the caller.
   */
  async getResource(
    moduleName: string,
    resourceName: string,
    options: GetResourceOptions = {},
  ): Promise<ResourceFile> {
    const entry = this.registry.ensureEntry(
      moduleName,
      resourceName,
      options.extension ?? DEFAULT_RESOURCE_EXTENSION,
    );
    if (entry.created) {
      this.log.record(ProjectEventKind.ResourceRegistered, {
        module: moduleName,
        resource: resourceName,
        path: entry.relativePath,
      });
    }

    const filePath = join(this.directory, entry.relativePath);
    await mkdir(dirname(filePath), { recursive: true });
    return ResourceFile.open(filePath, options);
  }

  /** Absolute path of a registered resource, or undefined. Registers nothing. */
  resourcePath(moduleName: string, resourceName: string): string | undefined {
    const relativePath = this.registry.lookup(moduleName, resourceName);
    return relativePath === undefined ? undefined : join(this.directory, relativePath);
  }

  /**
   * Remove a resource's file, if it is a regular file, and its registry entry.
   * The entry is removed even when there is no file.
   *
   * @throws {UnknownResourceError} The module or resource is not registered
   */
  async deleteResource(moduleName: string, resourceName: string): Promise<void> {
    const relativePath = this.registry.lookup(moduleName, resourceName);
    if (relativePath === undefined) {
      throw this.registry.modules().includes(moduleName)
        ? new UnknownResourceError(moduleName, resourceName)
        : new UnknownResourceError(moduleName);
    }

    const filePath = join(this.directory, relativePath);
    const removedFile = await removeIfRegularFile(filePath);
    this.registry.remove(moduleName, resourceName);
    this.log.record(ProjectEventKind.ResourceDeleted, {
      module: moduleName,
      resource: resourceName,
      removed_file: removedFile,
    });
  }

  /** Active modules in run order: built-ins first, then project-specific. */
  loadModules(): Promise<ReadonlyArray<ActiveModule>> {
    return this.moduleConfiguration.resolveActiveModules();
  }

  /**
   * Upgrade in-memory content from `oldVersion` to `newVersion`, then record
   * `newVersion` as the project version.
   *
   * @throws {UpgradePreconditionError} Pre-epoch configuration is not the default
   * @throws {UnsupportedUpgradeError} No upgrade path from `oldVersion`
   */
  upgrade(oldVersion: number, newVersion: number): void {
    this.moduleConfiguration.upgrade(oldVersion, newVersion);
    this.currentVersion = newVersion;
    this.log.record(ProjectEventKind.ProjectUpgraded, {
      from_version: oldVersion,
      to_version: newVersion,
    });
  }

  /**
   * Append registry modules not yet listed to the enabled or disabled list.
   *
   * @returns The names appended
   */
  addMissingDefaults(enable: boolean = false): ReadonlyArray<string> {
    const added = this.moduleConfiguration.addMissingDefaults(enable);
    if (added.length > 0) {
      this.log.record(ProjectEventKind.DefaultsAdded, {
        count: added.length,
        enabled: enable,
      });
    }
    return added;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function loadState(path: string, requested: TargetType | undefined): Promise<LoadedState> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (!isNodeError(err, 'ENOENT')) {
      throw err;
    }
    if (!isConcreteTargetType(requested)) {
      throw new PreconditionError(`Can't make new project of unknown type: ${path}`);
    }
    await mkdir(dirname(path), { recursive: true });
    return { targetType: requested, version: FORMAT_VERSION, resources: {}, created: true };
  }

  const document = decodeDescriptor(text, path);
  if (requested === undefined || requested === document.targetType) {
    return {
      targetType: document.targetType,
      version: document.version,
      resources: document.resources,
      moduleConfiguration: document.moduleConfiguration,
      created: false,
    };
  }

  return {
    targetType: requested,
    version: FORMAT_VERSION,
    resources: {},
    created: false,
    mismatchedFrom: document.targetType,
  };
}

async function removeIfRegularFile(filePath: string): Promise<boolean> {
  try {
    if (!(await stat(filePath)).isFile()) {
      return false;
    }
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) {
      return false;
    }
    throw err;
  }
  await unlink(filePath);
  return true;
}
