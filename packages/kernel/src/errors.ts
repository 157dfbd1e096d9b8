/**
 * Resforge Kernel — Error Types
 *
 * Every error raised by the project core is a ResforgeError carrying a `kind`
 * discriminator, so callers can branch on the category without matching
 * message text:
 *
 *   precondition — programmer or environment error; retrying will not help
 *   not_found    — a key or identifier the caller named does not exist
 *   malformed    — stored data or loaded code violates its contract
 *   unsupported  — an explicit placeholder (e.g. an unimplemented upgrade path)
 *
 * Nothing in the core retries or swallows these. Retry is a caller concern.
 */

export type ResforgeErrorKind = 'precondition' | 'not_found' | 'malformed' | 'unsupported';

/** Base class for all Resforge core errors. */
export abstract class ResforgeError extends Error {
  abstract readonly kind: ResforgeErrorKind;
}

// ---------------------------------------------------------------------------
// precondition
// ---------------------------------------------------------------------------

export class PreconditionError extends ResforgeError {
  readonly kind = 'precondition' as const;

  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * A pre-epoch upgrade found a module configuration that differs from the
 * default derivation. The on-disk state is inconsistent; there is no recovery.
 */
export class UpgradePreconditionError extends PreconditionError {
  constructor(
    readonly oldVersion: number,
    readonly newVersion: number,
    detail: string,
  ) {
    super(
      `Cannot upgrade project from version ${oldVersion} to ${newVersion}: ${detail}`,
    );
    this.name = 'UpgradePreconditionError';
  }
}

/**
 * Registry discovery could not resolve a manifest entry. The registry is
 * foundational, so this is fatal for the process.
 */
export class ModuleResolutionError extends ResforgeError {
  readonly kind = 'precondition' as const;

  constructor(
    readonly moduleName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ModuleResolutionError';
  }
}

// ---------------------------------------------------------------------------
// not_found
// ---------------------------------------------------------------------------

export class UnknownResourceError extends ResforgeError {
  readonly kind = 'not_found' as const;

  constructor(
    readonly moduleName: string,
    readonly resourceName?: string | undefined,
  ) {
    super(
      resourceName === undefined
        ? `No such module: ${moduleName}`
        : `No such resource ${resourceName} in module ${moduleName}`,
    );
    this.name = 'UnknownResourceError';
  }
}

export class ModuleNotFoundError extends ResforgeError {
  readonly kind = 'not_found' as const;

  constructor(
    readonly identifier: string,
    message: string = `Cannot locate module '${identifier}'`,
  ) {
    super(message);
    this.name = 'ModuleNotFoundError';
  }
}

// ---------------------------------------------------------------------------
// malformed
// ---------------------------------------------------------------------------

export class MalformedModuleError extends ResforgeError {
  readonly kind = 'malformed' as const;

  constructor(
    readonly identifier: string,
    readonly expectedExport: string,
  ) {
    super(`Module '${identifier}' must export an editing module named '${expectedExport}'`);
    this.name = 'MalformedModuleError';
  }
}

export class DescriptorFormatError extends ResforgeError {
  readonly kind = 'malformed' as const;

  constructor(
    readonly descriptorPath: string,
    detail: string,
  ) {
    super(`Malformed project descriptor ${descriptorPath}: ${detail}`);
    this.name = 'DescriptorFormatError';
  }
}

// ---------------------------------------------------------------------------
// unsupported
// ---------------------------------------------------------------------------

/**
 * No migration exists yet from `oldVersion`. This is a placeholder for future
 * schema evolution, never a silent success.
 */
export class UnsupportedUpgradeError extends ResforgeError {
  readonly kind = 'unsupported' as const;

  constructor(
    readonly oldVersion: number,
    readonly newVersion: number,
  ) {
    super(`Don't know how to upgrade from version ${oldVersion} to ${newVersion}`);
    this.name = 'UnsupportedUpgradeError';
  }
}

/** Narrow an unknown thrown value to a ResforgeError. */
export function isResforgeError(err: unknown): err is ResforgeError {
  return err instanceof ResforgeError;
}
