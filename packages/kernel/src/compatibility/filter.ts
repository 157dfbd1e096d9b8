/**
 * Resforge Kernel — Compatibility Filter
 *
 * Pure predicates deciding whether a module applies to a target type.
 * The decision belongs to the module type itself; these helpers only apply
 * it over descriptor sequences, preserving input order.
 */

import type { ModuleDescriptor, TargetType } from '../types/module.js';

export function isCompatible(targetType: TargetType, descriptor: ModuleDescriptor): boolean {
  return descriptor.moduleType.isCompatibleWithTargetType(targetType);
}

/**
 * Lazily yield the descriptors compatible with `targetType`, in input order.
 */
export function* filterCompatible(
  targetType: TargetType,
  descriptors: Iterable<ModuleDescriptor>,
): Generator<ModuleDescriptor, void, undefined> {
  for (const descriptor of descriptors) {
    if (isCompatible(targetType, descriptor)) {
      yield descriptor;
    }
  }
}

/** Names of the compatible descriptors, in input order. */
export function compatibleNames(
  targetType: TargetType,
  descriptors: Iterable<ModuleDescriptor>,
): string[] {
  return Array.from(filterCompatible(targetType, descriptors), (d) => d.name);
}
