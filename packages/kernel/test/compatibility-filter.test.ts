/**
 * Resforge Kernel — Compatibility Filter Tests
 *
 * Pure predicate helpers: order preservation, laziness, no side effects.
 */

import { describe, it, expect } from 'vitest';
import { compatibleNames, filterCompatible, isCompatible } from '../src/index.js';
import type { ModuleDescriptor, TargetType } from '../src/index.js';

function descriptor(name: string, compatibleWith: ReadonlyArray<TargetType>): ModuleDescriptor {
  return {
    name,
    moduleType: {
      name,
      isCompatibleWithTargetType: (t: TargetType) => compatibleWith.includes(t),
    },
  };
}

const DESCRIPTORS = [
  descriptor('a', ['X']),
  descriptor('b', ['Y']),
  descriptor('c', ['X', 'Y']),
];

describe('compatibility filter', () => {
  it('isCompatible delegates to the module type', () => {
    expect(isCompatible('X', descriptor('a', ['X']))).toBe(true);
    expect(isCompatible('unknown', descriptor('a', ['X']))).toBe(false);
  });

  it('filterCompatible preserves input order', () => {
    const names = [...filterCompatible('Y', DESCRIPTORS)].map((d) => d.name);
    expect(names).toEqual(['b', 'c']);
  });

  it('filterCompatible is lazy', () => {
    const checked: string[] = [];
    const tracking = ['p', 'q', 'r'].map((name) => ({
      name,
      moduleType: {
        name,
        isCompatibleWithTargetType: () => {
          checked.push(name);
          return true;
        },
      },
    }));

    const iterator = filterCompatible('X', tracking);
    expect(checked).toEqual([]);

    iterator.next();
    expect(checked).toEqual(['p']);
  });

  it('compatibleNames returns names in input order', () => {
    expect(compatibleNames('X', DESCRIPTORS)).toEqual(['a', 'c']);
    expect(compatibleNames('Z', DESCRIPTORS)).toEqual([]);
  });
});
