/**
 * Resforge Kernel — Module Type Guard Tests
 *
 *   MT-U1: classes and plain objects with a name and the predicate pass
 *   MT-U2: values missing either member are rejected
 */

import { describe, it, expect } from 'vitest';
import { isEditingModuleType } from '../src/index.js';

class TextModule {
  static isCompatibleWithTargetType(targetType: string): boolean {
    return targetType === 'X';
  }
}

describe('isEditingModuleType', () => {
  it('MT-U1: accepts a class with a static predicate', () => {
    expect(isEditingModuleType(TextModule)).toBe(true);
  });

  it('MT-U1: accepts a plain object carrying a name', () => {
    expect(isEditingModuleType({ name: 'Maps', isCompatibleWithTargetType: () => false })).toBe(true);
  });

  it('MT-U2: rejects a plain object without a name', () => {
    expect(isEditingModuleType({ isCompatibleWithTargetType: () => true })).toBe(false);
  });

  it('MT-U2: rejects a non-string name', () => {
    expect(isEditingModuleType({ name: 7, isCompatibleWithTargetType: () => true })).toBe(false);
  });

  it('MT-U2: rejects values without the predicate', () => {
    expect(isEditingModuleType({ name: 'Text' })).toBe(false);
    expect(isEditingModuleType(null)).toBe(false);
    expect(isEditingModuleType('Text')).toBe(false);
  });
});
