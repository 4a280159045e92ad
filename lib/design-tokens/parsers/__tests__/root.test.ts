import { describe, it, expect } from 'vitest';
import { generateRootTokenPath, isRootToken } from '../root';
import { SchemaVersion } from '../../schema/version';
import { DEFAULT_GROUP_MARKERS } from '../../types';

describe('isRootToken', () => {
  it('recognizes only $root under 2025.10', () => {
    expect(isRootToken('$root', SchemaVersion.V2025_10, DEFAULT_GROUP_MARKERS)).toBe(true);
    expect(isRootToken('_', SchemaVersion.V2025_10, DEFAULT_GROUP_MARKERS)).toBe(false);
    expect(isRootToken('DEFAULT', SchemaVersion.V2025_10, ['DEFAULT'])).toBe(false);
  });

  it('recognizes the configured markers under draft', () => {
    expect(isRootToken('_', SchemaVersion.Draft, DEFAULT_GROUP_MARKERS)).toBe(true);
    expect(isRootToken('@', SchemaVersion.Draft, DEFAULT_GROUP_MARKERS)).toBe(true);
    expect(isRootToken('DEFAULT', SchemaVersion.Draft, DEFAULT_GROUP_MARKERS)).toBe(true);
    expect(isRootToken('base', SchemaVersion.Draft, ['base'])).toBe(true);
    expect(isRootToken('_', SchemaVersion.Draft, ['base'])).toBe(false);
    expect(isRootToken('$root', SchemaVersion.Draft, DEFAULT_GROUP_MARKERS)).toBe(false);
  });

  it('recognizes nothing for an unknown version', () => {
    expect(isRootToken('$root', SchemaVersion.Unknown, DEFAULT_GROUP_MARKERS)).toBe(false);
    expect(isRootToken('_', SchemaVersion.Unknown, DEFAULT_GROUP_MARKERS)).toBe(false);
  });
});

describe('generateRootTokenPath', () => {
  it('places the root token at its group path', () => {
    expect(generateRootTokenPath(['color', 'primary'], '$root', SchemaVersion.V2025_10)).toEqual(['color', 'primary']);
    expect(generateRootTokenPath(['color', 'primary'], '_', SchemaVersion.Draft)).toEqual(['color', 'primary']);
  });

  it('returns a copy', () => {
    const groupPath = ['color'];
    const rootPath = generateRootTokenPath(groupPath, '$root', SchemaVersion.V2025_10);
    rootPath.push('extra');
    expect(groupPath).toEqual(['color']);
  });
});
