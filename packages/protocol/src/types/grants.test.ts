import { describe, it, expect } from 'vitest';
import {
  PermissionLevel,
  isPermissionLevel,
  maxLevel,
  parsePermissionLevel,
  permissionLevelName,
} from './grants.js';

describe('PermissionLevel', () => {
  it('is totally ordered from None to Owner', () => {
    expect(PermissionLevel.None).toBeLessThan(PermissionLevel.Read);
    expect(PermissionLevel.Read).toBeLessThan(PermissionLevel.Comment);
    expect(PermissionLevel.Comment).toBeLessThan(PermissionLevel.Edit);
    expect(PermissionLevel.Edit).toBeLessThan(PermissionLevel.Owner);
  });
});

describe('parsePermissionLevel', () => {
  it('parses names case-insensitively', () => {
    expect(parsePermissionLevel('edit')).toBe(3);
    expect(parsePermissionLevel(' Owner ')).toBe(4);
    expect(parsePermissionLevel('NONE')).toBe(0);
  });

  it('parses numbers and numeric strings', () => {
    expect(parsePermissionLevel(2)).toBe(2);
    expect(parsePermissionLevel('1')).toBe(1);
  });

  it('returns null for unknown input', () => {
    expect(parsePermissionLevel('admin')).toBeNull();
    expect(parsePermissionLevel(5)).toBeNull();
    expect(parsePermissionLevel('')).toBeNull();
    expect(parsePermissionLevel(1.5)).toBeNull();
  });
});

describe('maxLevel', () => {
  it('picks the most permissive level', () => {
    expect(maxLevel([1, 3, 2])).toBe(3);
  });

  it('is None for no levels', () => {
    expect(maxLevel([])).toBe(0);
  });
});

describe('helpers', () => {
  it('names levels', () => {
    expect(permissionLevelName(PermissionLevel.Comment)).toBe('Comment');
  });

  it('recognises levels', () => {
    expect(isPermissionLevel(4)).toBe(true);
    expect(isPermissionLevel(-1)).toBe(false);
    expect(isPermissionLevel('1')).toBe(false);
  });
});
