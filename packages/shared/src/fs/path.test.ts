import { describe, it, expect } from 'vitest';
import { normalizePath, isWithin } from './path';

describe('path', () => {
  describe('normalizePath', () => {
    it('should replace backslashes with forward slashes', () => {
      expect(normalizePath('foo\\bar')).toBe('foo/bar');
    });

    it('should not alter paths with forward slashes', () => {
      expect(normalizePath('foo/bar')).toBe('foo/bar');
    });
  });

  describe('isWithin', () => {
    it('accepts the directory itself and its descendants', () => {
      expect(isWithin('/work/project', '/work/project')).toBe(true);
      expect(isWithin('/work/project', '/work/project/build_lib')).toBe(true);
    });

    it('rejects siblings and parents', () => {
      expect(isWithin('/work/project', '/work/project-two')).toBe(false);
      expect(isWithin('/work/project', '/work')).toBe(false);
    });
  });
});
