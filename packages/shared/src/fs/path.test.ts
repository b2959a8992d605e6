import { join, normalizePath, relative, dirname, resolve, isWithin } from './path';

describe('path', () => {
  it('normalizes backslashes', () => {
    expect(normalizePath('foo\\bar')).toBe('foo/bar');
    expect(normalizePath('foo/bar')).toBe('foo/bar');
  });

  it('joins and collapses segments', () => {
    expect(join('foo', 'bar', '..', 'baz')).toBe('foo/baz');
  });

  it('computes relative paths with forward slashes', () => {
    expect(relative('/home/user/project', '/home/user/project/src/file.ts')).toBe('src/file.ts');
    expect(relative('/home/user/project/src', '/home/user/project/dist')).toBe('../dist');
  });

  it('returns dirname and resolve with forward slashes', () => {
    expect(dirname('/home/user/file.ts')).toBe('/home/user');
    expect(resolve('/home', 'user', 'project')).toBe('/home/user/project');
  });

  describe('isWithin', () => {
    it('accepts the root and paths beneath it', () => {
      expect(isWithin('/repo', '.')).toBe(true);
      expect(isWithin('/repo', 'src/a.ts')).toBe(true);
      expect(isWithin('/repo', '/repo/src/a.ts')).toBe(true);
    });

    it('rejects traversal and outside absolute paths', () => {
      expect(isWithin('/repo', '../etc/passwd')).toBe(false);
      expect(isWithin('/repo', 'src/../../x')).toBe(false);
      expect(isWithin('/repo', '/etc/passwd')).toBe(false);
    });

    it('does not treat names starting with dots as traversal', () => {
      expect(isWithin('/repo', '..hidden/file')).toBe(true);
    });
  });
});
