import { checkTarget, validatePathSecurity } from './security';

describe('validatePathSecurity', () => {
  it('accepts ordinary relative paths', () => {
    expect(validatePathSecurity('src/app.ts')).toBeUndefined();
    expect(validatePathSecurity('tests/..fixtures/a.ts')).toBeUndefined();
  });

  it.each([
    ['../secret.txt', 'Path traversal detected: ../secret.txt'],
    ['src/../../x', 'Path traversal detected: src/../../x'],
    ['%2e%2e/secret', 'Path traversal detected: %2e%2e/secret'],
    ['/etc/passwd', 'Absolute path not allowed: /etc/passwd'],
    ['C:/Windows/x', 'Absolute Windows path not allowed: C:/Windows/x'],
    ['a\0b', 'Null byte injection detected in path: a\0b'],
    ['a%2fb', 'Encoded path separator detected (potential traversal): a%2fb'],
    ['  ', 'Empty target path'],
  ])('rejects %j', (input, message) => {
    expect(validatePathSecurity(input)).toBe(message);
  });
});

describe('checkTarget', () => {
  it('refuses binary files unless allowed', () => {
    expect(checkTarget('/repo', 'assets/logo.png')?.kind).toBe('BINARY_FILE');
    expect(checkTarget('/repo', 'assets/logo.png', { allowBinary: true })).toBeUndefined();
  });

  it('reports unsafe paths as UNSAFE_PATH', () => {
    expect(checkTarget('/repo', '../x.ts')).toEqual({
      kind: 'UNSAFE_PATH',
      message: 'Path traversal detected: ../x.ts',
    });
  });
});
