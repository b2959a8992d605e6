import { getSafeEnv } from './env';

describe('getSafeEnv', () => {
  const base = {
    PATH: '/usr/bin',
    HOME: '/home/dev',
    OPENAI_API_KEY: 'test-secret',
    DATABASE_URL: 'postgres://localhost/test',
  };

  it('keeps PATH and baseline keys only', () => {
    expect(getSafeEnv([], base)).toEqual({ PATH: '/usr/bin', HOME: '/home/dev' });
  });

  it('adds allowlisted keys', () => {
    expect(getSafeEnv(['DATABASE_URL', 'MISSING'], base)).toEqual({
      PATH: '/usr/bin',
      HOME: '/home/dev',
      DATABASE_URL: 'postgres://localhost/test',
    });
  });

  it('falls back to the Windows Path spelling', () => {
    expect(getSafeEnv([], { Path: 'C:\\bin' }).PATH).toBe('C:\\bin');
  });

  it('lets command assignments override inherited values', () => {
    expect(getSafeEnv([], base, { HOME: '/tmp', CI: '1' })).toEqual({
      PATH: '/usr/bin',
      HOME: '/tmp',
      CI: '1',
    });
  });
});
