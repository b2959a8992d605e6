// Minimal env vars that test commands commonly need.
// Secrets must be explicitly allowlisted via sandbox.envAllowlist.
export const BASELINE_ENV_KEYS = [
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'TERM',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'TMP',
  'TEMP',
  'XDG_CACHE_HOME',
  'NODE_ENV',
  // Windows
  'USERPROFILE',
  'APPDATA',
  'LOCALAPPDATA',
  'SYSTEMROOT',
  'COMSPEC',
  'PATHEXT',
  'HOMEDRIVE',
  'HOMEPATH',
];

export function getSafeEnv(
  envAllowlist: readonly string[],
  baseEnv: NodeJS.ProcessEnv,
  extraEnv: Record<string, string> = {},
): Record<string, string> {
  const safeEnv: Record<string, string> = {};

  const pathValue = baseEnv.PATH ?? baseEnv.Path;
  if (pathValue) {
    safeEnv.PATH = pathValue;
  }

  for (const key of [...BASELINE_ENV_KEYS, ...envAllowlist]) {
    const value = baseEnv[key];
    if (value === undefined) continue;
    safeEnv[key] = value;
  }

  // Assignments written in the command itself always win.
  return { ...safeEnv, ...extraEnv };
}
