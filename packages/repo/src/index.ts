import * as fs from 'fs/promises';
import * as path from 'path';
import { pathExists } from 'fs-extra';
import { APP_DIR, ConfigError } from '@testmend/shared';

export * from './patch/diff';
export * from './patch/engine';
export * from './patch/lock';
export * from './patch/security';
export * from './patch/validate';

export const PROJECT_CONFIG_FILE = '.testmend.yaml';

/**
 * Finds the source root starting from `cwd`: the nearest parent holding
 * `.testmend.yaml`, then the nearest holding `.git`, then the nearest holding
 * `package.json`. Makes sure `.testmend/` can be written there.
 */
export async function findRepoRoot(cwd: string = process.cwd()): Promise<string> {
  for (const marker of [PROJECT_CONFIG_FILE, '.git', 'package.json']) {
    const found = await findUp(path.resolve(cwd), marker);
    if (found) {
      await validateRepoRoot(found);
      return found;
    }
  }

  throw new ConfigError(
    `Could not detect repository root from ${cwd}. Run inside a project with .git, package.json or ${PROJECT_CONFIG_FILE}.`,
  );
}

async function findUp(start: string, marker: string): Promise<string | undefined> {
  const { root } = path.parse(start);
  let dir = start;
  for (;;) {
    if (await pathExists(path.join(dir, marker))) return dir;
    if (dir === root) return undefined;
    dir = path.dirname(dir);
  }
}

async function validateRepoRoot(dir: string): Promise<void> {
  const appDir = path.join(dir, APP_DIR);
  try {
    await fs.mkdir(appDir, { recursive: true });
    await fs.access(appDir, fs.constants.W_OK);
  } catch (error) {
    throw new ConfigError(
      `Repository root detected at ${dir}, but ${APP_DIR} is not writable`,
      { cause: error },
    );
  }
}
