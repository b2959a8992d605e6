import { copy } from 'fs-extra';
import { relative } from '@testmend/shared';

/**
 * Copies the source tree into `dest`, skipping any entry whose first path
 * segment is in `ignore`.
 */
export async function copySnapshot(
  sourceRoot: string,
  dest: string,
  ignore: readonly string[],
): Promise<void> {
  const skip = new Set(ignore);
  await copy(sourceRoot, dest, {
    filter: (src) => {
      const rel = relative(sourceRoot, src);
      if (rel === '') return true;
      const [top] = rel.split('/');
      return !skip.has(top);
    },
  });
}
