import { ManualPatchSchema } from '@testmend/core';
import { UsageError, type ManualPatch } from '@testmend/shared';
import { readDocument } from './documents';

/**
 * Loads a hand-written patch for the `fix` verdict, e.g.
 *
 * ```yaml
 * kind: TargetedReplace
 * targetFile: src/cart.ts
 * payload:
 *   kind: TargetedReplace
 *   oldText: "total - discount"
 *   newText: "total * (1 - discount)"
 * ```
 */
export async function loadManualPatch(file: string): Promise<ManualPatch> {
  const patch = await readDocument(file, ManualPatchSchema, 'patch');
  if (patch.kind !== patch.payload.kind) {
    throw new UsageError(
      `Patch kind ${patch.kind} does not match its payload kind ${patch.payload.kind} in ${file}`,
    );
  }
  return patch;
}
