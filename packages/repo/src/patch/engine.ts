import * as fs from 'fs/promises';
import * as path from 'path';
import { pathExists } from 'fs-extra';
import {
  PatchOpError,
  atomicWrite,
  normalizePath,
  type AppliedPatch,
  type Patch,
  type ValidationResult,
} from '@testmend/shared';
import { KeyedLock } from './lock';
import { checkTarget } from './security';
import { validatePatch } from './validate';

export type LockScope = 'file' | 'tree';

export interface PatchEngineOptions {
  /** Absolute path of the source tree patches are applied to */
  root: string;
  lockScope?: LockScope;
  lockTimeoutMs?: number;
  fuzz?: number;
  maxLinesTouched?: number;
  allowBinary?: boolean;
  /**
   * Runs after the write and read-back succeeded, still under the lock.
   * Throwing restores the snapshot and fails the apply.
   */
  postApplyCheck?: (applied: AppliedPatch) => Promise<void> | void;
  /** Shared lock, when several engines work on the same tree */
  lock?: KeyedLock;
}

const TREE_KEY = '<tree>';

/**
 * Validates and applies patches to a source tree. Every read-validate-write
 * and every rollback runs under an exclusive lock on the target file, and a
 * failed apply leaves the file byte-identical to its snapshot.
 */
export class PatchEngine {
  readonly root: string;
  private readonly lock: KeyedLock;
  private readonly lockTimeoutMs: number;

  constructor(private readonly options: PatchEngineOptions) {
    this.root = path.resolve(options.root);
    this.lock = options.lock ?? new KeyedLock();
    this.lockTimeoutMs = options.lockTimeoutMs ?? 30_000;
  }

  /** Lock key guarding `targetFile` under the configured scope. */
  lockKey(targetFile: string): string {
    return this.options.lockScope === 'tree' ? TREE_KEY : normalizePath(path.normalize(targetFile));
  }

  /**
   * Pure validation against the given content; see {@link validatePatch}.
   */
  validate(patch: Patch, content: string | null): ValidationResult {
    const unsafe = checkTarget(this.root, patch.targetFile, this.options);
    if (unsafe) {
      return { valid: false, kind: unsafe.kind, errors: [unsafe] };
    }
    return validatePatch(patch, content, this.options);
  }

  /** Validates against the file as it is on disk now. */
  async check(patch: Patch): Promise<ValidationResult> {
    const unsafe = checkTarget(this.root, patch.targetFile, this.options);
    if (unsafe) {
      return { valid: false, kind: unsafe.kind, errors: [unsafe] };
    }
    const snapshot = await this.readSnapshot(this.resolve(patch.targetFile));
    return this.validate(patch, snapshot === null ? null : snapshot.toString('utf8'));
  }

  /**
   * Applies a patch atomically.
   *
   * @throws PatchOpError when validation rejects the patch (nothing written) or
   *   when the write could not be confirmed (snapshot restored)
   * @throws LockTimeoutError when the target stays locked past the timeout
   */
  async apply(patch: Patch): Promise<AppliedPatch> {
    return this.lock.withLock(this.lockKey(patch.targetFile), this.lockTimeoutMs, async () => {
      const unsafe = checkTarget(this.root, patch.targetFile, this.options);
      if (unsafe) {
        throw new PatchOpError(`Patch ${patch.id} rejected: ${unsafe.message}`, {
          kind: unsafe.kind,
          errors: [unsafe],
        });
      }

      const absolutePath = this.resolve(patch.targetFile);
      const snapshot = await this.readSnapshot(absolutePath);
      const validation = this.validate(
        patch,
        snapshot === null ? null : snapshot.toString('utf8'),
      );
      if (!validation.valid) {
        throw new PatchOpError(
          `Patch ${patch.id} rejected (${validation.kind}): ${validation.errors[0]?.message ?? ''}`,
          { kind: validation.kind, errors: validation.errors },
        );
      }

      const applied: AppliedPatch = {
        patch,
        absolutePath,
        snapshot,
        content: validation.result,
        appliedAt: new Date().toISOString(),
      };

      try {
        await atomicWrite(absolutePath, validation.result);
        const readBack = await fs.readFile(absolutePath, 'utf8');
        if (readBack !== validation.result) {
          throw new PatchOpError(`Patch ${patch.id} did not read back as written`, {
            kind: 'POST_APPLY_MISMATCH',
          });
        }
        await this.options.postApplyCheck?.(applied);
      } catch (error) {
        await this.restore(absolutePath, snapshot);
        if (error instanceof PatchOpError) throw error;
        throw new PatchOpError(`Patch ${patch.id} failed after writing; snapshot restored`, {
          kind: 'POST_APPLY_MISMATCH',
          cause: error,
        });
      }

      return applied;
    });
  }

  /**
   * Restores the snapshot of an applied patch. Refuses when the file no longer
   * holds the patched content, since a later write would be lost.
   */
  async rollback(applied: AppliedPatch): Promise<AppliedPatch> {
    if (applied.rolledBackAt) return applied;

    const { patch } = applied;
    return this.lock.withLock(this.lockKey(patch.targetFile), this.lockTimeoutMs, async () => {
      const current = await this.readSnapshot(applied.absolutePath);
      if (current === null || current.toString('utf8') !== applied.content) {
        throw new PatchOpError(
          `Cannot roll back patch ${patch.id}: ${patch.targetFile} changed after it was applied`,
        );
      }
      await this.restore(applied.absolutePath, applied.snapshot);
      return { ...applied, rolledBackAt: new Date().toISOString() };
    });
  }

  /**
   * Writes a generated file (such as test code) atomically under the target's lock.
   */
  async materialize(targetFile: string, content: string): Promise<void> {
    const unsafe = checkTarget(this.root, targetFile, this.options);
    if (unsafe) {
      throw new PatchOpError(`Refusing to write ${targetFile}: ${unsafe.message}`, {
        kind: unsafe.kind,
        errors: [unsafe],
      });
    }
    await this.lock.withLock(this.lockKey(targetFile), this.lockTimeoutMs, () =>
      atomicWrite(this.resolve(targetFile), content),
    );
  }

  /** Reads a target relative to the root, or `null` when it does not exist. */
  async read(targetFile: string): Promise<string | null> {
    const unsafe = checkTarget(this.root, targetFile, { allowBinary: true });
    if (unsafe) return null;
    const snapshot = await this.readSnapshot(this.resolve(targetFile));
    return snapshot === null ? null : snapshot.toString('utf8');
  }

  private resolve(targetFile: string): string {
    return path.resolve(this.root, targetFile);
  }

  private async readSnapshot(absolutePath: string): Promise<Buffer | null> {
    if (!(await pathExists(absolutePath))) return null;
    return fs.readFile(absolutePath);
  }

  private async restore(absolutePath: string, snapshot: Buffer | null): Promise<void> {
    if (snapshot === null) {
      await fs.rm(absolutePath, { force: true });
    } else {
      await atomicWrite(absolutePath, snapshot);
    }
  }
}
