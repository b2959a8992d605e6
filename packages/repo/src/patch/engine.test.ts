import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { LockTimeoutError, PatchOpError, type Patch, type PatchPayload } from '@testmend/shared';
import { PatchEngine } from './engine';
import { KeyedLock } from './lock';

function patch(id: string, payload: PatchPayload, targetFile = 'src/a.ts'): Patch {
  return { id, kind: payload.kind, targetFile, payload, confidence: 0.9 };
}

function replace(id: string, oldText: string, newText: string, targetFile?: string): Patch {
  return patch(id, { kind: 'TargetedReplace', oldText, newText }, targetFile);
}

describe('PatchEngine', () => {
  let root: string;
  let target: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'testmend-patch-'));
    target = path.join(root, 'src', 'a.ts');
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, 'import { missng } from "./lib";\nexport const run = () => missng();\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('applies a patch and keeps the exact pre-apply bytes', async () => {
    const engine = new PatchEngine({ root });
    const before = await fs.readFile(target);

    const applied = await engine.apply(replace('p1', '"./lib"', '"./lib/index"'));

    expect(await fs.readFile(target, 'utf8')).toBe(
      'import { missng } from "./lib/index";\nexport const run = () => missng();\n',
    );
    expect(applied.snapshot?.equals(before)).toBe(true);
    expect(applied.absolutePath).toBe(target);
    expect(applied.rolledBackAt).toBeUndefined();
  });

  it('rejects an ambiguous anchor without writing', async () => {
    const engine = new PatchEngine({ root });
    const before = await fs.readFile(target);

    const error = await engine.apply(replace('p1', 'missng', 'missing')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PatchOpError);
    expect(error).toMatchObject({ kind: 'AMBIGUOUS' });
    expect((await fs.readFile(target)).equals(before)).toBe(true);
  });

  it('restores the snapshot byte for byte when the post-apply check fails', async () => {
    const bytes = Buffer.from('café = 1\r\nother\r\n', 'utf8');
    await fs.writeFile(target, bytes);
    const engine = new PatchEngine({
      root,
      postApplyCheck: () => {
        throw new Error('syntax check failed');
      },
    });

    const error = await engine.apply(replace('p1', 'other', 'changed')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PatchOpError);
    expect(error).toMatchObject({ kind: 'POST_APPLY_MISMATCH' });
    expect((await fs.readFile(target)).equals(bytes)).toBe(true);
  });

  it('removes a created file when the post-apply check fails', async () => {
    const engine = new PatchEngine({
      root,
      postApplyCheck: () => Promise.reject(new Error('nope')),
    });

    await expect(
      engine.apply(patch('p1', { kind: 'FullRewrite', content: 'x\n' }, 'src/new.ts')),
    ).rejects.toBeInstanceOf(PatchOpError);
    await expect(fs.access(path.join(root, 'src', 'new.ts'))).rejects.toThrow();
  });

  it('rolls back to the snapshot once', async () => {
    const engine = new PatchEngine({ root });
    const before = await fs.readFile(target);
    const applied = await engine.apply(replace('p1', '"./lib"', '"./lib2"'));

    const rolledBack = await engine.rollback(applied);

    expect((await fs.readFile(target)).equals(before)).toBe(true);
    expect(rolledBack.rolledBackAt).toEqual(expect.any(String));
    expect(await engine.rollback(rolledBack)).toBe(rolledBack);
  });

  it('deletes a file it created on rollback', async () => {
    const engine = new PatchEngine({ root });
    const applied = await engine.apply(
      patch('p1', { kind: 'FullRewrite', content: 'export {};\n' }, 'src/created.ts'),
    );
    expect(applied.snapshot).toBeNull();

    await engine.rollback(applied);

    await expect(fs.access(path.join(root, 'src', 'created.ts'))).rejects.toThrow();
  });

  it('refuses to roll back over a later change', async () => {
    const engine = new PatchEngine({ root });
    const applied = await engine.apply(replace('p1', '"./lib"', '"./lib2"'));
    await engine.apply(replace('p2', 'export const run', 'export const go'));

    await expect(engine.rollback(applied)).rejects.toThrow(
      'Cannot roll back patch p1: src/a.ts changed after it was applied',
    );
  });

  it('rejects targets outside the root', async () => {
    const engine = new PatchEngine({ root });
    await expect(
      engine.apply(patch('p1', { kind: 'FullRewrite', content: 'x' }, '../escape.ts')),
    ).rejects.toMatchObject({ kind: 'UNSAFE_PATH' });
    expect(await engine.check(replace('p2', 'a', 'b', '/etc/hosts'))).toMatchObject({
      valid: false,
      kind: 'UNSAFE_PATH',
    });
  });

  it('validates the second of two concurrent patches only after the first completes', async () => {
    const order: string[] = [];
    let openGate: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });

    const engine = new PatchEngine({
      root,
      postApplyCheck: async (applied) => {
        order.push(`check:${applied.patch.id}`);
        if (applied.patch.id === 'first') await gate;
      },
    });
    const originalValidate = engine.validate.bind(engine);
    vi.spyOn(engine, 'validate').mockImplementation((p, content) => {
      order.push(`validate:${p.id}`);
      return originalValidate(p, content);
    });

    const first = engine.apply(replace('first', '"./lib"', '"./lib/index"'));
    const second = engine.apply(replace('second', 'export const run', 'export const start'));

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(order).toEqual(['validate:first', 'check:first']);

    openGate();
    await Promise.all([first, second]);

    expect(order).toEqual(['validate:first', 'check:first', 'validate:second', 'check:second']);
    expect(await fs.readFile(target, 'utf8')).toBe(
      'import { missng } from "./lib/index";\nexport const start = () => missng();\n',
    );
  });

  it('times out when the target stays locked', async () => {
    const lock = new KeyedLock();
    const engine = new PatchEngine({ root, lock, lockTimeoutMs: 20 });
    const release = await lock.acquire(engine.lockKey('src/a.ts'), 1000);

    await expect(engine.apply(replace('p1', '"./lib"', '"./x"'))).rejects.toBeInstanceOf(
      LockTimeoutError,
    );
    release();
  });

  it('shares one key across files under tree scope', () => {
    const fileScoped = new PatchEngine({ root });
    const treeScoped = new PatchEngine({ root, lockScope: 'tree' });
    expect(fileScoped.lockKey('src/a.ts')).not.toBe(fileScoped.lockKey('src/b.ts'));
    expect(fileScoped.lockKey('./src/a.ts')).toBe('src/a.ts');
    expect(treeScoped.lockKey('src/a.ts')).toBe(treeScoped.lockKey('src/b.ts'));
  });

  it('materializes generated files and reads them back', async () => {
    const engine = new PatchEngine({ root });
    await engine.materialize('tests/gen.test.ts', 'test("x", () => {});\n');
    expect(await engine.read('tests/gen.test.ts')).toBe('test("x", () => {});\n');
    expect(await engine.read('tests/missing.ts')).toBeNull();
    await expect(engine.materialize('../out.ts', 'x')).rejects.toBeInstanceOf(PatchOpError);
  });
});
