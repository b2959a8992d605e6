import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { UsageError } from '@testmend/shared';
import { loadBatch } from './batch';
import { loadManualPatch } from './manual_patch';

describe('input files', () => {
  let dir: string;

  const write = async (name: string, content: string) => {
    const file = path.join(dir, name);
    await fs.writeFile(file, content);
    return file;
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'testmend-cli-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('loadBatch', () => {
    it('reads a YAML list and defaults the selector to the id', async () => {
      const file = await write(
        'batch.yaml',
        [
          '- id: login',
          '  priority: 2',
          '  targetFile: src/login.ts',
          '- id: cart',
          '  selector: tests/cart.test.ts',
          '  dependsOn: [login]',
          '',
        ].join('\n'),
      );

      expect(await loadBatch(file)).toEqual([
        { id: 'login', selector: 'login', priority: 2, targetFile: 'src/login.ts' },
        { id: 'cart', selector: 'tests/cart.test.ts', dependsOn: ['login'] },
      ]);
    });

    it('reads a JSON mapping with a cases list', async () => {
      const file = await write(
        'batch.json',
        JSON.stringify({ cases: [{ id: 'a', selector: 'a.test.ts', resources: ['db'] }] }),
      );

      expect(await loadBatch(file)).toEqual([{ id: 'a', selector: 'a.test.ts', resources: ['db'] }]);
    });

    it('lists schema problems by path', async () => {
      const file = await write('batch.yaml', '- selector: x\n');

      await expect(loadBatch(file)).rejects.toThrow(
        `Invalid batch file ${file}:\n- cases.0.id: Required`,
      );
    });

    it('rejects unknown keys', async () => {
      const file = await write('batch.yaml', '- id: a\n  retries: 3\n');

      await expect(loadBatch(file)).rejects.toBeInstanceOf(UsageError);
    });

    it('rejects duplicate ids', async () => {
      const file = await write('batch.yaml', '- id: a\n- id: a\n');

      await expect(loadBatch(file)).rejects.toThrow(`Duplicate case id "a" in ${file}`);
    });

    it('reports a missing file as a usage error', async () => {
      const file = path.join(dir, 'missing.yaml');

      await expect(loadBatch(file)).rejects.toThrow(`Could not read batch file: ${file}`);
    });
  });

  describe('loadManualPatch', () => {
    it('reads a manual patch', async () => {
      const file = await write(
        'fix.yaml',
        [
          'kind: TargetedReplace',
          'targetFile: src/cart.ts',
          'payload:',
          '  kind: TargetedReplace',
          '  oldText: "total - discount"',
          '  newText: "total * (1 - discount)"',
          '',
        ].join('\n'),
      );

      expect(await loadManualPatch(file)).toEqual({
        kind: 'TargetedReplace',
        targetFile: 'src/cart.ts',
        payload: { kind: 'TargetedReplace', oldText: 'total - discount', newText: 'total * (1 - discount)' },
      });
    });

    it('rejects a payload of another kind', async () => {
      const file = await write(
        'fix.json',
        JSON.stringify({
          kind: 'UnifiedDiff',
          targetFile: 'src/cart.ts',
          payload: { kind: 'FullRewrite', content: 'export {};\n' },
        }),
      );

      await expect(loadManualPatch(file)).rejects.toThrow(
        `Patch kind UnifiedDiff does not match its payload kind FullRewrite in ${file}`,
      );
    });
  });
});
