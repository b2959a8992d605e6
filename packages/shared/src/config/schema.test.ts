import { ConfigSchema } from './schema';

describe('ConfigSchema', () => {
  it('fills every section with defaults', () => {
    const config = ConfigSchema.parse({});
    expect(config.healing).toEqual({
      maxRetries: 3,
      confidenceFloor: 0.6,
      rollbackFailedPatches: false,
    });
    expect(config.concurrency.workers).toBe(4);
    expect(config.sandbox.command).toBe('npm test -- {selector}');
    expect(config.sandbox.timeoutMs).toBe(120000);
    expect(config.sandbox.maxOutputBytes).toBe(1048576);
    expect(config.sandbox.ignore).toEqual(['node_modules', '.git', '.testmend']);
    expect(config.patch).toEqual({
      lockScope: 'file',
      lockTimeoutMs: 30000,
      fuzz: 2,
      maxLinesTouched: 400,
      allowBinary: false,
    });
    expect(config.knowledge).toEqual({ enabled: true, path: '.testmend/knowledge.jsonl' });
    expect(config.provider).toBeUndefined();
    expect(config.strict).toBe(false);
  });

  it('keeps defaults for keys missing from a partial section', () => {
    const config = ConfigSchema.parse({ healing: { maxRetries: 1 } });
    expect(config.healing.maxRetries).toBe(1);
    expect(config.healing.confidenceFloor).toBe(0.6);
  });

  it('rejects out-of-range values with their path', () => {
    const result = ConfigSchema.safeParse({
      healing: { confidenceFloor: 1.5 },
      concurrency: { workers: 0 },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      const paths = result.error.issues.map((issue) => issue.path.join('.'));
      expect(paths).toEqual(['healing.confidenceFloor', 'concurrency.workers']);
    }
  });

  it('accepts only known provider types', () => {
    expect(ConfigSchema.safeParse({ provider: { type: 'fake', model: 'scripted' } }).success).toBe(
      true,
    );
    expect(ConfigSchema.safeParse({ provider: { type: 'other', model: 'x' } }).success).toBe(false);
  });
});
