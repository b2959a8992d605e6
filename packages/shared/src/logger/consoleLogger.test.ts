import { ConsoleLogger } from './consoleLogger';
import type { RunStarted } from '../types/events';

const event: RunStarted = {
  schemaVersion: 1,
  timestamp: '2026-02-18T00:00:00.000Z',
  runId: 'run-1',
  type: 'RunStarted',
  payload: { caseCount: 3, resumed: false, workers: 2 },
};

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints raw events only at debug level', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    new ConsoleLogger().log(event);
    expect(logSpy).not.toHaveBeenCalled();

    new ConsoleLogger({ level: 'debug' }).log(event);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(event));
  });

  it('traces events with their message', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    new ConsoleLogger().child({ caseId: 'c1' }).trace(event, 'started');
    expect(logSpy).toHaveBeenCalledWith('[caseId=c1] started', JSON.stringify(event));
  });

  it('filters messages below the configured level', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new ConsoleLogger({ level: 'warn' });
    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('w');
  });

  it('always prints errors', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger({ level: 'error' });
    logger.error(new Error('boom'));
    logger.error(new Error('boom'), 'msg');
    expect(errorSpy).toHaveBeenCalledWith(expect.any(Error));
    expect(errorSpy).toHaveBeenCalledWith('msg', expect.any(Error));
  });

  it('merges bindings of nested children into a prefix', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new ConsoleLogger();
    logger.child({}).info('no-prefix');
    logger.child({ runId: 'r1' }).child({ caseId: 'x' }).info('hello');
    expect(infoSpy).toHaveBeenCalledWith('no-prefix');
    expect(infoSpy).toHaveBeenCalledWith('[runId=r1 caseId=x] hello');
  });
});
