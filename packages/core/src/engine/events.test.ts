import { SilentLogger, makeEvent } from '@testmend/shared';
import { HealEventBus } from './events';

const event = makeEvent('run-1', {
  type: 'CaseFatal',
  payload: { caseId: 'c1', code: 'StoreError', message: 'disk gone' },
});

describe('HealEventBus', () => {
  it('logs the event before notifying listeners', async () => {
    const logger = new SilentLogger();
    const order: string[] = [];
    vi.spyOn(logger, 'log').mockImplementation(() => {
      order.push('log');
    });
    const bus = new HealEventBus(logger);
    bus.subscribe(() => {
      order.push('listener');
    });

    await bus.emit(event);

    expect(order).toEqual(['log', 'listener']);
  });

  it('keeps notifying after a listener throws', async () => {
    const logger = new SilentLogger();
    const error = vi.spyOn(logger, 'error');
    const bus = new HealEventBus(logger);
    const second = vi.fn();
    bus.subscribe(() => {
      throw new Error('boom');
    });
    bus.subscribe(second);

    await bus.emit(event);

    expect(second).toHaveBeenCalledWith(event);
    expect(error).toHaveBeenCalledWith(expect.any(Error), 'Event listener failed on CaseFatal');
  });

  it('stops notifying after unsubscribe', async () => {
    const bus = new HealEventBus(new SilentLogger());
    const listener = vi.fn();
    const unsubscribe = bus.subscribe(listener);

    unsubscribe();
    await bus.emit(event);

    expect(listener).not.toHaveBeenCalled();
  });
});
