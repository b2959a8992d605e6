import type { EventBus, HealEvent, Logger } from '@testmend/shared';

export type EventListener = (event: HealEvent) => Promise<void> | void;

/**
 * Sends every event to the logger's audit trail, then to each listener in
 * registration order. A failing listener is logged and does not stop the
 * others or the emitter.
 */
export class HealEventBus implements EventBus {
  private readonly listeners: EventListener[] = [];

  constructor(private readonly logger: Logger) {}

  subscribe(listener: EventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  async emit(event: HealEvent): Promise<void> {
    await this.logger.log(event);
    for (const listener of this.listeners) {
      try {
        await listener(event);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        await this.logger.error(err, `Event listener failed on ${event.type}`);
      }
    }
  }
}
