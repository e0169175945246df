import { EventEmitter } from 'events';
import { IEventBus, EventHandler } from '../../domain/events/IEventBus';
import { EventName, EventPayload } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';

/**
 * In-memory event bus implementation using Node.js EventEmitter.
 * Handlers run concurrently; a failing handler is logged and does not affect the others.
 */
export class InMemoryEventBus implements IEventBus {
  private emitter: EventEmitter;

  constructor(private logger: ILogger) {
    this.emitter = new EventEmitter();

    // Dashboards attach one listener per event per WebSocket bridge
    this.emitter.setMaxListeners(100);
  }

  async emit<K extends EventName>(event: K, data: EventPayload<K>): Promise<void> {
    this.logger.debug(`Event emitted: ${event}`);

    const listeners = this.emitter.listeners(event);

    const promises = listeners.map(async (listener) => {
      try {
        await listener(data);
      } catch (error) {
        this.logger.error(`Error in event handler for ${event}:`, error instanceof Error ? error : new Error(String(error)));
      }
    });

    await Promise.all(promises);
  }

  on<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void {
    this.emitter.on(event, handler);
    this.logger.debug(`Handler registered for: ${event}`);
  }

  off<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void {
    this.emitter.off(event, handler);
    this.logger.debug(`Handler removed for: ${event}`);
  }

  removeAllListeners(event?: EventName): void {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
  }

  listenerCount(event: EventName): number {
    return this.emitter.listenerCount(event);
  }
}
