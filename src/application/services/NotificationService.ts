import { ICoordinationStore } from '../../domain/store/ICoordinationStore';
import { IOperatorConsole } from '../../domain/services/IOperatorConsole';
import { IEventBus } from '../../domain/events/IEventBus';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { IClock } from '../../domain/common/IClock';
import { ITicker } from '../../domain/common/ITicker';
import { ILogger } from '../../domain/common/ILogger';
import { ValidationError } from '../../domain/common/Errors';
import {
  Notification,
  NotificationPayload,
  NotificationType,
  RawNotification,
  notificationSchema,
  rawNotificationSchema,
} from '../../domain/notifications/Notification';
import { INotificationPublisher } from '../../domain/notifications/INotificationPublisher';
import { formatNotification } from '../../domain/notifications/formatNotification';
import { BoundedIdSet } from '../common/BoundedIdSet';

export const PENDING_NOTIFICATIONS_KEY = 'notifications:pending';

export interface NotificationServiceOptions {
  dedupCapacity: number;
  pollIntervalMs: number;
  keepAliveIntervalMs: number;
}

export interface DeliveryPassResult {
  delivered: number;
  skipped: number;
  /** Entries left on the pending list after the pass. */
  remaining: number;
}

/**
 * Delivers pending notifications to the operator console.
 *
 * The dedup set lives only in this process; losing it on restart can at worst repeat a line.
 */
export class NotificationService implements INotificationPublisher {
  private delivered: BoundedIdSet;

  constructor(
    private store: ICoordinationStore,
    private operatorConsole: IOperatorConsole,
    private eventBus: IEventBus,
    private idGenerator: IIdGenerator,
    private clock: IClock,
    private ticker: ITicker,
    private logger: ILogger,
    private options: NotificationServiceOptions
  ) {
    this.delivered = new BoundedIdSet(options.dedupCapacity);
  }

  /**
   * Append a typed notification to the pending list.
   */
  async publish<T extends NotificationType>(type: T, payload: NotificationPayload<T>): Promise<Notification> {
    const parsed = notificationSchema.safeParse({
      id: this.idGenerator.generate('notif'),
      type,
      payload,
      timestamp: this.clock.now().toISOString(),
    });
    if (!parsed.success) {
      throw new ValidationError(`Invalid '${type}' notification`, parsed.error.issues);
    }

    await this.store.rpush(PENDING_NOTIFICATIONS_KEY, JSON.stringify(parsed.data));
    this.logger.debug(`Notification queued: ${type}`, { id: parsed.data.id });
    return parsed.data;
  }

  /**
   * Append a notification of any type. Only the envelope is checked: unknown types and
   * malformed payloads are accepted and later rendered by the generic formatter.
   */
  async publishRaw(input: { id?: string; type: string; payload?: unknown; timestamp?: string }): Promise<RawNotification> {
    const notification: RawNotification = {
      id: input.id ?? this.idGenerator.generate('notif'),
      type: input.type,
      payload: input.payload,
      timestamp: input.timestamp ?? this.clock.now().toISOString(),
    };
    await this.store.rpush(PENDING_NOTIFICATIONS_KEY, JSON.stringify(notification));
    return notification;
  }

  async pending(): Promise<RawNotification[]> {
    const entries = await this.store.lrange(PENDING_NOTIFICATIONS_KEY, 0, -1);
    return entries.map(entry => this.decode(entry));
  }

  private decode(entry: string): RawNotification {
    let value: unknown;
    try {
      value = JSON.parse(entry);
    } catch {
      value = undefined;
    }

    const parsed = rawNotificationSchema.safeParse(value);
    if (parsed.success) {
      return parsed.data;
    }

    this.logger.warn('Unreadable notification entry, delivering as-is', { entry });
    return { id: `unreadable:${entry}`, type: 'unreadable', payload: entry };
  }

  /**
   * One delivery pass over the pending list. Entries are removed only once processed;
   * a console failure ends the pass and leaves the rest for the next one.
   */
  async deliverPending(): Promise<DeliveryPassResult> {
    const entries = await this.store.lrange(PENDING_NOTIFICATIONS_KEY, 0, -1);
    let processed = 0;
    let delivered = 0;
    let skipped = 0;

    for (const entry of entries) {
      const notification = this.decode(entry);

      if (this.delivered.has(notification.id)) {
        skipped++;
        processed++;
        continue;
      }

      const line = formatNotification(notification, this.logger);
      try {
        await this.operatorConsole.deliver(line);
      } catch (err) {
        this.logger.error('Operator console delivery failed', err instanceof Error ? err : new Error(String(err)), {
          notificationId: notification.id,
        });
        break;
      }

      this.delivered.add(notification.id);
      delivered++;
      processed++;
      await this.eventBus.emit('notification:delivered', { id: notification.id, type: notification.type });
    }

    if (processed > 0) {
      await this.store.ltrim(PENDING_NOTIFICATIONS_KEY, processed, -1);
    }

    const remaining = await this.store.llen(PENDING_NOTIFICATIONS_KEY);
    if (delivered > 0 || skipped > 0) {
      this.logger.debug('Notification pass complete', { delivered, skipped, remaining });
    }
    return { delivered, skipped, remaining };
  }

  async sendKeepAlive(): Promise<void> {
    await this.operatorConsole.deliver(`KEEP-ALIVE: notification delivery running at ${this.clock.now().toISOString()}`);
  }

  /**
   * Poll the pending list and send keep-alives until `signal` aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.info('Notification delivery started', {
      pollIntervalMs: this.options.pollIntervalMs,
      keepAliveIntervalMs: this.options.keepAliveIntervalMs,
    });

    await Promise.all([
      this.ticker.schedule('notifications:deliver', this.options.pollIntervalMs, async () => {
        await this.deliverPending();
      }, signal),
      this.ticker.schedule('notifications:keepalive', this.options.keepAliveIntervalMs, () => this.sendKeepAlive(), signal),
    ]);

    this.logger.info('Notification delivery stopped');
  }
}
