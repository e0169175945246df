import { WebSocketServer, WebSocket, RawData } from 'ws';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { EVENT_NAMES, EventName } from '../../domain/events/DomainEvents';

/**
 * Bridges domain events to WebSocket clients.
 * Subscribes to all domain events and broadcasts them to connected dashboards.
 *
 * Clients can send a `subscribe` message with `stages` to receive only queue events
 * for those stages. Clients without a subscription receive ALL events.
 */
export class WebSocketBridge {
  /** Per-client stage filters. Clients not in this map get all events. */
  private subscriptions = new Map<WebSocket, Set<string>>();

  constructor(
    private wss: WebSocketServer,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {
    this.setupEventHandlers();
    this.setupConnectionHandlers();
  }

  private setupConnectionHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      ws.on('close', () => {
        this.subscriptions.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.error('WebSocket client error', error);
      });

      ws.on('message', (data: RawData) => {
        let message: unknown;
        try {
          message = JSON.parse(data.toString());
        } catch {
          this.logger.warn('Failed to parse WebSocket message');
          return;
        }
        this.handleClientMessage(ws, message);
      });
    });
  }

  private handleClientMessage(ws: WebSocket, message: unknown): void {
    if (typeof message !== 'object' || message === null || !('type' in message)) return;

    if (message.type === 'ping') {
      ws.send(JSON.stringify({ type: 'pong', timestamp: Date.now() }));
      return;
    }

    // Client wants queue events filtered to specific stages
    if (message.type === 'subscribe' && 'stages' in message && Array.isArray(message.stages)) {
      const stages = new Set<string>(message.stages.filter((s: unknown): s is string => typeof s === 'string'));
      this.subscriptions.set(ws, stages);
      ws.send(JSON.stringify({ type: 'subscribed', stages: [...stages], timestamp: Date.now() }));
      return;
    }

    if (message.type === 'unsubscribe') {
      this.subscriptions.delete(ws);
      ws.send(JSON.stringify({ type: 'unsubscribed', timestamp: Date.now() }));
      return;
    }

    this.logger.debug('Received WebSocket message', { type: String(message.type) });
  }

  private setupEventHandlers(): void {
    for (const event of EVENT_NAMES) {
      this.eventBus.on(event, (data) => {
        this.broadcast(event, data);
      });
    }

    this.logger.info(`WebSocket bridge subscribed to ${EVENT_NAMES.length} events`);
  }

  /**
   * Stage a queue event refers to, if any.
   */
  private extractStage(event: EventName, data: unknown): string | undefined {
    if (!event.startsWith('queue:') || typeof data !== 'object' || data === null) return undefined;
    if ('stage' in data && typeof data.stage === 'string') return data.stage;
    if ('from' in data && typeof data.from === 'string') return data.from;
    return undefined;
  }

  /**
   * Broadcast an event to connected clients, honouring stage filters.
   */
  private broadcast(event: EventName, data: unknown): void {
    const message = JSON.stringify({
      type: event,
      event,
      data,
      timestamp: Date.now()
    });

    const stage = this.extractStage(event, data);

    this.wss.clients.forEach((client) => {
      if (client.readyState !== WebSocket.OPEN) return;

      const sub = this.subscriptions.get(client);
      if (sub && stage && !sub.has(stage)) {
        return;
      }

      client.send(message);
    });
  }

  getClientCount(): number {
    return this.wss.clients.size;
  }
}
