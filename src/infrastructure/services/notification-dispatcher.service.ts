import { WebhookRoute } from '../../config/app.settings';
import { INotificationChannel } from '../../domain/interfaces/services.interface';
import { MarketEvent } from '../../domain/types/event.types';
import { Logger } from '../../shared/logger';
import { WebhookClient } from '../http/webhook.client';
import { DeliveryQueueService } from './delivery-queue.service';

/**
 * Routes events to the webhooks registered for their source plus the ALL
 * route, and to any extra channels (Telegram). Delivery is queued, never awaited.
 */
export class NotificationDispatcher {
  private readonly logger = new Logger(NotificationDispatcher.name);
  private readonly webhooks = new Map<WebhookRoute, string[]>();
  private readonly clients = new Map<string, INotificationChannel>();

  constructor(
    private readonly queue: DeliveryQueueService,
    webhooks: Readonly<Partial<Record<WebhookRoute, readonly string[]>>> = {},
    private readonly channels: readonly INotificationChannel[] = [],
    private readonly createClient: (url: string) => INotificationChannel = (url) =>
      new WebhookClient(url),
  ) {
    for (const [route, urls] of Object.entries(webhooks)) {
      if (!urls || !isWebhookRoute(route)) continue;
      for (const url of urls) this.registerWebhook(route, url);
    }
  }

  registerWebhook(route: WebhookRoute, url: string): void {
    const urls = this.webhooks.get(route) ?? [];
    if (urls.includes(url)) return;
    urls.push(url);
    this.webhooks.set(route, urls);
    this.logger.info(`Registered webhook for ${route}: ${url}`);
  }

  /** Distinct webhook URLs for the event's source and ALL. */
  targetsFor(event: MarketEvent): string[] {
    const urls = [...(this.webhooks.get(event.source) ?? []), ...(this.webhooks.get('ALL') ?? [])];
    return [...new Set(urls)];
  }

  /** Returns the number of deliveries queued. */
  dispatch(event: MarketEvent): number {
    const targets: INotificationChannel[] = [
      ...this.targetsFor(event).map((url) => this.clientFor(url)),
      ...this.channels,
    ];
    if (targets.length === 0) {
      this.logger.debug(`No channels registered for ${event.source}`);
      return 0;
    }

    let queued = 0;
    for (const channel of targets) {
      if (this.queue.enqueue(channel, event)) queued++;
    }
    return queued;
  }

  private clientFor(url: string): INotificationChannel {
    let client = this.clients.get(url);
    if (!client) {
      client = this.createClient(url);
      this.clients.set(url, client);
    }
    return client;
  }
}

const ROUTES: readonly string[] = ['CASCADE', 'FUNDING', 'VOLATILITY', 'CORRELATION', 'REGIME', 'ALL'];

function isWebhookRoute(value: string): value is WebhookRoute {
  return ROUTES.includes(value);
}
