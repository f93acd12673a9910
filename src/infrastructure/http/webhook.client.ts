import { SinkDeliveryError, errorMessage } from '../../domain/errors';
import { INotificationChannel } from '../../domain/interfaces/services.interface';
import { MarketEvent } from '../../domain/types/event.types';
import { toWebhookBody } from '../notifications/event.formatter';

const WEBHOOK_TIMEOUT_MS = 5_000;

/** POSTs the event as JSON to one URL. Anything but a 2xx is a delivery failure. */
export class WebhookClient implements INotificationChannel {
  readonly name: string;

  constructor(private readonly url: string) {
    this.name = `webhook:${url}`;
  }

  async send(event: MarketEvent): Promise<void> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(toWebhookBody(event)),
        signal: AbortSignal.timeout(WEBHOOK_TIMEOUT_MS),
      });
    } catch (error) {
      throw new SinkDeliveryError(this.url, errorMessage(error));
    }

    if (response.status >= 300) {
      throw new SinkDeliveryError(this.url, `HTTP ${response.status}`);
    }
  }
}
