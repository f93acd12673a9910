import { errorMessage } from '../../domain/errors';
import { ICycleReportRepository } from '../../domain/interfaces/repositories.interface';
import { IEventSink } from '../../domain/interfaces/services.interface';
import { MarketEvent, SinkAck } from '../../domain/types/event.types';
import { CombinedReport } from '../../domain/types/results.types';
import { Logger } from '../../shared/logger';
import { DeliveryQueueService } from './delivery-queue.service';
import { NotificationDispatcher } from './notification-dispatcher.service';

/**
 * Persists each cycle's report with its events, then queues notifications.
 * The ack reflects persistence only; notification failures stay in the queue.
 */
export class EventSinkService implements IEventSink {
  private readonly logger = new Logger(EventSinkService.name);
  private isOpen = false;

  constructor(
    private readonly reports: ICycleReportRepository,
    private readonly dispatcher: NotificationDispatcher,
    private readonly queue: DeliveryQueueService,
  ) {}

  async open(): Promise<void> {
    if (this.isOpen) return;
    this.queue.start();
    this.isOpen = true;
  }

  async submit(events: readonly MarketEvent[], report: CombinedReport): Promise<SinkAck> {
    if (!this.isOpen) {
      return { ok: false, error: 'event sink is closed' };
    }

    let persistedEvents: number;
    try {
      persistedEvents = await this.reports.saveCycle(report, events);
    } catch (error) {
      this.logger.error('Failed to persist cycle report', error);
      return { ok: false, error: errorMessage(error) };
    }

    let queuedNotifications = 0;
    for (const event of events) {
      queuedNotifications += this.dispatcher.dispatch(event);
    }

    this.logger.info(
      `Cycle ${new Date(report.cycleTimestamp).toISOString()} stored: ${persistedEvents} events, ${queuedNotifications} notifications queued`,
    );
    return { ok: true, persistedEvents, queuedNotifications };
  }

  async close(): Promise<void> {
    if (!this.isOpen) return;
    this.isOpen = false;
    await this.queue.stop();
  }
}
