import { ICycleReportRepository } from '../../../domain/interfaces/repositories.interface';
import { MarketEvent } from '../../../domain/types/event.types';
import { CombinedReport, REPORT_SCHEMA_VERSION } from '../../../domain/types/results.types';
import { marketEvent } from '../../../modules/regime-pipeline/__tests__/results.fixture';
import { DeliveryQueueService } from '../delivery-queue.service';
import { EventSinkService } from '../event-sink.service';
import { NotificationDispatcher } from '../notification-dispatcher.service';

class FakeCycleReportRepository implements ICycleReportRepository {
  readonly saved: Array<{ report: CombinedReport; events: readonly MarketEvent[] }> = [];
  failure: Error | null = null;

  async saveCycle(report: CombinedReport, events: readonly MarketEvent[]): Promise<number> {
    if (this.failure) throw this.failure;
    this.saved.push({ report, events });
    return events.length;
  }

  async findLatest(): Promise<CombinedReport | null> {
    return this.saved.length > 0 ? this.saved[this.saved.length - 1].report : null;
  }
}

const report: CombinedReport = {
  schemaVersion: REPORT_SCHEMA_VERSION,
  cycleTimestamp: Date.UTC(2024, 0, 31),
  perSymbol: {},
  pairwise: {},
};

describe('EventSinkService', () => {
  let repository: FakeCycleReportRepository;
  let queue: DeliveryQueueService;
  let sink: EventSinkService;

  beforeEach(() => {
    repository = new FakeCycleReportRepository();
    queue = new DeliveryQueueService();
    const dispatcher = new NotificationDispatcher(queue, {}, [
      { name: 'telegram', send: async () => undefined },
    ]);
    sink = new EventSinkService(repository, dispatcher, queue);
  });

  afterEach(async () => {
    await sink.close();
  });

  it('rejects submissions before it is opened', async () => {
    await expect(sink.submit([marketEvent()], report)).resolves.toEqual({
      ok: false,
      error: 'event sink is closed',
    });
    expect(repository.saved).toHaveLength(0);
  });

  it('persists the cycle and queues its notifications', async () => {
    await sink.open();
    const events = [marketEvent(), marketEvent({ subject: 'ETH/USDT' })];

    const ack = await sink.submit(events, report);

    expect(ack).toEqual({ ok: true, persistedEvents: 2, queuedNotifications: 2 });
    expect(repository.saved[0].report).toBe(report);
  });

  it('acknowledges an empty cycle', async () => {
    await sink.open();

    await expect(sink.submit([], report)).resolves.toEqual({
      ok: true,
      persistedEvents: 0,
      queuedNotifications: 0,
    });
  });

  it('reports a persistence failure and notifies nobody', async () => {
    await sink.open();
    repository.failure = new Error('SQLITE_BUSY: database is locked');

    const ack = await sink.submit([marketEvent()], report);

    expect(ack).toEqual({ ok: false, error: 'SQLITE_BUSY: database is locked' });
    expect(queue.getQueueSize()).toBe(0);
  });
});
