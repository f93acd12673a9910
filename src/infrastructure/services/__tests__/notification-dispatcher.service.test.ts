import { INotificationChannel } from '../../../domain/interfaces/services.interface';
import { marketEvent } from '../../../modules/regime-pipeline/__tests__/results.fixture';
import { DeliveryQueueService } from '../delivery-queue.service';
import { NotificationDispatcher } from '../notification-dispatcher.service';

function channel(name: string): INotificationChannel {
  return { name, send: async () => undefined };
}

describe('NotificationDispatcher', () => {
  let queue: DeliveryQueueService;
  let created: string[];
  const createClient = (url: string): INotificationChannel => {
    created.push(url);
    return channel(`webhook:${url}`);
  };

  beforeEach(() => {
    queue = new DeliveryQueueService();
    created = [];
  });

  it('targets the webhooks of the event source plus ALL, without duplicates', () => {
    const dispatcher = new NotificationDispatcher(
      queue,
      { CASCADE: ['https://a.example', 'https://b.example'], ALL: ['https://b.example', 'https://c.example'] },
      [],
      createClient,
    );

    expect(dispatcher.targetsFor(marketEvent({ source: 'CASCADE' }))).toEqual([
      'https://a.example',
      'https://b.example',
      'https://c.example',
    ]);
    expect(dispatcher.targetsFor(marketEvent({ source: 'FUNDING' }))).toEqual([
      'https://b.example',
      'https://c.example',
    ]);
  });

  it('queues one delivery per webhook and extra channel', () => {
    const dispatcher = new NotificationDispatcher(
      queue,
      { CASCADE: ['https://a.example'], ALL: ['https://c.example'] },
      [channel('telegram')],
      createClient,
    );

    expect(dispatcher.dispatch(marketEvent())).toBe(3);
    expect(queue.getQueueSize()).toBe(3);
  });

  it('reuses webhook clients and lets the queue drop repeats', () => {
    const dispatcher = new NotificationDispatcher(queue, { CASCADE: ['https://a.example'] }, [], createClient);

    dispatcher.dispatch(marketEvent());
    expect(dispatcher.dispatch(marketEvent())).toBe(0);
    expect(created).toEqual(['https://a.example']);
  });

  it('queues nothing when no channel is registered', () => {
    const dispatcher = new NotificationDispatcher(queue, {}, [], createClient);

    expect(dispatcher.dispatch(marketEvent())).toBe(0);
  });

  it('registers a webhook once', () => {
    const dispatcher = new NotificationDispatcher(queue, {}, [], createClient);
    dispatcher.registerWebhook('VOLATILITY', 'https://v.example');
    dispatcher.registerWebhook('VOLATILITY', 'https://v.example');

    expect(dispatcher.targetsFor(marketEvent({ source: 'VOLATILITY' }))).toEqual(['https://v.example']);
  });
});
