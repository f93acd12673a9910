import { errorMessage } from '../../domain/errors';
import { INotificationChannel } from '../../domain/interfaces/services.interface';
import { EventSeverity, MarketEvent } from '../../domain/types/event.types';
import { Logger } from '../../shared/logger';

export enum DeliveryPriority {
  CRITICAL = 0,
  WARNING = 1,
  INFO = 2,
}

const PRIORITY_ORDER = [DeliveryPriority.CRITICAL, DeliveryPriority.WARNING, DeliveryPriority.INFO];

const PRIORITY_BY_SEVERITY: Record<EventSeverity, DeliveryPriority> = {
  CRITICAL: DeliveryPriority.CRITICAL,
  WARNING: DeliveryPriority.WARNING,
  INFO: DeliveryPriority.INFO,
};

export interface QueuedDelivery {
  id: string;
  channel: INotificationChannel;
  event: MarketEvent;
  priority: DeliveryPriority;
  enqueuedAt: number;
  attempts: number;
  notBefore: number;
}

export interface DeliveryQueueOptions {
  maxPerSecond: number;
  dedupWindowMs: number;
  maxQueueSize: number;
  maxAttempts: number;
  /** Wait before retry n is n times this. */
  retryDelayMs: number;
  processingIntervalMs: number;
}

export const DEFAULT_DELIVERY_OPTIONS: DeliveryQueueOptions = {
  maxPerSecond: 20,
  dedupWindowMs: 5 * 60_000,
  maxQueueSize: 1000,
  maxAttempts: 3,
  retryDelayMs: 1000,
  processingIntervalMs: 250,
};

const RATE_LIMIT_WINDOW_MS = 1000;

/**
 * Outbound notification queue. Sends CRITICAL before WARNING before INFO,
 * drops repeats of the same event to the same channel within the dedup window,
 * and retries a failed send on a later flush until maxAttempts.
 */
export class DeliveryQueueService {
  private readonly logger = new Logger(DeliveryQueueService.name);

  private readonly queues = new Map<DeliveryPriority, QueuedDelivery[]>(
    PRIORITY_ORDER.map((p) => [p, []]),
  );

  private sentTimestamps: number[] = [];
  private readonly recentDeliveries = new Map<string, number>(); // dedup key -> enqueue time

  private isRunning = false;
  private isProcessing = false;
  private processingTimer: NodeJS.Timeout | null = null;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private sequence = 0;

  private stats = {
    sent: 0,
    failed: 0,
    dropped: 0,
    deduplicated: 0,
    retried: 0,
  };

  constructor(
    private readonly options: DeliveryQueueOptions = DEFAULT_DELIVERY_OPTIONS,
    private readonly now: () => number = Date.now,
  ) {}

  public start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.processingTimer = setInterval(() => {
      void this.flush();
    }, this.options.processingIntervalMs);
    this.cleanupTimer = setInterval(() => this.cleanup(), 60_000);
    this.logger.info('DeliveryQueueService started');
  }

  /** Stops the timers, then makes one last pass over what is queued. */
  public async stop(): Promise<void> {
    if (this.processingTimer) {
      clearInterval(this.processingTimer);
      this.processingTimer = null;
    }
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.isRunning = false;
    await this.flush();
    this.logger.info('DeliveryQueueService stopped', this.getStats());
  }

  /** Returns false when the delivery was deduplicated. */
  public enqueue(channel: INotificationChannel, event: MarketEvent): boolean {
    const now = this.now();
    const dedupKey = this.getDedupKey(channel, event);
    const last = this.recentDeliveries.get(dedupKey);
    if (last !== undefined && now - last < this.options.dedupWindowMs) {
      this.stats.deduplicated++;
      this.logger.debug(`Deduplicated ${event.eventType} for ${event.subject} on ${channel.name}`);
      return false;
    }

    if (this.getQueueSize() >= this.options.maxQueueSize) {
      this.dropLowestPriority();
    }

    const priority = PRIORITY_BY_SEVERITY[event.severity];
    this.queueFor(priority).push({
      id: `${channel.name}:${event.eventType}:${event.subject}:${++this.sequence}`,
      channel,
      event,
      priority,
      enqueuedAt: now,
      attempts: 0,
      notBefore: now,
    });
    this.recentDeliveries.set(dedupKey, now);
    return true;
  }

  /**
   * Sends due deliveries in priority order until the queue is empty or the
   * rate limit is hit. A failed delivery is not due again until its retry
   * delay has passed, so it is never retried within the same flush.
   */
  public async flush(): Promise<void> {
    if (this.isProcessing) return;
    this.isProcessing = true;
    try {
      for (const priority of PRIORITY_ORDER) {
        if (!(await this.flushQueue(this.queueFor(priority)))) return;
      }
    } finally {
      this.isProcessing = false;
    }
  }

  // Returns false when the rate limit stopped the pass.
  private async flushQueue(queue: QueuedDelivery[]): Promise<boolean> {
    const waiting: QueuedDelivery[] = [];
    try {
      let item = queue.shift();
      while (item) {
        if (item.notBefore > this.now()) {
          waiting.push(item);
        } else if (!this.canSend()) {
          queue.unshift(item);
          return false;
        } else {
          await this.deliver(item, waiting);
        }
        item = queue.shift();
      }
      return true;
    } finally {
      queue.unshift(...waiting);
    }
  }

  private async deliver(item: QueuedDelivery, waiting: QueuedDelivery[]): Promise<void> {
    item.attempts++;
    this.sentTimestamps.push(this.now());
    try {
      await item.channel.send(item.event);
      this.stats.sent++;
    } catch (error) {
      if (item.attempts < this.options.maxAttempts) {
        this.stats.retried++;
        item.notBefore = this.now() + this.options.retryDelayMs * item.attempts;
        waiting.push(item);
        this.logger.warn(`Delivery ${item.id} failed (attempt ${item.attempts}), will retry`, {
          reason: errorMessage(error),
        });
      } else {
        this.stats.failed++;
        this.logger.error(`Gave up on ${item.id} after ${item.attempts} attempts`, error);
      }
    }
  }

  private canSend(): boolean {
    const now = this.now();
    this.sentTimestamps = this.sentTimestamps.filter((ts) => now - ts < RATE_LIMIT_WINDOW_MS);
    return this.sentTimestamps.length < this.options.maxPerSecond;
  }

  private getDedupKey(channel: INotificationChannel, event: MarketEvent): string {
    return `${channel.name}|${event.eventType}|${event.subject}|${event.timestamp}`;
  }

  private queueFor(priority: DeliveryPriority): QueuedDelivery[] {
    let queue = this.queues.get(priority);
    if (!queue) {
      queue = [];
      this.queues.set(priority, queue);
    }
    return queue;
  }

  private dropLowestPriority(): void {
    for (const priority of [...PRIORITY_ORDER].reverse()) {
      const dropped = this.queueFor(priority).shift();
      if (dropped) {
        this.stats.dropped++;
        this.logger.warn(`Queue full, dropped ${dropped.id}`);
        return;
      }
    }
  }

  private cleanup(): void {
    const now = this.now();
    for (const [key, timestamp] of this.recentDeliveries.entries()) {
      if (now - timestamp > this.options.dedupWindowMs) {
        this.recentDeliveries.delete(key);
      }
    }
    this.logger.debug(`🧹 Cleanup: ${this.recentDeliveries.size} recent deliveries tracked`);
  }

  public getQueueSize(): number {
    let total = 0;
    for (const queue of this.queues.values()) total += queue.length;
    return total;
  }

  public getStats(): {
    queueSizes: Record<string, number>;
    sent: number;
    failed: number;
    dropped: number;
    deduplicated: number;
    retried: number;
  } {
    return {
      queueSizes: {
        critical: this.queueFor(DeliveryPriority.CRITICAL).length,
        warning: this.queueFor(DeliveryPriority.WARNING).length,
        info: this.queueFor(DeliveryPriority.INFO).length,
      },
      ...this.stats,
    };
  }
}
