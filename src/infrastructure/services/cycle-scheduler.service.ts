import { CycleAbortedError, errorMessage } from '../../domain/errors';
import { CycleOutcome, PipelineOrchestrator } from '../../modules/regime-pipeline';
import { Logger } from '../../shared/logger';

export type CycleRunResult =
  | { status: 'completed'; outcome: CycleOutcome }
  | { status: 'skipped'; reason: string }
  | { status: 'aborted'; reason: string }
  | { status: 'failed'; error: string };

/**
 * Fires a cycle every interval and on demand. A cycle that would overlap the
 * running one is skipped, never queued.
 */
export class CycleSchedulerService {
  private readonly logger = new Logger(CycleSchedulerService.name);
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<CycleRunResult> | null = null;
  private lastOutcome: CycleOutcome | null = null;
  private lastRunAt: number | null = null;

  constructor(
    private readonly orchestrator: PipelineOrchestrator,
    private readonly intervalMinutes: number,
  ) {}

  public start(runImmediately: boolean): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.runNow();
    }, this.intervalMinutes * 60_000);
    this.logger.info(`Scheduler started: every ${this.intervalMinutes} min`);
    if (runImmediately) void this.runNow();
  }

  public isBusy(): boolean {
    return this.inFlight !== null;
  }

  public getLastOutcome(): CycleOutcome | null {
    return this.lastOutcome;
  }

  public getLastRunAt(): number | null {
    return this.lastRunAt;
  }

  /** Never rejects; the result says what happened. */
  public runNow(asOf?: number): Promise<CycleRunResult> {
    if (this.inFlight) {
      this.logger.warn('Cycle requested while another is running, skipped');
      return Promise.resolve({ status: 'skipped', reason: 'a cycle is already running' });
    }

    const controller = new AbortController();
    this.controller = controller;
    this.inFlight = this.execute(controller.signal, asOf).finally(() => {
      this.inFlight = null;
      this.controller = null;
    });
    return this.inFlight;
  }

  private async execute(signal: AbortSignal, asOf?: number): Promise<CycleRunResult> {
    this.lastRunAt = Date.now();
    try {
      const outcome = await this.orchestrator.runCycle({ asOf, signal });
      this.lastOutcome = outcome;
      return { status: 'completed', outcome };
    } catch (error) {
      if (error instanceof CycleAbortedError) {
        this.logger.warn(error.message);
        return { status: 'aborted', reason: error.message };
      }
      this.logger.error('Cycle failed', error);
      return { status: 'failed', error: errorMessage(error) };
    }
  }

  /** Stops the timer, aborts the running cycle and waits for it to settle. */
  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller?.abort();
    if (this.inFlight) await this.inFlight;
    this.logger.info('Scheduler stopped');
  }
}
