import { SetBaselineDto } from '../../application/dto/set-baseline.dto';
import { GetLatestReportUseCase } from '../../application/use-cases/get-latest-report.use-case';
import { GetRecentEventsUseCase } from '../../application/use-cases/get-recent-events.use-case';
import { SetBaselineUseCase } from '../../application/use-cases/set-baseline.use-case';
import { InvalidRequestError, errorMessage } from '../../domain/errors';
import { CycleSchedulerService } from '../../infrastructure/services/cycle-scheduler.service';
import { UptimeService } from '../../infrastructure/services/uptime.service';
import { UnavailabilityTracker } from '../../modules/regime-pipeline';
import { Logger } from '../../shared/logger';

export interface HttpResult {
  status: number;
  body: unknown;
}

/** Transport-free handlers behind the express routes. */
export class StatusController {
  private readonly logger = new Logger(StatusController.name);

  constructor(
    private readonly scheduler: CycleSchedulerService,
    private readonly uptime: UptimeService,
    private readonly tracker: UnavailabilityTracker,
    private readonly getLatestReport: GetLatestReportUseCase,
    private readonly getRecentEvents: GetRecentEventsUseCase,
    private readonly setBaselineUseCase: SetBaselineUseCase,
    private readonly unavailableAlertAfter: number,
  ) {}

  health(): HttpResult {
    const counts = this.tracker.counts();
    const lastOutcome = this.scheduler.getLastOutcome();
    const lastRunAt = this.scheduler.getLastRunAt();
    const degraded = Object.values(counts).some((n) => n >= this.unavailableAlertAfter);

    return {
      status: 200,
      body: {
        status: degraded ? 'degraded' : 'ok',
        ...this.uptime.getStatus(),
        cycleRunning: this.scheduler.isBusy(),
        lastRunAt: lastRunAt === null ? null : new Date(lastRunAt).toISOString(),
        lastCycle: lastOutcome && {
          cycleTimestamp: new Date(lastOutcome.report.cycleTimestamp).toISOString(),
          events: lastOutcome.events.length,
          sinkOk: lastOutcome.ack.ok,
          elapsedMs: lastOutcome.elapsedMs,
        },
        consecutiveUnavailable: counts,
      },
    };
  }

  async latestReport(): Promise<HttpResult> {
    const report = await this.getLatestReport.execute();
    return report
      ? { status: 200, body: report }
      : { status: 404, body: { error: 'no cycle report stored yet' } };
  }

  async recentEvents(limit: unknown): Promise<HttpResult> {
    const parsed = typeof limit === 'string' ? Number(limit) : 50;
    return { status: 200, body: await this.getRecentEvents.execute(parsed) };
  }

  async runCycle(): Promise<HttpResult> {
    const result = await this.scheduler.runNow();
    switch (result.status) {
      case 'completed':
        return {
          status: 200,
          body: {
            status: 'completed',
            cycleTimestamp: new Date(result.outcome.report.cycleTimestamp).toISOString(),
            events: result.outcome.events.map((e) => ({
              eventType: e.eventType,
              severity: e.severity,
              subject: e.subject,
            })),
            ack: result.outcome.ack,
            consecutiveUnavailable: result.outcome.consecutiveUnavailable,
          },
        };
      case 'skipped':
        return { status: 409, body: { error: result.reason } };
      case 'aborted':
        return { status: 503, body: { error: result.reason } };
      case 'failed':
        return { status: 500, body: { error: result.error } };
    }
  }

  async setBaseline(first: string, second: string, body: unknown): Promise<HttpResult> {
    const dto = new SetBaselineDto();
    dto.first = first.toUpperCase();
    dto.second = second.toUpperCase();
    dto.value = readValue(body);

    try {
      return { status: 200, body: await this.setBaselineUseCase.execute(dto) };
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        return { status: 400, body: { errors: error.problems } };
      }
      this.logger.error('Failed to store baseline', error);
      return { status: 500, body: { error: errorMessage(error) } };
    }
  }
}

function readValue(body: unknown): number {
  if (typeof body === 'object' && body !== null && 'value' in body && typeof body.value === 'number') {
    return body.value;
  }
  return Number.NaN;
}
