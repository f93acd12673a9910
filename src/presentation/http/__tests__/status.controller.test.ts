import { GetLatestReportUseCase } from '../../../application/use-cases/get-latest-report.use-case';
import { GetRecentEventsUseCase } from '../../../application/use-cases/get-recent-events.use-case';
import { SetBaselineUseCase } from '../../../application/use-cases/set-baseline.use-case';
import { DEFAULT_PIPELINE_CONFIG, PipelineConfig } from '../../../config/pipeline.config';
import { MarketEventEntity } from '../../../domain/entities/market-event.entity';
import {
  ICycleReportRepository,
  IMarketEventRepository,
} from '../../../domain/interfaces/repositories.interface';
import { CombinedReport } from '../../../domain/types/results.types';
import { unavailable } from '../../../domain/types/unavailable.type';
import { CycleSchedulerService } from '../../../infrastructure/services/cycle-scheduler.service';
import { UptimeService } from '../../../infrastructure/services/uptime.service';
import {
  PipelineOrchestrator,
  RegimeStateStore,
  UnavailabilityTracker,
} from '../../../modules/regime-pipeline';
import {
  FakeBaselineStore,
  FakeSink,
  FakeWindowProvider,
} from '../../../modules/regime-pipeline/__tests__/pipeline.fakes';
import { StatusController } from '../status.controller';

class EmptyReportRepository implements ICycleReportRepository, IMarketEventRepository {
  readonly limits: number[] = [];

  async saveCycle(): Promise<number> {
    return 0;
  }

  async findLatest(): Promise<CombinedReport | null> {
    return null;
  }

  async findRecent(limit: number): Promise<MarketEventEntity[]> {
    this.limits.push(limit);
    return [];
  }
}

describe('StatusController', () => {
  const config: PipelineConfig = {
    ...DEFAULT_PIPELINE_CONFIG,
    symbols: ['BTC/USDT', 'ETH/USDT'],
    orchestrator: { ...DEFAULT_PIPELINE_CONFIG.orchestrator, fetchTimeoutMs: 20 },
  };

  let provider: FakeWindowProvider;
  let baselines: FakeBaselineStore;
  let repository: EmptyReportRepository;
  let scheduler: CycleSchedulerService;
  let controller: StatusController;

  beforeEach(() => {
    provider = new FakeWindowProvider();
    baselines = new FakeBaselineStore();
    repository = new EmptyReportRepository();
    const tracker = new UnavailabilityTracker();
    scheduler = new CycleSchedulerService(
      new PipelineOrchestrator(
        config,
        provider,
        baselines,
        new FakeSink(),
        new RegimeStateStore(),
        tracker,
      ),
      60,
    );
    controller = new StatusController(
      scheduler,
      new UptimeService(() => 0),
      tracker,
      new GetLatestReportUseCase(repository),
      new GetRecentEventsUseCase(repository),
      new SetBaselineUseCase(config, baselines),
      1,
    );
  });

  afterEach(async () => {
    await scheduler.stop();
  });

  it('reports health before the first cycle', () => {
    expect(controller.health()).toEqual({
      status: 200,
      body: {
        status: 'ok',
        startedAt: '1970-01-01T00:00:00.000Z',
        uptime: '0s',
        uptimeSeconds: 0,
        cycleRunning: false,
        lastRunAt: null,
        lastCycle: null,
        consecutiveUnavailable: {},
      },
    });
  });

  it('turns degraded once a symbol stays unavailable', async () => {
    provider.script.set('ETH/USDT', unavailable('no rows'));

    await controller.runCycle();

    expect(controller.health().body).toMatchObject({
      status: 'degraded',
      consecutiveUnavailable: { 'BTC/USDT': 0, 'ETH/USDT': 1 },
      lastCycle: { sinkOk: true },
    });
  });

  it('runs a cycle on request', async () => {
    const result = await controller.runCycle();

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({ status: 'completed', ack: { ok: true } });
  });

  it('answers 409 while a cycle is running', async () => {
    provider.script.set('ETH/USDT', 'hang');
    const first = controller.runCycle();

    await expect(controller.runCycle()).resolves.toEqual({
      status: 409,
      body: { error: 'a cycle is already running' },
    });
    await first;
  });

  it('answers 404 until a report is stored', async () => {
    await expect(controller.latestReport()).resolves.toEqual({
      status: 404,
      body: { error: 'no cycle report stored yet' },
    });
  });

  it('passes the query limit through', async () => {
    await controller.recentEvents('10');
    await controller.recentEvents(undefined);

    expect(repository.limits).toEqual([10, 50]);
  });

  it('stores a baseline from URL symbols in any case', async () => {
    await expect(controller.setBaseline('eth/usdt', 'btc/usdt', { value: 0.8 })).resolves.toEqual({
      status: 200,
      body: { pair: 'BTC/USDT:ETH/USDT', value: 0.8 },
    });
    expect(baselines.values.get('BTC/USDT:ETH/USDT')).toBe(0.8);
  });

  it('answers 400 with the validation problems', async () => {
    const result = await controller.setBaseline('BTC/USDT', 'SOL/USDT', { value: 0.5 });

    expect(result).toEqual({ status: 400, body: { errors: ['SOL/USDT is not a configured symbol'] } });
  });

  it('answers 400 when the value is missing', async () => {
    const result = await controller.setBaseline('BTC/USDT', 'ETH/USDT', {});

    expect(result.status).toBe(400);
    expect(result.body).toEqual({ errors: expect.arrayContaining(['value must be a number']) });
  });
});
