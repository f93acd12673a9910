import { DEFAULT_PIPELINE_CONFIG, PipelineConfig } from '../../../config/pipeline.config';
import {
  PipelineOrchestrator,
  RegimeStateStore,
  UnavailabilityTracker,
} from '../../../modules/regime-pipeline';
import { AS_OF } from '../../../modules/regime-pipeline/__tests__/market-window.fixture';
import {
  FakeBaselineStore,
  FakeSink,
  FakeWindowProvider,
} from '../../../modules/regime-pipeline/__tests__/pipeline.fakes';
import { CycleSchedulerService } from '../cycle-scheduler.service';

describe('CycleSchedulerService', () => {
  const config: PipelineConfig = {
    ...DEFAULT_PIPELINE_CONFIG,
    symbols: ['BTC/USDT', 'ETH/USDT'],
    orchestrator: { ...DEFAULT_PIPELINE_CONFIG.orchestrator, fetchTimeoutMs: 20 },
  };

  let provider: FakeWindowProvider;
  let scheduler: CycleSchedulerService;

  beforeEach(() => {
    provider = new FakeWindowProvider();
    const orchestrator = new PipelineOrchestrator(
      config,
      provider,
      new FakeBaselineStore(),
      new FakeSink(),
      new RegimeStateStore(),
      new UnavailabilityTracker(),
    );
    scheduler = new CycleSchedulerService(orchestrator, 60);
  });

  afterEach(async () => {
    await scheduler.stop();
  });

  it('runs a cycle on demand and keeps its outcome', async () => {
    const result = await scheduler.runNow(AS_OF);

    expect(result.status).toBe('completed');
    expect(scheduler.getLastOutcome()?.report.cycleTimestamp).toBe(AS_OF);
    expect(scheduler.getLastRunAt()).not.toBeNull();
    expect(scheduler.isBusy()).toBe(false);
  });

  it('skips a cycle requested while one is running', async () => {
    provider.script.set('ETH/USDT', 'hang');
    const first = scheduler.runNow(AS_OF);

    expect(scheduler.isBusy()).toBe(true);
    await expect(scheduler.runNow(AS_OF)).resolves.toEqual({
      status: 'skipped',
      reason: 'a cycle is already running',
    });
    await expect(first).resolves.toMatchObject({ status: 'completed' });
  });

  it('aborts the running cycle on stop', async () => {
    provider.script.set('ETH/USDT', 'hang');
    const pending = scheduler.runNow(AS_OF);

    await scheduler.stop();

    await expect(pending).resolves.toEqual({
      status: 'aborted',
      reason: 'Pipeline cycle aborted before analysis',
    });
    expect(scheduler.getLastOutcome()).toBeNull();
  });
});
