import { AppSettings } from './config/app.settings';
import { IEventSink } from './domain/interfaces/services.interface';
import { CycleSchedulerService } from './infrastructure/services/cycle-scheduler.service';
import { Inject, Injectable } from './shared/decorators';
import { Logger } from './shared/logger';

@Injectable()
export class RegimeWatchApp {
  private readonly logger = new Logger(RegimeWatchApp.name);

  constructor(
    @Inject('IEventSink') private readonly sink: IEventSink,
    private readonly scheduler: CycleSchedulerService,
    @Inject('AppSettings') private readonly settings: AppSettings,
  ) {}

  public async start(): Promise<void> {
    this.logger.info('Initializing Regime Watch...');
    try {
      await this.sink.open();
      this.scheduler.start(this.settings.runOnStart);
      this.logger.info('Regime Watch started successfully!');
    } catch (error) {
      this.logger.error('Failed to initialize Regime Watch:', error);
      throw error;
    }
  }

  public async stop(): Promise<void> {
    this.logger.info('Stopping Regime Watch...');
    await this.scheduler.stop();
    await this.sink.close();
    this.logger.info('Regime Watch stopped gracefully.');
  }
}
