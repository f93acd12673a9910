import { DataSource } from 'typeorm';
import { RegimeWatchApp } from './app';
import { GetLatestReportUseCase } from './application/use-cases/get-latest-report.use-case';
import { GetRecentEventsUseCase } from './application/use-cases/get-recent-events.use-case';
import { SetBaselineUseCase } from './application/use-cases/set-baseline.use-case';
import { AppSettings } from './config/app.settings';
import { PipelineConfig } from './config/pipeline.config';
import { INotificationChannel } from './domain/interfaces/services.interface';
import { DatabaseWindowProvider } from './infrastructure/market-data/database-window.provider';
import { CorrelationBaselineRepository } from './infrastructure/repositories/correlation-baseline.repository';
import { CycleReportRepository } from './infrastructure/repositories/cycle-report.repository';
import { MarketDataRepository } from './infrastructure/repositories/market-data.repository';
import { MarketEventRepository } from './infrastructure/repositories/market-event.repository';
import { CorrelationBaselineStore } from './infrastructure/services/correlation-baseline.store';
import { CycleSchedulerService } from './infrastructure/services/cycle-scheduler.service';
import { DeliveryQueueService } from './infrastructure/services/delivery-queue.service';
import { EventSinkService } from './infrastructure/services/event-sink.service';
import { NotificationDispatcher } from './infrastructure/services/notification-dispatcher.service';
import { UptimeService } from './infrastructure/services/uptime.service';
import { TelegramBotService } from './infrastructure/telegram/telegram.bot';
import {
  PipelineOrchestrator,
  RegimeStateStore,
  UnavailabilityTracker,
} from './modules/regime-pipeline';
import { StatusController } from './presentation/http/status.controller';
import { DIContainer } from './shared/container';
import { Logger } from './shared/logger';

const logger = new Logger('DependencyContainer');

export function registerDependencies(
  config: PipelineConfig,
  settings: AppSettings,
  dataSource: DataSource,
  container: DIContainer = DIContainer.getInstance(),
): void {
  // --- Configuration & Database ---
  container.bind('PipelineConfig', () => config);
  container.bind('AppSettings', () => settings);
  container.bind('DataSource', () => dataSource);

  // --- Register Repositories ---
  container.bindClass('IMarketDataRepository', MarketDataRepository);
  container.bindClass('ICorrelationBaselineRepository', CorrelationBaselineRepository);
  container.bindClass('ICycleReportRepository', CycleReportRepository);
  container.bindClass('IMarketEventRepository', MarketEventRepository);

  // --- Register Pipeline Collaborators ---
  container.bindClass('IWindowProvider', DatabaseWindowProvider);
  container.bindClass('ICorrelationBaselineStore', CorrelationBaselineStore);

  // --- Register Notifications ---
  container.bind(DeliveryQueueService, () => new DeliveryQueueService());
  container.bind(
    NotificationDispatcher,
    () =>
      new NotificationDispatcher(
        container.get(DeliveryQueueService),
        settings.webhooks,
        createChannels(settings),
      ),
  );
  container.bind(
    'IEventSink',
    () =>
      new EventSinkService(
        container.get('ICycleReportRepository'),
        container.get(NotificationDispatcher),
        container.get(DeliveryQueueService),
      ),
  );

  // --- Register Pipeline ---
  container.bindClass(RegimeStateStore, RegimeStateStore);
  container.bindClass(UnavailabilityTracker, UnavailabilityTracker);
  container.bindClass(PipelineOrchestrator, PipelineOrchestrator);
  container.bind(
    CycleSchedulerService,
    () =>
      new CycleSchedulerService(
        container.get(PipelineOrchestrator),
        config.orchestrator.cycleIntervalMinutes,
      ),
  );

  // --- Register Use Cases & HTTP ---
  container.bind(UptimeService, () => new UptimeService());
  container.bindClass(GetLatestReportUseCase, GetLatestReportUseCase);
  container.bindClass(GetRecentEventsUseCase, GetRecentEventsUseCase);
  container.bindClass(SetBaselineUseCase, SetBaselineUseCase);
  container.bind(
    StatusController,
    () =>
      new StatusController(
        container.get(CycleSchedulerService),
        container.get(UptimeService),
        container.get(UnavailabilityTracker),
        container.get(GetLatestReportUseCase),
        container.get(GetRecentEventsUseCase),
        container.get(SetBaselineUseCase),
        config.orchestrator.unavailableAlertAfter,
      ),
  );

  // --- Register Main App ---
  container.bindClass(RegimeWatchApp, RegimeWatchApp);
}

function createChannels(settings: AppSettings): INotificationChannel[] {
  if (settings.telegramBotToken && settings.telegramChatId !== null) {
    return [new TelegramBotService(settings.telegramBotToken, settings.telegramChatId)];
  }
  logger.warn('⚠️ Telegram alerts disabled: TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID missing');
  return [];
}
