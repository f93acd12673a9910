import 'reflect-metadata';

import { config } from 'dotenv';
import type { Server } from 'http';

import { RegimeWatchApp } from './app';
import { registerDependencies } from './app.container';
import { loadAppSettings } from './config/app.settings';
import { loadPipelineConfig } from './config/config.loader';
import { ConfigurationError } from './domain/errors';
import { DatabaseModule } from './infrastructure/database/database.module';
import { createHttpServer } from './presentation/http/status.router';
import { StatusController } from './presentation/http/status.controller';
import { DIContainer } from './shared/container';
import { Logger, closeLoggers } from './shared/logger';

// Load environment variables
config();

const logger = new Logger('Main');

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
});

async function bootstrap(): Promise<void> {
  try {
    logger.info('Starting Regime Watch...');

    const pipelineConfig = loadPipelineConfig();
    const settings = loadAppSettings();
    logger.info(`Watching ${pipelineConfig.symbols.join(', ')} on ${pipelineConfig.timeframes.join('/')}`);

    const dataSource = await DatabaseModule.initialize(settings.databasePath);
    registerDependencies(pipelineConfig, settings, dataSource);

    const container = DIContainer.getInstance();
    const app = container.get(RegimeWatchApp);
    await app.start();

    const server: Server = createHttpServer(container.get(StatusController)).listen(
      settings.port,
      '0.0.0.0',
      () => logger.info(`HTTP server listening on port ${settings.port}`),
    );

    // Graceful shutdown
    let isShuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (isShuttingDown) return;
      isShuttingDown = true;
      logger.info(`Received ${signal}, shutting down gracefully...`);
      try {
        server.close();
        await app.stop();
      } finally {
        await DatabaseModule.close();
        await closeLoggers();
        process.exit(0);
      }
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message, { problems: error.problems });
    } else {
      logger.error('Failed to start application:', error);
    }
    await DatabaseModule.close();
    await closeLoggers();
    process.exit(1);
  }
}

void bootstrap();
