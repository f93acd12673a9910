import { DataSource } from 'typeorm';
import { CandleEntity } from '../../domain/entities/candle.entity';
import { CorrelationBaselineEntity } from '../../domain/entities/correlation-baseline.entity';
import { CycleReportEntity } from '../../domain/entities/cycle-report.entity';
import { FundingRateEntity } from '../../domain/entities/funding-rate.entity';
import { LiquidationEntity } from '../../domain/entities/liquidation.entity';
import { MarketEventEntity } from '../../domain/entities/market-event.entity';
import { Logger } from '../../shared/logger';

const logger = new Logger('DatabaseModule');

export const ENTITIES = [
  CandleEntity,
  LiquidationEntity,
  FundingRateEntity,
  CorrelationBaselineEntity,
  MarketEventEntity,
  CycleReportEntity,
];

export function createDataSource(database: string): DataSource {
  return new DataSource({
    type: 'sqlite',
    database,
    synchronize: true, // schema follows the entities; no migrations yet
    logging: false,
    entities: ENTITIES,
    migrations: [],
    subscribers: [],
  });
}

export class DatabaseModule {
  private static dataSource: DataSource | null = null;

  static async initialize(database: string): Promise<DataSource> {
    if (DatabaseModule.dataSource?.isInitialized) return DatabaseModule.dataSource;
    const dataSource = createDataSource(database);
    try {
      await dataSource.initialize();
      DatabaseModule.dataSource = dataSource;
      logger.info(`Database connection established (${database})`);
      return dataSource;
    } catch (error) {
      logger.error('Database connection failed:', error);
      throw error;
    }
  }

  static get(): DataSource {
    if (!DatabaseModule.dataSource) {
      throw new Error('Database is not initialized');
    }
    return DatabaseModule.dataSource;
  }

  static async close(): Promise<void> {
    const dataSource = DatabaseModule.dataSource;
    DatabaseModule.dataSource = null;
    if (dataSource?.isInitialized) {
      await dataSource.destroy();
      logger.info('Database connection closed');
    }
  }
}
