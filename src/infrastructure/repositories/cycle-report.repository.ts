import { DataSource, Repository } from 'typeorm';
import { CycleReportEntity } from '../../domain/entities/cycle-report.entity';
import { MarketEventEntity } from '../../domain/entities/market-event.entity';
import { ICycleReportRepository } from '../../domain/interfaces/repositories.interface';
import { MarketEvent } from '../../domain/types/event.types';
import { CombinedReport } from '../../domain/types/results.types';
import { Inject, Injectable } from '../../shared/decorators';

@Injectable()
export class CycleReportRepository implements ICycleReportRepository {
  private repository: Repository<CycleReportEntity>;

  constructor(@Inject('DataSource') private readonly dataSource: DataSource) {
    this.repository = dataSource.getRepository(CycleReportEntity);
  }

  async saveCycle(report: CombinedReport, events: readonly MarketEvent[]): Promise<number> {
    return this.dataSource.transaction(async (manager) => {
      await manager.save(
        manager.create(CycleReportEntity, {
          cycleTimestamp: report.cycleTimestamp,
          report,
          schemaVersion: report.schemaVersion,
          eventCount: events.length,
        }),
      );

      const rows = events.map((event) =>
        manager.create(MarketEventEntity, {
          eventType: event.eventType,
          source: event.source,
          severity: event.severity,
          subject: event.subject,
          title: event.title,
          description: event.description,
          payload: event.payload,
          schemaVersion: report.schemaVersion,
          timestamp: event.timestamp,
        }),
      );
      if (rows.length > 0) await manager.save(rows);
      return rows.length;
    });
  }

  async findLatest(): Promise<CombinedReport | null> {
    const [latest] = await this.repository.find({
      order: { cycleTimestamp: 'DESC', id: 'DESC' },
      take: 1,
    });
    return latest ? latest.report : null;
  }
}
