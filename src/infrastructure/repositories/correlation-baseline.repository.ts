import { DataSource, Repository } from 'typeorm';
import { CorrelationBaselineEntity } from '../../domain/entities/correlation-baseline.entity';
import { ICorrelationBaselineRepository } from '../../domain/interfaces/repositories.interface';
import { Inject, Injectable } from '../../shared/decorators';

@Injectable()
export class CorrelationBaselineRepository implements ICorrelationBaselineRepository {
  private repository: Repository<CorrelationBaselineEntity>;

  constructor(@Inject('DataSource') dataSource: DataSource) {
    this.repository = dataSource.getRepository(CorrelationBaselineEntity);
  }

  async findValue(pair: string): Promise<number | null> {
    const row = await this.repository.findOne({ where: { pair } });
    return row ? row.value : null;
  }

  async upsert(pair: string, value: number): Promise<void> {
    await this.repository.save(this.repository.create({ pair, value }));
  }
}
