import { DataSource, Repository } from 'typeorm';
import { MarketEventEntity } from '../../domain/entities/market-event.entity';
import { IMarketEventRepository } from '../../domain/interfaces/repositories.interface';
import { Inject, Injectable } from '../../shared/decorators';

@Injectable()
export class MarketEventRepository implements IMarketEventRepository {
  private repository: Repository<MarketEventEntity>;

  constructor(@Inject('DataSource') dataSource: DataSource) {
    this.repository = dataSource.getRepository(MarketEventEntity);
  }

  async findRecent(limit: number): Promise<MarketEventEntity[]> {
    return this.repository.find({ order: { id: 'DESC' }, take: limit });
  }
}
