import { MarketEventEntity } from '../../domain/entities/market-event.entity';
import { IMarketEventRepository } from '../../domain/interfaces/repositories.interface';
import { Inject, Injectable } from '../../shared/decorators';

const MAX_LIMIT = 500;

@Injectable()
export class GetRecentEventsUseCase {
  constructor(
    @Inject('IMarketEventRepository')
    private readonly events: IMarketEventRepository,
  ) {}

  /** Newest first; the limit is clamped to 1..500. */
  public async execute(limit: number): Promise<MarketEventEntity[]> {
    const bounded = Number.isInteger(limit) ? Math.min(Math.max(limit, 1), MAX_LIMIT) : 50;
    return this.events.findRecent(bounded);
  }
}
