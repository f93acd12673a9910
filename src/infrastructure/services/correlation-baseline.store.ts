import { ICorrelationBaselineRepository } from '../../domain/interfaces/repositories.interface';
import { ICorrelationBaselineStore } from '../../domain/interfaces/services.interface';
import { Unavailable, unavailable } from '../../domain/types/unavailable.type';
import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';

/** Baselines are written by an external batch or the control API, read once per cycle. */
@Injectable()
export class CorrelationBaselineStore implements ICorrelationBaselineStore {
  private readonly logger = new Logger(CorrelationBaselineStore.name);

  constructor(
    @Inject('ICorrelationBaselineRepository')
    private readonly repository: ICorrelationBaselineRepository,
  ) {}

  async getBaseline(pair: string): Promise<number | Unavailable> {
    const value = await this.repository.findValue(pair);
    return value === null ? unavailable(`no baseline stored for ${pair}`) : value;
  }

  async setBaseline(pair: string, value: number): Promise<void> {
    if (!Number.isFinite(value) || value < -1 || value > 1) {
      throw new RangeError(`Correlation baseline must be within [-1, 1], got ${value}`);
    }
    await this.repository.upsert(pair, value);
    this.logger.info(`Baseline for ${pair} set to ${value.toFixed(4)}`);
  }
}
