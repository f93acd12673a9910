import { DataSource, Repository } from 'typeorm';
import { CandleEntity } from '../../domain/entities/candle.entity';
import { FundingRateEntity } from '../../domain/entities/funding-rate.entity';
import { LiquidationEntity } from '../../domain/entities/liquidation.entity';
import { IMarketDataRepository } from '../../domain/interfaces/repositories.interface';
import {
  Candle,
  FundingSample,
  LiquidationRecord,
  LiquidationSide,
  Timeframe,
} from '../../domain/types/market.types';
import { Inject, Injectable } from '../../shared/decorators';

@Injectable()
export class MarketDataRepository implements IMarketDataRepository {
  private candles: Repository<CandleEntity>;
  private liquidations: Repository<LiquidationEntity>;
  private funding: Repository<FundingRateEntity>;

  constructor(@Inject('DataSource') dataSource: DataSource) {
    this.candles = dataSource.getRepository(CandleEntity);
    this.liquidations = dataSource.getRepository(LiquidationEntity);
    this.funding = dataSource.getRepository(FundingRateEntity);
  }

  async findCandles(
    symbol: string,
    timeframe: Timeframe,
    asOf: number,
    limit: number,
  ): Promise<Candle[]> {
    const rows = await this.candles
      .createQueryBuilder('candle')
      .where('candle.symbol = :symbol', { symbol })
      .andWhere('candle.timeframe = :timeframe', { timeframe })
      .andWhere('candle.openTime <= :asOf', { asOf })
      .orderBy('candle.openTime', 'DESC')
      .take(limit)
      .getMany();

    return rows.reverse().map((row) => ({
      openTime: row.openTime,
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
    }));
  }

  async findLiquidations(symbol: string, from: number, to: number): Promise<LiquidationRecord[]> {
    const rows = await this.liquidations
      .createQueryBuilder('liq')
      .where('liq.symbol = :symbol', { symbol })
      .andWhere('liq.timestamp > :from', { from })
      .andWhere('liq.timestamp <= :to', { to })
      .orderBy('liq.timestamp', 'ASC')
      .getMany();

    const records: LiquidationRecord[] = [];
    for (const row of rows) {
      const side = toSide(row.side);
      if (!side) continue;
      records.push({
        timestamp: row.timestamp,
        usdAmount: row.usdAmount,
        side,
        ...(row.price === null ? {} : { price: row.price }),
      });
    }
    return records;
  }

  async findFundingRates(symbol: string, from: number, to: number): Promise<FundingSample[]> {
    const rows = await this.funding
      .createQueryBuilder('funding')
      .where('funding.symbol = :symbol', { symbol })
      .andWhere('funding.timestamp > :from', { from })
      .andWhere('funding.timestamp <= :to', { to })
      .orderBy('funding.timestamp', 'ASC')
      .getMany();

    return rows.map((row) => ({ timestamp: row.timestamp, rate: row.rate }));
  }
}

// Exchanges report the order side; a SELL liquidation closes a long.
function toSide(raw: string): LiquidationSide | null {
  switch (raw.toUpperCase()) {
    case 'LONG':
    case 'SELL':
      return 'LONG';
    case 'SHORT':
    case 'BUY':
      return 'SHORT';
    default:
      return null;
  }
}
