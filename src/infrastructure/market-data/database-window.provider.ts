import { PipelineConfig } from '../../config/pipeline.config';
import { DataUnavailableError, errorMessage } from '../../domain/errors';
import { IMarketDataRepository } from '../../domain/interfaces/repositories.interface';
import { IWindowProvider } from '../../domain/interfaces/services.interface';
import { Candle, MarketWindow, Timeframe } from '../../domain/types/market.types';
import {
  Series,
  Unavailable,
  isUnavailable,
  unavailable,
} from '../../domain/types/unavailable.type';
import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Builds market windows from stored candles, liquidations and funding rates.
 * Each sub-series is read on its own; one failing read only marks that series.
 */
@Injectable()
export class DatabaseWindowProvider implements IWindowProvider {
  private readonly logger = new Logger(DatabaseWindowProvider.name);

  constructor(
    @Inject('PipelineConfig') private readonly config: PipelineConfig,
    @Inject('IMarketDataRepository') private readonly repository: IMarketDataRepository,
  ) {}

  async fetchWindow(
    symbol: string,
    timeframes: readonly Timeframe[],
    asOf: number,
    signal?: AbortSignal,
  ): Promise<MarketWindow | Unavailable> {
    const candles: Partial<Record<Timeframe, Series<Candle>>> = {};
    for (const tf of timeframes) {
      candles[tf] = await this.read(symbol, `${tf} candles`, signal, async () => {
        const rows = await this.repository.findCandles(symbol, tf, asOf, this.candleLimit(tf));
        if (rows.length === 0) throw new DataUnavailableError(symbol, `no ${tf} candles stored`);
        return rows;
      });
    }

    const liquidations = await this.read(symbol, 'liquidations', signal, () =>
      this.repository.findLiquidations(
        symbol,
        asOf - this.config.cascade.lookbackHours * HOUR_MS,
        asOf,
      ),
    );

    const funding = await this.read(symbol, 'funding', signal, () =>
      this.repository.findFundingRates(
        symbol,
        asOf - this.config.funding.windowDays * DAY_MS,
        asOf,
      ),
    );

    const series: unknown[] = [...Object.values(candles), liquidations, funding];
    if (series.every(isUnavailable)) {
      return unavailable(`no market data readable for ${symbol}`);
    }

    return { symbol, asOf, candles, liquidations, funding };
  }

  /** Enough candles for the largest lookback that reads the timeframe, plus the closing one. */
  candleLimit(tf: Timeframe): number {
    const mtf = this.config.multiTimeframe.baselineWindows[tf] + 2;
    if (tf !== '1h') return mtf;
    return Math.max(
      mtf,
      this.config.volatility.baselineHours + 1,
      this.config.correlation.windowHours + 1,
    );
  }

  private async read<T>(
    symbol: string,
    label: string,
    signal: AbortSignal | undefined,
    query: () => Promise<T[]>,
  ): Promise<T[] | Unavailable> {
    if (signal?.aborted) return unavailable(`${label}: fetch aborted`);
    try {
      return await query();
    } catch (error) {
      this.logger.warn(`${symbol}: ${label} unavailable`, { reason: errorMessage(error) });
      return unavailable(`${label}: ${errorMessage(error)}`);
    }
  }
}
