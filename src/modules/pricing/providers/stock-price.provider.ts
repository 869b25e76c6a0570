import { Inject, Injectable, Logger } from '@nestjs/common';
import dayjs from 'dayjs';
import { env } from '../../../config/env.validation';
import type { PriceProvider, PriceResolution } from '../interfaces/price-provider.interface';
import { DAILY_CLOSE_SOURCE, type DailyCloseSource } from './yahoo-daily-close.source';

/**
 * Latest daily close for exchange-listed stocks and ETFs.
 */
@Injectable()
export class StockPriceProvider implements PriceProvider {
  readonly assetType = 'stock' as const;
  private readonly logger = new Logger(StockPriceProvider.name);

  constructor(
    @Inject(DAILY_CLOSE_SOURCE)
    private readonly closes: DailyCloseSource,
  ) {}

  async getCurrentPrice(symbol: string): Promise<PriceResolution> {
    // a few days back so weekends and holidays still have a last close
    const from = dayjs().subtract(env.STOCK_LOOKBACK_DAYS, 'day').startOf('day').toDate();

    let closes: Array<{ date: Date; close: number | null }>;
    try {
      closes = await this.closes.getDailyCloses(symbol, from);
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      this.logger.error(`Error fetching current price for ${symbol}: ${detail}`);
      return { kind: 'absent', reason: 'upstream-failure', detail };
    }

    let latest: number | null = null;
    for (const c of closes) {
      if (c.close !== null && Number.isFinite(c.close)) latest = c.close;
    }

    if (latest === null) {
      this.logger.warn(`${symbol}: No price data found, using fallback price 0`);
      return { kind: 'fallback', price: 0, reason: 'no-data' };
    }

    return { kind: 'resolved', price: latest };
  }
}
