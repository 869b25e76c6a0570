import { Injectable } from '@nestjs/common';
import YahooFinance from 'yahoo-finance2';
import { withTimeout } from '../../../common/async/with-timeout';
import { env } from '../../../config/env.validation';

export const DAILY_CLOSE_SOURCE = 'DailyCloseSource';

export interface DailyClose {
  date: Date;
  close: number | null;
}

export interface DailyCloseSource {
  /** Daily candles from `from` until now, oldest first. Empty when the symbol has no history. */
  getDailyCloses(symbol: string, from: Date): Promise<DailyClose[]>;
}

const yahooFinance = new YahooFinance();

// Yahoo answers unknown and delisted tickers with an error instead of an empty series
const NO_DATA_PATTERN = /no data found|not found|delisted/i;

@Injectable()
export class YahooDailyCloseSource implements DailyCloseSource {
  async getDailyCloses(symbol: string, from: Date): Promise<DailyClose[]> {
    try {
      const chart = await withTimeout(
        yahooFinance.chart(symbol, { period1: from, interval: '1d', return: 'array' }),
        env.HTTP_TIMEOUT_MS,
      );
      return chart.quotes.map((q) => ({ date: q.date, close: q.close ?? null }));
    } catch (e) {
      if (e instanceof Error && NO_DATA_PATTERN.test(e.message)) return [];
      throw e;
    }
  }
}
