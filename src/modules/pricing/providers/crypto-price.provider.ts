import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { env } from '../../../config/env.validation';
import type { PriceProvider, PriceResolution } from '../interfaces/price-provider.interface';

// { "symbol": "BTCUSDT", "price": "60000.00000000" }
const tickerPriceSchema = z.object({
  price: z.union([z.string().min(1), z.number()]),
});

/**
 * Spot price of `<SYMBOL><QUOTE>` (e.g. BTCUSDT) from a Binance-style ticker endpoint.
 */
@Injectable()
export class CryptoPriceProvider implements PriceProvider {
  readonly assetType = 'crypto' as const;
  private readonly logger = new Logger(CryptoPriceProvider.name);

  async getCurrentPrice(symbol: string): Promise<PriceResolution> {
    const pair = `${symbol.trim().toUpperCase()}${env.CRYPTO_QUOTE_ASSET}`;
    const url = new URL(env.CRYPTO_PRICE_API_URL);
    url.searchParams.set('symbol', pair);

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(env.HTTP_TIMEOUT_MS),
      });

      if (!res.ok) {
        this.logger.error(`${pair}: price feed answered ${res.status}`);
        return { kind: 'absent', reason: 'no-data', detail: `HTTP ${res.status}` };
      }

      const parsed = tickerPriceSchema.safeParse(await res.json());
      const price = parsed.success ? Number(parsed.data.price) : NaN;
      if (!Number.isFinite(price)) {
        this.logger.error(`${pair}: malformed price response`);
        return { kind: 'absent', reason: 'upstream-failure', detail: 'malformed response' };
      }

      return { kind: 'resolved', price };
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      this.logger.error(`Error fetching current price for ${symbol}: ${detail}`);
      return { kind: 'absent', reason: 'upstream-failure', detail };
    }
  }
}
