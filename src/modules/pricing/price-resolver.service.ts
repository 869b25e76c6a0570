import { Inject, Injectable, Logger } from '@nestjs/common';
import type { AssetType } from '../assets/entities/asset.entity';
import { PRICE_PROVIDERS, type PriceProvider, type PriceResolution } from './interfaces/price-provider.interface';

/**
 * Picks the market feed for an asset type and turns every failure into a
 * `PriceResolution` value.
 */
@Injectable()
export class PriceResolverService {
  private readonly logger = new Logger(PriceResolverService.name);
  private readonly providers: Map<AssetType, PriceProvider>;

  constructor(@Inject(PRICE_PROVIDERS) providers: PriceProvider[]) {
    this.providers = new Map(providers.map((p) => [p.assetType, p]));
  }

  async resolve(assetType: AssetType, tickerSymbol: string | null): Promise<PriceResolution> {
    const provider = this.providers.get(assetType);
    if (!provider) {
      return { kind: 'absent', reason: 'unsupported-type' };
    }

    const symbol = tickerSymbol?.trim();
    if (!symbol) {
      this.logger.warn(`Cannot price ${assetType} asset without a ticker symbol`);
      return { kind: 'absent', reason: 'missing-symbol' };
    }

    try {
      return await provider.getCurrentPrice(symbol);
    } catch (e) {
      const detail = e instanceof Error ? e.message : String(e);
      this.logger.error(`Error fetching current price for ${symbol} (${assetType}): ${detail}`);
      return { kind: 'absent', reason: 'upstream-failure', detail };
    }
  }
}
