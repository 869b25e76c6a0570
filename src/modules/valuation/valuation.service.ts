import { Injectable, Logger } from '@nestjs/common';
import { mapWithConcurrency } from '../../common/async/map-with-concurrency';
import { settle } from '../../common/async/settle';
import { roundTo } from '../../common/math/round';
import { env } from '../../config/env.validation';
import { AssetsService } from '../assets/assets.service';
import type { Asset } from '../assets/entities/asset.entity';
import { ExchangeRateService, type ExchangeRate } from '../pricing/exchange-rate.service';
import { PriceResolverService } from '../pricing/price-resolver.service';
import type { AssetValuation, PriceStatus, ValuationOutcome, ValuationReport } from './valuation.types';

@Injectable()
export class ValuationService {
  private readonly logger = new Logger(ValuationService.name);

  constructor(
    private readonly assets: AssetsService,
    private readonly priceResolver: PriceResolverService,
    private readonly exchangeRates: ExchangeRateService,
  ) {}

  /** Valuate everything in the store. */
  async valuatePortfolio(): Promise<ValuationReport> {
    const assets = await this.assets.findAll();
    return this.valuate(assets);
  }

  /**
   * Price every asset, convert base-currency prices with one rate fetched
   * for the whole run, and total the final values.
   * Returns one valuation per input asset in input order; a failing asset
   * is reported in its own `outcome` and never stops the run.
   */
  async valuate(assets: readonly Asset[]): Promise<ValuationReport> {
    const exchangeRate = await this.exchangeRates.currentRate(env.BASE_CURRENCY, env.TARGET_CURRENCY);

    const valuations = await mapWithConcurrency(assets, env.PRICE_CONCURRENCY, (asset) =>
      this.valuateAsset(asset, exchangeRate),
    );

    const total = roundTo(
      valuations.reduce((sum, v) => sum + v.finalValue, 0),
      2,
    );

    const failed = valuations.filter((v) => v.outcome.status === 'failed').length;
    this.logger.log(
      `Valuated ${valuations.length} asset(s) at ${exchangeRate.base}/${exchangeRate.target}=${exchangeRate.rate} (${exchangeRate.source}): total ${total} ${exchangeRate.target}` +
        (failed ? `, ${failed} failed` : ''),
    );

    return {
      currency: exchangeRate.target,
      exchangeRate,
      assets: valuations,
      total,
      computedAt: new Date().toISOString(),
    };
  }

  private async valuateAsset(asset: Asset, exchangeRate: ExchangeRate): Promise<AssetValuation> {
    const label = asset.tickerSymbol ?? `${asset.assetType}#${asset.id}`;
    const stored = asset.currentPrice;
    const hasCachedPrice = stored !== null && !Number.isNaN(stored);

    let workingPrice: number | null = hasCachedPrice ? stored : null;
    let priceStatus: PriceStatus = 'cached';
    let outcome: ValuationOutcome = { status: 'ok' };

    if (!hasCachedPrice) {
      const lookup = await settle(() => this.priceResolver.resolve(asset.assetType, asset.tickerSymbol));
      if (lookup.ok) {
        const resolution = lookup.value;
        workingPrice = resolution.kind === 'absent' ? null : resolution.price;
        priceStatus = resolution.kind;
      } else {
        priceStatus = 'absent';
        outcome = { status: 'failed', error: lookup.error.message };
        this.logger.error(`Error calculating final values for ${label}: ${lookup.error.message}`);
      }
    }

    const converted = workingPrice !== null && asset.currency.toUpperCase() === exchangeRate.base;
    let currentPrice = converted && workingPrice !== null ? workingPrice * exchangeRate.rate : workingPrice;
    let finalValue = roundTo((currentPrice ?? 0) * asset.quantity * asset.leverage, 2);

    if (!Number.isFinite(finalValue)) {
      const error = `non-finite value from price ${currentPrice} x quantity ${asset.quantity} x leverage ${asset.leverage}`;
      this.logger.error(`Error calculating final values for ${label}: ${error}`);
      outcome = { status: 'failed', error };
      currentPrice = workingPrice;
      finalValue = 0;
    }

    return {
      id: asset.id,
      assetType: asset.assetType,
      plotType: asset.plotType,
      tickerSymbol: asset.tickerSymbol,
      quantity: asset.quantity,
      currency: asset.currency,
      leverage: asset.leverage,
      storedPrice: stored,
      currentPrice,
      priceStatus,
      converted,
      finalValue,
      outcome,
    };
  }
}
