import type { AssetType } from '../assets/entities/asset.entity';
import type { ExchangeRate } from '../pricing/exchange-rate.service';

/**
 * Where an asset's working price came from:
 * - cached: stored `current_price`, no lookup
 * - resolved: market feed
 * - fallback: feed had no trading data, priced at 0
 * - absent: no usable price, counts as 0
 */
export type PriceStatus = 'cached' | 'resolved' | 'fallback' | 'absent';

export type ValuationOutcome = { status: 'ok' } | { status: 'failed'; error: string };

export interface AssetValuation {
  id: number;
  assetType: AssetType;
  plotType: string;
  tickerSymbol: string | null;
  quantity: number;
  currency: string;
  leverage: number;
  /** Unit price as stored, in `currency`. */
  storedPrice: number | null;
  /** Unit price used for the valuation, after currency conversion. */
  currentPrice: number | null;
  priceStatus: PriceStatus;
  converted: boolean;
  /** round2(currentPrice * quantity * leverage) */
  finalValue: number;
  outcome: ValuationOutcome;
}

export interface ValuationReport {
  /** Reporting currency. */
  currency: string;
  exchangeRate: ExchangeRate;
  assets: AssetValuation[];
  total: number;
  computedAt: string;
}
