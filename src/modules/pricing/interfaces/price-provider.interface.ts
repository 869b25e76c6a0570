import type { AssetType } from '../../assets/entities/asset.entity';

export const PRICE_PROVIDERS = 'PriceProviders';

export type AbsentReason =
  | 'unsupported-type' // the asset type has no market feed
  | 'missing-symbol'
  | 'no-data'
  | 'upstream-failure';

/**
 * Outcome of a price lookup. Lookups never throw: feed problems come back
 * as `absent`, and a symbol without trading data as a zero `fallback`.
 */
export type PriceResolution =
  | { kind: 'resolved'; price: number }
  | { kind: 'fallback'; price: number; reason: 'no-data' }
  | { kind: 'absent'; reason: AbsentReason; detail?: string };

/**
 * Market feed for one asset type. Returns the unit price in the feed's
 * native currency (stock exchange currency, USDT for crypto pairs).
 */
export interface PriceProvider {
  readonly assetType: AssetType;
  getCurrentPrice(symbol: string): Promise<PriceResolution>;
}
