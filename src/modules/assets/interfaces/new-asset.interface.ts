import type { AssetType } from '../entities/asset.entity';

/**
 * Holding as supplied by a caller or an asset source, before it gets an id.
 */
export interface NewAsset {
  assetType: AssetType;
  plotType: string;
  tickerSymbol?: string | null;
  quantity: number;
  currency: string;
  leverage?: number;
  currentPrice?: number | null;
}
