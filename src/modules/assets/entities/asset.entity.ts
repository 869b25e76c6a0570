import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';

export const ASSET_TYPES = ['stock', 'crypto', 'cash', 'other'] as const;
export type AssetType = (typeof ASSET_TYPES)[number];

/** Asset types whose unit price comes from a market feed and therefore need a ticker. */
export const PRICED_ASSET_TYPES: readonly AssetType[] = ['stock', 'crypto'];

export function requiresPriceResolution(assetType: AssetType): boolean {
  return PRICED_ASSET_TYPES.includes(assetType);
}

@Entity('assets')
export class Asset {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('text', { name: 'asset_type' })
  assetType!: AssetType;

  // chart grouping only
  @Column('text', { name: 'plot_type' })
  plotType!: string;

  @Column('text', { name: 'ticker_symbol', nullable: true })
  tickerSymbol!: string | null;

  @Column('real')
  quantity!: number;

  /** Cached unit price in `currency`; null means "resolve at valuation time". */
  @Column('real', { name: 'current_price', nullable: true })
  currentPrice!: number | null;

  @Column('text')
  currency!: string;

  @Column('real', { default: 1 })
  leverage!: number;
}
