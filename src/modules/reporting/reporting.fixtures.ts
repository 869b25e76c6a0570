import type { AssetValuation, ValuationReport } from '../valuation/valuation.types';

export function valuation(fields: Partial<AssetValuation> & { id: number; plotType: string; finalValue: number }): AssetValuation {
  return {
    assetType: 'other',
    tickerSymbol: null,
    quantity: 1,
    currency: 'KRW',
    leverage: 1,
    storedPrice: fields.finalValue,
    currentPrice: fields.finalValue,
    priceStatus: 'cached',
    converted: false,
    outcome: { status: 'ok' },
    ...fields,
  };
}

export function report(assets: AssetValuation[], total: number): ValuationReport {
  return {
    currency: 'KRW',
    exchangeRate: { base: 'USD', target: 'KRW', rate: 1300, source: 'live' },
    assets,
    total,
    computedAt: '2026-10-19T09:00:00.000Z',
  };
}
