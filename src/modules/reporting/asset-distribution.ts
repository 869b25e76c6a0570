import { roundTo } from '../../common/math/round';
import type { AssetValuation } from '../valuation/valuation.types';

export interface DistributionSlice {
  plotType: string;
  value: number;
  /** Percent of the positive total, one decimal. 0 for non-positive groups. */
  share: number;
}

/**
 * Sum final values per plot type, largest first. Groups that net to zero or
 * below stay in the result but cannot be drawn as pie slices.
 */
export function buildDistribution(valuations: readonly AssetValuation[]): DistributionSlice[] {
  const sums = new Map<string, number>();
  for (const v of valuations) {
    sums.set(v.plotType, (sums.get(v.plotType) ?? 0) + v.finalValue);
  }

  const positiveTotal = [...sums.values()].filter((v) => v > 0).reduce((a, b) => a + b, 0);

  return [...sums.entries()]
    .map(([plotType, sum]) => ({
      plotType,
      value: roundTo(sum, 2),
      share: sum > 0 && positiveTotal > 0 ? roundTo((sum / positiveTotal) * 100, 1) : 0,
    }))
    .sort((a, b) => b.value - a.value);
}
