import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { Injectable, Logger } from '@nestjs/common';
import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import type { ValuationReport } from '../valuation/valuation.types';
import { buildDistribution, type DistributionSlice } from './asset-distribution';
import { AssetDistributionReport } from './components/AssetDistributionReport';
import { formatAmount } from './format';

export interface AssetDistribution {
  currency: string;
  total: number;
  slices: DistributionSlice[];
}

export interface SummaryRow {
  id: number;
  asset_type: string;
  plot_type: string;
  ticker_symbol: string | null;
  quantity: number;
  current_price: number | null;
  currency: string;
  leverage: number;
  final_value: number;
  price_status: string;
}

/** Where summary lines go; `console` in the batch run. */
export type SummaryOutput = Pick<Console, 'table' | 'log'>;

@Injectable()
export class ReportingService {
  private readonly logger = new Logger(ReportingService.name);

  distribution(report: ValuationReport): AssetDistribution {
    return {
      currency: report.currency,
      total: report.total,
      slices: buildDistribution(report.assets),
    };
  }

  summaryRows(report: ValuationReport): SummaryRow[] {
    return report.assets.map((a) => ({
      id: a.id,
      asset_type: a.assetType,
      plot_type: a.plotType,
      ticker_symbol: a.tickerSymbol,
      quantity: a.quantity,
      current_price: a.currentPrice,
      currency: a.currency,
      leverage: a.leverage,
      final_value: a.finalValue,
      price_status: a.outcome.status === 'failed' ? 'failed' : a.priceStatus,
    }));
  }

  printSummary(report: ValuationReport, out: SummaryOutput = console) {
    out.table(this.summaryRows(report));
    out.log(`Total portfolio value: ${formatAmount(report.total)} ${report.currency}`);
  }

  renderChart(report: ValuationReport): string {
    const { currency, total, slices } = this.distribution(report);
    const markup = renderToStaticMarkup(
      createElement(AssetDistributionReport, {
        title: `Investment Asset Distribution by Plot Type (${currency})`,
        currency,
        total,
        slices,
        computedAt: report.computedAt,
      }),
    );
    return `<!DOCTYPE html>${markup}`;
  }

  /**
   * Write the distribution chart to `outputPath`. Returns the path, or null
   * when the file could not be written (logged; the run goes on).
   */
  async writeChart(report: ValuationReport, outputPath: string): Promise<string | null> {
    try {
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, this.renderChart(report), 'utf8');
      this.logger.log(`Distribution chart saved to ${outputPath}`);
      return outputPath;
    } catch (e) {
      this.logger.error(`Error saving asset distribution chart: ${e instanceof Error ? e.message : String(e)}`);
      return null;
    }
  }
}
