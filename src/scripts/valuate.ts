#!/usr/bin/env node
import 'reflect-metadata';
import type { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { createAppLogger } from '../common/logging/create-app-logger';
import { env } from '../config/env.validation';
import { AssetsService } from '../modules/assets/assets.service';
import { nextArtifactPath } from '../modules/reporting/artifact-path';
import { ReportingService } from '../modules/reporting/reporting.service';
import { ValuationService } from '../modules/valuation/valuation.service';

function getArg(name: string): string | undefined {
  const idx = process.argv.findIndex((a) => a === `--${name}`);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

/**
 * Batch run: seed the store from the asset source, valuate every holding,
 * print the table and total, write the distribution chart.
 *
 * Usage: npm run valuate -- [--chart ./out/pie.html]
 */
async function main() {
  const logger = createAppLogger('valuate');

  let app: INestApplicationContext;
  try {
    app = await NestFactory.createApplicationContext(AppModule, { logger, abortOnError: false });
  } catch (e) {
    logger.fatal(`Error initializing database ${env.DATABASE_PATH}: ${e instanceof Error ? e.message : String(e)}`);
    process.exitCode = 1;
    return;
  }

  try {
    const assets = app.get(AssetsService);
    await assets.populateFromSource();

    const stored = await assets.findAll();
    if (stored.length === 0) {
      // eslint-disable-next-line no-console
      console.log(`[valuate] No assets in ${env.DATABASE_PATH}`);
      return;
    }

    const report = await app.get(ValuationService).valuate(stored);
    const reporting = app.get(ReportingService);
    reporting.printSummary(report);

    // the chart path is fixed once per run and handed to reporting
    const chartPath = getArg('chart') ?? nextArtifactPath(env.REPORT_DIR, 'pie', 'html');
    await reporting.writeChart(report, chartPath);
  } finally {
    await app.close();
  }
}

void main();
