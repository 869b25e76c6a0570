import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { env } from '../../config/env.validation';

/** Used when the rate feed cannot be read: conversion becomes a no-op. */
export const FALLBACK_RATE = 1;

export interface ExchangeRate {
  base: string;
  target: string;
  /** Units of `target` per one unit of `base`. */
  rate: number;
  source: 'live' | 'identity' | 'fallback';
}

// { "base": "USD", "rates": { "KRW": 1300.5, ... } }
const latestRatesSchema = z.object({
  rates: z.record(z.unknown()),
});

@Injectable()
export class ExchangeRateService {
  private readonly logger = new Logger(ExchangeRateService.name);

  async currentRate(base: string = env.BASE_CURRENCY, target: string = env.TARGET_CURRENCY): Promise<ExchangeRate> {
    const from = base.toUpperCase();
    const to = target.toUpperCase();

    if (from === to) {
      return { base: from, target: to, rate: 1, source: 'identity' };
    }

    const fallback: ExchangeRate = { base: from, target: to, rate: FALLBACK_RATE, source: 'fallback' };
    const url = `${env.EXCHANGE_RATE_API_URL.replace(/\/+$/, '')}/${encodeURIComponent(from)}`;

    try {
      const res = await fetch(url, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(env.HTTP_TIMEOUT_MS),
      });

      if (!res.ok) {
        this.logger.error(`Error fetching ${from}-${to} exchange rate: HTTP ${res.status}, using ${FALLBACK_RATE}`);
        return fallback;
      }

      const parsed = latestRatesSchema.safeParse(await res.json());
      const rate = parsed.success ? parsed.data.rates[to] : undefined;
      if (typeof rate !== 'number' || !Number.isFinite(rate) || rate <= 0) {
        this.logger.error(`Error fetching ${from}-${to} exchange rate: no usable rates.${to}, using ${FALLBACK_RATE}`);
        return fallback;
      }

      return { base: from, target: to, rate, source: 'live' };
    } catch (e) {
      this.logger.error(
        `Error fetching ${from}-${to} exchange rate: ${e instanceof Error ? e.message : String(e)}, using ${FALLBACK_RATE}`,
      );
      return fallback;
    }
  }
}
