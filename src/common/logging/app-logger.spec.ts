import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConsoleLogger, Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { StockPriceProvider } from '../../modules/pricing/providers/stock-price.provider';
import { DAILY_CLOSE_SOURCE, type DailyClose } from '../../modules/pricing/providers/yahoo-daily-close.source';
import { AppLogger } from './app-logger';

const LINE = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3} - (WARN|ERROR|FATAL) - (.*)$/;

describe('AppLogger', () => {
  let dir: string;
  let errorLogPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'app-logger-'));
    errorLogPath = join(dir, 'errors.log');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const readLines = () => readFileSync(errorLogPath, 'utf8').trimEnd().split('\n');

  it('appends warnings and errors with timestamp, severity and context', () => {
    const logger = new AppLogger('Valuation', { errorLogPath, logLevels: [] });

    logger.log('not for the file');
    logger.warn('AAPL: No price data found');
    logger.error('feed down', 'ExchangeRateService');

    const lines = readLines();
    expect(lines).toHaveLength(2);
    expect(lines[0]?.match(LINE)?.slice(1)).toEqual(['WARN', '[Valuation] AAPL: No price data found']);
    expect(lines[1]?.match(LINE)?.slice(1)).toEqual(['ERROR', '[ExchangeRateService] feed down']);
  });

  it('keeps earlier entries when a new logger opens the same file', () => {
    new AppLogger('first', { errorLogPath, logLevels: [] }).error('one');
    new AppLogger('second', { errorLogPath, logLevels: [] }).error('two');

    expect(readLines().map((l) => l.match(LINE)?.[2])).toEqual(['[first] one', '[second] two']);
  });

  it('skips warnings when the file level is error', () => {
    const logger = new AppLogger('Test', { errorLogPath, fileLevel: 'error', logLevels: [] });

    logger.warn('ignored');
    logger.fatal('store unusable');

    expect(readLines().map((l) => l.match(LINE)?.slice(1))).toEqual([['FATAL', '[Test] store unusable']]);
  });

  it('writes the message of an Error', () => {
    const logger = new AppLogger('Test', { errorLogPath, logLevels: [] });
    logger.error(new Error('boom'));

    expect(readLines()[0]).toMatch(/ - ERROR - \[Test\] boom$/);
  });

  describe('as the application logger', () => {
    const mockCloses = {
      getDailyCloses: jest.fn<Promise<DailyClose[]>, [string, Date]>(),
    };

    afterEach(() => {
      mockCloses.getDailyCloses.mockReset();
      Logger.overrideLogger(new ConsoleLogger());
    });

    it('receives warnings and errors logged by services', async () => {
      const module = await Test.createTestingModule({
        providers: [StockPriceProvider, { provide: DAILY_CLOSE_SOURCE, useValue: mockCloses }],
      })
        .setLogger(new AppLogger('bootstrap', { errorLogPath, logLevels: [] }))
        .compile();
      const provider = module.get(StockPriceProvider);

      mockCloses.getDailyCloses.mockResolvedValueOnce([]);
      await provider.getCurrentPrice('ZZZZ');
      mockCloses.getDailyCloses.mockRejectedValueOnce(new Error('socket hang up'));
      await provider.getCurrentPrice('AAPL');
      await module.close();

      expect(readLines().map((l) => l.match(LINE)?.slice(1))).toEqual([
        ['WARN', '[StockPriceProvider] ZZZZ: No price data found, using fallback price 0'],
        ['ERROR', '[StockPriceProvider] Error fetching current price for AAPL: socket hang up'],
      ]);
    });
  });
});
