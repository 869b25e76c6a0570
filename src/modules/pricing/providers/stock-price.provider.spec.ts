import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { StockPriceProvider } from './stock-price.provider';
import { DAILY_CLOSE_SOURCE, type DailyClose } from './yahoo-daily-close.source';

describe('StockPriceProvider', () => {
  let provider: StockPriceProvider;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  const mockCloses = {
    getDailyCloses: jest.fn<Promise<DailyClose[]>, [string, Date]>(),
  };

  beforeEach(async () => {
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    const module: TestingModule = await Test.createTestingModule({
      providers: [StockPriceProvider, { provide: DAILY_CLOSE_SOURCE, useValue: mockCloses }],
    }).compile();

    provider = module.get<StockPriceProvider>(StockPriceProvider);
  });

  afterEach(() => {
    jest.resetAllMocks();
    jest.restoreAllMocks();
  });

  it('returns the most recent daily close', async () => {
    mockCloses.getDailyCloses.mockResolvedValue([
      { date: new Date('2026-10-14'), close: 148.2 },
      { date: new Date('2026-10-15'), close: 150 },
      // today's candle before the first trade
      { date: new Date('2026-10-16'), close: null },
    ]);

    await expect(provider.getCurrentPrice('AAPL')).resolves.toEqual({ kind: 'resolved', price: 150 });
    expect(mockCloses.getDailyCloses).toHaveBeenCalledWith('AAPL', expect.any(Date));
  });

  it('looks back a few days so a weekend still has a close', async () => {
    mockCloses.getDailyCloses.mockResolvedValue([{ date: new Date(), close: 10 }]);

    await provider.getCurrentPrice('AAPL');

    const from = mockCloses.getDailyCloses.mock.calls[0]?.[1];
    expect(from).toBeInstanceOf(Date);
    expect(Date.now() - (from?.getTime() ?? 0)).toBeGreaterThan(24 * 60 * 60 * 1000);
  });

  it('falls back to 0 with a warning when there is no trading data', async () => {
    mockCloses.getDailyCloses.mockResolvedValue([]);

    await expect(provider.getCurrentPrice('ZZZZ')).resolves.toEqual({ kind: 'fallback', price: 0, reason: 'no-data' });
    expect(warnSpy).toHaveBeenCalledWith('ZZZZ: No price data found, using fallback price 0');
  });

  it('reports a feed failure as absent', async () => {
    mockCloses.getDailyCloses.mockRejectedValue(new Error('socket hang up'));

    await expect(provider.getCurrentPrice('AAPL')).resolves.toEqual({
      kind: 'absent',
      reason: 'upstream-failure',
      detail: 'socket hang up',
    });
    expect(errorSpy).toHaveBeenCalledWith('Error fetching current price for AAPL: socket hang up');
  });
});
