import { YahooDailyCloseSource } from './yahoo-daily-close.source';

const mockChart = jest.fn();

jest.mock('yahoo-finance2', () => ({
  __esModule: true,
  default: class {
    chart = (...args: unknown[]) => mockChart(...args);
  },
}));

describe('YahooDailyCloseSource', () => {
  const source = new YahooDailyCloseSource();
  const from = new Date('2026-10-12T00:00:00Z');

  afterEach(() => {
    mockChart.mockReset();
  });

  it('requests daily candles and maps them to closes', async () => {
    mockChart.mockResolvedValue({
      meta: { symbol: 'AAPL' },
      quotes: [
        { date: new Date('2026-10-15T13:30:00Z'), open: 149, close: 150.25 },
        { date: new Date('2026-10-16T13:30:00Z'), open: 150, close: null },
      ],
    });

    await expect(source.getDailyCloses('AAPL', from)).resolves.toEqual([
      { date: new Date('2026-10-15T13:30:00Z'), close: 150.25 },
      { date: new Date('2026-10-16T13:30:00Z'), close: null },
    ]);
    expect(mockChart).toHaveBeenCalledWith('AAPL', { period1: from, interval: '1d', return: 'array' });
  });

  it('treats an unknown or delisted symbol as an empty history', async () => {
    mockChart.mockRejectedValue(new Error('No data found, symbol may be delisted'));

    await expect(source.getDailyCloses('GONE', from)).resolves.toEqual([]);
  });

  it('rethrows other failures', async () => {
    mockChart.mockRejectedValue(new Error('getaddrinfo ENOTFOUND query1.finance.yahoo.com'));

    await expect(source.getDailyCloses('AAPL', from)).rejects.toThrow('getaddrinfo ENOTFOUND');
  });
});
