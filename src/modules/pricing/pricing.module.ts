import { Module } from '@nestjs/common';
import { ExchangeRateService } from './exchange-rate.service';
import { PRICE_PROVIDERS } from './interfaces/price-provider.interface';
import { PriceResolverService } from './price-resolver.service';
import { CryptoPriceProvider } from './providers/crypto-price.provider';
import { StockPriceProvider } from './providers/stock-price.provider';
import { DAILY_CLOSE_SOURCE, YahooDailyCloseSource } from './providers/yahoo-daily-close.source';

@Module({
  providers: [
    ExchangeRateService,
    PriceResolverService,
    StockPriceProvider,
    CryptoPriceProvider,
    { provide: DAILY_CLOSE_SOURCE, useClass: YahooDailyCloseSource },
    {
      provide: PRICE_PROVIDERS,
      useFactory: (stock: StockPriceProvider, crypto: CryptoPriceProvider) => [stock, crypto],
      inject: [StockPriceProvider, CryptoPriceProvider],
    },
  ],
  exports: [PriceResolverService, ExchangeRateService],
})
export class PricingModule {}
