import { Module } from '@nestjs/common';
import { AssetsModule } from '../assets/assets.module';
import { PricingModule } from '../pricing/pricing.module';
import { ValuationController } from './valuation.controller';
import { ValuationService } from './valuation.service';

@Module({
  imports: [AssetsModule, PricingModule],
  controllers: [ValuationController],
  providers: [ValuationService],
  exports: [ValuationService],
})
export class ValuationModule {}
