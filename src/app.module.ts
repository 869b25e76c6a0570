import { Module } from '@nestjs/common';
import { AssetsModule } from './modules/assets/assets.module';
import { DatabaseModule } from './modules/database/database.module';
import { HealthModule } from './modules/health/health.module';
import { PricingModule } from './modules/pricing/pricing.module';
import { ReportingModule } from './modules/reporting/reporting.module';
import { ValuationModule } from './modules/valuation/valuation.module';

@Module({
  imports: [DatabaseModule, HealthModule, AssetsModule, PricingModule, ValuationModule, ReportingModule],
})
export class AppModule {}
