import { Controller, Get, Header } from '@nestjs/common';
import { ValuationService } from '../valuation/valuation.service';
import { ReportingService } from './reporting.service';

@Controller('portfolio')
export class ReportingController {
  constructor(
    private readonly valuation: ValuationService,
    private readonly reporting: ReportingService,
  ) {}

  @Get('distribution')
  async distribution() {
    const report = await this.valuation.valuatePortfolio();
    return this.reporting.distribution(report);
  }

  @Get('chart')
  @Header('Content-Type', 'text/html; charset=utf-8')
  async chart() {
    const report = await this.valuation.valuatePortfolio();
    return this.reporting.renderChart(report);
  }
}
