import { Controller, Get } from '@nestjs/common';
import { ValuationService } from './valuation.service';

@Controller('portfolio')
export class ValuationController {
  constructor(private readonly valuation: ValuationService) {}

  @Get('valuation')
  current() {
    return this.valuation.valuatePortfolio();
  }
}
