import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import type { Repository } from 'typeorm';
import { Asset, requiresPriceResolution } from './entities/asset.entity';
import { ASSET_SOURCE, type AssetSource } from './interfaces/asset-source.interface';
import type { NewAsset } from './interfaces/new-asset.interface';

export interface PopulateResult {
  source: string;
  inserted: number;
  rejected: number;
  skipped: boolean;
}

@Injectable()
export class AssetsService {
  private readonly logger = new Logger(AssetsService.name);

  constructor(
    @InjectRepository(Asset)
    private readonly assets: Repository<Asset>,
    @Inject(ASSET_SOURCE)
    private readonly assetSource: AssetSource,
  ) {}

  /**
   * Insert a holding. Rejects records that break the store invariants:
   * finite quantity / leverage, non-empty currency, a ticker for priced types.
   */
  async insert(input: NewAsset): Promise<Asset> {
    const tickerSymbol = input.tickerSymbol?.trim().toUpperCase() || null;
    const currency = input.currency.trim().toUpperCase();
    const leverage = input.leverage ?? 1;
    const currentPrice = input.currentPrice ?? null;

    if (!Number.isFinite(input.quantity)) {
      throw new BadRequestException('quantity must be a finite number');
    }
    if (!Number.isFinite(leverage)) {
      throw new BadRequestException('leverage must be a finite number');
    }
    if (!currency) {
      throw new BadRequestException('currency is required');
    }
    if (currentPrice !== null && !Number.isFinite(currentPrice)) {
      throw new BadRequestException('currentPrice must be a finite number when set');
    }
    if (requiresPriceResolution(input.assetType) && !tickerSymbol) {
      throw new BadRequestException(`tickerSymbol is required for ${input.assetType} assets`);
    }

    const entity = this.assets.create({
      assetType: input.assetType,
      plotType: input.plotType.trim(),
      tickerSymbol,
      quantity: input.quantity,
      currentPrice,
      currency,
      leverage,
    });

    return this.assets.save(entity);
  }

  /** Full scan, oldest first. */
  findAll(): Promise<Asset[]> {
    return this.assets.find({ order: { id: 'ASC' } });
  }

  /**
   * Seed an empty store from the configured asset source.
   * A populated store is left alone so repeated runs do not duplicate holdings.
   */
  async populateFromSource(): Promise<PopulateResult> {
    const source = this.assetSource.name;

    const existing = await this.assets.count();
    if (existing > 0) {
      this.logger.log(`Store already holds ${existing} asset(s), skipping source "${source}"`);
      return { source, inserted: 0, rejected: 0, skipped: true };
    }

    const records = await this.assetSource.produceAssets();
    let inserted = 0;
    let rejected = 0;

    for (const record of records) {
      try {
        await this.insert(record);
        inserted++;
      } catch (e) {
        rejected++;
        this.logger.error(
          `Error adding asset ${record.tickerSymbol ?? record.plotType} from "${source}": ${(e as Error).message}`,
        );
      }
    }

    if (records.length > 0) {
      this.logger.log(`Loaded ${inserted}/${records.length} asset(s) from "${source}"`);
    }
    return { source, inserted, rejected, skipped: false };
  }
}
