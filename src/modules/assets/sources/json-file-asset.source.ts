import { readFile } from 'fs/promises';
import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { ASSET_TYPES } from '../entities/asset.entity';
import type { AssetSource } from '../interfaces/asset-source.interface';
import type { NewAsset } from '../interfaces/new-asset.interface';

const assetRecordSchema = z.object({
  assetType: z.enum(ASSET_TYPES),
  plotType: z.string().min(1),
  tickerSymbol: z.string().min(1).nullish(),
  quantity: z.number().finite(),
  currency: z.string().min(1),
  leverage: z.number().finite().optional(),
  currentPrice: z.number().finite().nullish(),
});

const assetFileSchema = z.array(assetRecordSchema);

/**
 * Reads holdings from a local JSON file: an array of
 * `{ assetType, plotType, tickerSymbol?, quantity, currency, leverage?, currentPrice? }`.
 */
export class JsonFileAssetSource implements AssetSource {
  private readonly logger = new Logger(JsonFileAssetSource.name);

  constructor(private readonly filePath: string) {}

  get name(): string {
    return `file:${this.filePath}`;
  }

  async produceAssets(): Promise<NewAsset[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (e) {
      this.logger.error(`Cannot read asset source ${this.filePath}: ${(e as Error).message}`);
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      this.logger.error(`Asset source ${this.filePath} is not valid JSON: ${(e as Error).message}`);
      return [];
    }

    const parsed = assetFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
      this.logger.error(`Asset source ${this.filePath} has invalid records: ${issues}`);
      return [];
    }

    return parsed.data;
  }
}
