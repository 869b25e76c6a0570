import { IsIn, IsNumber, IsOptional, IsString, MinLength } from 'class-validator';
import { ASSET_TYPES, type AssetType } from '../entities/asset.entity';
import type { NewAsset } from '../interfaces/new-asset.interface';

export class CreateAssetDto implements NewAsset {
  @IsIn(ASSET_TYPES)
  assetType!: AssetType;

  @IsString()
  @MinLength(1)
  plotType!: string; // e.g. "US stocks", "Crypto", "Cash"

  @IsString()
  @IsOptional()
  tickerSymbol?: string | null; // required for stock / crypto, checked in the service

  @IsNumber({ allowNaN: false, allowInfinity: false })
  quantity!: number;

  @IsString()
  @MinLength(1)
  currency!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsOptional()
  leverage?: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsOptional()
  currentPrice?: number | null;
}
