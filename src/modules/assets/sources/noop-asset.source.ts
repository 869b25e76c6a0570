import { Injectable } from '@nestjs/common';
import type { AssetSource } from '../interfaces/asset-source.interface';
import type { NewAsset } from '../interfaces/new-asset.interface';

/** Used when no asset source is configured. */
@Injectable()
export class NoopAssetSource implements AssetSource {
  readonly name = 'none';

  async produceAssets(): Promise<NewAsset[]> {
    return [];
  }
}
