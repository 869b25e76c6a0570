import type { NewAsset } from './new-asset.interface';

export const ASSET_SOURCE = 'AssetSource';

/**
 * Supplies holdings used to populate an empty store, e.g. a private file
 * that is kept out of version control.
 */
export interface AssetSource {
  readonly name: string;
  produceAssets(): Promise<NewAsset[]>;
}
