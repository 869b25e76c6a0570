import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { env } from '../../config/env.validation';
import { AssetsController } from './assets.controller';
import { AssetsService } from './assets.service';
import { Asset } from './entities/asset.entity';
import { ASSET_SOURCE } from './interfaces/asset-source.interface';
import { JsonFileAssetSource } from './sources/json-file-asset.source';
import { NoopAssetSource } from './sources/noop-asset.source';

@Module({
  imports: [TypeOrmModule.forFeature([Asset])],
  controllers: [AssetsController],
  providers: [
    AssetsService,
    NoopAssetSource,
    {
      provide: ASSET_SOURCE,
      useFactory: (noop: NoopAssetSource) =>
        // A configured file wins; otherwise seeding is a no-op
        env.ASSET_SOURCE_FILE ? new JsonFileAssetSource(env.ASSET_SOURCE_FILE) : noop,
      inject: [NoopAssetSource],
    },
  ],
  exports: [AssetsService],
})
export class AssetsModule {}
