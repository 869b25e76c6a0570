import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { env } from '../../config/env.validation';
import { Asset } from '../assets/entities/asset.entity';

@Module({
  imports: [
    TypeOrmModule.forRoot({
      type: 'better-sqlite3',
      database: env.DATABASE_PATH,
      entities: [Asset],
      // single table, created on first start
      synchronize: true,
      // fail the bootstrap instead of retrying an unusable store
      retryAttempts: 0,
    }),
  ],
})
export class DatabaseModule {}
