import { Module } from '@nestjs/common';
import { UpsertLoaderService } from './upsert-loader.service';

// The DataSource comes from the global TypeOrmModule.forRootAsync in AppModule
@Module({
  providers: [UpsertLoaderService],
  exports: [UpsertLoaderService],
})
export class LoaderModule {}
