import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EtlConfigModule } from './modules/config/etl-config.module';
import { EtlConfigService } from './modules/config/etl-config.service';
import { PipelineModule } from './modules/pipeline/pipeline.module';

export interface AppModuleOptions {
  /** Register the hourly cron job and keep the context alive. */
  scheduled: boolean;
}

@Module({})
export class AppModule {
  static forRoot({ scheduled }: AppModuleOptions): DynamicModule {
    return {
      module: AppModule,
      imports: [
        EtlConfigModule,
        TypeOrmModule.forRootAsync({
          imports: [EtlConfigModule],
          inject: [ConfigService, EtlConfigService],
          useFactory: (
            configService: ConfigService,
            etlConfig: EtlConfigService,
          ) => ({
            type: 'postgres',
            url: configService.get<string>('POSTGRES_URI'),
            connectTimeoutMS: etlConfig.connectTimeoutMs,
            // Only the load step connects; extract runs without a database
            manualInitialization: true,
            synchronize: false,
            entities: [],
          }),
        }),
        PipelineModule.register({ scheduled }),
      ],
    };
  }
}
