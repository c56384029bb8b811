import { DynamicModule, Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { LoaderModule } from '../loader/loader.module';
import { LocationsModule } from '../locations/locations.module';
import { SnapshotModule } from '../snapshot/snapshot.module';
import { WeatherModule } from '../weather/weather.module';
import { EtlPipelineService } from './etl-pipeline.service';
import { EtlSchedulerService } from './etl-scheduler.service';

export interface PipelineModuleOptions {
  scheduled: boolean;
}

@Module({})
export class PipelineModule {
  static register({ scheduled }: PipelineModuleOptions): DynamicModule {
    return {
      module: PipelineModule,
      imports: [
        LocationsModule,
        WeatherModule,
        SnapshotModule,
        LoaderModule,
        ...(scheduled ? [ScheduleModule.forRoot()] : []),
      ],
      providers: [
        EtlPipelineService,
        ...(scheduled ? [EtlSchedulerService] : []),
      ],
      exports: [EtlPipelineService],
    };
  }
}
