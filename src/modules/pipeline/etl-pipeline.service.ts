import { Injectable, Logger } from '@nestjs/common';
import { EtlConfigService } from '../config/etl-config.service';
import { UpsertLoaderService, UpsertResult } from '../loader/upsert-loader.service';
import { LocationsService } from '../locations/locations.service';
import { SnapshotService, snapshotPath } from '../snapshot/snapshot.service';
import { describeError } from '../utils/etl-errors';
import { ForecastService } from '../weather/forecast.service';
import { KEY_COLUMNS } from '../weather/weather-record';
import { ETL_STEPS, EtlStep } from './etl-command';

export interface ExtractResult {
  path: string;
  rows: number;
}

/**
 * Runs the two ETL steps. The snapshot file is the hand-off between them,
 * so each step can also run in its own process.
 */
@Injectable()
export class EtlPipelineService {
  private readonly logger = new Logger(EtlPipelineService.name);

  constructor(
    private readonly config: EtlConfigService,
    private readonly locationsService: LocationsService,
    private readonly forecastService: ForecastService,
    private readonly snapshotService: SnapshotService,
    private readonly upsertLoader: UpsertLoaderService,
  ) {}

  /**
   * Fetch every location and write the parquet snapshot.
   */
  async extract(): Promise<ExtractResult> {
    const apiKey = this.config.apiKey;
    const locations = await this.locationsService.loadLocations();
    const table = await this.forecastService.getHistoryAndForecast(
      apiKey,
      locations,
      this.config.snapshotTime,
    );

    const path = snapshotPath(this.config.outputDir);
    await this.snapshotService.writeSnapshot(table, path);
    return { path, rows: table.size };
  }

  /**
   * Upsert the latest snapshot into the destination table.
   */
  async load(): Promise<UpsertResult> {
    const table = await this.snapshotService.readSnapshot(
      snapshotPath(this.config.outputDir),
    );
    return this.upsertLoader.upsert(
      table,
      this.config.table,
      this.config.schema,
      KEY_COLUMNS,
    );
  }

  /**
   * Run steps in order. The first failure stops the run and is rethrown.
   */
  async run(steps: readonly EtlStep[] = ETL_STEPS): Promise<void> {
    for (const step of steps) {
      const startTime = Date.now();
      this.logger.log(`Starting ${step} step`);

      try {
        const summary =
          step === 'extract'
            ? await this.extract().then(
                ({ path, rows }) => `${rows} rows written to ${path}`,
              )
            : await this.load().then(
                ({ destination, rows }) => `${rows} rows upserted into ${destination}`,
              );
        this.logger.log(
          `${step} step completed in ${Date.now() - startTime}ms: ${summary}`,
        );
      } catch (error) {
        this.logger.error(
          `${step} step failed after ${Date.now() - startTime}ms: ${describeError(error)}`,
        );
        throw error;
      }
    }
  }
}
