import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { EtlPipelineService } from './etl-pipeline.service';

@Injectable()
export class EtlSchedulerService implements OnApplicationBootstrap {
  private readonly logger = new Logger(EtlSchedulerService.name);
  private isRunning = false;

  constructor(private readonly pipeline: EtlPipelineService) {}

  onApplicationBootstrap(): void {
    this.logger.log('Weather ETL scheduler started - running initial update');
    void this.runScheduled();
  }

  /**
   * Hourly extract + load. A failed run is logged and the next tick tries again.
   */
  @Cron(CronExpression.EVERY_HOUR, { name: 'weather-etl' })
  async runScheduled(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Weather ETL already running, skipping...');
      return;
    }

    this.isRunning = true;
    try {
      await this.pipeline.run();
    } catch (error) {
      this.logger.error('Scheduled weather ETL run failed:', error);
    } finally {
      this.isRunning = false;
    }
  }

  getStatus(): { isRunning: boolean } {
    return { isRunning: this.isRunning };
  }
}
