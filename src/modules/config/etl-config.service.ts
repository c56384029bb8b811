import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '../utils/etl-errors';

export type UpsertStrategy = 'merge' | 'on-conflict';

const UPSERT_STRATEGIES: readonly UpsertStrategy[] = ['merge', 'on-conflict'];

/**
 * Typed view over the process environment.
 * Optional settings fall back to defaults; required ones throw
 * ConfigurationError only when a step actually needs them.
 */
@Injectable()
export class EtlConfigService {
  constructor(private readonly configService: ConfigService) {}

  get apiKey(): string {
    return this.require('TOMORROW_API_KEY');
  }

  get apiUrl(): string {
    return this.getString(
      'TOMORROW_API_URL',
      'https://api.tomorrow.io/v4/timelines',
    );
  }

  get requestTimeoutMs(): number {
    return this.getPositiveInt('WEATHER_API_TIMEOUT_MS', 10000);
  }

  get snapshotTime(): string | undefined {
    return this.getOptional('SNAPSHOT_TIME');
  }

  get locationsFile(): string {
    return this.getString('LOCATIONS_FILE', 'locations.json');
  }

  get outputDir(): string {
    return this.getString('OUTPUT_DIR', 'data');
  }

  get postgresUri(): string {
    return this.require('POSTGRES_URI');
  }

  get connectTimeoutMs(): number {
    return this.getPositiveInt('DB_CONNECT_TIMEOUT_MS', 10000);
  }

  get table(): string {
    return this.getString('TABLE', 'weather_history_forecast');
  }

  get schema(): string {
    return this.getString('SCHEMA', 'bronze_data');
  }

  get upsertStrategy(): UpsertStrategy {
    const raw = this.getString('UPSERT_STRATEGY', 'merge');
    const strategy = UPSERT_STRATEGIES.find((candidate) => candidate === raw);
    if (!strategy) {
      throw new ConfigurationError(
        `UPSERT_STRATEGY must be one of ${UPSERT_STRATEGIES.join(', ')}, got '${raw}'`,
      );
    }
    return strategy;
  }

  private getOptional(name: string): string | undefined {
    const value = this.configService.get<string>(name);
    if (value === undefined || value === null) {
      return undefined;
    }
    const trimmed = String(value).trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }

  private getString(name: string, fallback: string): string {
    return this.getOptional(name) ?? fallback;
  }

  private getPositiveInt(name: string, fallback: number): number {
    const raw = this.getOptional(name);
    if (!raw) {
      return fallback;
    }
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
  }

  private require(name: string): string {
    const value = this.getOptional(name);
    if (!value) {
      throw new ConfigurationError(`${name} must be set`);
    }
    return value;
  }
}
