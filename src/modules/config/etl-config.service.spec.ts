import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EtlConfigService } from './etl-config.service';
import { ConfigurationError } from '../utils/etl-errors';

describe('EtlConfigService', () => {
  async function createService(
    env: Record<string, string>,
  ): Promise<EtlConfigService> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        EtlConfigService,
        {
          provide: ConfigService,
          useValue: { get: (name: string) => env[name] },
        },
      ],
    }).compile();

    return moduleRef.get(EtlConfigService);
  }

  it('falls back to defaults for optional settings', async () => {
    const config = await createService({});

    expect(config.table).toBe('weather_history_forecast');
    expect(config.schema).toBe('bronze_data');
    expect(config.outputDir).toBe('data');
    expect(config.locationsFile).toBe('locations.json');
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.upsertStrategy).toBe('merge');
    expect(config.snapshotTime).toBeUndefined();
  });

  it('reads overrides and ignores unparsable timeouts', async () => {
    const config = await createService({
      TABLE: 'weather_hourly',
      SCHEMA: 'silver_data',
      WEATHER_API_TIMEOUT_MS: 'soon',
      DB_CONNECT_TIMEOUT_MS: '2500',
      UPSERT_STRATEGY: 'on-conflict',
      SNAPSHOT_TIME: ' 2024-01-10T00:00:00Z ',
    });

    expect(config.table).toBe('weather_hourly');
    expect(config.schema).toBe('silver_data');
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.connectTimeoutMs).toBe(2500);
    expect(config.upsertStrategy).toBe('on-conflict');
    expect(config.snapshotTime).toBe('2024-01-10T00:00:00Z');
  });

  it('requires the API key and database URI', async () => {
    const config = await createService({ TOMORROW_API_KEY: '  ' });

    expect(() => config.apiKey).toThrow(ConfigurationError);
    expect(() => config.postgresUri).toThrow('POSTGRES_URI must be set');
  });

  it('rejects unknown upsert strategies', async () => {
    const config = await createService({ UPSERT_STRATEGY: 'replace' });

    expect(() => config.upsertStrategy).toThrow(
      "UPSERT_STRATEGY must be one of merge, on-conflict, got 'replace'",
    );
  });
});
