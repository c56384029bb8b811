import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { EtlConfigService } from '../config/etl-config.service';
import { ConfigurationError, describeError } from '../utils/etl-errors';
import { validatePayload } from '../utils/validation';
import { Location, LocationsFileDto } from './location.dto';

@Injectable()
export class LocationsService {
  private readonly logger = new Logger(LocationsService.name);

  constructor(private readonly config: EtlConfigService) {}

  /**
   * Read the static list of points to query, in file order.
   */
  async loadLocations(
    filePath: string = this.config.locationsFile,
  ): Promise<Location[]> {
    const absolutePath = resolve(process.cwd(), filePath);

    let raw: string;
    try {
      raw = await readFile(absolutePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read locations file ${absolutePath}: ${describeError(error)}`,
        { cause: error },
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(
        `Locations file ${absolutePath} is not valid JSON`,
        { cause: error },
      );
    }

    const file = validatePayload(
      LocationsFileDto,
      parsed,
      (violation) =>
        new ConfigurationError(
          `Invalid locations file ${absolutePath}: ${violation}`,
        ),
    );

    const locations = file.locations.map(({ name, lat, lon }) =>
      name === undefined ? { lat, lon } : { name, lat, lon },
    );
    this.logger.log(`Loaded ${locations.length} locations from ${filePath}`);
    return locations;
  }
}
