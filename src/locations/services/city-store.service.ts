// src/locations/services/city-store.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '../../database/database.service';
import { StoreWriteError, extractErrorMessage } from '../../common/errors/weather.errors';
import { CachedCoordinate, NamedLocation } from '../interfaces/location.interface';

interface CityRow {
  lat: number;
  long: number;
}

/**
 * Persistent name -> coordinate cache backed by the `cities` table
 *
 * Entries never expire and are never updated.
 */
@Injectable()
export class CityStoreService {
  private readonly logger = new Logger(CityStoreService.name);

  constructor(private readonly database: DatabaseService) {}

  /**
   * Exact-name lookup. Never throws: driver failures come back as `error`.
   */
  async find(name: string): Promise<CachedCoordinate> {
    try {
      const result = await this.database.query<CityRow>(
        'SELECT lat, long FROM cities WHERE name = $1 LIMIT 1',
        [name]
      );
      const row = result.rows[0];
      if (!row) {
        return { status: 'miss' };
      }
      return { status: 'hit', coordinate: { latitude: row.lat, longitude: row.long } };
    } catch (error) {
      this.logger.error(`City lookup failed for "${name}": ${extractErrorMessage(error)}`);
      return { status: 'error', cause: error };
    }
  }

  /**
   * Insert-or-ignore keyed by name. Two requests racing on the same miss both
   * succeed and the first stored coordinate wins.
   *
   * @returns true when a new row was written
   * @throws StoreWriteError
   */
  async save(location: NamedLocation): Promise<boolean> {
    try {
      const result = await this.database.query(
        'INSERT INTO cities (name, lat, long) VALUES ($1, $2, $3) ON CONFLICT (name) DO NOTHING',
        [location.name, location.coordinate.latitude, location.coordinate.longitude]
      );
      return result.rowCount === 1;
    } catch (error) {
      this.logger.error(`City write-back failed for "${location.name}": ${extractErrorMessage(error)}`);
      throw new StoreWriteError(`Could not store coordinates for "${location.name}"`, {
        cause: error,
        details: { name: location.name },
      });
    }
  }
}
