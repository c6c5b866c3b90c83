// src/database/database.service.ts
import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import { extractErrorMessage } from '../common/errors/weather.errors';

/**
 * `name` is the natural key; the primary key constraint is what makes the
 * write-back upsert safe under concurrent misses.
 */
export const CREATE_CITIES_TABLE = `
  CREATE TABLE IF NOT EXISTS cities (
    name TEXT PRIMARY KEY,
    lat DOUBLE PRECISION NOT NULL,
    long DOUBLE PRECISION NOT NULL
  )
`;

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly pool: Pool;
  private isConnected = false;

  constructor(private readonly configService: ConfigService) {
    this.pool = new Pool({
      connectionString: this.configService.get<string>('DATABASE_URL'),
      max: this.configService.get<number>('DATABASE_POOL_SIZE', 10),
    });
    // an idle client dropping its connection must not crash the process
    this.pool.on('error', (error) => {
      this.logger.error(`Idle database client error: ${error.message}`);
    });
  }

  async onModuleInit() {
    try {
      await this.pool.query(CREATE_CITIES_TABLE);
      this.isConnected = true;
      this.logger.log('Database connection established');
    } catch (error) {
      this.logger.warn(`Failed to connect to database: ${extractErrorMessage(error)}`);

      const allowNoDb = this.configService.get<boolean>('ALLOW_NO_DATABASE', false);
      if (!allowNoDb) {
        this.logger.error('Database connection is required. Set ALLOW_NO_DATABASE=true to allow running without database.');
        throw error;
      }

      this.logger.warn('Continuing without database connection; the location cache is unavailable');
    }
  }

  async onModuleDestroy() {
    try {
      await this.pool.end();
      this.logger.log('Database connection closed');
    } catch (error) {
      this.logger.warn(`Error disconnecting from database: ${extractErrorMessage(error)}`);
    }
  }

  async query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    return this.pool.query<R>(text, values);
  }

  isDbConnected(): boolean {
    return this.isConnected;
  }
}
