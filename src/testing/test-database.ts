import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { ENTITIES } from '../entities';
import { EnvConfig, validateEnv } from '../config/env.validation';

/**
 * In-process stand-in for the Postgres connection: the same entities over an
 * in-memory SQLite database, rebuilt for every testing module.
 */
export const testDatabaseOptions: TypeOrmModuleOptions = {
  type: 'better-sqlite3',
  database: ':memory:',
  entities: ENTITIES,
  synchronize: true,
  dropSchema: true,
  logging: false,
};

export function testDatabaseImports() {
  return [
    TypeOrmModule.forRoot(testDatabaseOptions),
    TypeOrmModule.forFeature(ENTITIES),
  ];
}

export function testConfig(
  overrides: Record<string, string> = {},
): ConfigService<EnvConfig, true> {
  return new ConfigService<EnvConfig, true>(
    validateEnv({ NODE_ENV: 'test', INGESTION_ENABLED: 'false', ...overrides }),
  );
}

export function testConfigProvider(overrides: Record<string, string> = {}) {
  return { provide: ConfigService, useValue: testConfig(overrides) };
}
