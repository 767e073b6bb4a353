import { DataSource } from 'typeorm';
import { ENTITIES, MIGRATIONS } from '../../src/database/database.options';

// In-memory SQLite with the real migration applied; foreign keys are enforced by the driver.
export async function createTestDataSource({ migrationsRun = true } = {}): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: ENTITIES,
    migrations: MIGRATIONS,
    migrationsRun,
    synchronize: false,
    logging: false,
  });
  return dataSource.initialize();
}
