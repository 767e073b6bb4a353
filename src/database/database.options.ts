import { DataSourceOptions } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { Student } from '../student/entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { CreateClassroomSchema1729000000000 } from '../migrations/1729000000000-CreateClassroomSchema';

export const ENTITIES = [Student, Grade];
export const MIGRATIONS = [CreateClassroomSchema1729000000000];

export type SupportedDatabaseType = 'postgres' | 'better-sqlite3';

export function resolveDatabaseType(raw: string): SupportedDatabaseType {
  if (raw === 'postgres' || raw === 'better-sqlite3') return raw;
  throw new Error(`Configuration error: Unsupported DB_TYPE ${raw}`);
}

export function buildDataSourceOptions(configService: ConfigService): DataSourceOptions {
  const type = resolveDatabaseType(configService.getOrDefault('DB_TYPE', 'postgres'));
  const logging = configService.getOrDefault('NODE_ENV', 'development') === 'development';
  const migrationsRun = configService.getBoolean('DB_MIGRATIONS_RUN', false);

  if (type === 'better-sqlite3') {
    return {
      type,
      database: configService.getOrDefault('DB_DATABASE', 'classroom.sqlite'),
      entities: ENTITIES,
      migrations: MIGRATIONS,
      migrationsRun,
      synchronize: false,
      logging,
    };
  }

  return {
    type,
    host: configService.get('DB_HOST'),
    port: configService.getNumber('DB_PORT', 5432),
    username: configService.get('DB_USERNAME'),
    password: configService.get('DB_PASSWORD'),
    database: configService.get('DB_DATABASE'),
    entities: ENTITIES,
    migrations: MIGRATIONS,
    migrationsRun,
    synchronize: false,
    logging,
    ssl: false, // Disable SSL for local development
  };
}
