import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { REPAIR_ENTITIES } from '../entities';

export type DatabaseType = 'postgres' | 'better-sqlite3';

export function createTypeOrmOptions(configService: ConfigService): TypeOrmModuleOptions {
  const dbType = configService.get<DatabaseType>('DB_TYPE', 'postgres');
  const environment = configService.get<string>('NODE_ENV', 'development');
  const synchronize = configService.get<boolean>('DB_SYNCHRONIZE', environment !== 'production');

  if (dbType === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: configService.get<string>('DB_SQLITE_PATH', ':memory:'),
      entities: REPAIR_ENTITIES,
      synchronize,
      logging: environment === 'development' ? ['error', 'warn'] : false,
    };
  }

  return {
    type: 'postgres',
    host: configService.get<string>('DB_HOST', 'localhost'),
    port: configService.get<number>('DB_PORT', 5432),
    username: configService.get<string>('DB_USERNAME', 'postgres'),
    password: configService.get<string>('DB_PASSWORD', 'password'),
    database: configService.get<string>('DB_DATABASE', 'repairflow'),
    entities: REPAIR_ENTITIES,
    synchronize,
    logging: environment === 'development',
    ssl: environment === 'production' ? { rejectUnauthorized: false } : false,
    extra: {
      max: 20,
      connectionTimeoutMillis: 60000,
    },
  };
}
