import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export enum Environment {
  DEVELOPMENT = 'development',
  PRODUCTION = 'production',
  TEST = 'test',
}

export enum DatabaseDriver {
  POSTGRES = 'postgres',
  SQLITE = 'better-sqlite3',
}

// reads the raw value: implicit conversion would turn 'false' into true
const toBoolean = ({ obj, key }: TransformFnParams): unknown => {
  const raw: unknown = obj[key];
  if (raw === true || raw === 'true' || raw === '1') return true;
  if (raw === false || raw === 'false' || raw === '0') return false;
  return raw;
};

export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.DEVELOPMENT;

  @IsEnum(DatabaseDriver)
  DB_TYPE: DatabaseDriver = DatabaseDriver.POSTGRES;

  @IsOptional()
  @IsString()
  DB_HOST?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT?: number;

  @IsOptional()
  @IsString()
  DB_USERNAME?: string;

  @IsOptional()
  @IsString()
  DB_PASSWORD?: string;

  @IsOptional()
  @IsString()
  DB_DATABASE?: string;

  @IsOptional()
  @IsString()
  DB_SQLITE_PATH?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE?: boolean;

  @Transform(toBoolean)
  @IsBoolean()
  AUTO_ASSIGN_ON_CREATE: boolean = true;

  @IsInt()
  @Min(1)
  @Max(500)
  AUDIT_QUERY_DEFAULT_LIMIT: number = 50;
}

/** Validates process environment for ConfigModule.forRoot */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
