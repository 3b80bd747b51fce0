import 'reflect-metadata';
import { Transform, plainToInstance } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';
import { LOG_LEVEL_NAMES, LogLevelName } from './logging';

export const COLLECTOR_MODES = ['production', 'simulation'] as const;
export const ALIGNMENT_MODES = ['average', 'nearest'] as const;

const isProduction = (env: EnvironmentVariables): boolean => env.COLLECTOR_MODE === 'production';

/**
 * Process environment, validated once at start-up by ConfigModule.
 * Defaults live here so every consumer sees the same value.
 */
export class EnvironmentVariables {
  @IsIn(['development', 'production', 'test'])
  NODE_ENV: 'development' | 'production' | 'test' = 'development';

  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsIn(LOG_LEVEL_NAMES)
  LOG_LEVEL: LogLevelName = 'log';

  @IsIn(COLLECTOR_MODES)
  COLLECTOR_MODE: (typeof COLLECTOR_MODES)[number] = 'production';

  // Database
  @IsString()
  DB_HOST: string = 'localhost';

  @IsInt()
  DB_PORT: number = 5432;

  @IsString()
  DB_USERNAME: string = 'postgres';

  @IsString()
  DB_PASSWORD: string = 'postgres';

  @IsString()
  DB_NAME: string = 'heatpump_collector';

  @Transform(({ obj }) => obj.DB_SSL === true || obj.DB_SSL === 'true')
  @IsBoolean()
  DB_SSL: boolean = false;

  // Heat pump API
  @ValidateIf(isProduction)
  @IsNotEmpty()
  VIESSMANN_CLIENT_ID?: string;

  @ValidateIf(isProduction)
  @IsNotEmpty()
  VIESSMANN_REFRESH_TOKEN?: string;

  @ValidateIf(isProduction)
  @IsNotEmpty()
  VIESSMANN_INSTALLATION_ID?: string;

  @ValidateIf(isProduction)
  @IsNotEmpty()
  VIESSMANN_GATEWAY_SERIAL?: string;

  @IsString()
  VIESSMANN_DEVICE_ID: string = '0';

  // Power meter
  @ValidateIf(isProduction)
  @IsNotEmpty()
  SHELLY_HOST?: string;

  @IsOptional()
  @IsString()
  SHELLY_PASSWORD?: string;

  // Polling, seconds
  @IsInt()
  @Min(1)
  HEAT_PUMP_POLL_INTERVAL: number = 300;

  @IsInt()
  @Min(1)
  POWER_POLL_INTERVAL: number = 10;

  @IsInt()
  @Min(0)
  POWER_RETRY_DELAY_MS: number = 2000;

  @IsInt()
  @Min(100)
  SOURCE_TIMEOUT_MS: number = 10000;

  // Quota
  @IsInt()
  @IsPositive()
  RATE_LIMIT_DAILY_CAP: number = 1450;

  @IsInt()
  @IsPositive()
  RATE_LIMIT_SAFETY_THRESHOLD: number = 1400;

  @IsInt()
  @Min(1)
  RATE_LIMIT_BACKOFF_SECONDS: number = 3600;

  // Metrics
  @IsNumber()
  @IsPositive()
  HEAT_PUMP_RATED_POWER: number = 16;

  /** Litres per hour */
  @IsNumber()
  @IsPositive()
  ESTIMATED_FLOW_RATE: number = 1000;

  @IsNumber()
  @Min(0)
  COP_MIN_WATTS: number = 50;

  @IsNumber()
  @Min(0)
  COP_MIN: number = 0.5;

  @IsNumber()
  @IsPositive()
  COP_MAX: number = 10;

  @IsIn(ALIGNMENT_MODES)
  POWER_ALIGNMENT_MODE: (typeof ALIGNMENT_MODES)[number] = 'average';

  @IsInt()
  @Min(1)
  POWER_AVERAGE_WINDOW_SECONDS: number = 300;

  @IsInt()
  @Min(1)
  POWER_ALIGNMENT_TOLERANCE_SECONDS: number = 300;
}

/**
 * `validate` hook for ConfigModule: converts strings from the environment to
 * their declared types, applies defaults and rejects invalid settings.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  const problems = errors.flatMap((error) => Object.values(error.constraints ?? {}));
  if (validated.RATE_LIMIT_SAFETY_THRESHOLD >= validated.RATE_LIMIT_DAILY_CAP) {
    problems.push('RATE_LIMIT_SAFETY_THRESHOLD must be below RATE_LIMIT_DAILY_CAP');
  }
  if (validated.COP_MIN >= validated.COP_MAX) {
    problems.push('COP_MIN must be below COP_MAX');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid environment:\n- ${problems.join('\n- ')}`);
  }
  return validated;
}
