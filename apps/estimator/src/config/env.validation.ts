import { plainToInstance, Transform } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Typed view of the environment. Loaded once by ConfigModule; services read
 * values through ConfigService with the same key names.
 */
export class EnvironmentVariables {
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsOptional()
  @IsString()
  MARKETS_FILE?: string;

  @IsString()
  REFERENCE_MARKETS: string = 'Nairobi,Nakuru,Nyeri';

  @IsOptional()
  @IsString()
  CALIBRATION_LOCATIONS?: string;

  @IsInt()
  @Min(1)
  CALIBRATION_WINDOW_DAYS: number = 30;

  @IsInt()
  @Min(1)
  CALIBRATION_MIN_SAMPLES: number = 10;

  @IsString()
  CALIBRATION_CRON: string = '0 2 * * *';

  @IsOptional()
  @IsString()
  WEATHER_API_KEY?: string;

  @IsUrl({ require_tld: false })
  WEATHER_API_URL: string = 'https://api.openweathermap.org/data/3.0/onecall';

  @IsInt()
  @Min(1000)
  WEATHER_FETCH_INTERVAL_MS: number = 3600000;

  @Transform(({ obj, key }) => {
    const raw: unknown = obj[key];
    return raw === true || raw === 'true' || raw === '1';
  })
  @IsBoolean()
  SCHEDULER_ENABLED: boolean = false;

  @IsString()
  PRICE_UNITS: string = 'KES/kg';
}

/**
 * ConfigModule `validate` hook: coerces string env values and fails fast on
 * anything malformed.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map(error => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}

/**
 * Split a comma-separated config value into trimmed, non-empty names.
 */
export function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}
