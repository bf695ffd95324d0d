import { plainToInstance } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export class EnvironmentVariables {
  @IsString()
  @IsOptional()
  OCR_LANGUAGE: string = 'eng';

  @IsString()
  @IsOptional()
  OCR_LANG_PATH?: string;

  @IsInt()
  @Min(256)
  @Max(8192)
  OCR_MAX_IMAGE_DIMENSION: number = 2048;

  @IsInt()
  @IsIn([1, 3, 5, 7, 9])
  OCR_MEDIAN_WINDOW: number = 3;

  @IsString()
  @IsOptional()
  EXTRACTION_EXTRA_HEADER_PHRASES?: string;

  @IsIn([...LOG_LEVELS])
  LOG_LEVEL: string = 'info';
}

/**
 * Validates process environment at bootstrap; used as the `validate` hook of
 * `ConfigModule.forRoot`.
 * @throws Error listing every violated constraint.
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}
