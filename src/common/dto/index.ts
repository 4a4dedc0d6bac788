import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';
import { Transform, plainToInstance } from 'class-transformer';
import { ConfigError } from '../errors';
import { PollConfig } from '../interfaces';

export const MAX_LOOKBACK_DAYS = 36500;
export const MAX_INTERVAL_SECONDS = Math.floor(0x7fffffff / 1000);

export class PollConfigDto implements PollConfig {
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty({ message: 'keyword ne doit pas être vide' })
  keyword!: string;

  @IsInt()
  @Min(0)
  @Max(MAX_LOOKBACK_DAYS)
  lookbackDays!: number;

  // setInterval ramène tout délai au-delà de 2^31-1 ms à 1 ms
  @IsInt()
  @Min(1)
  @Max(MAX_INTERVAL_SECONDS)
  intervalSeconds!: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  fetchTimeoutMs?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(32)
  concurrency?: number;
}

export class MatchQueryDto {
  @IsOptional()
  @IsString()
  search?: string;

  @IsOptional()
  @Transform(({ value }) => (typeof value === 'string' ? parseInt(value, 10) : value))
  @IsInt()
  @Min(1)
  limit?: number;
}

/**
 * Valide une configuration de polling hors du pipeline HTTP.
 * Lève ConfigError sans rien appliquer.
 */
export function validatePollConfig(input: unknown): PollConfig {
  if (typeof input !== 'object' || input === null) {
    throw new ConfigError('Configuration de surveillance invalide', ['objet attendu']);
  }

  const dto = plainToInstance(PollConfigDto, input);
  const errors = validateSync(dto, { whitelist: true });

  if (errors.length > 0) {
    const details = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new ConfigError('Configuration de surveillance invalide', details);
  }

  return {
    keyword: dto.keyword,
    lookbackDays: dto.lookbackDays,
    intervalSeconds: dto.intervalSeconds,
    ...(dto.fetchTimeoutMs !== undefined && { fetchTimeoutMs: dto.fetchTimeoutMs }),
    ...(dto.concurrency !== undefined && { concurrency: dto.concurrency }),
  };
}
