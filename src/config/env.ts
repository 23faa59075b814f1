import { ConfigService } from '@nestjs/config';

/**
 * Reads a numeric setting. `ConfigService.get` hands back whatever is in
 * `process.env`, which is always a string, so the value is coerced here.
 */
export function getNumber(
  config: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}".`);
  }
  return value;
}

export function getRequired(config: ConfigService, key: string): string {
  const value = config.get<string>(key);
  if (!value) {
    throw new Error(`${key} is not defined. Check your .env file.`);
  }
  return value;
}
