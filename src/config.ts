import { IANAZone } from 'luxon';

export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const { DATABASE_PATH } = process.env;

/** Civil timezone that every shift time-of-day and allocation date is interpreted in. */
export const SCHEDULE_TIMEZONE = process.env.SCHEDULE_TIMEZONE || 'UTC';

/**
 * Validates the environment the entry point runs in
 * @param requireDatabasePath - Whether DATABASE_PATH must be set explicitly (defaults to false, falling back to the local database file)
 */
export function validateEnvironmentVariables(requireDatabasePath: boolean = false): {
  valid: boolean;
  missing: string[];
  invalid: string[];
} {
  const missing: string[] = [];
  const invalid: string[] = [];

  if (requireDatabasePath && !DATABASE_PATH) {
    missing.push('DATABASE_PATH');
  }

  if (!IANAZone.isValidZone(SCHEDULE_TIMEZONE)) {
    invalid.push('SCHEDULE_TIMEZONE');
  }

  return {
    valid: missing.length === 0 && invalid.length === 0,
    missing,
    invalid,
  };
}
