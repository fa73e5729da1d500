import { parseDateFilter } from '../core/query.js';
import logger from '../utils/logger.js';

const INTEGER = /^-?\d+$/;

// Only whole decimal integers count; '10abc', '1e3' and '2.9' fall back to defaults.
export function parseIntParam(value: string | undefined): number | undefined {
  if (value === undefined || !INTEGER.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

// Unparseable optional dates are dropped rather than rejected.
export function lenientDate(name: string, value: string | undefined): Date | undefined {
  const parsed = parseDateFilter(value);
  if (value && !parsed) {
    logger.debug({ name, value }, 'Ignoring unparseable date filter');
  }
  return parsed;
}
