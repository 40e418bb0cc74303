import { ContractViolationError } from "../errors.js";

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const LONG_FRACTION = /(\.\d{3})\d+/;

/**
 * Parses an API timestamp. Values without a zone designator are taken as UTC,
 * and sub-millisecond digits (AppVeyor sends seven) are dropped.
 */
export function parseTimestamp(value: string): Date {
  const trimmed = value.trim().replace(LONG_FRACTION, "$1");
  const zoned = ZONE_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`;
  const parsed = Date.parse(zoned);
  if (Number.isNaN(parsed)) {
    throw new ContractViolationError(`Unparseable timestamp: ${value}`);
  }

  return new Date(parsed);
}

export function computeCutoff(now: Date, lookbackHours: number): Date {
  return new Date(now.getTime() - lookbackHours * 60 * 60 * 1000);
}

export function isWithinWindow(timestamp: Date, cutoff: Date): boolean {
  return timestamp.getTime() > cutoff.getTime();
}

export function formatTimestamp(timestamp: Date): string {
  return timestamp.toISOString().replace(/\.\d{3}Z$/, "Z");
}
