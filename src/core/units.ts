/**
 * Time Units
 *
 * Conversion from raw nanoseconds to coarser units. Conversion truncates
 * toward zero, the same as integer division.
 */

export const TimeUnit = {
  Nanoseconds: 'NANOSECONDS',
  Microseconds: 'MICROSECONDS',
  Milliseconds: 'MILLISECONDS',
  Seconds: 'SECONDS',
  Minutes: 'MINUTES',
  Hours: 'HOURS',
  Days: 'DAYS',
} as const;

export type TimeUnit = (typeof TimeUnit)[keyof typeof TimeUnit];

const NANOS_PER_UNIT: Record<TimeUnit, bigint> = {
  NANOSECONDS: 1n,
  MICROSECONDS: 1_000n,
  MILLISECONDS: 1_000_000n,
  SECONDS: 1_000_000_000n,
  MINUTES: 60_000_000_000n,
  HOURS: 3_600_000_000_000n,
  DAYS: 86_400_000_000_000n,
};

const UNIT_ABBREVIATIONS: Record<TimeUnit, string> = {
  NANOSECONDS: 'ns',
  MICROSECONDS: 'us',
  MILLISECONDS: 'ms',
  SECONDS: 's',
  MINUTES: 'm',
  HOURS: 'h',
  DAYS: 'd',
};

/**
 * Convert a nanosecond value to the given unit
 *
 * bigint division already truncates toward zero, so negative values
 * (which a well-formed ledger never produces) behave like integer division.
 * Results above Number.MAX_SAFE_INTEGER (about 104 days in nanoseconds)
 * lose precision; SplitTimer.elapsedTimeNanos() returns the exact value.
 */
export function convertNanos(nanos: bigint, unit: TimeUnit): number {
  return Number(nanos / NANOS_PER_UNIT[unit]);
}

/**
 * Lowercase unit name, e.g. "microseconds"
 */
export function unitLabel(unit: TimeUnit): string {
  return unit.toLowerCase();
}

/**
 * Short unit suffix, e.g. "us"
 */
export function unitAbbreviation(unit: TimeUnit): string {
  return UNIT_ABBREVIATIONS[unit];
}

/**
 * Parse a unit from its name (any case) or abbreviation
 *
 * @returns the unit, or undefined when the text names no known unit
 */
export function parseTimeUnit(text: string | undefined): TimeUnit | undefined {
  if (!text) {
    return undefined;
  }

  const normalized = text.trim();
  for (const unit of Object.values(TimeUnit)) {
    if (unit === normalized.toUpperCase() || UNIT_ABBREVIATIONS[unit] === normalized) {
      return unit;
    }
  }

  return undefined;
}
