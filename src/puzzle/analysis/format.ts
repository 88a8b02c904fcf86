// Human-friendly numbers and durations for run reports

const NUMBER_WORDS = ['zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine'];

const grouping = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Counts up to nine as words, everyday counts with thousands separators, huge
 * counts in exponential form: 7 -> "seven", 12345 -> "12,345",
 * 3.2e12 -> "3.2e+12".
 */
export function formatNumber(value: number | bigint): string {
  if (typeof value === 'bigint') {
    if (value < 1_000_000_000n) return formatNumber(Number(value));
    return Number(value).toExponential(1);
  }

  if (!Number.isFinite(value)) return String(value);

  if (value < 100) {
    if (Number.isInteger(value)) {
      return value >= 0 && value <= 9 ? NUMBER_WORDS[value] : String(value);
    }
    return String(Math.round(value * 100) / 100);
  }
  if (value < 1_000_000_000) {
    return grouping.format(Math.trunc(value));
  }
  return value.toExponential(1);
}

export function formatOrdinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1: return `${n}st`;
    case 2: return `${n}nd`;
    case 3: return `${n}rd`;
    default: return `${n}th`;
  }
}

interface DurationUnit {
  seconds: number;
  singular: string;
  plural: string;
}

// Largest first
const UNITS: DurationUnit[] = [
  { seconds: 365 * 24 * 3600, singular: 'a year', plural: 'years' },
  { seconds: 24 * 3600, singular: 'a day', plural: 'days' },
  { seconds: 3600, singular: 'an hour', plural: 'hours' },
  { seconds: 60, singular: 'a minute', plural: 'minutes' },
  { seconds: 1, singular: 'a second', plural: 'seconds' },
  { seconds: 1e-3, singular: '1 millisecond', plural: 'milliseconds' },
  { seconds: 1e-6, singular: '1 microsecond', plural: 'microseconds' }
];

/**
 * Duration in the largest whole unit, down to microseconds:
 * 0.0042 -> "4 milliseconds", 90 -> "a minute", 7200 -> "2 hours".
 */
export function formatDuration(seconds: number): string {
  if (!Number.isFinite(seconds)) return 'forever';

  for (const unit of UNITS) {
    const count = Math.floor(seconds / unit.seconds);
    if (count < 1) continue;
    if (count === 1) return unit.singular;
    return `${unit.seconds >= 365 * 24 * 3600 ? formatNumber(count) : count} ${unit.plural}`;
  }
  return '0 microseconds';
}
