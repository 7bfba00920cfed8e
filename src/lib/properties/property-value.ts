export type TimeUnit = 'milliseconds' | 'seconds' | 'minutes' | 'hours' | 'days';
export type DataUnit = 'B' | 'KB' | 'MB' | 'GB' | 'TB';

const MILLIS_PER: Record<TimeUnit, number> = {
  milliseconds: 1,
  seconds: 1000,
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
};

const TIME_UNIT_ALIASES = new Map<string, TimeUnit>([
  ['ms', 'milliseconds'],
  ['milli', 'milliseconds'],
  ['millis', 'milliseconds'],
  ['millisecond', 'milliseconds'],
  ['milliseconds', 'milliseconds'],
  ['s', 'seconds'],
  ['sec', 'seconds'],
  ['secs', 'seconds'],
  ['second', 'seconds'],
  ['seconds', 'seconds'],
  ['m', 'minutes'],
  ['min', 'minutes'],
  ['mins', 'minutes'],
  ['minute', 'minutes'],
  ['minutes', 'minutes'],
  ['h', 'hours'],
  ['hr', 'hours'],
  ['hrs', 'hours'],
  ['hour', 'hours'],
  ['hours', 'hours'],
  ['d', 'days'],
  ['day', 'days'],
  ['days', 'days'],
]);

// Binary multiples
const BYTES_PER: Record<DataUnit, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
};

const MEASURE_PATTERN = /^(\d+(?:\.\d+)?)\s*([a-z]+)$/i;

function isDataUnit(value: string): value is DataUnit {
  return Object.hasOwn(BYTES_PER, value);
}

/**
 * A configured property value, with the default already applied.
 */
export class PropertyValue {
  private readonly raw?: string;

  constructor(raw?: string) {
    this.raw = raw;
  }

  public getValue(): string | undefined {
    return this.raw;
  }

  public isSet(): boolean {
    return this.raw !== undefined;
  }

  /**
   * @returns undefined when unset or not an integer
   */
  public asInteger(): number | undefined {
    if (this.raw === undefined || !/^-?\d+$/.test(this.raw.trim())) {
      return undefined;
    }

    return Number.parseInt(this.raw, 10);
  }

  /**
   * 'true' / 'false', case-insensitive; anything else is undefined
   */
  public asBoolean(): boolean | undefined {
    const normalized = this.raw?.trim().toLowerCase();

    if (normalized === 'true') {
      return true;
    }

    if (normalized === 'false') {
      return false;
    }

    return undefined;
  }

  /**
   * Parse a period such as `30 sec` or `5 mins` and express it in `unit`
   *
   * @returns undefined when unset or not a time period
   */
  public asTimePeriod(unit: TimeUnit): number | undefined {
    const match = MEASURE_PATTERN.exec(this.raw?.trim() ?? '');

    if (!match) {
      return undefined;
    }

    const [, amount, suffix] = match;
    const from = TIME_UNIT_ALIASES.get(suffix.toLowerCase());

    if (!from) {
      return undefined;
    }

    return (Number(amount) * MILLIS_PER[from]) / MILLIS_PER[unit];
  }

  /**
   * Parse a size such as `10 KB` or `1.5 MB` and express it in `unit`
   *
   * @returns undefined when unset or not a data size
   */
  public asDataSize(unit: DataUnit): number | undefined {
    const match = MEASURE_PATTERN.exec(this.raw?.trim() ?? '');

    if (!match) {
      return undefined;
    }

    const [, amount, suffix] = match;
    const normalized = suffix.toUpperCase();
    const from = normalized === 'BYTES' ? 'B' : normalized;

    if (!isDataUnit(from)) {
      return undefined;
    }

    return (Number(amount) * BYTES_PER[from]) / BYTES_PER[unit];
  }
}
