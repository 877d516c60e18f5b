const LOCAL_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * A calendar date without a time of day or zone.
 *
 * Serializes to `YYYY-MM-DD` through `toJSON`, so `JSON.stringify` and every
 * codec emit it without extra configuration.
 */
export class LocalDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (
      !Number.isInteger(year) ||
      probe.getUTCFullYear() !== year ||
      probe.getUTCMonth() !== month - 1 ||
      probe.getUTCDate() !== day
    ) {
      throw new RangeError(`Invalid date: ${year}-${month}-${day}`);
    }
    this.year = year;
    this.month = month;
    this.day = day;
  }

  static of(year: number, month: number, day: number): LocalDate {
    return new LocalDate(year, month, day);
  }

  /**
   * Parse an ISO `YYYY-MM-DD` string.
   */
  static parse(text: string): LocalDate {
    const match = LOCAL_DATE_PATTERN.exec(text);
    if (!match) {
      throw new RangeError(`Invalid date: ${text}`);
    }
    return new LocalDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  /**
   * The UTC calendar date of the given instant.
   */
  static fromDate(date: Date): LocalDate {
    return new LocalDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
  }

  equals(other: LocalDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  toString(): string {
    const yyyy = String(this.year).padStart(4, "0");
    const mm = String(this.month).padStart(2, "0");
    const dd = String(this.day).padStart(2, "0");
    return `${yyyy}-${mm}-${dd}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
