const RFC3339 = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}(?::?\d{2})?)$/;

/** `+0200` and `+02` read as `+02:00`. */
function normalizeOffset(offset: string): string {
  if (offset === 'Z') {
    return offset;
  }

  const digits = offset.slice(1).replace(':', '');
  return `${offset[0]}${digits.slice(0, 2)}:${digits.slice(2, 4) || '00'}`;
}

/**
 * UTC instant with the full fractional-second precision of its wire form.
 *
 * `Date` stops at milliseconds; the fraction digits are kept next to it so a
 * decoded `…21.126645Z` encodes back unchanged.
 */
export class Timestamp {
  /** Instant truncated to milliseconds */
  #date: Date;
  /** Fraction-of-second digits, at least 3 */
  #fraction: string;

  private constructor(date: Date, fraction: string) {
    this.#date = date;
    this.#fraction = fraction;
  }

  /**
   * Parses an RFC 3339 date-time. Offsets are converted to UTC; `null` when
   * the value is not a valid date-time.
   */
  static parse(value: string): Timestamp | null {
    const match = RFC3339.exec(value);
    if (!match) {
      return null;
    }

    const [, seconds, digits = '', offset] = match;
    const date = new Date(`${seconds}${normalizeOffset(offset)}`);
    if (Number.isNaN(date.getTime())) {
      return null;
    }

    const fraction = digits.padEnd(3, '0');
    date.setUTCMilliseconds(Number(fraction.slice(0, 3)));
    return new Timestamp(date, fraction);
  }

  static fromDate(date: Date): Timestamp {
    return new Timestamp(new Date(date.getTime()), String(date.getUTCMilliseconds()).padStart(3, '0'));
  }

  /** The instant as a `Date`, truncated to milliseconds. */
  toDate(): Date {
    return new Date(this.#date.getTime());
  }

  /** UTC form, e.g. `2020-12-21T15:51:21.126645Z`; never fewer than 3 fraction digits. */
  toISOString(): string {
    return `${this.#date.toISOString().slice(0, -4)}${this.#fraction}Z`;
  }

  toJSON(): string {
    return this.toISOString();
  }

  toString(): string {
    return this.toISOString();
  }
}
