import { z } from "zod";
import { DateTimeParseError } from "./errors.js";

const RFC3339 = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

/**
 * One API timestamp. Holds the raw string as received; the instant is only
 * computed on demand so a bad value surfaces where it is read, not where the
 * surrounding entity was decoded.
 */
export class DateTime {
  readonly iso8601: string;

  constructor(iso8601: string) {
    this.iso8601 = iso8601;
  }

  static fromDate(d: Date): DateTime {
    return new DateTime(d.toISOString());
  }

  toDate(): Date {
    if (!RFC3339.test(this.iso8601)) throw new DateTimeParseError(this.iso8601);
    const ms = Date.parse(this.iso8601);
    if (!Number.isFinite(ms)) throw new DateTimeParseError(this.iso8601);
    return new Date(ms);
  }

  // null instead of throwing, for display code
  tryDate(): Date | null {
    try {
      return this.toDate();
    } catch (err) {
      if (err instanceof DateTimeParseError) return null;
      throw err;
    }
  }

  toString(): string {
    return this.iso8601;
  }

  toJSON(): { iso8601: string } {
    return { iso8601: this.iso8601 };
  }
}

export const DateTimeSchema = z
  .object({ iso8601: z.string() })
  .nullish()
  .transform((v) => (v ? new DateTime(v.iso8601) : null));
