// Temporal-backed calendar arithmetic: the fields of an instant in a zone,
// and the instant for a set of fields.

import { Temporal } from "@js-temporal/polyfill";
import { ConfigError, InvalidFieldsError } from "./error.js";

type PD = Temporal.PlainDate;

/** Field values of an instant in a zone. Day of week runs 1 (Monday) to 7. */
export interface CalendarFields {
  era: number;
  yearOfEra: number;
  year: number;
  weekyear: number;
  weekOfWeekyear: number;
  dayOfWeek: number;
  dayOfYear: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  nanosecond: number;
  offsetNanoseconds: number;
}

export type DateFields =
  | { type: "calendar"; year: number; month: number; day: number }
  | { type: "ordinal"; year: number; dayOfYear: number }
  | { type: "week"; weekyear: number; week: number; dayOfWeek: number };

/** Resolved field values handed to `instantOf`. */
export interface FieldValues {
  date: DateFields;
  /** Expected day of week, checked against the resolved date. */
  dayOfWeek?: number;
  hour: number;
  minute: number;
  second: number;
  nanosecond: number;
  /** A parsed UTC offset; takes precedence over the zone. */
  offsetNanoseconds?: number;
}

export interface CalendarSystem {
  readonly id: string;
  fieldsOf(instant: Temporal.Instant, zone: string): CalendarFields;
  instantOf(fields: FieldValues, zone: string): Temporal.Instant;
  /** The zone identifier if the calendar system knows it, else null. */
  resolveZone(zone: string): string | null;
}

const EPOCH = new Temporal.Instant(0n);

/** ISO week-year and week of an ISO date. */
function isoWeek(date: PD): { weekyear: number; week: number } {
  const thursday = date.add({ days: 4 - date.dayOfWeek });
  return {
    weekyear: thursday.year,
    week: Math.floor((thursday.dayOfYear - 1) / 7) + 1,
  };
}

function weekOneMonday(weekyear: number): PD {
  const jan4 = Temporal.PlainDate.from({ year: weekyear, month: 1, day: 4 });
  return jan4.subtract({ days: jan4.dayOfWeek - 1 });
}

function rangeCheck(value: number, min: number, max: number, name: string): void {
  if (value < min || value > max) {
    throw new InvalidFieldsError(`${name} ${value} is outside ${min}..${max}`);
  }
}

export class TemporalCalendarSystem implements CalendarSystem {
  readonly id: string;

  constructor(id = "iso8601") {
    try {
      new Temporal.PlainDate(2000, 1, 1, id);
    } catch (err) {
      if (err instanceof RangeError) {
        throw new ConfigError(`unknown calendar '${id}'`);
      }
      throw err;
    }
    this.id = id;
  }

  fieldsOf(instant: Temporal.Instant, zone: string): CalendarFields {
    const zdt = instant.toZonedDateTimeISO(zone).withCalendar(this.id);
    const { weekyear, week } = isoWeek(zdt.toPlainDate().withCalendar("iso8601"));
    // eras are the two-era split of the calendar's arithmetic year in every
    // calendar system; regnal eras such as the japanese calendar's are not modelled
    const era = zdt.year > 0 ? 1 : 0;
    return {
      era,
      yearOfEra: era === 1 ? zdt.year : 1 - zdt.year,
      year: zdt.year,
      weekyear,
      weekOfWeekyear: week,
      dayOfWeek: zdt.dayOfWeek,
      dayOfYear: zdt.dayOfYear,
      month: zdt.month,
      day: zdt.day,
      hour: zdt.hour,
      minute: zdt.minute,
      second: zdt.second,
      nanosecond: zdt.millisecond * 1_000_000 + zdt.microsecond * 1_000 + zdt.nanosecond,
      offsetNanoseconds: zdt.offsetNanoseconds,
    };
  }

  instantOf(fields: FieldValues, zone: string): Temporal.Instant {
    try {
      return this.resolve(fields, zone);
    } catch (err) {
      if (err instanceof RangeError) {
        throw new InvalidFieldsError(`invalid date-time fields: ${err.message}`);
      }
      throw err;
    }
  }

  resolveZone(zone: string): string | null {
    try {
      // the bracketed id is Temporal's canonical name, e.g. an alias resolved
      const match = /\[([^\]]+)\]$/.exec(EPOCH.toZonedDateTimeISO(zone).toString());
      return match === null ? zone : match[1];
    } catch (err) {
      if (err instanceof RangeError) return null;
      throw err;
    }
  }

  private resolve(fields: FieldValues, zone: string): Temporal.Instant {
    const date = this.resolveDate(fields.date);
    if (fields.dayOfWeek !== undefined && date.dayOfWeek !== fields.dayOfWeek) {
      throw new InvalidFieldsError(
        `day of week ${fields.dayOfWeek} does not match ${date.toString()}`,
      );
    }

    const nanos = fields.nanosecond;
    const time = Temporal.PlainTime.from(
      {
        hour: fields.hour,
        minute: fields.minute,
        second: fields.second,
        millisecond: Math.floor(nanos / 1_000_000),
        microsecond: Math.floor(nanos / 1_000) % 1_000,
        nanosecond: nanos % 1_000,
      },
      { overflow: "reject" },
    );
    const local = date.toPlainDateTime(time);

    if (fields.offsetNanoseconds !== undefined) {
      const utc = local.toZonedDateTime("UTC").epochNanoseconds;
      return new Temporal.Instant(utc - BigInt(fields.offsetNanoseconds));
    }
    return local.toZonedDateTime(zone, { disambiguation: "compatible" }).toInstant();
  }

  private resolveDate(date: FieldValues["date"]): PD {
    switch (date.type) {
      case "calendar":
        return Temporal.PlainDate.from(
          { year: date.year, month: date.month, day: date.day, calendar: this.id },
          { overflow: "reject" },
        );
      case "ordinal": {
        const first = Temporal.PlainDate.from({
          year: date.year,
          month: 1,
          day: 1,
          calendar: this.id,
        });
        rangeCheck(date.dayOfYear, 1, first.daysInYear, "day of year");
        return first.add({ days: date.dayOfYear - 1 });
      }
      case "week": {
        const weeks = isoWeek(Temporal.PlainDate.from({ year: date.weekyear, month: 12, day: 28 })).week;
        rangeCheck(date.week, 1, weeks, "week of week-year");
        rangeCheck(date.dayOfWeek, 1, 7, "day of week");
        return weekOneMonday(date.weekyear)
          .add({ days: (date.week - 1) * 7 + date.dayOfWeek - 1 })
          .withCalendar(this.id);
      }
    }
  }
}

/** The ISO-8601 calendar shared by default formatters. */
export const isoCalendar: CalendarSystem = new TemporalCalendarSystem("iso8601");
