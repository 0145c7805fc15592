// Month, weekday, meridiem, era and zone names.

import type { Temporal } from "@js-temporal/polyfill";
import { ConfigError } from "./error.js";
import type { NameWidth } from "./plan.js";

export interface NameSet {
  readonly short: readonly string[];
  readonly long: readonly string[];
}

export interface LocaleNames {
  readonly id: string;
  /** January first. */
  readonly months: NameSet;
  /** Monday first. */
  readonly weekdays: NameSet;
  /** [AM, PM] */
  readonly meridiems: readonly [string, string];
  /** [before common era, common era] */
  readonly eras: NameSet;
  zoneName(zone: string, instant: Temporal.Instant, width: NameWidth): string;
}

type PartType = Intl.DateTimeFormatPartTypes;

function partOf(
  locale: string,
  options: Intl.DateTimeFormatOptions,
  date: Date,
  type: PartType,
): string {
  const parts = new Intl.DateTimeFormat(locale, { timeZone: "UTC", ...options }).formatToParts(date);
  const part = parts.find((p) => p.type === type);
  if (part === undefined) {
    throw new ConfigError(`locale '${locale}' has no ${type} names`);
  }
  return part.value;
}

function utcDate(year: number, month: number, day: number, hour = 0): Date {
  const date = new Date(Date.UTC(2001, month, day, hour));
  date.setUTCFullYear(year);
  return date;
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

/** Name tables for a BCP 47 tag, read from the runtime's Intl data. */
class IntlLocaleNames implements LocaleNames {
  readonly id: string;
  readonly months: NameSet;
  readonly weekdays: NameSet;
  readonly meridiems: readonly [string, string];
  readonly eras: NameSet;

  constructor(id: string) {
    this.id = id;
    const month = (width: NameWidth) =>
      range(12).map((m) => partOf(id, { month: width }, utcDate(2001, m, 15), "month"));
    // 2001-01-01 is a Monday
    const weekday = (width: NameWidth) =>
      range(7).map((d) => partOf(id, { weekday: width }, utcDate(2001, 0, d + 1), "weekday"));
    const era = (width: NameWidth) =>
      [-100, 2001].map((y) => partOf(id, { era: width, year: "numeric" }, utcDate(y, 0, 15), "era"));
    const meridiem = (hour: number) =>
      partOf(id, { hour: "numeric", hour12: true }, utcDate(2001, 0, 1, hour), "dayPeriod");

    this.months = { short: month("short"), long: month("long") };
    this.weekdays = { short: weekday("short"), long: weekday("long") };
    this.eras = { short: era("short"), long: era("long") };
    this.meridiems = [meridiem(6), meridiem(18)];
  }

  zoneName(zone: string, instant: Temporal.Instant, width: NameWidth): string {
    let format: Intl.DateTimeFormat;
    try {
      format = new Intl.DateTimeFormat(this.id, { timeZone: zone, timeZoneName: width });
    } catch (err) {
      // fixed-offset zones are not Intl time zones; the id is the best name
      if (err instanceof RangeError) return zone;
      throw err;
    }
    const part = format
      .formatToParts(new Date(instant.epochMilliseconds))
      .find((p) => p.type === "timeZoneName");
    return part?.value ?? zone;
  }
}

const cache = new Map<string, LocaleNames>();

/** Resolve a locale tag to its name tables. Invalid tags throw `ConfigError`. */
export function localeNames(tag: string): LocaleNames {
  let id: string;
  try {
    [id] = Intl.getCanonicalLocales(tag);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new ConfigError(`invalid locale tag '${tag}'`);
    }
    throw err;
  }

  let names = cache.get(id);
  if (names === undefined) {
    names = new IntlLocaleNames(id);
    cache.set(id, names);
  }
  return names;
}

export type NameTable = Omit<LocaleNames, "zoneName">;

/**
 * Locale from a caller-supplied name table. Zone names print as the zone id.
 */
export function staticLocale(table: NameTable): LocaleNames {
  return {
    ...table,
    zoneName: (zone) => zone,
  };
}
