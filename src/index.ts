// chronofmt — Public API

import type { Temporal } from "@js-temporal/polyfill";
import type { CalendarSystem } from "./calendar.js";
import { Default } from "./defaults.js";
import { Formatter, type FormatterOptions } from "./formatter.js";
import type { LocaleNames } from "./locale.js";

/** Compile a pattern into a formatter. */
export function compile(pattern: string, options?: FormatterOptions): Formatter {
  return Formatter.compile(pattern, options);
}

/** Compile a pattern into a formatter bound to `zone` (UTC by default). */
export function formatter(pattern: string, zone: string = Default.zone): Formatter {
  return Formatter.compile(pattern, { zone });
}

/** Render an instant as text. */
export function print(
  fmt: Formatter,
  instant: Temporal.Instant | Temporal.ZonedDateTime,
): string {
  return fmt.print(instant);
}

/** Parse the whole of `text` into an instant. */
export function parse(fmt: Formatter, text: string): Temporal.Instant {
  return fmt.parse(text);
}

export function withZone(fmt: Formatter, zone: string): Formatter {
  return fmt.withZone(zone);
}

export function withLocale(fmt: Formatter, locale: string | LocaleNames): Formatter {
  return fmt.withLocale(locale);
}

export function withChronology(fmt: Formatter, calendar: string | CalendarSystem): Formatter {
  return fmt.withChronology(calendar);
}

export function withPivotYear(fmt: Formatter, pivotYear: number | null): Formatter {
  return fmt.withPivotYear(pivotYear);
}

export { Temporal } from "@js-temporal/polyfill";
export type {
  CalendarFields,
  CalendarSystem,
  DateFields,
  FieldValues,
} from "./calendar.js";
export { isoCalendar, TemporalCalendarSystem } from "./calendar.js";
export { compilePattern } from "./compiler.js";
export { type Config, configure, Default } from "./defaults.js";
export { display } from "./display.js";
export type { Span, TimeFormatErrorKind } from "./error.js";
export {
  ConfigError,
  InvalidFieldsError,
  NoMatchError,
  ParseError,
  PatternError,
  TimeFormatError,
  TrailingInputError,
  UnsupportedError,
} from "./error.js";
export { Formatter, type FormatterOptions, type ParseResult } from "./formatter.js";
export type { LocaleNames, NameSet, NameTable } from "./locale.js";
export { localeNames, staticLocale } from "./locale.js";
export { Logify } from "./logger.js";
export type {
  CompiledPlan,
  Directive,
  FieldKind,
  FieldStyle,
  Instruction,
  NameWidth,
} from "./plan.js";
export { choicePlan, restrictPlan } from "./plan.js";
export {
  formatters,
  getFormatter,
  listRegistry,
  parsers,
  printers,
  registry,
  type RegistryEntry,
} from "./registry.js";
export { parseAny } from "./resolver.js";
export { showFormatters } from "./show.js";
