import { Temporal } from "@js-temporal/polyfill";
import { type CalendarSystem, isoCalendar, TemporalCalendarSystem } from "./calendar.js";
import { compilePattern } from "./compiler.js";
import { Default } from "./defaults.js";
import { display } from "./display.js";
import { ConfigError, TimeFormatError } from "./error.js";
import { type LocaleNames, localeNames } from "./locale.js";
import { type ParseContext, type ParseOutcome, parseText } from "./parser.js";
import type { CompiledPlan } from "./plan.js";
import { render } from "./printer.js";

export interface FormatterOptions {
  zone?: string;
  locale?: string | LocaleNames;
  calendar?: string | CalendarSystem;
  pivotYear?: number | null;
}

export type ParseResult =
  | { ok: true; instant: Temporal.Instant }
  | { ok: false; error: TimeFormatError };

function resolveZone(zone: string, calendar: CalendarSystem): string {
  const resolved = calendar.resolveZone(zone);
  if (resolved === null) throw new ConfigError(`unknown time zone '${zone}'`);
  return resolved;
}

function resolveLocale(locale: string | LocaleNames): LocaleNames {
  return typeof locale === "string" ? localeNames(locale) : locale;
}

function resolveCalendar(calendar: string | CalendarSystem): CalendarSystem {
  if (typeof calendar !== "string") return calendar;
  return calendar === isoCalendar.id ? isoCalendar : new TemporalCalendarSystem(calendar);
}

function checkPivotYear(pivotYear: number | null): number | null {
  if (pivotYear !== null && !Number.isSafeInteger(pivotYear)) {
    throw new ConfigError(`pivot year must be an integer, got ${pivotYear}`);
  }
  return pivotYear;
}

/**
 * A compiled layout bound to a zone, locale, calendar system and pivot year.
 * Instances never change; every `with*` method returns a new formatter.
 */
export class Formatter {
  readonly plan: CompiledPlan;
  readonly zone: string;
  readonly locale: LocaleNames;
  readonly calendar: CalendarSystem;
  readonly pivotYear: number | null;

  private constructor(
    plan: CompiledPlan,
    zone: string,
    locale: LocaleNames,
    calendar: CalendarSystem,
    pivotYear: number | null,
  ) {
    this.plan = plan;
    this.zone = zone;
    this.locale = locale;
    this.calendar = calendar;
    this.pivotYear = pivotYear;
    Object.freeze(this);
  }

  /** Compile a pattern such as `yyyy-MM-dd'T'HH:mm`. */
  static compile(pattern: string, options: FormatterOptions = {}): Formatter {
    return Formatter.fromPlan(compilePattern(pattern), options);
  }

  /** Bind an already compiled plan. */
  static fromPlan(plan: CompiledPlan, options: FormatterOptions = {}): Formatter {
    const calendar = resolveCalendar(options.calendar ?? Default.calendar);
    return new Formatter(
      plan,
      resolveZone(options.zone ?? Default.zone, calendar),
      resolveLocale(options.locale ?? Default.locale),
      calendar,
      checkPivotYear(options.pivotYear ?? null),
    );
  }

  /** Check if a pattern compiles. */
  static validate(pattern: string): boolean {
    try {
      compilePattern(pattern);
      return true;
    } catch (err) {
      if (err instanceof TimeFormatError) return false;
      throw err;
    }
  }

  get canPrint(): boolean {
    return this.plan.canPrint;
  }

  get canParse(): boolean {
    return this.plan.canParse;
  }

  withZone(zone: string): Formatter {
    return new Formatter(
      this.plan,
      resolveZone(zone, this.calendar),
      this.locale,
      this.calendar,
      this.pivotYear,
    );
  }

  withLocale(locale: string | LocaleNames): Formatter {
    return new Formatter(
      this.plan,
      this.zone,
      resolveLocale(locale),
      this.calendar,
      this.pivotYear,
    );
  }

  withChronology(calendar: string | CalendarSystem): Formatter {
    const resolved = resolveCalendar(calendar);
    return new Formatter(
      this.plan,
      resolveZone(this.zone, resolved),
      this.locale,
      resolved,
      this.pivotYear,
    );
  }

  withPivotYear(pivotYear: number | null): Formatter {
    return new Formatter(
      this.plan,
      this.zone,
      this.locale,
      this.calendar,
      checkPivotYear(pivotYear),
    );
  }

  private context(): ParseContext {
    return {
      zone: this.zone,
      locale: this.locale,
      calendar: this.calendar,
      pivotYear: this.pivotYear,
    };
  }

  /** Render an instant, or the instant of a zoned date-time, in this formatter's zone. */
  print(instant: Temporal.Instant | Temporal.ZonedDateTime): string {
    const target = instant instanceof Temporal.ZonedDateTime ? instant.toInstant() : instant;
    return render(this.plan, target, this.context());
  }

  /** Parse the whole of `text`. */
  parse(text: string): Temporal.Instant {
    return parseText(this.plan, text, this.context()).instant;
  }

  /**
   * Parse from `start`, stopping where the layout ends.
   * Returns the instant and the index just past the consumed text.
   */
  parsePrefix(text: string, start = 0): { instant: Temporal.Instant; position: number } {
    const { instant, position } = parseText(this.plan, text, this.context(), {
      start,
      partial: true,
    });
    return { instant, position };
  }

  /** Parse the whole of `text`, keeping the zone read from it or this formatter's zone. */
  parseZoned(text: string): Temporal.ZonedDateTime {
    const outcome: ParseOutcome = parseText(this.plan, text, this.context());
    return outcome.instant.toZonedDateTimeISO(outcome.zone ?? this.zone);
  }

  /** Like `parse`, but returns failures as a value. */
  tryParse(text: string): ParseResult {
    try {
      return { ok: true, instant: this.parse(text) };
    } catch (err) {
      if (err instanceof TimeFormatError) return { ok: false, error: err };
      throw err;
    }
  }

  /** Whether both formatters have the same plan, capabilities and settings. */
  equals(other: Formatter): boolean {
    return (
      this.canPrint === other.canPrint &&
      this.canParse === other.canParse &&
      this.zone === other.zone &&
      this.locale.id === other.locale.id &&
      this.calendar.id === other.calendar.id &&
      this.pivotYear === other.pivotYear &&
      this.toString() === other.toString()
    );
  }

  /** Canonical pattern of this formatter's plan. */
  toString(): string {
    return display(this.plan);
  }
}
