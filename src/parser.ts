// Walks a compiled plan against input text, then resolves the
// collected fields into an instant through the calendar system.

import { Temporal } from "@js-temporal/polyfill";
import type { DateFields, FieldValues } from "./calendar.js";
import {
  InvalidFieldsError,
  ParseError,
  TrailingInputError,
  UnsupportedError,
} from "./error.js";
import type { LocaleNames } from "./locale.js";
import type { CompiledPlan, Directive, FieldKind, FieldStyle, Instruction } from "./plan.js";
import type { PrintContext } from "./printer.js";

export interface ParseContext extends PrintContext {
  /** Century window anchor for two-digit years; null means the current year. */
  pivotYear: number | null;
}

export interface ParseOptions {
  /** Index in the text to start at. */
  start?: number;
  /** Accept a match that leaves text unconsumed. */
  partial?: boolean;
}

export interface ParseOutcome {
  instant: Temporal.Instant;
  /** Index just past the last consumed character. */
  position: number;
  /** Zone id read from the text, if the plan has one. */
  zone: string | null;
}

export interface ParsedFields {
  fields: Partial<Record<FieldKind, number>>;
  zone?: string;
}

const FIELD_LABELS: Record<FieldKind, string> = {
  era: "era",
  yearOfEra: "year of era",
  year: "year",
  weekyear: "week-based year",
  weekOfWeekyear: "week of year",
  dayOfWeek: "day of week",
  dayOfYear: "day of year",
  monthOfYear: "month",
  dayOfMonth: "day of month",
  halfdayOfDay: "AM/PM marker",
  hourOfHalfday: "hour",
  clockhourOfHalfday: "hour",
  hourOfDay: "hour",
  clockhourOfDay: "hour",
  minuteOfHour: "minute",
  secondOfMinute: "second",
  fractionOfSecond: "fraction of second",
  zoneOffset: "UTC offset",
  zoneId: "time zone id",
  zoneName: "time zone name",
};

function euclideanMod(a: number, b: number): number {
  return ((a % b) + b) % b;
}

/** Place a two-digit year in the 100-year window ending at `pivot`. */
export function resolveTwoDigitYear(value: number, pivot: number): number {
  const low = pivot - 99;
  return low + euclideanMod(value - low, 100);
}

class TextParser {
  private text: string;
  private ctx: ParseContext;
  pos: number;
  bucket: ParsedFields;

  constructor(text: string, ctx: ParseContext, pos: number, bucket: ParsedFields) {
    this.text = text;
    this.ctx = ctx;
    this.pos = pos;
    this.bucket = bucket;
  }

  error(expected: string, position = this.pos): ParseError {
    return new ParseError(expected, position, this.text);
  }

  private fork(): TextParser {
    return new TextParser(this.text, this.ctx, this.pos, {
      fields: { ...this.bucket.fields },
      zone: this.bucket.zone,
    });
  }

  private adopt(other: TextParser): void {
    this.pos = other.pos;
    this.bucket = other.bucket;
  }

  run(instructions: readonly Instruction[]): void {
    for (const ins of instructions) {
      switch (ins.type) {
        case "literal":
          this.parseLiteral(ins.text);
          break;
        case "field":
          this.parseField(ins.directive);
          break;
        case "optional":
          this.parseOptional(ins.instructions);
          break;
        case "choice":
          this.parseChoice(ins.branches);
          break;
      }
    }
  }

  private parseLiteral(literal: string): void {
    if (!this.text.startsWith(literal, this.pos)) {
      throw this.error(`'${literal}'`);
    }
    this.pos += literal.length;
  }

  private parseOptional(instructions: readonly Instruction[]): void {
    const sub = this.fork();
    try {
      sub.run(instructions);
    } catch (err) {
      if (err instanceof ParseError) return; // section absent
      throw err;
    }
    this.adopt(sub);
  }

  private parseChoice(branches: readonly (readonly Instruction[])[]): void {
    let best: TextParser | null = null;
    let furthest: ParseError | null = null;
    for (const branch of branches) {
      const sub = this.fork();
      try {
        sub.run(branch);
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        if (furthest === null || err.position > furthest.position) furthest = err;
        continue;
      }
      if (best === null || sub.pos > best.pos) best = sub;
    }
    if (best === null) throw furthest ?? this.error("one of several layouts");
    this.adopt(best);
  }

  private parseField(directive: Directive): void {
    const style = directive.style;
    const field = directive.field;
    switch (style.type) {
      case "numeric":
        this.bucket.fields[field] = this.parseNumber(field, style);
        break;
      case "twoDigitYear":
        this.bucket.fields[field] = this.parseTwoDigitYear(field, style.fixed);
        break;
      case "fraction":
        this.bucket.fields[field] = this.parseFraction(style);
        break;
      case "text":
        this.bucket.fields[field] = this.parseName(field);
        break;
      case "offset":
        this.bucket.fields[field] = this.parseOffset();
        break;
      case "zoneId":
        this.bucket.zone = this.parseZoneId();
        break;
      case "zoneName":
        throw new UnsupportedError("time zone names cannot be parsed");
    }
  }

  private readDigits(max: number): string {
    const start = this.pos;
    while (this.pos < this.text.length && this.pos - start < max && isDigit(this.text[this.pos])) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  private readSign(): number {
    const ch = this.text[this.pos];
    if ((ch === "-" || ch === "+") && isDigit(this.text[this.pos + 1] ?? "")) {
      this.pos++;
      return ch === "-" ? -1 : 1;
    }
    return 0;
  }

  private parseNumber(field: FieldKind, style: Extract<FieldStyle, { type: "numeric" }>): number {
    const start = this.pos;
    const sign = style.signed ? this.readSign() : 0;
    const digitsAt = this.pos;
    const digits = this.readDigits(style.maxDigits);
    const needed = style.fixed ? style.maxDigits : 1;
    if (digits.length < needed) {
      this.pos = start;
      const count = style.fixed ? `${needed} digits` : "digits";
      throw this.error(`${count} for ${FIELD_LABELS[field]}`, digitsAt);
    }
    const value = Number(digits);
    return sign < 0 ? -value : value;
  }

  private parseTwoDigitYear(field: FieldKind, fixed: boolean): number {
    const start = this.pos;
    const sign = fixed ? 0 : this.readSign();
    const digits = this.readDigits(fixed ? 2 : 9);
    if (digits.length === 0 || (fixed && digits.length < 2)) {
      this.pos = start;
      throw this.error(`2 digits for ${FIELD_LABELS[field]}`);
    }
    const value = Number(digits);
    if (sign === 0 && digits.length === 2) {
      return resolveTwoDigitYear(value, this.pivotYear());
    }
    // anything but exactly two unsigned digits is taken as the full year
    return sign < 0 ? -value : value;
  }

  private pivotYear(): number {
    return this.ctx.pivotYear ?? Temporal.Now.plainDateISO(this.ctx.zone).year;
  }

  private parseFraction(style: Extract<FieldStyle, { type: "fraction" }>): number {
    const digits = this.readDigits(style.maxDigits);
    const needed = style.fixed ? style.maxDigits : 1;
    if (digits.length < needed) {
      this.pos -= digits.length;
      throw this.error(`digits for ${FIELD_LABELS.fractionOfSecond}`);
    }
    return Number(digits.slice(0, 9).padEnd(9, "0"));
  }

  private parseName(field: FieldKind): number {
    let bestLength = 0;
    let bestValue = -1;
    for (const [name, value] of nameCandidates(field, this.ctx.locale)) {
      if (name.length <= bestLength) continue;
      const slice = this.text.slice(this.pos, this.pos + name.length);
      if (slice.toLowerCase() === name.toLowerCase()) {
        bestLength = name.length;
        bestValue = value;
      }
    }
    if (bestLength === 0) throw this.error(FIELD_LABELS[field]);
    this.pos += bestLength;
    return bestValue;
  }

  private parseOffset(): number {
    const start = this.pos;
    const ch = this.text[this.pos];
    if (ch === "Z") {
      this.pos++;
      return 0;
    }
    if (ch !== "+" && ch !== "-") throw this.error(FIELD_LABELS.zoneOffset);
    this.pos++;

    const hours = this.readDigits(2);
    if (hours.length < 2) {
      this.pos = start;
      throw this.error(FIELD_LABELS.zoneOffset);
    }
    const parts = [Number(hours)];
    const colon = this.text[this.pos] === ":";
    while (parts.length < 3) {
      const at = this.pos + (colon ? 1 : 0);
      if (colon && this.text[this.pos] !== ":") break;
      if (!isDigit(this.text[at] ?? "") || !isDigit(this.text[at + 1] ?? "")) break;
      parts.push(Number(this.text.slice(at, at + 2)));
      this.pos = at + 2;
    }
    const [h, m = 0, s = 0] = parts;
    if (h > 18 || m > 59 || s > 59) {
      this.pos = start;
      throw this.error(`valid ${FIELD_LABELS.zoneOffset}`);
    }
    const seconds = h * 3600 + m * 60 + s;
    return (ch === "-" ? -seconds : seconds) * 1e9;
  }

  private parseZoneId(): string {
    let end = this.pos;
    while (end < this.text.length && isZoneChar(this.text[end])) end++;
    // longest prefix of the run that names a zone
    for (; end > this.pos; end--) {
      const zone = this.ctx.calendar.resolveZone(this.text.slice(this.pos, end));
      if (zone !== null) {
        this.pos = end;
        return zone;
      }
    }
    throw this.error(FIELD_LABELS.zoneId);
  }
}

function nameCandidates(field: FieldKind, locale: LocaleNames): [string, number][] {
  const out: [string, number][] = [];
  const add = (names: readonly string[], base: number) =>
    names.forEach((name, i) => out.push([name, i + base]));
  switch (field) {
    case "monthOfYear":
      add(locale.months.long, 1);
      add(locale.months.short, 1);
      break;
    case "dayOfWeek":
      add(locale.weekdays.long, 1);
      add(locale.weekdays.short, 1);
      break;
    case "halfdayOfDay":
      add(locale.meridiems, 0);
      break;
    case "era":
      add(locale.eras.long, 0);
      add(locale.eras.short, 0);
      break;
  }
  return out;
}

function checkRange(value: number, min: number, max: number, field: FieldKind): number {
  if (value < min || value > max) {
    throw new InvalidFieldsError(`${FIELD_LABELS[field]} ${value} is outside ${min}..${max}`);
  }
  return value;
}

function resolveYear(f: ParsedFields["fields"]): number {
  if (f.yearOfEra !== undefined) {
    const yearOfEra = checkRange(f.yearOfEra, 1, Number.MAX_SAFE_INTEGER, "yearOfEra");
    return (f.era ?? 1) === 0 ? 1 - yearOfEra : yearOfEra;
  }
  return f.year ?? 1970;
}

function resolveHour(f: ParsedFields["fields"]): number {
  if (f.hourOfDay !== undefined) return f.hourOfDay;
  if (f.clockhourOfDay !== undefined) {
    return checkRange(f.clockhourOfDay, 1, 24, "clockhourOfDay") % 24;
  }
  let hour = 0;
  if (f.clockhourOfHalfday !== undefined) {
    hour = checkRange(f.clockhourOfHalfday, 1, 12, "clockhourOfHalfday") % 12;
  } else if (f.hourOfHalfday !== undefined) {
    hour = checkRange(f.hourOfHalfday, 0, 11, "hourOfHalfday");
  }
  return hour + 12 * (f.halfdayOfDay ?? 0);
}

// raw parsed fields to calendar field values, with defaults
function resolveFields(bucket: ParsedFields): FieldValues {
  const f = bucket.fields;
  let date: DateFields;
  if (f.weekyear !== undefined || f.weekOfWeekyear !== undefined) {
    date = {
      type: "week",
      weekyear: f.weekyear ?? resolveYear(f),
      week: f.weekOfWeekyear ?? 1,
      dayOfWeek: f.dayOfWeek ?? 1,
    };
  } else if (f.dayOfYear !== undefined) {
    date = { type: "ordinal", year: resolveYear(f), dayOfYear: f.dayOfYear };
  } else {
    date = {
      type: "calendar",
      year: resolveYear(f),
      month: f.monthOfYear ?? 1,
      day: f.dayOfMonth ?? 1,
    };
  }

  return {
    date,
    dayOfWeek: date.type === "week" ? undefined : f.dayOfWeek,
    hour: resolveHour(f),
    minute: f.minuteOfHour ?? 0,
    second: f.secondOfMinute ?? 0,
    nanosecond: f.fractionOfSecond ?? 0,
    offsetNanoseconds: f.zoneOffset,
  };
}

/** Parse `text` with `plan`, resolving the result through the calendar system. */
export function parseText(
  plan: CompiledPlan,
  text: string,
  ctx: ParseContext,
  options: ParseOptions = {},
): ParseOutcome {
  if (!plan.canParse) {
    throw new UnsupportedError("formatter prints time zone names and cannot parse");
  }
  const start = options.start ?? 0;
  if (!Number.isInteger(start) || start < 0 || start > text.length) {
    throw new ParseError("a start position within the text", start, text);
  }

  const parser = new TextParser(text, ctx, start, { fields: {} });
  parser.run(plan.instructions);
  if (!options.partial && parser.pos < text.length) {
    throw new TrailingInputError(parser.pos, text);
  }

  const zone = parser.bucket.zone ?? null;
  const instant = ctx.calendar.instantOf(resolveFields(parser.bucket), zone ?? ctx.zone);
  return { instant, position: parser.pos, zone };
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isZoneChar(ch: string): boolean {
  return isDigit(ch) || (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || "_/+-:".includes(ch);
}
