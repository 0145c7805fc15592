import type { Temporal } from "@js-temporal/polyfill";
import type { CalendarFields, CalendarSystem } from "./calendar.js";
import { UnsupportedError } from "./error.js";
import type { LocaleNames } from "./locale.js";
import type {
  CompiledPlan,
  Directive,
  FieldKind,
  FieldStyle,
  Instruction,
  NameWidth,
} from "./plan.js";

export interface PrintContext {
  zone: string;
  locale: LocaleNames;
  calendar: CalendarSystem;
}

/** Render `instant` with `plan`. Fails only for plans that cannot print. */
export function render(
  plan: CompiledPlan,
  instant: Temporal.Instant,
  ctx: PrintContext,
): string {
  if (!plan.canPrint) {
    throw new UnsupportedError("formatter has alternative layouts and can only parse");
  }
  const fields = ctx.calendar.fieldsOf(instant, ctx.zone);
  return renderInstructions(plan.instructions, fields, instant, ctx);
}

function renderInstructions(
  instructions: readonly Instruction[],
  fields: CalendarFields,
  instant: Temporal.Instant,
  ctx: PrintContext,
): string {
  let out = "";
  for (const ins of instructions) {
    switch (ins.type) {
      case "literal":
        out += ins.text;
        break;
      case "field":
        out += renderField(ins.directive, fields, instant, ctx);
        break;
      case "optional":
        // every field is known when printing, so optional sections always print
        out += renderInstructions(ins.instructions, fields, instant, ctx);
        break;
      case "choice":
        throw new UnsupportedError("cannot print a choice of layouts");
    }
  }
  return out;
}

function fieldValue(field: FieldKind, fields: CalendarFields): number {
  switch (field) {
    case "era":
      return fields.era;
    case "yearOfEra":
      return fields.yearOfEra;
    case "year":
      return fields.year;
    case "weekyear":
      return fields.weekyear;
    case "weekOfWeekyear":
      return fields.weekOfWeekyear;
    case "dayOfWeek":
      return fields.dayOfWeek;
    case "dayOfYear":
      return fields.dayOfYear;
    case "monthOfYear":
      return fields.month;
    case "dayOfMonth":
      return fields.day;
    case "halfdayOfDay":
      return fields.hour < 12 ? 0 : 1;
    case "hourOfHalfday":
      return fields.hour % 12;
    case "clockhourOfHalfday":
      return fields.hour % 12 || 12;
    case "hourOfDay":
      return fields.hour;
    case "clockhourOfDay":
      return fields.hour || 24;
    case "minuteOfHour":
      return fields.minute;
    case "secondOfMinute":
      return fields.second;
    case "fractionOfSecond":
      return fields.nanosecond;
    case "zoneOffset":
    case "zoneId":
    case "zoneName":
      return fields.offsetNanoseconds;
  }
}

function pad(value: number, width: number): string {
  const digits = String(Math.abs(value)).padStart(width, "0");
  return value < 0 ? `-${digits}` : digits;
}

function nameOf(
  field: FieldKind,
  value: number,
  width: NameWidth,
  locale: LocaleNames,
): string | undefined {
  switch (field) {
    case "monthOfYear":
      return locale.months[width][value - 1];
    case "dayOfWeek":
      return locale.weekdays[width][value - 1];
    case "halfdayOfDay":
      return locale.meridiems[value];
    case "era":
      return locale.eras[width][value];
    default:
      return undefined;
  }
}

export function formatOffset(
  offsetNanoseconds: number,
  style: Extract<FieldStyle, { type: "offset" }>,
): string {
  const total = Math.trunc(offsetNanoseconds / 1e9);
  if (total === 0 && style.zulu) return "Z";

  const abs = Math.abs(total);
  const hours = Math.floor(abs / 3600);
  const minutes = Math.floor((abs % 3600) / 60);
  const seconds = abs % 60;
  const sep = style.colon ? ":" : "";

  let out = (total < 0 ? "-" : "+") + pad(hours, 2);
  if (style.minutes === "always" || minutes !== 0 || seconds !== 0) {
    out += sep + pad(minutes, 2);
  }
  if (seconds !== 0) out += sep + pad(seconds, 2);
  return out;
}

function renderField(
  directive: Directive,
  fields: CalendarFields,
  instant: Temporal.Instant,
  ctx: PrintContext,
): string {
  const style = directive.style;
  const value = fieldValue(directive.field, fields);
  switch (style.type) {
    case "numeric":
      return pad(value, style.minDigits);
    case "twoDigitYear":
      return pad(((value % 100) + 100) % 100, 2);
    case "fraction":
      return String(value).padStart(9, "0").slice(0, style.digits).padEnd(style.digits, "0");
    case "text":
      return nameOf(directive.field, value, style.width, ctx.locale) ?? String(value);
    case "offset":
      return formatOffset(value, style);
    case "zoneId":
      return ctx.zone;
    case "zoneName":
      return ctx.locale.zoneName(ctx.zone, instant, style.width);
  }
}
