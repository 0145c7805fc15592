import type { Directive, FieldKind, FieldStyle } from "./plan.js";

interface DirectiveRule {
  field: FieldKind;
  /** Style for a run of `count` letters, or null if the run is invalid. */
  style(count: number): FieldStyle | null;
}

function numeric(naturalMax: number, signed = false) {
  return (count: number): FieldStyle => ({
    type: "numeric",
    minDigits: count,
    maxDigits: Math.max(count, naturalMax),
    signed,
    fixed: false,
  });
}

function yearLike(signed: boolean) {
  return (count: number): FieldStyle =>
    count === 2 ? { type: "twoDigitYear", fixed: false } : numeric(9, signed)(count);
}

function text(longFrom: number) {
  return (count: number): FieldStyle => ({
    type: "text",
    width: count >= longFrom ? "long" : "short",
  });
}

const DIRECTIVES: Record<string, DirectiveRule> = {
  G: { field: "era", style: text(4) },
  y: { field: "year", style: yearLike(true) },
  Y: { field: "yearOfEra", style: yearLike(false) },
  x: { field: "weekyear", style: yearLike(true) },
  w: { field: "weekOfWeekyear", style: numeric(2) },
  e: { field: "dayOfWeek", style: numeric(1) },
  E: { field: "dayOfWeek", style: text(4) },
  D: { field: "dayOfYear", style: numeric(3) },
  M: {
    field: "monthOfYear",
    style: (count) => (count >= 3 ? text(4)(count) : numeric(2)(count)),
  },
  d: { field: "dayOfMonth", style: numeric(2) },
  a: { field: "halfdayOfDay", style: text(Number.POSITIVE_INFINITY) },
  K: { field: "hourOfHalfday", style: numeric(2) },
  h: { field: "clockhourOfHalfday", style: numeric(2) },
  H: { field: "hourOfDay", style: numeric(2) },
  k: { field: "clockhourOfDay", style: numeric(2) },
  m: { field: "minuteOfHour", style: numeric(2) },
  s: { field: "secondOfMinute", style: numeric(2) },
  S: {
    field: "fractionOfSecond",
    style: (count) => ({
      type: "fraction",
      digits: count,
      // digits past the ninth are read and dropped
      maxDigits: Math.max(count, 9),
      fixed: false,
    }),
  },
  Z: {
    field: "zoneOffset",
    style: (count) =>
      count >= 3
        ? { type: "zoneId" }
        : { type: "offset", colon: count === 2, zulu: false, minutes: "always" },
  },
  X: {
    field: "zoneOffset",
    style: (count) => {
      if (count > 3) return null;
      return {
        type: "offset",
        colon: count === 3,
        zulu: true,
        minutes: count === 1 ? "nonZero" : "always",
      };
    },
  },
  z: {
    field: "zoneName",
    style: (count) => ({ type: "zoneName", width: count >= 4 ? "long" : "short" }),
  },
};

/** Whether `letter` is a pattern letter with a directive. */
export function isDirectiveLetter(letter: string): boolean {
  return Object.hasOwn(DIRECTIVES, letter);
}

/**
 * Look up the directive for a run of `count` copies of `letter`.
 * Returns null when the letter is unknown or the run length is not allowed.
 */
export function lookupDirective(letter: string, count: number): Directive | null {
  if (!isDirectiveLetter(letter)) return null;
  const rule = DIRECTIVES[letter];
  const style = rule.style(count);
  if (style === null) return null;
  // zone ids are a different field from offsets
  const field = style.type === "zoneId" ? "zoneId" : rule.field;
  return { letter, count, field, style };
}
