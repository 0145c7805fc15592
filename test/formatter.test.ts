import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import {
  compile,
  ConfigError,
  Formatter,
  formatter,
  parse,
  print,
  TemporalCalendarSystem,
  withChronology,
  withLocale,
  withPivotYear,
  withZone,
} from "../src/index.js";

const instant = Temporal.Instant.from("2010-10-03T14:05:09.123Z");

describe("Formatter", () => {
  it("defaults to UTC, en-US, ISO and no fixed pivot", () => {
    const fmt = compile("yyyy-MM-dd");
    expect(fmt.zone).toBe("UTC");
    expect(fmt.locale.id).toBe("en-US");
    expect(fmt.calendar.id).toBe("iso8601");
    expect(fmt.pivotYear).toBeNull();
  });

  it("is frozen", () => {
    expect(Object.isFrozen(compile("yyyy"))).toBe(true);
  });

  it("prints its canonical pattern", () => {
    expect(compile("yyyy'-'MM").toString()).toBe("yyyy-MM");
  });

  it("reports capabilities", () => {
    const fmt = compile("yyyy");
    expect(fmt.canPrint).toBe(true);
    expect(fmt.canParse).toBe(true);
  });

  it("validates patterns", () => {
    expect(Formatter.validate("yyyy-MM-dd")).toBe(true);
    expect(Formatter.validate("yyyy-qq")).toBe(false);
    expect(Formatter.validate("'open")).toBe(false);
  });
});

// ===========================================================================
// Derived formatters
// ===========================================================================

describe("withZone", () => {
  it("returns a new formatter and leaves the original alone", () => {
    const utc = compile("HH:mm");
    const kolkata = utc.withZone("Asia/Kolkata");
    expect(kolkata).not.toBe(utc);
    expect(utc.zone).toBe("UTC");
    expect(utc.print(instant)).toBe("14:05");
    expect(kolkata.print(instant)).toBe("19:35");
  });

  it("accepts fixed offsets", () => {
    expect(compile("HH:mm XXX").withZone("+01:00").print(instant)).toBe("15:05 +01:00");
  });

  it("rejects unknown zones", () => {
    expect(() => compile("HH").withZone("Mars/Olympus_Mons")).toThrow(ConfigError);
    expect(() => compile("HH", { zone: "Nowhere" })).toThrow(ConfigError);
  });
});

describe("withLocale", () => {
  it("swaps the name tables", () => {
    const fmt = compile("MMMM").withLocale("en-GB");
    expect(fmt.locale.id).toBe("en-GB");
    expect(fmt.print(instant)).toBe("October");
  });

  it("rejects malformed tags", () => {
    expect(() => compile("MMMM").withLocale("not a locale!!")).toThrow(ConfigError);
  });
});

describe("withChronology", () => {
  it("accepts calendar ids", () => {
    const fmt = compile("yyyy-MM-dd").withChronology("gregory");
    expect(fmt.calendar.id).toBe("gregory");
    expect(fmt.print(instant)).toBe("2010-10-03");
  });

  it("accepts calendar systems", () => {
    const calendar = new TemporalCalendarSystem("iso8601");
    expect(compile("yyyy").withChronology(calendar).calendar).toBe(calendar);
  });

  it("rejects unknown calendars", () => {
    expect(() => compile("yyyy").withChronology("no-such-calendar")).toThrow(ConfigError);
  });
});

describe("withPivotYear", () => {
  it("changes how two-digit years parse", () => {
    const fmt = compile("yy");
    expect(fmt.withPivotYear(1950).parse("50").toString()).toBe("1950-01-01T00:00:00Z");
    expect(fmt.withPivotYear(2049).parse("50").toString()).toBe("1950-01-01T00:00:00Z");
    expect(fmt.withPivotYear(2050).parse("50").toString()).toBe("2050-01-01T00:00:00Z");
  });

  it("goes back to the current year with null", () => {
    expect(compile("yy", { pivotYear: 2000 }).withPivotYear(null).pivotYear).toBeNull();
  });

  it("rejects fractional pivots", () => {
    expect(() => compile("yy").withPivotYear(1999.5)).toThrow(ConfigError);
  });
});

// ===========================================================================
// Parsing helpers
// ===========================================================================

describe("tryParse", () => {
  const fmt = compile("yyyy-MM-dd");

  it("returns the instant", () => {
    const result = fmt.tryParse("2010-10-03");
    expect(result.ok && result.instant.toString()).toBe("2010-10-03T00:00:00Z");
  });

  it("returns the error", () => {
    const result = fmt.tryParse("2010-10-03!");
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.kind).toBe("trailing");
  });
});

describe("parseZoned", () => {
  it("falls back to the formatter zone", () => {
    const fmt = compile("yyyy-MM-dd HH:mm", { zone: "Europe/Paris" });
    expect(fmt.parseZoned("2010-10-03 16:05").toString()).toBe(
      "2010-10-03T16:05:00+02:00[Europe/Paris]",
    );
  });

  it("reports the same zone id the formatter holds and prints", () => {
    // Asia/Kolkata and Asia/Calcutta name one zone; Temporal picks one of them
    const fmt = compile("yyyy-MM-dd HH:mm ZZZ", { zone: "Asia/Kolkata" });
    const zoned = fmt.parseZoned(`2010-10-03 19:35 ${fmt.zone}`);
    expect(zoned.toString()).toBe(`2010-10-03T19:35:00+05:30[${fmt.zone}]`);
    expect(fmt.print(zoned)).toBe(`2010-10-03 19:35 ${fmt.zone}`);
    expect(compile("HH:mm", { zone: "Asia/Calcutta" }).zone).toBe(fmt.zone);
  });
});

// ===========================================================================
// Equality
// ===========================================================================

describe("equals", () => {
  it("holds for the same pattern and settings", () => {
    expect(compile("yyyy-MM-dd").equals(compile("yyyy-MM-dd"))).toBe(true);
    expect(compile("yyyy'-'MM").equals(compile("yyyy-MM"))).toBe(true);
  });

  it("fails when any setting differs", () => {
    const fmt = compile("yyyy-MM-dd");
    expect(fmt.equals(fmt.withZone("Europe/Paris"))).toBe(false);
    expect(fmt.equals(fmt.withLocale("fr-FR"))).toBe(false);
    expect(fmt.equals(fmt.withPivotYear(2000))).toBe(false);
    expect(fmt.equals(compile("yyyy/MM/dd"))).toBe(false);
  });
});

// ===========================================================================
// Free functions
// ===========================================================================

describe("free functions", () => {
  it("mirror the methods", () => {
    const fmt = formatter("yyyy-MM-dd HH:mm", "Asia/Kolkata");
    expect(print(fmt, instant)).toBe("2010-10-03 19:35");
    expect(parse(fmt, "2010-10-03 19:35").toString()).toBe("2010-10-03T14:05:00Z");
    expect(withZone(fmt, "UTC").zone).toBe("UTC");
    expect(withLocale(fmt, "de-DE").locale.id).toBe("de-DE");
    expect(withChronology(fmt, "gregory").calendar.id).toBe("gregory");
    expect(withPivotYear(fmt, 1999).pivotYear).toBe(1999);
  });

  it("default to UTC", () => {
    expect(formatter("HH:mm").zone).toBe("UTC");
  });
});
