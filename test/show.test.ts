import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import { printers, showFormatters } from "../src/index.js";

describe("showFormatters", () => {
  const instant = Temporal.Instant.from("2010-10-03T14:05:09.123Z");

  it("writes one line per printing layout", () => {
    const written: string[] = [];
    const lines = showFormatters(instant, (line) => written.push(line));
    expect(lines).toEqual(written);
    expect(lines).toHaveLength(printers.length);
  });

  it("pads names into a column", () => {
    const lines = showFormatters(instant, () => {});
    expect(lines[0]).toBe(`${"basic-date".padEnd(40)}20101003`);
    expect(lines).toContain(`${"rfc822".padEnd(40)}Sun, 03 Oct 2010 14:05:09 +0000`);
  });
});
