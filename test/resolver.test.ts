import { afterEach, describe, expect, it, vi } from "vitest";
import { configure, NoMatchError, parseAny, TimeFormatError } from "../src/index.js";

describe("parseAny", () => {
  const cases: [string, string][] = [
    ["2010-03-11", "2010-03-11T00:00:00Z"],
    ["20100311", "2010-03-11T00:00:00Z"],
    ["2010", "2010-01-01T00:00:00Z"],
    ["2010-070", "2010-03-11T00:00:00Z"],
    ["2010-W10-4", "2010-03-11T00:00:00Z"],
    ["2010-03-11T00:00:00.000Z", "2010-03-11T00:00:00Z"],
    ["2010-03-11T05:30+05:30", "2010-03-11T00:00:00Z"],
    ["T10:15:30Z", "1970-01-01T10:15:30Z"],
    ["10:15", "1970-01-01T10:15:00Z"],
    ["Thu, 11 Mar 2010 00:00:00 +0000", "2010-03-11T00:00:00Z"],
  ];

  for (const [input, expected] of cases) {
    it(`reads ${input}`, () => {
      expect(parseAny(input).toString()).toBe(expected);
    });
  }

  it("gives the same answer every time", () => {
    const first = parseAny("2010-03-11T00:00:00.000Z");
    for (let i = 0; i < 5; i++) {
      expect(parseAny("2010-03-11T00:00:00.000Z").equals(first)).toBe(true);
    }
  });

  it("fails with NoMatchError", () => {
    expect(() => parseAny("not a date")).toThrow(NoMatchError);
    expect(() => parseAny("")).toThrow(NoMatchError);
  });

  it("reports the input", () => {
    try {
      parseAny("2010-02-30");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(TimeFormatError);
      if (err instanceof TimeFormatError) {
        expect(err.kind).toBe("noMatch");
        expect(err.message).toBe("no built-in layout matches '2010-02-30'");
      }
    }
  });
});

describe("debug logging", () => {
  afterEach(() => {
    configure({ debug: false });
    vi.restoreAllMocks();
  });

  it("stays quiet by default", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    parseAny("2010-03-11");
    expect(debug).not.toHaveBeenCalled();
  });

  it("names each layout tried once switched on", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    configure({ debug: true });
    parseAny("20100311");
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("chronofmt:", "'20100311' matched basic-date");
  });
});
