import { describe, it, expect } from "vitest";
import { parseTimestamp, formatTimestamp } from "./timestamp";
import { IcsValueFormatError } from "./errors";

// ---------------------------------------------------------------------------
// parseTimestamp
// ---------------------------------------------------------------------------

describe("parseTimestamp", () => {
  it("parses a UTC date-time", () => {
    expect(parseTimestamp("20110601T100000Z").getTime()).toBe(Date.UTC(2011, 5, 1, 10, 0, 0));
  });

  it("parses the last second of a year", () => {
    expect(parseTimestamp("20111231T235959Z").toISOString()).toBe("2011-12-31T23:59:59.000Z");
  });

  it("accepts February 29 in a leap year", () => {
    expect(parseTimestamp("20120229T000000Z").toISOString()).toBe("2012-02-29T00:00:00.000Z");
  });

  it("keeps two-digit years literal", () => {
    expect(parseTimestamp("00500101T000000Z").getUTCFullYear()).toBe(50);
  });

  it("rejects a value missing the seconds", () => {
    expect(() => parseTimestamp("20110601T1000Z")).toThrow(IcsValueFormatError);
    expect(() => parseTimestamp("20110601T1000Z")).toThrow(
      'bad timestamp "20110601T1000Z", expected YYYYMMDDThhmmssZ',
    );
  });

  it("rejects floating times without Z", () => {
    expect(() => parseTimestamp("20110601T100000")).toThrow(IcsValueFormatError);
  });

  it("rejects a lowercase z", () => {
    expect(() => parseTimestamp("20110601t100000z")).toThrow(IcsValueFormatError);
  });

  it("rejects DATE values", () => {
    expect(() => parseTimestamp("20110601")).toThrow(IcsValueFormatError);
  });

  it("rejects surrounding whitespace", () => {
    expect(() => parseTimestamp(" 20110601T100000Z")).toThrow(IcsValueFormatError);
  });

  it("appends the line number to the message", () => {
    expect(() => parseTimestamp("soon", 7)).toThrow(
      'bad timestamp "soon", expected YYYYMMDDThhmmssZ (line 7)',
    );
  });

  it.each([
    ["20111301T000000Z", "month"],
    ["20110001T000000Z", "month"],
    ["20110230T000000Z", "day"],
    ["20110229T000000Z", "day"],
    ["20110600T000000Z", "day"],
    ["20110601T240000Z", "hour"],
    ["20110601T106000Z", "minute"],
    ["20110601T100060Z", "second"],
  ])("rejects %s (%s out of range)", (value, field) => {
    expect(() => parseTimestamp(value)).toThrow(`bad timestamp "${value}": ${field} out of range`);
  });
});

// ---------------------------------------------------------------------------
// formatTimestamp
// ---------------------------------------------------------------------------

describe("formatTimestamp", () => {
  it("formats at second precision with a Z suffix", () => {
    expect(formatTimestamp(new Date(Date.UTC(2011, 5, 1, 10, 0, 0)))).toBe("2011-06-01T10:00:00Z");
  });

  it("formats a parsed timestamp back to ISO 8601", () => {
    expect(formatTimestamp(parseTimestamp("20110501T083015Z"))).toBe("2011-05-01T08:30:15Z");
  });
});
