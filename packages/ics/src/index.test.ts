import { describe, it, expect } from "vitest";
import {
  DEFAULT_MAX_LINE_LENGTH,
  TIMESTAMP_LAYOUT,
  IcsDecodeError,
  IcsStructureError,
  IcsLineFormatError,
  IcsValueFormatError,
  isIcsDecodeError,
  LineReader,
  parseTimestamp,
  formatTimestamp,
  compareEvents,
  sortEvents,
  decode,
  decodeStream,
} from "./index";

describe("@icsjson/ics", () => {
  it("exports the default line limit", () => {
    expect(DEFAULT_MAX_LINE_LENGTH).toBe(4095);
    expect(TIMESTAMP_LAYOUT).toBe("YYYYMMDDThhmmssZ");
  });

  it("exports the decoder entry points", () => {
    expect(decode).toBeDefined();
    expect(decodeStream).toBeDefined();
    expect(LineReader).toBeDefined();
    expect(parseTimestamp).toBeDefined();
    expect(formatTimestamp).toBeDefined();
    expect(compareEvents).toBeDefined();
    expect(sortEvents).toBeDefined();
  });

  it("exports an error hierarchy rooted at IcsDecodeError", () => {
    expect(new IcsStructureError("x")).toBeInstanceOf(IcsDecodeError);
    expect(new IcsLineFormatError("x")).toBeInstanceOf(IcsDecodeError);
    expect(new IcsValueFormatError("x")).toBeInstanceOf(IcsDecodeError);
  });
});

describe("error types", () => {
  it("sets name, kind, detail and line", () => {
    const err = new IcsLineFormatError("unexpected blank line", 3);
    expect(err.name).toBe("IcsLineFormatError");
    expect(err.kind).toBe("line-format");
    expect(err.detail).toBe("unexpected blank line");
    expect(err.line).toBe(3);
    expect(err.message).toBe("unexpected blank line (line 3)");
  });

  it("omits the line suffix when no line is known", () => {
    const err = new IcsStructureError("unexpected end of input");
    expect(err.message).toBe("unexpected end of input");
    expect(err.line).toBeUndefined();
  });

  it("narrows unknown values with isIcsDecodeError", () => {
    expect(isIcsDecodeError(new IcsValueFormatError("bad"))).toBe(true);
    expect(isIcsDecodeError(new Error("other"))).toBe(false);
    expect(isIcsDecodeError("bad")).toBe(false);
  });
});
