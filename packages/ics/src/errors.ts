/**
 * @icsjson/ics -- Decode error types.
 *
 * Every error is terminal for the decode call that raised it: folded lines
 * and nested BEGIN/END blocks make it unsafe to skip a bad line and keep
 * going.
 */

/** Discriminator shared by all decode errors. */
export type IcsErrorKind = "structure" | "line-format" | "value-format";

/** Base class for all decode errors. */
export class IcsDecodeError extends Error {
  readonly kind: IcsErrorKind;
  /** Error text without the line suffix. */
  readonly detail: string;
  /** 1-based physical line number, when known. */
  readonly line?: number;

  constructor(detail: string, kind: IcsErrorKind, line?: number) {
    super(line === undefined ? detail : `${detail} (line ${line})`);
    this.name = "IcsDecodeError";
    this.kind = kind;
    this.detail = detail;
    this.line = line;
  }
}

/** Envelope missing or mismatched, or input ended inside a block. */
export class IcsStructureError extends IcsDecodeError {
  constructor(detail: string, line?: number) {
    super(detail, "structure", line);
    this.name = "IcsStructureError";
  }
}

/** Blank, overlong, or colon-less line. */
export class IcsLineFormatError extends IcsDecodeError {
  constructor(detail: string, line?: number) {
    super(detail, "line-format", line);
    this.name = "IcsLineFormatError";
  }
}

/** DTSTART/DTEND value that is not a YYYYMMDDThhmmssZ timestamp. */
export class IcsValueFormatError extends IcsDecodeError {
  constructor(detail: string, line?: number) {
    super(detail, "value-format", line);
    this.name = "IcsValueFormatError";
  }
}

/** Type guard for values caught from decode()/decodeStream(). */
export function isIcsDecodeError(err: unknown): err is IcsDecodeError {
  return err instanceof IcsDecodeError;
}
