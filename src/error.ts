/** Character range within a pattern or input string. */
export interface Span {
  start: number;
  end: number;
}

export type TimeFormatErrorKind =
  | "pattern"
  | "parse"
  | "trailing"
  | "fields"
  | "noMatch"
  | "unsupported"
  | "config";

/** Base class of every error raised by chronofmt. */
export class TimeFormatError extends Error {
  readonly kind: TimeFormatErrorKind;
  readonly span?: Span;
  readonly input?: string;

  constructor(
    kind: TimeFormatErrorKind,
    message: string,
    span?: Span,
    input?: string,
  ) {
    super(message);
    this.name = "TimeFormatError";
    this.kind = kind;
    this.span = span;
    this.input = input;
  }

  displayRich(): string {
    if (this.span && this.input !== undefined) {
      let out = `error: ${this.message}\n`;
      out += `  ${this.input}\n`;
      const padding = " ".repeat(this.span.start + 2);
      const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
      out += padding + underline;
      return out;
    }
    return `error: ${this.message}`;
  }
}

/** Malformed pattern string. */
export class PatternError extends TimeFormatError {
  constructor(message: string, span: Span, pattern: string) {
    super("pattern", message, span, pattern);
    this.name = "PatternError";
  }
}

/** Input text does not match the plan at `position`. */
export class ParseError extends TimeFormatError {
  readonly position: number;
  readonly expected: string;

  constructor(
    expected: string,
    position: number,
    input: string,
    kind: TimeFormatErrorKind = "parse",
    message = `expected ${expected} at position ${position}`,
  ) {
    super(kind, message, { start: position, end: position + 1 }, input);
    this.name = "ParseError";
    this.position = position;
    this.expected = expected;
  }
}

/** The plan matched, but text remains after it. */
export class TrailingInputError extends ParseError {
  constructor(position: number, input: string) {
    super(
      "end of input",
      position,
      input,
      "trailing",
      `unexpected trailing input '${input.slice(position)}' at position ${position}`,
    );
    this.name = "TrailingInputError";
  }
}

/** Parsed fields do not form a valid calendar instant. */
export class InvalidFieldsError extends TimeFormatError {
  constructor(message: string, input?: string) {
    super("fields", message, undefined, input);
    this.name = "InvalidFieldsError";
  }
}

/** Best-effort parsing tried every candidate layout without success. */
export class NoMatchError extends TimeFormatError {
  constructor(input: string) {
    super("noMatch", `no built-in layout matches '${input}'`, undefined, input);
    this.name = "NoMatchError";
  }
}

/** A formatter was asked to print or parse with a plan that cannot. */
export class UnsupportedError extends TimeFormatError {
  constructor(message: string) {
    super("unsupported", message);
    this.name = "UnsupportedError";
  }
}

/** Invalid formatter configuration: zone, locale, calendar or pivot year. */
export class ConfigError extends TimeFormatError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}
