// value.ts
//
// The closed set of values a node may carry, plus the coercers the typed
// accessors use. Coercers are Zod schemas so callers can pass their own
// (`z.enum([...])`, `z.string().url()`, ...) wherever a built-in one fits.

import { isValid, parse as parseWithFormat, parseISO } from "date-fns";
import * as z from "zod";
import { ConversionError } from "./errors.ts";

/* -------------------------------------------------------------------------- */
/* Duration                                                                   */
/* -------------------------------------------------------------------------- */

export interface DurationParts {
  readonly days?: number;
  readonly hours?: number;
  readonly minutes?: number;
  readonly seconds?: number;
  readonly milliseconds?: number;
}

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

/** Immutable, millisecond-precision span of time. Days are 24 hours. */
export class Duration {
  static readonly ZERO = new Duration(0);

  private constructor(readonly milliseconds: number) {}

  static fromMilliseconds(milliseconds: number): Duration {
    return milliseconds === 0 ? Duration.ZERO : new Duration(milliseconds);
  }

  static of(parts: DurationParts): Duration {
    return Duration.fromMilliseconds(
      (parts.days ?? 0) * MS_PER_DAY +
        (parts.hours ?? 0) * MS_PER_HOUR +
        (parts.minutes ?? 0) * MS_PER_MINUTE +
        (parts.seconds ?? 0) * MS_PER_SECOND +
        (parts.milliseconds ?? 0),
    );
  }

  equals(other: Duration): boolean {
    return this.milliseconds === other.milliseconds;
  }

  /** `2h0m0s`, `2m0s`, `1.5s`, `250ms`, `0s`. */
  toString(): string {
    const ms = this.milliseconds;
    if (ms === 0) return "0s";
    const sign = ms < 0 ? "-" : "";
    const abs = Math.abs(ms);
    if (abs < MS_PER_SECOND) return `${sign}${abs}ms`;

    const hours = Math.floor(abs / MS_PER_HOUR);
    const minutes = Math.floor((abs % MS_PER_HOUR) / MS_PER_MINUTE);
    const seconds = (abs % MS_PER_MINUTE) / MS_PER_SECOND;
    if (hours > 0) return `${sign}${hours}h${minutes}m${seconds}s`;
    if (minutes > 0) return `${sign}${minutes}m${seconds}s`;
    return `${sign}${seconds}s`;
  }

  toJSON(): string {
    return this.toString();
  }
}

/* -------------------------------------------------------------------------- */
/* Values                                                                     */
/* -------------------------------------------------------------------------- */

export type Scalar = string | number | boolean | Duration | Date;
export type Value = Scalar | readonly Value[];

export function isList(value: Value): value is readonly Value[] {
  return Array.isArray(value);
}

export function isValue(candidate: unknown): candidate is Value {
  switch (typeof candidate) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      if (candidate instanceof Duration || candidate instanceof Date) {
        return true;
      }
      return Array.isArray(candidate) && candidate.every(isValue);
    default:
      return false;
  }
}

/**
 * Textual form of a value as used for key probes, settings payloads and
 * dumps. Unset values read as the empty string.
 */
export function stringValue(value: Value | undefined): string {
  if (value === undefined) return "";
  if (typeof value === "string") return value;
  if (value instanceof Date) {
    return isValid(value) ? value.toISOString() : String(value);
  }
  if (isList(value)) return value.map(stringValue).join(",");
  return String(value);
}

export function valuesEqual(
  a: Value | undefined,
  b: Value | undefined,
): boolean {
  if (a instanceof Duration && b instanceof Duration) return a.equals(b);
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (a !== undefined && b !== undefined && isList(a) && isList(b)) {
    return a.length === b.length &&
      a.every((item, i) => valuesEqual(item, b[i]));
  }
  return a === b;
}

/* -------------------------------------------------------------------------- */
/* Parsing primitives                                                         */
/* -------------------------------------------------------------------------- */

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DURATION_RE =
  /^(?:\s*(\d+)\s*d(?:ays?)?)?(?:\s*(\d+)\s*h(?:ours?)?)?(?:\s*(\d+)\s*m(?:in(?:ute)?s?)?)?(?:\s*(\d+)\s*s(?:econds?)?)?$/;
const DURATION_HMS_RE = /^([0-9]{2,10}):([0-9]{2})(?::([0-9]{2}))?$/;

const TRUE_WORDS: ReadonlySet<string> = new Set(["1", "t", "true", "on"]);
const FALSE_WORDS: ReadonlySet<string> = new Set(["0", "f", "false", "off"]);

export function parseBoolText(text: string): boolean | undefined {
  const lower = text.toLowerCase();
  if (TRUE_WORDS.has(lower)) return true;
  if (FALSE_WORDS.has(lower)) return false;
  return undefined;
}

export function parseIntText(text: string): number | undefined {
  if (!INT_RE.test(text)) return undefined;
  const n = Number(text);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function parseFloatText(text: string): number | undefined {
  return FLOAT_RE.test(text) ? Number(text) : undefined;
}

/**
 * `HH:MM`, `HH:MM:SS`, or any ordered subset of `<d>d<h>h<m>m<s>s` (long unit
 * names such as `2 hours` are accepted). At least one part is required.
 */
export function parseDurationText(text: string): Duration | undefined {
  if (text === "") return undefined;

  const hms = DURATION_HMS_RE.exec(text);
  if (hms) {
    return Duration.of({
      hours: Number(hms[1]),
      minutes: Number(hms[2]),
      seconds: hms[3] === undefined ? 0 : Number(hms[3]),
    });
  }

  const parts = DURATION_RE.exec(text);
  if (!parts) return undefined;
  const n = (s: string | undefined) => (s === undefined ? 0 : Number(s));
  return Duration.of({
    days: n(parts[1]),
    hours: n(parts[2]),
    minutes: n(parts[3]),
    seconds: n(parts[4]),
  });
}

/* -------------------------------------------------------------------------- */
/* Time layouts                                                               */
/* -------------------------------------------------------------------------- */

export interface TimeLayout {
  readonly name: string;
  /** date-fns format; the input is always completed with a numeric zone. */
  readonly format: string;
  /** Append `+0000` before parsing (layouts without their own zone). */
  readonly utc: boolean;
}

const RFC3339_RE =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;

/**
 * Layouts tried, in order, after RFC 3339. Zone abbreviations are only
 * understood for UTC and GMT, which are rewritten to `+0000` first.
 */
export const TIME_LAYOUTS: readonly TimeLayout[] = Object.freeze([
  { name: "ANSIC", format: "EEE MMM d HH:mm:ss yyyy", utc: true },
  { name: "UnixDate", format: "EEE MMM d HH:mm:ss xx yyyy", utc: false },
  { name: "RubyDate", format: "EEE MMM dd HH:mm:ss xx yyyy", utc: false },
  { name: "RFC822Z", format: "dd MMM yy HH:mm xx", utc: false },
  { name: "RFC850", format: "EEEE, dd-MMM-yy HH:mm:ss xx", utc: false },
  { name: "RFC1123Z", format: "EEE, dd MMM yyyy HH:mm:ss xx", utc: false },
  { name: "DateTime", format: "yyyy-MM-dd HH:mm:ss", utc: true },
  { name: "DateOnly", format: "yyyy-MM-dd", utc: true },
]);

const REFERENCE_DATE = new Date(0);

function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MS_PER_SECOND) * MS_PER_SECOND);
}

/** Parse a timestamp in any known layout; UTC, truncated to whole seconds. */
export function parseTimeText(text: string): Date | undefined {
  const normalized = text.trim().replace(/\s+/g, " ");
  if (RFC3339_RE.test(normalized)) {
    const date = parseISO(normalized);
    return isValid(date) ? truncateToSeconds(date) : undefined;
  }

  const zoned = normalized.replace(/ (?:UTC|GMT)\b/, " +0000");
  for (const layout of TIME_LAYOUTS) {
    const date = layout.utc
      ? parseWithFormat(`${zoned} +0000`, `${layout.format} xx`, REFERENCE_DATE)
      : parseWithFormat(zoned, layout.format, REFERENCE_DATE);
    if (isValid(date)) return truncateToSeconds(date);
  }
  return undefined;
}

/* -------------------------------------------------------------------------- */
/* Coercers                                                                   */
/* -------------------------------------------------------------------------- */

export type Coercer<T> = z.ZodType<T>;

const valueSchema = z.custom<Value>(isValue);

function textCoercer<T>(
  target: string,
  fromText: (text: string) => T | undefined,
  direct?: (value: Value) => T | undefined,
): Coercer<T> {
  return valueSchema.optional().transform((value, ctx) => {
    const converted = value === undefined
      ? undefined
      : direct?.(value) ?? fromText(stringValue(value));
    if (converted === undefined) {
      ctx.addIssue({
        code: "custom",
        message: `cannot convert ${
          JSON.stringify(stringValue(value))
        } to ${target}`,
      });
      return z.NEVER;
    }
    return converted;
  }).describe(target);
}

export const stringCoercer: Coercer<string> = valueSchema.optional()
  .transform(stringValue).describe("string");

export const intCoercer: Coercer<number> = textCoercer(
  "int",
  parseIntText,
  (value) =>
    typeof value === "number" && Number.isSafeInteger(value) ? value : undefined,
);

export const floatCoercer: Coercer<number> = textCoercer(
  "float",
  parseFloatText,
  (value) =>
    typeof value === "number" && Number.isFinite(value) ? value : undefined,
);

export const boolCoercer: Coercer<boolean> = textCoercer(
  "bool",
  parseBoolText,
  (value) => (typeof value === "boolean" ? value : undefined),
);

export const durationCoercer: Coercer<Duration> = textCoercer(
  "duration",
  parseDurationText,
  (value) => (value instanceof Duration ? value : undefined),
);

export const timeCoercer: Coercer<Date> = textCoercer(
  "time",
  parseTimeText,
  (value) =>
    value instanceof Date && isValid(value) ? value : undefined,
);

/**
 * Run a coercer against a value, returning either the converted value or a
 * `ConversionError` describing the first issue.
 */
export function coerce<T>(
  coercer: Coercer<T>,
  value: Value | undefined,
): T | ConversionError {
  const result = coercer.safeParse(value);
  if (result.success) return result.data;
  const target = coercer.description ?? "value";
  return new ConversionError(target, value, result.error.issues[0]?.message);
}
