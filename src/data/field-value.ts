export type FieldValue =
  | { kind: "null" }
  | { kind: "bool"; value: boolean }
  | { kind: "int"; value: number | bigint }
  | { kind: "float"; value: number }
  | { kind: "text"; value: string }
  | { kind: "timestamp"; value: Date }
  | { kind: "duration"; seconds: number }
  | { kind: "error"; error: Error };

export type FieldKind = FieldValue["kind"];

/** A value as it appears in an output trace. */
export type PlotValue = string | number | boolean | null;

export const NULL_VALUE: FieldValue = { kind: "null" };

export function nullValue(): FieldValue {
  return NULL_VALUE;
}

export function boolValue(value: boolean): FieldValue {
  return { kind: "bool", value };
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

/** Integers outside the safe range stay bigints so distinct keys keep distinct text. */
export function intValue(value: number | bigint): FieldValue {
  if (typeof value === "bigint") {
    return { kind: "int", value: value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value };
  }
  return { kind: "int", value: Math.trunc(value) };
}

export function floatValue(value: number): FieldValue {
  return { kind: "float", value };
}

export function textValue(value: string): FieldValue {
  return { kind: "text", value };
}

export function timestampValue(value: Date): FieldValue {
  return { kind: "timestamp", value };
}

export function durationValue(seconds: number): FieldValue {
  return { kind: "duration", seconds };
}

export function errorValue(error: Error | string): FieldValue {
  return { kind: "error", error: typeof error === "string" ? new Error(error) : error };
}

export function formatRfc3339(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Text used to compare join and group keys. Numbers of either kind and
 * timestamps format the same way wherever they came from.
 */
export function canonicalText(value: FieldValue): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "int":
    case "float":
      return String(value.value);
    case "text":
      return value.value;
    case "timestamp":
      return formatRfc3339(value.value);
    case "duration":
      return `${value.seconds}s`;
    case "error":
      return value.error.message;
  }
}

export function toPlotValue(value: FieldValue): PlotValue {
  switch (value.kind) {
    case "null":
    case "error":
      return null;
    case "int":
      return typeof value.value === "bigint" ? String(value.value) : value.value;
    case "bool":
    case "float":
    case "text":
      return value.value;
    case "timestamp":
      return formatRfc3339(value.value);
    case "duration":
      return value.seconds;
  }
}

export function numericValue(value: FieldValue): number | undefined {
  if (value.kind === "int" || value.kind === "float") {
    return Number(value.value);
  }
  return undefined;
}

/** Maps a plain JS value (fixture data, parsed JSON) onto a field value. */
export function fromJsValue(raw: unknown): FieldValue {
  if (raw === null || raw === undefined) {
    return NULL_VALUE;
  }
  if (typeof raw === "boolean") {
    return boolValue(raw);
  }
  if (typeof raw === "number") {
    return Number.isInteger(raw) ? intValue(raw) : floatValue(raw);
  }
  if (typeof raw === "bigint") {
    return intValue(raw);
  }
  if (typeof raw === "string") {
    return textValue(raw);
  }
  if (raw instanceof Date) {
    return timestampValue(raw);
  }
  if (raw instanceof Error) {
    return errorValue(raw);
  }
  return textValue(JSON.stringify(raw));
}
