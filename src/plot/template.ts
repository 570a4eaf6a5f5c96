import { formatRfc3339 } from "../data/field-value.js";
import { ConfigurationError } from "../utils/errors.js";

export interface TemplateContext {
  basisTime: Date;
  params: Record<string, unknown>;
}

/** Rewrites definition text before it is parsed. */
export type TemplateEngine = (source: string, context: TemplateContext) => string | Promise<string>;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

function truncateMs(time: number, unit: number): number {
  return Math.floor(time / unit) * unit;
}

/** Start of the UTC week, weeks beginning on Monday. */
export function startOfWeek(date: Date): Date {
  const day = Math.floor(date.getTime() / DAY_MS);
  const sinceMonday = (((day + 3) % 7) + 7) % 7;
  return new Date((day - sinceMonday) * DAY_MS);
}

export function templateValues(basisTime: Date): Record<string, string> {
  const now = basisTime.getTime();
  const startOfHour = truncateMs(now, HOUR_MS);
  const startOfDay = truncateMs(now, DAY_MS);
  const weekStart = startOfWeek(basisTime).getTime();

  const values: Record<string, number> = {
    Now: now,
    StartOfHour: startOfHour,
    StartOfDay: startOfDay,
    StartOfWeek: weekStart,
    // instants just before the start of the period, for labels rather than range ends
    EndOfPreviousHour: startOfHour - 1,
    EndOfPreviousDay: startOfDay - 1,
    EndOfPreviousWeek: weekStart - 1,
    StartOfPreviousWeek: weekStart - WEEK_MS,
  };

  return Object.fromEntries(Object.entries(values).map(([key, ms]) => [key, formatRfc3339(new Date(ms))]));
}

function stringifyParam(value: unknown): string {
  if (value instanceof Date) {
    return formatRfc3339(value);
  }
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Replaces {{ Name }} placeholders with basis-time values and
 * {{ Params.key }} placeholders with template parameters.
 */
export const expandTemplate: TemplateEngine = (source, context) => {
  const values = templateValues(context.basisTime);
  return source.replace(/{{\s*([A-Za-z_][\w.]*)\s*}}/g, (_match, key: string) => {
    if (key.startsWith("Params.")) {
      const param = key.slice("Params.".length);
      if (!(param in context.params)) {
        throw new ConfigurationError(`unknown template parameter "${param}"`);
      }
      return stringifyParam(context.params[param]);
    }
    const value = values[key];
    if (value === undefined) {
      throw new ConfigurationError(`unknown template value "${key}"`);
    }
    return value;
  });
};
