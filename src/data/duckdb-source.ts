import { createDefaultRunner, stripTerminator, type ColumnType, type QueryRunner } from "../cli/db-runner.js";
import { logger } from "../utils/logger.js";
import { StaticDataSet, type DataSet } from "./dataset.js";
import {
  boolValue,
  durationValue,
  floatValue,
  fromJsValue,
  intValue,
  NULL_VALUE,
  textValue,
  timestampValue,
  type FieldValue,
} from "./field-value.js";
import type { DataSource } from "./sources.js";

const INTEGER_TYPES = ["TINYINT", "SMALLINT", "INTEGER", "BIGINT", "HUGEINT", "UTINYINT", "USMALLINT", "UINTEGER", "UBIGINT"];
const FLOAT_TYPES = ["FLOAT", "REAL", "DOUBLE", "DECIMAL", "NUMERIC"];

/**
 * SQL source backed by the DuckDB CLI. The CLI is probed on first use and
 * the outcome of that probe is kept: once it fails, every later query fails
 * with the same error. Concurrent callers share one instance; their queries
 * run one at a time, in call order.
 */
export class DuckDbDataSource implements DataSource {
  private runner: QueryRunner;
  private ready: Promise<void> | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(runner: QueryRunner) {
    this.runner = runner;
  }

  static fromUrl(url: string): DuckDbDataSource {
    const database = url.slice("duckdb:".length);
    return new DuckDbDataSource(createDefaultRunner(database === "" ? null : database));
  }

  private init(): Promise<void> {
    this.ready ??= this.runner.execute({ sql: "SELECT 1 AS ok" }).then(
      () => undefined,
      (error: unknown) => {
        throw new Error("unable to connect to database", { cause: error });
      }
    );
    return this.ready;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.catch(() => undefined);
    return run;
  }

  getDataSet(query: string, ...params: unknown[]): Promise<DataSet> {
    return this.serialize(() => this.query(query, params));
  }

  private async query(query: string, params: unknown[]): Promise<DataSet> {
    await this.init();

    let types: ColumnType[] = [];
    let sql = stripTerminator(query);
    if (params.length > 0) {
      sql = `PREPARE plot_query AS ${sql}; EXECUTE plot_query(${params.map(sqlLiteral).join(", ")});`;
    } else {
      types = await this.runner.describe(sql);
    }

    logger.debug("executing query", { query: sql.replace(/\n/g, " ") });
    const result = await this.runner.execute({ sql });

    const typeByName = new Map(types.map((column) => [column.name, column.type]));
    const names = result.columns.length > 0 ? result.columns : types.map((column) => column.name);
    const columns: Record<string, FieldValue[]> = {};
    for (const name of names) {
      const type = typeByName.get(name);
      columns[name] = result.rows.map((row) => toFieldValue(row[name], type));
    }

    return new StaticDataSet(columns);
  }
}

function baseType(type: string): string {
  return type.toUpperCase().replace(/\(.*\)$/, "").trim();
}

export function toFieldValue(raw: unknown, type?: string): FieldValue {
  if (raw === null || raw === undefined) {
    return NULL_VALUE;
  }
  if (!type) {
    return fromJsValue(raw);
  }

  const declared = baseType(type);
  if (INTEGER_TYPES.includes(declared)) {
    if (typeof raw === "string" && /^-?\d+$/.test(raw)) {
      return intValue(BigInt(raw));
    }
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? intValue(parsed) : textValue(String(raw));
  }
  if (FLOAT_TYPES.includes(declared)) {
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? floatValue(parsed) : textValue(String(raw));
  }
  if (declared === "BOOLEAN") {
    return typeof raw === "boolean" ? boolValue(raw) : boolValue(String(raw).toLowerCase() === "true");
  }
  if (declared.startsWith("TIMESTAMP") || declared === "DATE") {
    const parsed = parseTimestamp(String(raw));
    return parsed ? timestampValue(parsed) : textValue(String(raw));
  }
  if (declared === "INTERVAL") {
    const seconds = parseInterval(String(raw));
    return seconds === undefined ? textValue(String(raw)) : durationValue(seconds);
  }
  return fromJsValue(raw);
}

export function parseTimestamp(text: string): Date | undefined {
  let normalized = text.trim().replace(" ", "T");
  if (/T/.test(normalized)) {
    normalized = normalized.replace(/([+-]\d{2})$/, "$1:00");
    if (!/(Z|[+-]\d{2}:\d{2})$/.test(normalized)) {
      normalized += "Z";
    }
  }
  const time = Date.parse(normalized);
  return Number.isNaN(time) ? undefined : new Date(time);
}

/** Seconds in an interval such as "1 day 02:30:00" or "3 mons". Months count as 30 days. */
export function parseInterval(text: string): number | undefined {
  const units: Record<string, number> = {
    year: 365 * 86400,
    mon: 30 * 86400,
    month: 30 * 86400,
    day: 86400,
  };

  let seconds = 0;
  let matched = false;
  for (const match of text.matchAll(/(-?\d+)\s+(year|mon|month|day)s?\b/g)) {
    seconds += Number(match[1]) * units[match[2]];
    matched = true;
  }

  const clock = /(-?)(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/.exec(text);
  if (clock) {
    const sign = clock[1] === "-" ? -1 : 1;
    seconds += sign * (Number(clock[2]) * 3600 + Number(clock[3]) * 60 + Number(clock[4]));
    matched = true;
  }

  return matched ? seconds : undefined;
}

export function sqlLiteral(value: unknown): string {
  if (value === null || value === undefined) {
    return "NULL";
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  if (value instanceof Date) {
    return `TIMESTAMP '${value.toISOString().replace("T", " ").replace("Z", "")}'`;
  }
  return `'${String(value).replace(/'/g, "''")}'`;
}
