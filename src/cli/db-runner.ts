import { spawn } from "child_process";

import { getConfig } from "../state/config.js";

export interface DbRunnerConfig {
  cliPath: string;
  database?: string | null;
  /** Open the database read-only, so several processes can share one file. */
  readonly?: boolean;
}

export interface ExecuteOptions {
  sql: string;
  signal?: AbortSignal;
}

export interface ExecuteResult {
  columns: string[];
  rows: Array<Record<string, unknown>>;
  rowCount: number;
}

export interface ColumnType {
  name: string;
  type: string;
}

/** The part of the DuckDB runner a data source depends on. */
export interface QueryRunner {
  execute(options: ExecuteOptions): Promise<ExecuteResult>;
  describe(sql: string): Promise<ColumnType[]>;
}

export class DbRunner implements QueryRunner {
  private config: DbRunnerConfig;

  constructor(config: DbRunnerConfig) {
    this.config = config;
  }

  get database(): string {
    return this.config.database ?? ":memory:";
  }

  args(sql: string): string[] {
    const flags = this.config.readonly ? ["-readonly"] : [];
    return [...flags, this.database, "-json", "-c", sql];
  }

  async execute(options: ExecuteOptions): Promise<ExecuteResult> {
    const proc = spawn(this.config.cliPath, this.args(options.sql), {
      signal: options.signal,
    });

    const chunks: Buffer[] = [];
    const errChunks: Buffer[] = [];

    proc.stdout.on("data", (chunk) => chunks.push(Buffer.from(chunk)));
    proc.stderr.on("data", (chunk) => errChunks.push(Buffer.from(chunk)));

    let exitCode: number | null;
    try {
      exitCode = await new Promise<number | null>((resolve, reject) => {
        proc.on("error", reject);
        proc.on("close", resolve);
      });
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new Error(`DuckDB CLI not found at "${this.config.cliPath}". Set PLOTFORGE_DUCKDB_PATH or config.`);
      }
      throw error;
    }

    if (exitCode !== 0) {
      const message = Buffer.concat(errChunks).toString() || "DuckDB CLI failed";
      throw new Error(message.trim());
    }

    return parseJsonRows(Buffer.concat(chunks).toString());
  }

  async describe(sql: string): Promise<ColumnType[]> {
    const result = await this.execute({ sql: `DESCRIBE ${stripTerminator(sql)}` });
    return result.rows.map((row) => ({
      name: String(row.column_name ?? row.column ?? ""),
      type: String(row.column_type ?? row.type ?? "unknown"),
    }));
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const JSON_NUMBER = /-?\d+(\.\d+)?([eE][+-]?\d+)?/y;

/**
 * Quotes integer literals outside the safe range so JSON.parse keeps every
 * digit. String contents are left untouched.
 */
export function quoteUnsafeIntegers(json: string): string {
  let out = "";
  let i = 0;
  while (i < json.length) {
    const ch = json[i];
    if (ch === '"') {
      let end = i + 1;
      while (end < json.length && json[end] !== '"') {
        end += json[end] === "\\" ? 2 : 1;
      }
      out += json.slice(i, end + 1);
      i = end + 1;
      continue;
    }
    JSON_NUMBER.lastIndex = i;
    const number = JSON_NUMBER.exec(json);
    if (number) {
      const token = number[0];
      const isInteger = number[1] === undefined && number[2] === undefined;
      out += isInteger && !Number.isSafeInteger(Number(token)) ? `"${token}"` : token;
      i += token.length;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}

export function parseJsonRows(output: string): ExecuteResult {
  const trimmed = output.trim();
  if (!trimmed) {
    return { columns: [], rows: [], rowCount: 0 };
  }

  const parsed: unknown = JSON.parse(quoteUnsafeIntegers(trimmed));
  const rows = Array.isArray(parsed) ? parsed.filter(isRecord) : [];
  const columns = rows.length > 0 ? Object.keys(rows[0]) : [];
  return { columns, rows, rowCount: rows.length };
}

export function stripTerminator(sql: string): string {
  return sql.trim().replace(/;$/, "");
}

/** File databases open read-only; a missing file then fails instead of being created. */
export function createDefaultRunner(database?: string | null): DbRunner {
  const config = getConfig();
  const isFile = Boolean(database) && database !== ":memory:";
  return new DbRunner({ cliPath: config.duckdbPath, database, readonly: isFile });
}
