import { describe, expect, it, vi } from "vitest";

import {
  createDefaultRunner,
  DbRunner,
  parseJsonRows,
  quoteUnsafeIntegers,
  stripTerminator,
  type ColumnType,
  type ExecuteOptions,
  type ExecuteResult,
  type QueryRunner,
} from "../src/cli/db-runner.js";
import { derive } from "../src/compute/derive.js";
import { DuckDbDataSource, parseInterval, parseTimestamp, sqlLiteral, toFieldValue } from "../src/data/duckdb-source.js";
import { builtinSources, createSourceRegistry, DemoDataSource } from "../src/data/sources.js";
import { ConfigurationError } from "../src/utils/errors.js";
import { scan } from "./helpers.js";

class FakeRunner implements QueryRunner {
  statements: string[] = [];
  described: string[] = [];
  probeError: Error | null = null;

  constructor(
    private rows: Array<Record<string, unknown>>,
    private types: ColumnType[] = []
  ) {}

  async execute(options: ExecuteOptions): Promise<ExecuteResult> {
    this.statements.push(options.sql);
    if (options.sql === "SELECT 1 AS ok") {
      if (this.probeError) {
        throw this.probeError;
      }
      return { columns: ["ok"], rows: [{ ok: 1 }], rowCount: 1 };
    }
    const columns = this.rows.length > 0 ? Object.keys(this.rows[0]) : [];
    return { columns, rows: this.rows, rowCount: this.rows.length };
  }

  async describe(sql: string): Promise<ColumnType[]> {
    this.described.push(sql);
    return this.types;
  }
}

/** Fails like a second process opening a locked database file whenever two statements overlap. */
class ExclusiveRunner implements QueryRunner {
  private active = 0;
  statements: string[] = [];

  async execute(options: ExecuteOptions): Promise<ExecuteResult> {
    return this.exclusive(async () => {
      this.statements.push(options.sql);
      if (options.sql.includes("broken")) {
        throw new Error("Parser Error: syntax error");
      }
      return { columns: ["v"], rows: [{ v: 1 }], rowCount: 1 };
    });
  }

  async describe(): Promise<ColumnType[]> {
    return this.exclusive(async () => [{ name: "v", type: "INTEGER" }]);
  }

  private async exclusive<T>(work: () => Promise<T>): Promise<T> {
    if (this.active > 0) {
      throw new Error("IO Error: Could not set lock on file");
    }
    this.active++;
    try {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return await work();
    } finally {
      this.active--;
    }
  }
}

/** Answers each query with raw CLI output, parsed the way DbRunner parses it. */
class JsonOutputRunner implements QueryRunner {
  constructor(private outputs: Record<string, string>, private types: ColumnType[]) {}

  async execute(options: ExecuteOptions): Promise<ExecuteResult> {
    return parseJsonRows(this.outputs[options.sql] ?? "[]");
  }

  async describe(): Promise<ColumnType[]> {
    return this.types;
  }
}

describe("DuckDbDataSource", () => {
  it("converts rows using the described column types", async () => {
    const runner = new FakeRunner(
      [{ n: "2", f: 1.5, ts: "2023-05-08 10:00:00", d: "1 day 02:00:00", b: true, z: null }],
      [
        { name: "n", type: "BIGINT" },
        { name: "f", type: "DOUBLE" },
        { name: "ts", type: "TIMESTAMP" },
        { name: "d", type: "INTERVAL" },
        { name: "b", type: "BOOLEAN" },
        { name: "z", type: "VARCHAR" },
      ]
    );
    const source = new DuckDbDataSource(runner);

    const ds = await source.getDataSet("select * from visits;");
    expect(runner.statements).toEqual(["SELECT 1 AS ok", "select * from visits"]);
    expect(runner.described).toEqual(["select * from visits"]);

    ds.next();
    expect(ds.field("n")).toEqual({ kind: "int", value: 2 });
    expect(ds.field("f")).toEqual({ kind: "float", value: 1.5 });
    expect(ds.field("ts")).toEqual({ kind: "timestamp", value: new Date("2023-05-08T10:00:00Z") });
    expect(ds.field("d")).toEqual({ kind: "duration", seconds: 93600 });
    expect(ds.field("b")).toEqual({ kind: "bool", value: true });
    expect(ds.field("z")).toEqual({ kind: "null" });
  });

  it("probes the database only once", async () => {
    const runner = new FakeRunner([{ v: 1 }]);
    const source = new DuckDbDataSource(runner);
    await source.getDataSet("select 1 as v");
    await source.getDataSet("select 1 as v");
    expect(runner.statements.filter((sql) => sql === "SELECT 1 AS ok")).toHaveLength(1);
  });

  it("replays a failed probe for every later query", async () => {
    const runner = new FakeRunner([]);
    runner.probeError = new Error("database is locked");
    const execute = vi.spyOn(runner, "execute");
    const source = new DuckDbDataSource(runner);

    await expect(source.getDataSet("select 1")).rejects.toThrow("unable to connect to database");
    await expect(source.getDataSet("select 1")).rejects.toThrow("unable to connect to database");
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it("binds parameters through a prepared statement", async () => {
    const runner = new FakeRunner([{ v: 3 }]);
    const source = new DuckDbDataSource(runner);

    const ds = await source.getDataSet("select v from t where team = $1 and n > $2", "o'neil", 4);
    expect(runner.statements[1]).toBe(
      "PREPARE plot_query AS select v from t where team = $1 and n > $2; EXECUTE plot_query('o''neil', 4);"
    );
    expect(runner.described).toEqual([]);
    expect(scan(ds, ["v"])).toEqual([["3"]]);
  });

  it("runs overlapping queries one at a time", async () => {
    const runner = new ExclusiveRunner();
    const source = new DuckDbDataSource(runner);

    const results = await Promise.all([
      source.getDataSet("select 1 as v"),
      source.getDataSet("select 2 as v"),
      source.getDataSet("select 3 as v"),
    ]);

    expect(results.map((ds) => scan(ds, ["v"]))).toEqual([[["1"]], [["1"]], [["1"]]]);
    expect(runner.statements).toEqual(["SELECT 1 AS ok", "select 1 as v", "select 2 as v", "select 3 as v"]);
  });

  it("keeps serving queries after one fails", async () => {
    const source = new DuckDbDataSource(new ExclusiveRunner());

    const [failed, next] = await Promise.allSettled([
      source.getDataSet("select broken"),
      source.getDataSet("select 1 as v"),
    ]);
    expect(failed.status).toBe("rejected");
    expect(next.status).toBe("fulfilled");
  });

  it("joins on 64-bit keys without losing digits", async () => {
    const runner = new JsonOutputRunner(
      {
        "select id, v from lhs": '[{"id": 9007199254740993, "v": 5}, {"id": 9007199254740992, "v": 7}]',
        "select id, v from rhs": '[{"id": 9007199254740992, "v": 2}]',
      },
      [
        { name: "id", type: "BIGINT" },
        { name: "v", type: "INTEGER" },
      ]
    );
    const source = new DuckDbDataSource(runner);
    const lhs = await source.getDataSet("select id, v from lhs");
    const rhs = await source.getDataSet("select id, v from rhs");

    const out = derive(
      "diff",
      { name: "lhs", dataSet: lhs, joinField: "id", valueField: "v" },
      { name: "rhs", dataSet: rhs, joinField: "id", valueField: "v" }
    );
    expect(scan(out, ["key", "value"])).toEqual([["9007199254740992", "5"]]);
  });

  it("keeps described columns for empty results", async () => {
    const runner = new FakeRunner([], [{ name: "v", type: "INTEGER" }]);
    const ds = await new DuckDbDataSource(runner).getDataSet("select v from t where false");
    expect(ds.next()).toBe(false);
    expect(ds.err()).toBeNull();
  });
});

describe("value conversion", () => {
  it("reads integers outside the safe range as exact digits", () => {
    const json = '[{"id": 12345678901234567890, "note": "12345678901234567890", "x": 1.5e300, "n": -42}]';
    expect(quoteUnsafeIntegers(json)).toBe(
      '[{"id": "12345678901234567890", "note": "12345678901234567890", "x": 1.5e300, "n": -42}]'
    );
    expect(parseJsonRows(json).rows).toEqual([
      { id: "12345678901234567890", note: "12345678901234567890", x: 1.5e300, n: -42 },
    ]);
    expect(toFieldValue("12345678901234567890", "HUGEINT")).toEqual({ kind: "int", value: 12345678901234567890n });
    expect(toFieldValue("42", "BIGINT")).toEqual({ kind: "int", value: 42 });
  });

  it("leaves escaped quotes inside strings alone", () => {
    const json = '[{"s": "say \\"99999999999999999\\"", "t": 1}]';
    expect(quoteUnsafeIntegers(json)).toBe(json);
  });

  it("parses timestamps with and without offsets", () => {
    expect(parseTimestamp("2023-05-08 10:00:00+02")?.toISOString()).toBe("2023-05-08T08:00:00.000Z");
    expect(parseTimestamp("2023-05-08")?.toISOString()).toBe("2023-05-08T00:00:00.000Z");
    expect(parseTimestamp("soon")).toBeUndefined();
  });

  it("parses intervals", () => {
    expect(parseInterval("3 mons")).toBe(7776000);
    expect(parseInterval("-00:00:30")).toBe(-30);
    expect(parseInterval("1 year 2 days")).toBe(31708800);
    expect(parseInterval("forever")).toBeUndefined();
  });

  it("falls back to text when a typed value does not parse", () => {
    expect(toFieldValue("n/a", "INTEGER")).toEqual({ kind: "text", value: "n/a" });
    expect(toFieldValue("12.5", "DECIMAL(10,2)")).toEqual({ kind: "float", value: 12.5 });
  });

  it("quotes SQL literals", () => {
    expect(sqlLiteral(null)).toBe("NULL");
    expect(sqlLiteral(true)).toBe("TRUE");
    expect(sqlLiteral(new Date("2023-05-08T10:00:00Z"))).toBe("TIMESTAMP '2023-05-08 10:00:00.000'");
  });
});

describe("createSourceRegistry", () => {
  it("includes the built-in sources", () => {
    const registry = createSourceRegistry([]);
    expect(Array.from(registry.keys())).toEqual(["static", "demo"]);
    expect(registry.get("demo")).toBeInstanceOf(DemoDataSource);
  });

  it("adds DuckDB sources by url", () => {
    const registry = createSourceRegistry(["warehouse=duckdb::memory:"]);
    expect(registry.get("warehouse")).toBeInstanceOf(DuckDbDataSource);
  });

  it("rejects malformed, duplicate and unsupported specs", () => {
    expect(() => createSourceRegistry(["warehouse"])).toThrow(ConfigurationError);
    expect(() => createSourceRegistry(["demo=duckdb:zoo.db"], builtinSources())).toThrow('duplicate source "demo" specified');
    expect(() => createSourceRegistry(["pg=postgres://localhost/db"])).toThrow(
      'unsupported source url: "postgres://localhost/db"'
    );
  });
});

describe("DbRunner", () => {
  it("reports a missing CLI", async () => {
    const runner = new DbRunner({ cliPath: "/nonexistent/duckdb-cli" });
    await expect(runner.execute({ sql: "SELECT 1" })).rejects.toThrow(
      'DuckDB CLI not found at "/nonexistent/duckdb-cli". Set PLOTFORGE_DUCKDB_PATH or config.'
    );
  });

  it("opens file databases read-only", () => {
    expect(createDefaultRunner("zoo.db").args("SELECT 1")).toEqual(["-readonly", "zoo.db", "-json", "-c", "SELECT 1"]);
    expect(createDefaultRunner(null).args("SELECT 1")).toEqual([":memory:", "-json", "-c", "SELECT 1"]);
    expect(createDefaultRunner(":memory:").args("SELECT 1")).toEqual([":memory:", "-json", "-c", "SELECT 1"]);
  });

  it("strips a trailing terminator", () => {
    expect(stripTerminator("  select 1;\n")).toBe("select 1");
  });
});
