import { ConfigurationError } from "../utils/errors.js";
import { StaticDataSet, type DataSet } from "./dataset.js";
import { DuckDbDataSource } from "./duckdb-source.js";

/** Resolves a query into a fully materialized dataset. */
export interface DataSource {
  getDataSet(query: string, ...params: unknown[]): Promise<DataSet>;
}

export type SourceRegistry = Map<string, DataSource>;

export type FixtureRows = Array<Record<string, unknown>>;

/** Serves named in-memory fixtures; the query is the fixture name. */
export class FixtureDataSource implements DataSource {
  private fixtures: Map<string, FixtureRows>;

  constructor(fixtures: Record<string, FixtureRows> = {}) {
    this.fixtures = new Map(Object.entries(fixtures));
  }

  async getDataSet(query: string): Promise<DataSet> {
    const rows = this.fixtures.get(query.trim());
    if (!rows) {
      throw new Error(`unknown fixture dataset: ${query}`);
    }
    return StaticDataSet.fromRows(rows);
  }
}

export class DemoDataSource implements DataSource {
  async getDataSet(query: string): Promise<DataSet> {
    switch (query.trim()) {
      case "populations":
        return StaticDataSet.fromRows([
          { creature: "giraffes", month1: 20, month2: 2 },
          { creature: "orangutans", month1: 14, month2: 18 },
          { creature: "monkeys", month1: 23, month2: 29 },
        ]);
      default:
        throw new Error(`unknown demo dataset: ${query}`);
    }
  }
}

export function builtinSources(): SourceRegistry {
  return new Map<string, DataSource>([
    ["static", new FixtureDataSource()],
    ["demo", new DemoDataSource()],
  ]);
}

/**
 * Builds a registry from "name=url" specs on top of the built-in sources.
 * Supported urls: duckdb:<database path> and duckdb::memory:.
 */
export function createSourceRegistry(specs: string[] = [], base: SourceRegistry = builtinSources()): SourceRegistry {
  const registry: SourceRegistry = new Map(base);

  for (const spec of specs) {
    const separator = spec.indexOf("=");
    if (separator <= 0) {
      throw new ConfigurationError(`source option not valid, use format 'name=url': ${spec}`);
    }
    const name = spec.slice(0, separator).trim();
    const url = spec.slice(separator + 1).trim();

    if (registry.has(name)) {
      throw new ConfigurationError(`duplicate source "${name}" specified`);
    }

    if (url.startsWith("duckdb:")) {
      registry.set(name, DuckDbDataSource.fromUrl(url));
    } else {
      throw new ConfigurationError(`unsupported source url: "${url}"`);
    }
  }

  return registry;
}
