import { mkdtempSync, utimesSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join, resolve } from "path";
import { fileURLToPath } from "url";

import type { DataSet } from "../src/data/dataset.js";
import { canonicalText } from "../src/data/field-value.js";

const dirname = resolve(fileURLToPath(import.meta.url), "..");

export function fixturesPath(...parts: string[]): string {
  return resolve(dirname, "fixtures", ...parts);
}

export function createTempWorkspace(): string {
  return mkdtempSync(join(tmpdir(), "plotforge-"));
}

/** Writes a definition document and backdates it so outputs written afterwards are never stale. */
export function writeDefinition(dir: string, file: string, doc: unknown, mtime = new Date("2020-01-01T00:00:00Z")): string {
  const path = join(dir, file);
  writeFileSync(path, JSON.stringify(doc, null, 2), "utf-8");
  utimesSync(path, mtime, mtime);
  return path;
}

/** Canonical text of the given fields for every row, from the current cursor position to the end. */
export function scan(ds: DataSet, fields: string[]): string[][] {
  const rows: string[][] = [];
  while (ds.next()) {
    rows.push(fields.map((field) => canonicalText(ds.field(field))));
  }
  return rows;
}
