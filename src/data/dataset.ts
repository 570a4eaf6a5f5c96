import { errorValue, fromJsValue, type FieldValue } from "./field-value.js";

/**
 * Forward-only cursor over named, typed fields. Implementations hold their
 * rows in memory so resetIterator never re-runs a query.
 */
export interface DataSet {
  next(): boolean;
  err(): Error | null;
  field(name: string): FieldValue;
  resetIterator(): void;
}

export interface StaticDataSetOptions {
  /** Reported by err() once iteration has run off the end. */
  endError?: Error;
}

export class StaticDataSet implements DataSet {
  private columns: Map<string, FieldValue[]>;
  private rowCount: number;
  private endError: Error | null;
  private position = -1;
  private finished = false;

  constructor(columns: Record<string, FieldValue[]>, options: StaticDataSetOptions = {}) {
    this.columns = new Map(Object.entries(columns));
    this.rowCount = Math.max(0, ...Array.from(this.columns.values(), (values) => values.length));
    this.endError = options.endError ?? null;
  }

  static fromRows(rows: Array<Record<string, unknown>>, options: StaticDataSetOptions = {}): StaticDataSet {
    const names: string[] = [];
    for (const row of rows) {
      for (const name of Object.keys(row)) {
        if (!names.includes(name)) {
          names.push(name);
        }
      }
    }

    const columns: Record<string, FieldValue[]> = {};
    for (const name of names) {
      columns[name] = rows.map((row) => fromJsValue(row[name]));
    }
    return new StaticDataSet(columns, options);
  }

  get fieldNames(): string[] {
    return Array.from(this.columns.keys());
  }

  get size(): number {
    return this.rowCount;
  }

  next(): boolean {
    if (this.position + 1 >= this.rowCount) {
      this.position = this.rowCount;
      this.finished = true;
      return false;
    }
    this.position += 1;
    return true;
  }

  err(): Error | null {
    return this.finished ? this.endError : null;
  }

  field(name: string): FieldValue {
    const values = this.columns.get(name);
    if (!values) {
      return errorValue(`unknown field "${name}"`);
    }
    if (this.position < 0 || this.position >= this.rowCount) {
      return errorValue(`no current row for field "${name}"`);
    }
    return values[this.position] ?? errorValue(`no value for field "${name}" in row ${this.position}`);
  }

  resetIterator(): void {
    this.position = -1;
    this.finished = false;
  }
}
