import type { DataSet } from "../data/dataset.js";
import { canonicalText, toPlotValue, type FieldValue, type PlotValue } from "../data/field-value.js";
import { ConfigurationError, DataAccessError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import type { TableDef } from "./definition.js";
import { partitionByDataSet } from "./series.js";
import type { Annotation, Trace } from "./traces.js";

interface AxisLabels {
  keys: string[];
  values: PlotValue[];
}

export class LabeledTable {
  readonly def: TableDef;
  readonly labelsX: AxisLabels = { keys: [], values: [] };
  readonly labelsY: AxisLabels = { keys: [], values: [] };
  private cells = new Map<string, Map<string, PlotValue>>();

  constructor(def: TableDef) {
    this.def = def;
  }

  get name(): string {
    return this.def.name;
  }

  add(x: FieldValue, y: FieldValue, value: FieldValue): void {
    const xKey = canonicalText(x);
    const yKey = canonicalText(y);

    let column = this.cells.get(xKey);
    if (!column) {
      column = new Map();
      this.cells.set(xKey, column);
      this.labelsX.keys.push(xKey);
      this.labelsX.values.push(toPlotValue(x));
    }
    if (!this.labelsY.keys.includes(yKey)) {
      this.labelsY.keys.push(yKey);
      this.labelsY.values.push(toPlotValue(y));
    }
    if (column.has(yKey)) {
      throw new ConfigurationError(`table "${this.name}": found two values for ${xKey}/${yKey}`);
    }
    column.set(yKey, toPlotValue(value));
  }

  cell(xKey: string, yKey: string): PlotValue {
    return this.cells.get(xKey)?.get(yKey) ?? null;
  }

  /** Rows follow the y labels and columns the x labels, both in first-seen order. */
  valueZ(): PlotValue[][] {
    return this.labelsY.keys.map((yKey) => this.labelsX.keys.map((xKey) => this.cell(xKey, yKey)));
  }

  annotations(): Annotation[] {
    const annotations: Annotation[] = [];
    this.labelsY.keys.forEach((yKey, yi) => {
      this.labelsX.keys.forEach((xKey, xi) => {
        annotations.push({
          xref: "x1",
          yref: "y1",
          x: this.labelsX.values[xi],
          y: this.labelsY.values[yi],
          text: formatCell(this.cell(xKey, yKey)),
          showarrow: false,
        });
      });
    });
    return annotations;
  }
}

export function formatCell(value: PlotValue): string {
  if (value === null) {
    return "";
  }
  return typeof value === "number" ? value.toFixed(3) : String(value);
}

export interface TableOutput {
  traces: Trace[];
  annotations: Annotation[];
}

export function tableTraces(dataSets: Map<string, DataSet>, defs: TableDef[], logger: Logger): TableOutput {
  const tables: LabeledTable[] = [];

  for (const [dsname, defsForDataSet] of partitionByDataSet(defs, dataSets, logger, "table")) {
    const ds = dataSets.get(dsname);
    if (!ds) {
      continue;
    }

    const active = defsForDataSet.map((def) => new LabeledTable(def));
    const live = new Set(active);

    logger.info("reading dataset", { dataset: dsname });
    ds.resetIterator();
    while (ds.next()) {
      for (const lt of live) {
        const x = ds.field(lt.def.labelsX);
        const y = ds.field(lt.def.labelsY);
        const z = ds.field(lt.def.values);
        const failed = [x, y, z].find((v) => v.kind === "error");
        if (failed?.kind === "error") {
          logger.warn(`skipping table "${lt.name}": ${failed.error.message} in dataset "${dsname}"`);
          live.delete(lt);
          continue;
        }
        lt.add(x, y, z);
      }
    }
    const error = ds.err();
    if (error) {
      throw new DataAccessError(`dataset "${dsname}" iteration ended with an error: ${error.message}`, { cause: error });
    }

    tables.push(...active.filter((lt) => live.has(lt)));
  }

  tables.sort((a, b) => a.def.order - b.def.order);

  const traces: Trace[] = [];
  const annotations: Annotation[] = [];
  for (const lt of tables) {
    switch (lt.def.type) {
      case "heatmap":
        traces.push({
          type: "heatmap",
          name: lt.name,
          x: lt.labelsX.values,
          y: lt.labelsY.values,
          z: lt.valueZ(),
          colorscale: "Viridis",
          reversescale: true,
          ...(lt.def.colorbar ? { colorbar: lt.def.colorbar } : {}),
        });
        annotations.push(...lt.annotations());
        break;
      default:
        throw new ConfigurationError(`unsupported table type: ${String(lt.def.type)}`);
    }
  }

  return { traces, annotations };
}
