import type { DataSet } from "../data/dataset.js";
import { canonicalText, toPlotValue, type PlotValue } from "../data/field-value.js";
import { ConfigurationError, DataAccessError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import type { ColorTable } from "./colors.js";
import type { SeriesDef } from "./definition.js";
import type { Trace } from "./traces.js";

export const GROUP_WILDCARD = "*";

export interface LabeledSeries {
  name: string;
  def: SeriesDef;
  labels: PlotValue[];
  values: PlotValue[];
}

/** Splits definitions by backing dataset, keeping first-reference order. Unknown datasets are logged and dropped. */
export function partitionByDataSet<T extends { dataset: string }>(
  defs: T[],
  dataSets: Map<string, DataSet>,
  logger: Logger,
  kind: string
): Map<string, T[]> {
  const partitions = new Map<string, T[]>();
  defs.forEach((def, index) => {
    if (!dataSets.has(def.dataset)) {
      logger.warn(`unknown dataset name "${def.dataset}" in ${kind} ${index}`);
      return;
    }
    const list = partitions.get(def.dataset) ?? [];
    list.push(def);
    partitions.set(def.dataset, list);
  });
  return partitions;
}

/** Display name for the current row, or null when the row is filtered out. */
function displayName(def: SeriesDef, groupText: string | undefined): string | null {
  const base = def.name ?? "";
  if (!def.groupField || groupText === undefined) {
    return base;
  }
  if (def.groupValue === GROUP_WILDCARD) {
    return base !== "" ? `${base}-${groupText}` : groupText;
  }
  return groupText === (def.groupValue ?? "") ? base : null;
}

function compareSeries(a: LabeledSeries, b: LabeledSeries): number {
  if (a.def.order !== b.def.order) {
    return a.def.order - b.def.order;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Scans each dataset once and collects one labeled series per display name.
 * A definition whose fields cannot be read is logged and dropped without
 * affecting the others.
 */
export function collectSeries(
  dataSets: Map<string, DataSet>,
  defs: SeriesDef[],
  logger: Logger
): LabeledSeries[] {
  const collected: LabeledSeries[] = [];

  for (const [dsname, series] of partitionByDataSet(defs, dataSets, logger, "series")) {
    const ds = dataSets.get(dsname);
    if (!ds) {
      continue;
    }

    const index = new Map<string, LabeledSeries>();
    const skipped = new Set<SeriesDef>();

    const skip = (def: SeriesDef, field: string, message: string): void => {
      logger.warn(`skipping series "${def.name ?? ""}": field "${field}" not read from dataset "${dsname}": ${message}`);
      skipped.add(def);
      for (const [key, ls] of index) {
        if (ls.def === def) {
          index.delete(key);
        }
      }
    };

    logger.info("reading dataset", { dataset: dsname });
    ds.resetIterator();
    let rowcount = 0;
    while (ds.next()) {
      rowcount++;
      for (const def of series) {
        if (skipped.has(def)) {
          continue;
        }

        let groupText: string | undefined;
        if (def.groupField) {
          const group = ds.field(def.groupField);
          if (group.kind === "error") {
            skip(def, def.groupField, group.error.message);
            continue;
          }
          groupText = canonicalText(group);
        }

        const name = displayName(def, groupText);
        if (name === null) {
          continue;
        }

        const value = ds.field(def.values);
        if (value.kind === "error") {
          skip(def, def.values, value.error.message);
          continue;
        }
        const label = def.labels ? ds.field(def.labels) : undefined;
        if (label?.kind === "error") {
          skip(def, def.labels ?? "", label.error.message);
          continue;
        }

        const key = `${def.order}\u0000${name}`;
        let ls = index.get(key);
        if (!ls) {
          logger.debug("creating series", { dataset: dsname, series: name });
          ls = { name, def, labels: [], values: [] };
          index.set(key, ls);
        }
        if (label) {
          ls.labels.push(toPlotValue(label));
        }
        ls.values.push(toPlotValue(value));
      }
    }
    const error = ds.err();
    if (error) {
      throw new DataAccessError(`dataset "${dsname}" iteration ended with an error: ${error.message}`, { cause: error });
    }
    logger.info("finished reading dataset", { dataset: dsname, rowcount });

    collected.push(...index.values());
  }

  return collected.sort(compareSeries);
}

export function renderSeries(ls: LabeledSeries, colors: ColorTable): Trace {
  const def = ls.def;
  const color = colors.resolve(def.color);

  switch (def.type) {
    case "bar":
      return {
        type: "bar",
        name: ls.name,
        orientation: "v",
        x: ls.labels,
        y: ls.values,
        ...(def.hoverTemplate ? { hovertemplate: def.hoverTemplate } : {}),
        ...(color ? { marker: { color } } : {}),
      };
    case "hbar":
      return {
        type: "bar",
        name: ls.name,
        orientation: "h",
        x: ls.values,
        y: ls.labels,
        ...(def.hoverTemplate ? { hovertemplate: def.hoverTemplate } : {}),
        ...(color ? { marker: { color } } : {}),
      };
    case "line": {
      const marker = def.marker ? { symbol: def.marker } : {};
      return {
        type: "scatter",
        name: ls.name,
        mode: def.marker ? "lines+markers" : "lines",
        x: ls.labels,
        y: ls.values,
        ...(def.fill === "tozero" ? { fill: "tozeroy" as const } : {}),
        ...(def.hoverTemplate ? { hovertemplate: def.hoverTemplate } : {}),
        marker: color ? { ...marker, color } : marker,
      };
    }
    case "box":
      return {
        type: "box",
        name: ls.name,
        y: ls.values,
        ...(color ? { marker: { color } } : {}),
      };
    case "hbox":
      return {
        type: "box",
        name: ls.name,
        x: ls.values,
        ...(color ? { marker: { color } } : {}),
      };
    default:
      return unsupportedSeries(def.type);
  }
}

function unsupportedSeries(type: never): never {
  throw new ConfigurationError(`unsupported series type: ${String(type)}`);
}

export function seriesTraces(
  dataSets: Map<string, DataSet>,
  defs: SeriesDef[],
  colors: ColorTable,
  logger: Logger
): Trace[] {
  return collectSeries(dataSets, defs, logger).map((ls) => renderSeries(ls, colors));
}
