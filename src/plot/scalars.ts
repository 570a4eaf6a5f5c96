import type { DataSet } from "../data/dataset.js";
import { numericValue } from "../data/field-value.js";
import { ConfigurationError } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import type { ColorTable } from "./colors.js";
import type { ScalarDef } from "./definition.js";
import type { IndicatorTrace, Trace } from "./traces.js";

type FirstRowValues = Map<string, Map<string, number>>;

function addField(fields: Map<string, string[]>, dataset: string, field: string): void {
  const list = fields.get(dataset) ?? [];
  if (!list.includes(field)) {
    list.push(field);
  }
  fields.set(dataset, list);
}

/** Reads the first row of every referenced dataset, keeping the numeric fields the scalars need. */
function readFirstRows(dataSets: Map<string, DataSet>, defs: ScalarDef[], logger: Logger): FirstRowValues {
  const fieldsUsed = new Map<string, string[]>();
  for (const s of defs) {
    if (!dataSets.has(s.dataset)) {
      logger.warn(`unknown dataset name "${s.dataset}" for scalar ${s.name}`);
      continue;
    }
    addField(fieldsUsed, s.dataset, s.value);

    if (s.deltaDataset) {
      if (!dataSets.has(s.deltaDataset)) {
        logger.warn(`unknown delta dataset name "${s.deltaDataset}" for scalar ${s.name}`);
        continue;
      }
      addField(fieldsUsed, s.deltaDataset, s.deltaValue ?? "");
    }
  }

  const values: FirstRowValues = new Map();
  for (const [dsname, fields] of fieldsUsed) {
    const ds = dataSets.get(dsname);
    if (!ds) {
      continue;
    }

    logger.info("reading first row of dataset", { dataset: dsname });
    ds.resetIterator();
    if (!ds.next()) {
      const error = ds.err();
      if (error) {
        logger.warn(`error reading dataset "${dsname}": ${error.message}`);
      } else {
        logger.warn(`no rows found for dataset "${dsname}"`);
      }
      continue;
    }

    const row = new Map<string, number>();
    for (const f of fields) {
      const v = ds.field(f);
      const n = numericValue(v);
      if (n === undefined) {
        logger.warn(`field "${f}" not read from dataset "${dsname}" (${v.kind === "error" ? v.error.message : v.kind})`);
        continue;
      }
      row.set(f, n);
    }
    values.set(dsname, row);
  }

  return values;
}

function deltaColor(value: number, reference: number, s: ScalarDef, colors: ColorTable): string | undefined {
  if (value > reference) {
    return colors.resolve(s.increaseColor);
  }
  if (value < reference) {
    return colors.resolve(s.decreaseColor);
  }
  return colors.resolve(s.color);
}

/**
 * One indicator per scalar, laid out side by side. Each takes an equal share
 * of the width at its declaration index, so skipped scalars leave a gap.
 */
export function scalarTraces(
  dataSets: Map<string, DataSet>,
  defs: ScalarDef[],
  colors: ColorTable,
  logger: Logger
): Trace[] {
  const values = readFirstRows(dataSets, defs, logger);
  const traces: Trace[] = [];
  const domainX = defs.length > 0 ? 1 / defs.length : 1;

  for (const s of defs) {
    if (s.type !== "number") {
      throw new ConfigurationError(`unsupported scalar type: ${String(s.type)}`);
    }

    const value = values.get(s.dataset)?.get(s.value);
    if (value === undefined) {
      logger.warn(`missing value field for scalar ${s.name}`);
      continue;
    }

    const idx = s.order;
    const trace: IndicatorTrace = {
      type: "indicator",
      name: s.name,
      mode: "number",
      value,
      number: {
        ...(s.valuePrefix ? { prefix: s.valuePrefix } : {}),
        ...(s.valueSuffix ? { suffix: s.valueSuffix } : {}),
      },
      domain: {
        column: idx,
        x: [domainX * idx, domainX * (idx + 1)],
      },
      title: { text: s.name },
    };

    let fontColor = colors.resolve(s.color);

    if (s.deltaDataset) {
      const reference = values.get(s.deltaDataset)?.get(s.deltaValue ?? "");
      if (reference === undefined) {
        logger.warn(`missing delta value field for scalar ${s.name}`);
        continue;
      }
      if (s.deltaType !== "relative") {
        throw new ConfigurationError(`unsupported delta type for scalar ${s.name}: "${s.deltaType ?? ""}"`);
      }

      const increasing = colors.resolve(s.increaseColor);
      const decreasing = colors.resolve(s.decreaseColor);
      trace.mode = "number+delta";
      trace.delta = {
        reference,
        relative: true,
        valueformat: ".2%",
        ...(increasing ? { increasing: { color: increasing } } : {}),
        ...(decreasing ? { decreasing: { color: decreasing } } : {}),
      };
      fontColor = deltaColor(value, reference, s, colors);
    }

    if (fontColor) {
      trace.number.font = { color: fontColor };
    }
    traces.push(trace);
  }

  return traces;
}
