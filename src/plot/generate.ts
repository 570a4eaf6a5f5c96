import { derive } from "../compute/derive.js";
import { getPredicate } from "../compute/predicates.js";
import type { DataSet } from "../data/dataset.js";
import type { SourceRegistry } from "../data/sources.js";
import { ConfigurationError, throwIfAborted, wrapError } from "../utils/errors.js";
import { plotLogger, type Logger } from "../utils/logger.js";
import { ColorTable } from "./colors.js";
import type { PlotDefinition } from "./definition.js";
import { scalarTraces } from "./scalars.js";
import { seriesTraces } from "./series.js";
import { tableTraces, type TableOutput } from "./tables.js";
import type { FigureDocument, Trace } from "./traces.js";

export interface PlotContext {
  sources: SourceRegistry;
  colors?: ColorTable;
  /** Echoed into the output document. */
  templateParams?: Record<string, unknown>;
}

function stripNewlines(s: string): string {
  return s.replace(/\n/g, " ");
}

/** Fetches every declared dataset, then derives the computed ones in declaration order. */
export async function resolveDataSets(
  def: PlotDefinition,
  ctx: PlotContext,
  logger: Logger,
  signal?: AbortSignal
): Promise<Map<string, DataSet>> {
  const dataSets = new Map<string, DataSet>();

  for (const ds of def.datasets) {
    throwIfAborted(signal);
    const src = ctx.sources.get(ds.source);
    if (!src) {
      throw new ConfigurationError(`unknown dataset source: "${ds.source}"`);
    }
    logger.debug("getting dataset", { dataset: ds.name, source: ds.source, query: stripNewlines(ds.query) });
    try {
      dataSets.set(ds.name, await src.getDataSet(ds.query));
    } catch (error) {
      throw wrapError(`failed to get dataset "${ds.name}" from source "${ds.source}"`, error);
    }
  }

  for (const cds of def.computed) {
    throwIfAborted(signal);
    if (dataSets.has(cds.name)) {
      throw new ConfigurationError(`computed dataset name conflicts with existing dataset: "${cds.name}"`);
    }
    if (cds.datasets.length !== 2) {
      throw new ConfigurationError(
        `unexpected number of datasets in computed dataset "${cds.name}": ${cds.datasets.length}`
      );
    }
    const [left, right] = cds.datasets;
    const leftSet = dataSets.get(left.dataset);
    const rightSet = dataSets.get(right.dataset);
    if (!leftSet || !rightSet) {
      const missing = leftSet ? right.dataset : left.dataset;
      throw new ConfigurationError(`unknown dataset in computed dataset "${cds.name}": "${missing}"`);
    }
    getPredicate(cds.function);

    logger.debug("computing dataset", {
      computed: cds.name,
      function: cds.function,
      dataset1: left.dataset,
      dataset2: right.dataset,
    });
    try {
      dataSets.set(
        cds.name,
        derive(
          cds.function,
          { name: left.dataset, dataSet: leftSet, joinField: left.joinField, valueField: left.valueField },
          { name: right.dataset, dataSet: rightSet, joinField: right.joinField, valueField: right.valueField }
        )
      );
    } catch (error) {
      throw wrapError(`failed to compute dataset "${cds.name}"`, error);
    }
  }

  return dataSets;
}

/**
 * Builds the chart document for a definition. Cancellation is checked
 * before each dataset fetch and each derivation; a query already sent to a
 * source runs to completion.
 */
export async function generateFigure(
  def: PlotDefinition,
  ctx: PlotContext,
  signal?: AbortSignal
): Promise<FigureDocument> {
  const logger = plotLogger(def.name);
  const colors = ctx.colors ?? new ColorTable();

  const dataSets = await resolveDataSets(def, ctx, logger, signal);

  const data: Trace[] = [];
  try {
    data.push(...seriesTraces(dataSets, def.series, colors, logger));
  } catch (error) {
    throw wrapError("series traces", error);
  }
  try {
    data.push(...scalarTraces(dataSets, def.scalars, colors, logger));
  } catch (error) {
    throw wrapError("scalar traces", error);
  }

  let tables: TableOutput;
  try {
    tables = tableTraces(dataSets, def.tables, logger);
  } catch (error) {
    throw wrapError("table traces", error);
  }
  data.push(...tables.traces);

  const layout: Record<string, unknown> = { ...def.layout };
  if (tables.annotations.length > 0) {
    layout.annotations = tables.annotations;
  }

  return {
    data,
    layout,
    ...(def.config ? { config: def.config } : {}),
    params: ctx.templateParams ?? {},
  };
}
