export type { FieldValue, FieldKind, PlotValue } from "./src/data/field-value.js";
export {
  boolValue,
  canonicalText,
  durationValue,
  errorValue,
  floatValue,
  fromJsValue,
  intValue,
  nullValue,
  textValue,
  timestampValue,
  toPlotValue,
} from "./src/data/field-value.js";
export type { DataSet, StaticDataSetOptions } from "./src/data/dataset.js";
export { StaticDataSet } from "./src/data/dataset.js";
export type { DataSource, SourceRegistry, FixtureRows } from "./src/data/sources.js";
export { builtinSources, createSourceRegistry, DemoDataSource, FixtureDataSource } from "./src/data/sources.js";
export { DuckDbDataSource } from "./src/data/duckdb-source.js";
export { DbRunner, createDefaultRunner } from "./src/cli/db-runner.js";
export type { QueryRunner } from "./src/cli/db-runner.js";

export type { BinaryPredicate, Result } from "./src/compute/predicates.js";
export { diff, getPredicate, registerPredicate } from "./src/compute/predicates.js";
export type { DeriveInput } from "./src/compute/derive.js";
export { derive } from "./src/compute/derive.js";

export type {
  PlotDefinition,
  PlotFrequency,
  SeriesDef,
  ScalarDef,
  TableDef,
  DataSetDef,
  ComputedDef,
} from "./src/plot/definition.js";
export { parsePlotDefinition, toPlotDefinition } from "./src/plot/definition.js";
export { ColorTable } from "./src/plot/colors.js";
export type { PlotContext } from "./src/plot/generate.js";
export { generateFigure } from "./src/plot/generate.js";
export type { TemplateContext, TemplateEngine } from "./src/plot/template.js";
export { expandTemplate } from "./src/plot/template.js";
export type { Annotation, FigureDocument, Trace } from "./src/plot/traces.js";

export { Organizer, truncateBasis } from "./src/state/organizer.js";
export { loadColorTable, loadProfiles } from "./src/state/conf-dir.js";
export type { ProcessingProfile } from "./src/state/conf-dir.js";
export { getConfig, resetConfig } from "./src/state/config.js";
export type { PlotforgeConfig } from "./src/state/config.js";

export type { PlotOptions, PlotResult } from "./src/commands/plot.js";
export { generatePlot } from "./src/commands/plot.js";
export type { BatchOptions, BatchReport } from "./src/commands/batch.js";
export { batchOptionsFromConfig, runBatch } from "./src/commands/batch.js";
export { parseBasisTime } from "./src/commands/basis.js";

export { ConfigurationError, DataAccessError, PersistenceError, PlotError } from "./src/utils/errors.js";
export { logger } from "./src/utils/logger.js";
