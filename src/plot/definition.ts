import { Type, type Static } from "@sinclair/typebox";
import { basename, extname } from "path";

import { ConfigurationError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { assertSchema } from "../utils/schema.js";

export const PlotFrequencySchema = Type.Union([
  Type.Literal("weekly"),
  Type.Literal("daily"),
  Type.Literal("hourly"),
]);

export type PlotFrequency = Static<typeof PlotFrequencySchema>;

export const DataSetDefSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  source: Type.String({ minLength: 1 }),
  query: Type.String(),
});

export const ComputeInputDefSchema = Type.Object({
  dataset: Type.String({ description: "Name of the dataset" }),
  joinField: Type.String({ description: "Field the datasets are joined on" }),
  valueField: Type.String({ description: "Field holding the value passed to the function" }),
});

export const ComputedDefSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  function: Type.String({ description: "Predicate applied to matched rows, e.g. diff" }),
  datasets: Type.Array(ComputeInputDefSchema),
});

export const SeriesTypeSchema = Type.Union([
  Type.Literal("bar"),
  Type.Literal("hbar"),
  Type.Literal("line"),
  Type.Literal("box"),
  Type.Literal("hbox"),
]);

export const MarkerTypeSchema = Type.Union([
  Type.Literal(""),
  Type.Literal("circle"),
  Type.Literal("square"),
  Type.Literal("diamond"),
  Type.Literal("triangle"),
  Type.Literal("hexagon"),
]);

export const FillTypeSchema = Type.Union([Type.Literal(""), Type.Literal("tozero")]);

export const SeriesDefSchema = Type.Object({
  type: SeriesTypeSchema,
  name: Type.Optional(Type.String()),
  color: Type.Optional(Type.String()),
  marker: Type.Optional(MarkerTypeSchema),
  fill: Type.Optional(FillTypeSchema),
  dataset: Type.String(),
  labels: Type.Optional(Type.String({ description: "Field used for labels" })),
  values: Type.String({ description: "Field used for values" }),
  groupField: Type.Optional(Type.String({ description: "Field used to split rows into related series" })),
  groupValue: Type.Optional(Type.String({ description: "Value of groupField to keep, or * for one series per value" })),
  hoverTemplate: Type.Optional(Type.String()),
});

export const ScalarTypeSchema = Type.Literal("number");

export const DeltaTypeSchema = Type.Union([Type.Literal(""), Type.Literal("relative")]);

export const ScalarDefSchema = Type.Object({
  type: ScalarTypeSchema,
  name: Type.String(),
  color: Type.Optional(Type.String()),
  dataset: Type.String(),
  value: Type.String({ description: "Field holding the scalar value" }),
  valuePrefix: Type.Optional(Type.String()),
  valueSuffix: Type.Optional(Type.String()),
  deltaDataset: Type.Optional(Type.String()),
  deltaValue: Type.Optional(Type.String()),
  deltaType: Type.Optional(DeltaTypeSchema),
  increaseColor: Type.Optional(Type.String()),
  decreaseColor: Type.Optional(Type.String()),
});

export const TableTypeSchema = Type.Literal("heatmap");

export const TableDefSchema = Type.Object({
  type: TableTypeSchema,
  name: Type.String(),
  dataset: Type.String(),
  labelsX: Type.String(),
  labelsY: Type.String(),
  values: Type.String(),
  colorbar: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const PlotDefSchema = Type.Object({
  name: Type.Optional(Type.String()),
  frequency: PlotFrequencySchema,
  datasets: Type.Optional(Type.Array(DataSetDefSchema)),
  computed: Type.Optional(Type.Array(ComputedDefSchema)),
  series: Type.Optional(Type.Array(SeriesDefSchema)),
  scalars: Type.Optional(Type.Array(ScalarDefSchema)),
  tables: Type.Optional(Type.Array(TableDefSchema)),
  layout: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  config: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export type DataSetDef = Static<typeof DataSetDefSchema>;
export type ComputeInputDef = Static<typeof ComputeInputDefSchema>;
export type ComputedDef = Static<typeof ComputedDefSchema>;
export type SeriesType = Static<typeof SeriesTypeSchema>;
export type MarkerType = Static<typeof MarkerTypeSchema>;
export type DeltaType = Static<typeof DeltaTypeSchema>;

/** Position of the element in its list, used to order output traces. */
interface Ordered {
  order: number;
}

export type SeriesDef = Static<typeof SeriesDefSchema> & Ordered;
export type ScalarDef = Static<typeof ScalarDefSchema> & Ordered;
export type TableDef = Static<typeof TableDefSchema> & Ordered;

export interface PlotDefinition {
  name: string;
  frequency: PlotFrequency;
  datasets: DataSetDef[];
  computed: ComputedDef[];
  series: SeriesDef[];
  scalars: ScalarDef[];
  tables: TableDef[];
  layout: Record<string, unknown>;
  config?: Record<string, unknown>;
}

export function plotName(fileName: string): string {
  return basename(fileName, extname(fileName));
}

function withOrder<T>(items: T[] | undefined): Array<T & Ordered> {
  return (items ?? []).map((item, order) => ({ ...item, order }));
}

/** Validates a decoded definition document and fills in defaults. */
export function toPlotDefinition(fileName: string, raw: unknown): PlotDefinition {
  const doc = assertSchema(PlotDefSchema, raw, `plot definition "${fileName}"`);

  return {
    name: doc.name || plotName(fileName),
    frequency: doc.frequency,
    datasets: doc.datasets ?? [],
    computed: doc.computed ?? [],
    series: withOrder(doc.series),
    scalars: withOrder(doc.scalars),
    tables: withOrder(doc.tables),
    layout: doc.layout ?? {},
    config: doc.config,
  };
}

export function parsePlotDefinition(fileName: string, content: string): PlotDefinition {
  logger.info("parsing plot definition file", { filename: fileName });
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`failed to decode plot definition "${fileName}"`, { cause: error });
  }
  return toPlotDefinition(fileName, raw);
}
