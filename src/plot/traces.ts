import type { PlotValue } from "../data/field-value.js";
import type { MarkerType } from "./definition.js";

export interface MarkerStyle {
  color?: string;
  symbol?: Exclude<MarkerType, "">;
}

export interface BarTrace {
  type: "bar";
  name: string;
  orientation: "v" | "h";
  x: PlotValue[];
  y: PlotValue[];
  hovertemplate?: string;
  marker?: MarkerStyle;
}

export interface ScatterTrace {
  type: "scatter";
  name: string;
  mode: "lines" | "lines+markers";
  x: PlotValue[];
  y: PlotValue[];
  fill?: "tozeroy";
  hovertemplate?: string;
  marker: MarkerStyle;
}

export interface BoxTrace {
  type: "box";
  name: string;
  x?: PlotValue[];
  y?: PlotValue[];
  marker?: MarkerStyle;
}

export interface IndicatorTrace {
  type: "indicator";
  name: string;
  mode: "number" | "number+delta";
  value: number;
  number: {
    prefix?: string;
    suffix?: string;
    font?: { color: string };
  };
  delta?: {
    reference: number;
    relative: boolean;
    valueformat: string;
    increasing?: { color: string };
    decreasing?: { color: string };
  };
  domain: {
    column: number;
    x: [number, number];
  };
  title: { text: string };
}

export interface HeatmapTrace {
  type: "heatmap";
  name: string;
  x: PlotValue[];
  y: PlotValue[];
  z: PlotValue[][];
  colorscale: string;
  reversescale: boolean;
  colorbar?: Record<string, unknown>;
}

export type Trace = BarTrace | ScatterTrace | BoxTrace | IndicatorTrace | HeatmapTrace;

export interface Annotation {
  xref: string;
  yref: string;
  x: PlotValue;
  y: PlotValue;
  text: string;
  showarrow: boolean;
}

/** The chart-description document written for each plot. */
export interface FigureDocument {
  data: Trace[];
  /** The definition's layout, plus the table annotations when there are any. */
  layout: Record<string, unknown>;
  config?: Record<string, unknown>;
  params: Record<string, unknown>;
}
