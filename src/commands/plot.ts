import { readFile } from "fs/promises";

import { builtinSources, type SourceRegistry } from "../data/sources.js";
import type { ColorTable } from "../plot/colors.js";
import { parsePlotDefinition, type PlotDefinition } from "../plot/definition.js";
import { generateFigure } from "../plot/generate.js";
import { expandTemplate, type TemplateEngine } from "../plot/template.js";
import type { FigureDocument } from "../plot/traces.js";
import { writeOutput } from "../state/organizer.js";
import { ConfigurationError, errorMessage, wrapError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export interface PlotOptions {
  definitionPath: string;
  sources?: SourceRegistry;
  colors?: ColorTable;
  templateParams?: Record<string, unknown>;
  basisTime?: Date;
  compact?: boolean;
  /** Describe the definition without running any query. */
  validate?: boolean;
  /** File the document is written to; when absent only the text is returned. */
  output?: string;
  template?: TemplateEngine;
  signal?: AbortSignal;
}

export interface PlotResult {
  name: string;
  text: string;
  outputPath?: string;
}

export function serializeFigure(doc: FigureDocument, compact = false): string {
  return compact ? JSON.stringify(doc) : JSON.stringify(doc, null, 2);
}

export function indent(s: string, prefix: string): string {
  return prefix + s.replace(/\n/g, `\n${prefix}`);
}

export function describeDefinition(pd: PlotDefinition, extra: string[] = []): string[] {
  const lines = [`Name: ${pd.name}`, `Frequency: ${pd.frequency}`, ...extra, "Datasets:"];
  for (const ds of pd.datasets) {
    lines.push(`  Name: ${ds.name}`, `  Source: ${ds.source}`, "  Query:", indent(ds.query, "      "));
  }
  return lines;
}

/** Reads, templates and parses a definition file. */
export async function loadDefinition(
  fname: string,
  basisTime: Date,
  params: Record<string, unknown>,
  template: TemplateEngine = expandTemplate
): Promise<{ definition: PlotDefinition; content: string }> {
  let source: string;
  try {
    source = await readFile(fname, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`failed to read plot definition "${fname}": ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let templated: string;
  try {
    templated = await template(source, { basisTime, params });
  } catch (error) {
    throw wrapError(`failed to execute templates for plot definition "${fname}"`, error);
  }

  return { definition: parsePlotDefinition(fname, templated), content: templated };
}

/** Generates a single plot document from one definition file. */
export async function generatePlot(options: PlotOptions): Promise<PlotResult> {
  const basisTime = options.basisTime ?? new Date();
  const params = options.templateParams ?? {};
  const { definition } = await loadDefinition(options.definitionPath, basisTime, params, options.template);

  if (options.validate) {
    return { name: definition.name, text: describeDefinition(definition).join("\n") };
  }

  logger.info("generating figure", { filename: options.definitionPath });
  let doc: FigureDocument;
  try {
    doc = await generateFigure(
      definition,
      { sources: options.sources ?? builtinSources(), colors: options.colors, templateParams: params },
      options.signal
    );
  } catch (error) {
    throw wrapError(`failed to generate plot "${definition.name}"`, error);
  }

  const text = serializeFigure(doc, options.compact);
  if (options.output) {
    await writeOutput(options.output, text);
    return { name: definition.name, text, outputPath: options.output };
  }
  return { name: definition.name, text };
}
