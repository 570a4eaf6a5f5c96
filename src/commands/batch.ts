import { readdir, stat } from "fs/promises";
import { basename, dirname, join, resolve } from "path";

import { builtinSources, createSourceRegistry, type SourceRegistry } from "../data/sources.js";
import { ColorTable } from "../plot/colors.js";
import { generateFigure } from "../plot/generate.js";
import { expandTemplate, type TemplateEngine } from "../plot/template.js";
import { loadColorTable, loadProfiles, type ProcessingProfile } from "../state/conf-dir.js";
import { getConfig } from "../state/config.js";
import { Organizer } from "../state/organizer.js";
import { errorMessage, wrapError } from "../utils/errors.js";
import { matchesGlob } from "../utils/glob.js";
import { logger, plotLogger, setLogLevel } from "../utils/logger.js";
import { parseBasisTime } from "./basis.js";
import { withHeartbeat } from "./heartbeat.js";
import { describeDefinition, loadDefinition, serializeFigure } from "./plot.js";
import { runPool } from "./pool.js";

export const DEFAULT_CONCURRENCY = 6;
export const DEFAULT_HEARTBEAT_MS = 60_000;

export interface BatchOptions {
  profiles: ProcessingProfile[];
  outDir: string;
  basisTime: Date;
  sources?: SourceRegistry;
  colors?: ColorTable;
  concurrency?: number;
  /** Print what would be generated without running queries. Forces a concurrency of one. */
  validate?: boolean;
  /** Regenerate plots whose output is already up to date. */
  force?: boolean;
  compact?: boolean;
  /** Glob over definition file names, replacing the profile's own selection. */
  match?: string | null;
  heartbeatMs?: number;
  template?: TemplateEngine;
  print?: (line: string) => void;
  signal?: AbortSignal;
}

export interface BatchReport {
  written: string[];
  skipped: string[];
  validated: string[];
}

/** Definition files selected by a profile, sorted by name. */
export async function listDefinitionFiles(profile: ProcessingProfile, match?: string | null): Promise<string[]> {
  const info = await stat(profile.source);
  const dir = info.isDirectory() ? profile.source : dirname(profile.source);
  const pattern = match || (info.isDirectory() ? "*.json" : basename(profile.source));

  logger.info(`using plot definitions in ${dir}`);
  const entries = await readdir(dir);
  return entries
    .filter((entry) => matchesGlob(entry, pattern))
    .sort()
    .map((entry) => join(dir, entry));
}

async function profileOutputDir(
  outDir: string,
  profile: ProcessingProfile,
  variant: Record<string, unknown>,
  basisTime: Date,
  template: TemplateEngine
): Promise<string> {
  if (!profile.output) {
    return resolve(outDir);
  }
  const output = await template(profile.output, { basisTime, params: variant });
  return resolve(outDir, output);
}

interface PlotJob {
  fname: string;
  variant: Record<string, unknown>;
  base: string;
}

async function processPlot(job: PlotJob, options: BatchOptions, report: BatchReport, signal: AbortSignal): Promise<void> {
  const template = options.template ?? expandTemplate;
  const print = options.print ?? ((line: string) => process.stdout.write(`${line}\n`));

  const { definition: pd } = await loadDefinition(job.fname, options.basisTime, job.variant, template);
  const log = plotLogger(pd.name);
  const org = new Organizer(job.base);

  const plotFilename = org.canonicalPath(pd.name, pd.frequency, options.basisTime);
  log.debug("plot filename", { filepath: plotFilename });

  const info = await stat(job.fname);

  let isMissingOrStale = false;
  try {
    isMissingOrStale = await org.isStaleOrMissing(pd.name, pd.frequency, options.basisTime, info.mtime);
  } catch (error) {
    log.error("failed to determine if plot file needs writing", { error: errorMessage(error) });
  }

  const shouldWrite = Boolean(options.force) || isMissingOrStale;
  log.debug(shouldWrite ? "plot file should be written" : "plot file does not need to be written");

  let isLatest = false;
  try {
    isLatest = await org.isLatest(pd.name, pd.frequency, options.basisTime);
  } catch (error) {
    log.error("failed to determine if plot file is latest", { error: errorMessage(error) });
  }
  log.debug(isLatest ? "plot is latest" : "plot is not latest");

  if (options.validate) {
    const lines = describeDefinition(pd, [
      `Output: ${plotFilename}`,
      `Is missing or stale: ${isMissingOrStale}`,
      `Is latest version: ${isLatest}`,
    ]);
    lines.forEach((line) => print(line));
    report.validated.push(plotFilename);
    return;
  }

  if (!shouldWrite) {
    log.info("skipping plot, output already exists");
    report.skipped.push(plotFilename);
    return;
  }

  log.info("generating plot");
  const heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
  let text: string;
  try {
    const doc = await withHeartbeat(
      heartbeatMs,
      (elapsedMs) => log.info("still generating plot", { elapsed: `${Math.round(elapsedMs / 1000)}s` }),
      () =>
        generateFigure(
          pd,
          { sources: options.sources ?? builtinSources(), colors: options.colors, templateParams: job.variant },
          signal
        )
    );
    text = serializeFigure(doc, options.compact);
  } catch (error) {
    throw wrapError(`failed to generate plot "${pd.name}"`, error);
  }

  log.info("writing plot output", { filename: plotFilename });
  try {
    await org.writeArtifact(text, pd.name, pd.frequency, options.basisTime);
  } catch (error) {
    throw wrapError(`failed to write plot "${pd.name}"`, error);
  }
  report.written.push(plotFilename);
}

/**
 * Generates every definition selected by every profile, once per variant.
 * Variants run one after another; the definitions of a variant run through
 * a bounded pool that stops at the first failure.
 */
export async function runBatch(options: BatchOptions): Promise<BatchReport> {
  const concurrency = options.validate ? 1 : options.concurrency ?? DEFAULT_CONCURRENCY;
  const template = options.template ?? expandTemplate;
  const report: BatchReport = { written: [], skipped: [], validated: [] };

  logger.info(`plots will be generated for time ${options.basisTime.toISOString()}`);
  logger.info(`plot output directory: ${options.outDir}`);
  logger.info(`using concurrency ${concurrency}`);

  for (const profile of options.profiles) {
    const fnames = await listDefinitionFiles(profile, options.match);

    for (const variant of profile.variants) {
      const base = await profileOutputDir(options.outDir, profile, variant, options.basisTime, template);
      const jobs = fnames.map((fname) => ({ fname, variant, base }));
      await runPool(jobs, concurrency, (job, signal) => processPlot(job, options, report, signal), options.signal);
    }
  }

  return report;
}

/** Batch options from configuration: the conf directory's colors and profiles, sources and basis time. */
export async function batchOptionsFromConfig(): Promise<BatchOptions> {
  const config = getConfig();
  setLogLevel(config.logLevel);

  let colors = new ColorTable();
  let profiles: ProcessingProfile[] = [];
  if (config.confDir) {
    logger.info(`reading config from: ${config.confDir}`);
    colors = await loadColorTable(config.confDir);
    profiles = await loadProfiles(config.confDir);
  }

  return {
    profiles,
    colors,
    outDir: config.outDir,
    basisTime: parseBasisTime(config.basis),
    sources: createSourceRegistry(config.sources),
    concurrency: config.concurrency,
    validate: config.validate,
    force: config.force,
    compact: config.compact,
    match: config.match,
    heartbeatMs: config.heartbeatMs,
  };
}
