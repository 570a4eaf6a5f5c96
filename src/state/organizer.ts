import { lstat, mkdir, readdir, writeFile } from "fs/promises";
import { dirname, join } from "path";

import type { PlotFrequency } from "../plot/definition.js";
import { errorMessage, PersistenceError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

const YEAR_DIR = /^20\d\d$/;
const TWO_DIGIT_DIR = /^\d\d$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Weekly plots are placed day-grained, exactly like daily ones. Hourly
 * plots get an extra hour level.
 */
export function truncateBasis(frequency: PlotFrequency, basisTime: Date): Date {
  const t = new Date(basisTime.getTime());
  switch (frequency) {
    case "hourly":
      t.setUTCMinutes(0, 0, 0);
      return t;
    case "daily":
    case "weekly":
      t.setUTCHours(0, 0, 0, 0);
      return t;
  }
}

/** Directory levels below the base for a frequency: year, month, day and, for hourly plots, hour. */
function datedDepth(frequency: PlotFrequency): number {
  return frequency === "hourly" ? 4 : 3;
}

export function datedSegments(frequency: PlotFrequency, basisTime: Date): string[] {
  const t = truncateBasis(frequency, basisTime);
  const segments = [String(t.getUTCFullYear()), pad(t.getUTCMonth() + 1), pad(t.getUTCDate())];
  if (frequency === "hourly") {
    segments.push(pad(t.getUTCHours()));
  }
  return segments;
}

/**
 * Places plot artifacts into a dated hierarchy under a base directory:
 *
 *   base/2023/05/08/demo.json       daily and weekly
 *   base/2023/05/08/10/demo.json    hourly
 *   base/latest/demo.json           copy of the most recent version
 */
export class Organizer {
  readonly base: string;

  constructor(base: string) {
    this.base = base;
  }

  canonicalPath(name: string, frequency: PlotFrequency, basisTime: Date): string {
    return join(this.base, ...datedSegments(frequency, basisTime), `${name}.json`);
  }

  latestPath(name: string): string {
    return join(this.base, "latest", `${name}.json`);
  }

  /** Existing dated artifacts for a name at the frequency's depth. */
  async listDated(name: string, frequency: PlotFrequency): Promise<string[]> {
    const depth = datedDepth(frequency);
    const found: string[] = [];

    const walk = async (dir: string, level: number): Promise<void> => {
      if (level === depth) {
        const candidate = join(dir, `${name}.json`);
        try {
          const info = await lstat(candidate);
          if (info.isFile()) {
            found.push(candidate);
          }
        } catch (error) {
          if (!isNotFound(error)) {
            throw error;
          }
        }
        return;
      }

      let entries: string[];
      try {
        entries = await readdir(dir);
      } catch (error) {
        if (isNotFound(error)) {
          return;
        }
        throw error;
      }

      const pattern = level === 0 ? YEAR_DIR : TWO_DIGIT_DIR;
      for (const entry of entries.filter((e) => pattern.test(e))) {
        await walk(join(dir, entry), level + 1);
      }
    };

    try {
      await walk(this.base, 0);
    } catch (error) {
      throw new PersistenceError(`list artifacts for "${name}": ${errorMessage(error)}`, { cause: error });
    }
    return found;
  }

  /** True when the dated artifact is absent or was last written before expectedTime. */
  async isStaleOrMissing(name: string, frequency: PlotFrequency, basisTime: Date, expectedTime: Date): Promise<boolean> {
    const fname = this.canonicalPath(name, frequency, basisTime);
    try {
      const info = await lstat(fname);
      return info.mtime.getTime() < expectedTime.getTime();
    } catch (error) {
      if (isNotFound(error)) {
        return true;
      }
      throw new PersistenceError(`stat file "${fname}": ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Adds the candidate path to the existing ones and checks whether it sorts
   * last. Zero-padded date segments make lexical order chronological.
   */
  async isLatest(name: string, frequency: PlotFrequency, basisTime: Date): Promise<boolean> {
    const fname = this.canonicalPath(name, frequency, basisTime);
    const existing = await this.listDated(name, frequency);
    existing.push(fname);
    existing.sort();
    return existing[existing.length - 1] === fname;
  }

  /**
   * Writes the dated artifact, then refreshes latest/ when this version is
   * the newest. The two writes are independent; a failed latest write leaves
   * the dated file in place.
   */
  async writeArtifact(data: string | Uint8Array, name: string, frequency: PlotFrequency, basisTime: Date): Promise<string> {
    const fname = this.canonicalPath(name, frequency, basisTime);
    await writeOutput(fname, data);

    if (!(await this.isLatest(name, frequency, basisTime))) {
      logger.debug("plot is not latest", { plot: name, filename: fname });
      return fname;
    }

    await writeOutput(this.latestPath(name), data);
    return fname;
  }
}

export async function writeOutput(fname: string, data: string | Uint8Array): Promise<void> {
  try {
    await mkdir(dirname(fname), { recursive: true });
    const bytes = typeof data === "string" ? Buffer.from(data, "utf-8") : Buffer.from(data);
    await writeFile(fname, Buffer.concat([bytes, Buffer.from("\n")]));
  } catch (error) {
    throw new PersistenceError(`write file "${fname}": ${errorMessage(error)}`, { cause: error });
  }
}
