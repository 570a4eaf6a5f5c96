import { Type, type Static } from "@sinclair/typebox";
import { readFile } from "fs/promises";
import { isAbsolute, join } from "path";

import { ColorTable } from "../plot/colors.js";
import { ConfigurationError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { assertSchema } from "../utils/schema.js";

export const ColorDocSchema = Type.Object({
  default: Type.Optional(Type.String()),
  colors: Type.Array(
    Type.Object({
      name: Type.String(),
      color: Type.String(),
    })
  ),
});

export const ProfileSchema = Type.Object({
  source: Type.String({ description: "Directory of plot definitions, or a single definition file" }),
  output: Type.Optional(Type.String()),
  variants: Type.Optional(Type.Array(Type.Record(Type.String(), Type.Unknown()))),
});

export const ProfilesDocSchema = Type.Array(ProfileSchema);

export type ColorDoc = Static<typeof ColorDocSchema>;

export interface ProcessingProfile {
  source: string;
  output?: string;
  /** Template parameter sets; every definition is generated once per variant. */
  variants: Array<Record<string, unknown>>;
}

async function readJson(path: string): Promise<unknown> {
  const raw = await readFile(path, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`failed to decode ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

export function colorTableFromDoc(doc: ColorDoc): ColorTable {
  const colors: Record<string, string> = {};
  for (const nc of doc.colors) {
    colors[nc.name] = nc.color;
  }
  return new ColorTable(colors, doc.default ?? "");
}

export async function loadColorTable(confDir: string): Promise<ColorTable> {
  const path = join(confDir, "colors.json");
  logger.info("parsing colors.json", { filename: path });
  const doc = assertSchema(ColorDocSchema, await readJson(path), path);
  return colorTableFromDoc(doc);
}

export async function loadProfiles(confDir: string): Promise<ProcessingProfile[]> {
  const path = join(confDir, "profiles.json");
  const docs = assertSchema(ProfilesDocSchema, await readJson(path), path);
  return docs.map((profile) => ({
    source: isAbsolute(profile.source) ? profile.source : join(confDir, profile.source),
    output: profile.output,
    variants: profile.variants && profile.variants.length > 0 ? profile.variants : [{}],
  }));
}
