/**
 * JSON town descriptions stored under `configs/towns/`.
 *
 * Each file holds `{ name, description, twoWay?, adjacency, coordinates }`;
 * adjacency maps a location to `[neighbor, weight]` roads and coordinates map
 * it to `[x, y]`.
 */

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import type { TownDescription } from "@town-sim/types";
import { z } from "zod";

import { EDGE_ARROW, isValidVertexName } from "../domain/edge.js";
import { buildTown } from "../town/build-town.js";
import type { Town, TownOptions } from "../town/town.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const vertexNameSchema = z
  .string()
  .refine(isValidVertexName, { message: `Vertex names must be non-empty and must not contain "${EDGE_ARROW}"` });

const roadSchema = z.tuple([vertexNameSchema, z.number().nonnegative()]);

export const townDescriptionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  twoWay: z.boolean().optional(),
  adjacency: z.record(vertexNameSchema, z.array(roadSchema)),
  coordinates: z.record(vertexNameSchema, z.tuple([z.number(), z.number()])).default({}),
});

export interface TownConfigInfo {
  name: string;
  description: string;
  vertexCount: number;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/towns/`.
 * Works from both source (packages/routing/src/config/) and compiled paths.
 */
export function findTownConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "towns");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // Fallback: repo root relative to packages/routing/src/config
  return join(resolve(__dirname, "..", "..", "..", ".."), "configs", "towns");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Validate raw JSON as a town description */
export function parseTownDescription(raw: unknown): TownDescription {
  return townDescriptionSchema.parse(raw);
}

/** Read `configs/towns/<name>.json` (or a file in `root`) */
export function loadTownDescription(name: string, root = findTownConfigsRoot()): TownDescription {
  const filePath = join(root, `${name}.json`);
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  const description = parseTownDescription(raw);
  console.log(
    `[config] Loaded town "${description.name}" (${Object.keys(description.adjacency).length} vertices) from ${filePath}`,
  );
  return description;
}

/** Build a town from a description */
export function townFromDescription(description: TownDescription, options: TownOptions = {}): Town {
  return buildTown(description.adjacency, description.coordinates, {
    ...options,
    twoWay: description.twoWay,
  });
}

/** Load and build a named town config */
export function loadTown(name: string, options: TownOptions = {}, root?: string): Town {
  return townFromDescription(loadTownDescription(name, root), options);
}

/** List the town configs available in `root` */
export function listTownConfigs(root = findTownConfigsRoot()): TownConfigInfo[] {
  if (!existsSync(root)) return [];

  const towns: TownConfigInfo[] = [];
  for (const file of readdirSync(root)) {
    if (!file.endsWith(".json")) continue;
    const raw: unknown = JSON.parse(readFileSync(join(root, file), "utf-8"));
    const parsed = townDescriptionSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[config] Skipping ${file}: ${parsed.error.issues[0]?.message ?? "invalid town"}`);
      continue;
    }
    towns.push({
      name: file.replace(/\.json$/, ""),
      description: parsed.data.description,
      vertexCount: Object.keys(parsed.data.adjacency).length,
    });
  }
  return towns.sort((a, b) => a.name.localeCompare(b.name));
}
