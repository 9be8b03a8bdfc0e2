// worldcore/world/WorldSeedLoader.ts
//
// Reads the immutable catalog and static occluder geometry from
// worldcore/data/*.json. Malformed entries are skipped with a warning;
// a missing file yields an empty list.

import fs from "node:fs";
import path from "node:path";

import { Logger } from "../utils/logger";
import type { CatalogObject } from "../shared/InteractableObject";
import { isFiniteVec3 } from "../shared/Vec3";
import { SURFACE_KINDS } from "../visibility/RayCaster";
import type { Occluder } from "../visibility/AabbRayCaster";
import { isRecord } from "../utils/guards";

const log = Logger.scope("WORLD");

export const DEFAULT_DATA_DIR = process.env.BW_DATA_DIR || path.resolve(__dirname, "..", "data");

function readJsonArray(file: string): unknown[] {
  if (!fs.existsSync(file)) {
    log.warn("Seed file not found", { file });
    return [];
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  if (!Array.isArray(parsed)) {
    log.warn("Seed file is not a JSON array", { file });
    return [];
  }
  return parsed;
}

export function parseCatalogEntry(raw: unknown): CatalogObject | null {
  if (!isRecord(raw)) return null;

  const { id, name, baseValue, position, size } = raw;
  if (typeof id !== "string" || !id) return null;
  if (typeof baseValue !== "number" || !Number.isFinite(baseValue) || baseValue < 0) return null;
  if (!isFiniteVec3(position) || !isFiniteVec3(size)) return null;

  return {
    kind: "catalog",
    id,
    name: typeof name === "string" ? name : undefined,
    baseValue,
    position,
    size,
  };
}

export function parseOccluder(raw: unknown): Occluder | null {
  if (!isRecord(raw)) return null;

  const { id, surface, min, max } = raw;
  const kind = SURFACE_KINDS.find((k) => k === surface);
  if (typeof id !== "string" || !id || !kind) return null;
  if (!isFiniteVec3(min) || !isFiniteVec3(max)) return null;

  return { id, surface: kind, min, max };
}

export function loadCatalog(dataDir: string = DEFAULT_DATA_DIR): CatalogObject[] {
  const out: CatalogObject[] = [];
  for (const raw of readJsonArray(path.join(dataDir, "catalog.json"))) {
    const entry = parseCatalogEntry(raw);
    if (entry) out.push(entry);
    else log.warn("Skipping malformed catalog entry", { raw });
  }
  return out;
}

export function loadOccluders(dataDir: string = DEFAULT_DATA_DIR): Occluder[] {
  const out: Occluder[] = [];
  for (const raw of readJsonArray(path.join(dataDir, "occluders.json"))) {
    const occ = parseOccluder(raw);
    if (occ) out.push(occ);
    else log.warn("Skipping malformed occluder", { raw });
  }
  return out;
}
