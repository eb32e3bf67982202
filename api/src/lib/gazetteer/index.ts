/**
 * Location Gazetteer
 *
 * Static place name → bounding box + centroid table, loaded once from
 * data/gazetteer.json and shared read-only by every request.
 * Lookup is exact (case and whitespace insensitive); unknown names are
 * rejected rather than guessed.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type {
  BoundingBox,
  Centroid,
  LocationPredicate,
} from '../../../../shared/types/intent';

export type LocationKind = 'basin' | 'sea' | 'coastal' | 'band';

export interface GazetteerEntry {
  name: string;
  kind: LocationKind;
  predicate: LocationPredicate;
  centroid: Centroid;
}

// ============================================================================
// File Schema
// ============================================================================

const latitudeSchema = z.number().min(-90).max(90);
const longitudeSchema = z.number().min(-180).max(180);

const boundingBoxSchema: z.ZodType<BoundingBox> = z
  .object({
    latMin: latitudeSchema,
    latMax: latitudeSchema,
    lonMin: longitudeSchema.optional(),
    lonMax: longitudeSchema.optional(),
  })
  .refine((box) => box.latMin <= box.latMax, {
    message: 'latMin must not exceed latMax',
  })
  .refine((box) => (box.lonMin === undefined) === (box.lonMax === undefined), {
    message: 'lonMin and lonMax must be given together',
  });

const entrySchema = z.object({
  name: z.string().min(1),
  kind: z.enum(['basin', 'sea', 'coastal', 'band']),
  bounds: boundingBoxSchema,
  centroid: z.object({
    latitude: latitudeSchema,
    longitude: longitudeSchema,
  }),
});

const gazetteerFileSchema = z.object({
  locations: z.array(entrySchema).min(1),
});

// ============================================================================
// Gazetteer
// ============================================================================

export function normalizeLocationName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

export class Gazetteer {
  private readonly entries: ReadonlyMap<string, GazetteerEntry>;

  constructor(entries: GazetteerEntry[]) {
    const map = new Map<string, GazetteerEntry>();
    for (const entry of entries) {
      const key = normalizeLocationName(entry.name);
      if (map.has(key)) {
        throw new Error(`Duplicate gazetteer entry: ${key}`);
      }
      map.set(key, Object.freeze({ ...entry, name: key }));
    }
    this.entries = map;
  }

  /**
   * Look up a place by exact name
   */
  resolve(name: string): GazetteerEntry | undefined {
    return this.entries.get(normalizeLocationName(name));
  }

  /**
   * Every accepted name, in file order
   */
  listKnownNames(): string[] {
    return Array.from(this.entries.keys());
  }

  list(): GazetteerEntry[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Validate parsed gazetteer JSON and build the lookup table
 *
 * @throws ZodError if the file does not match the expected shape
 */
export function parseGazetteer(input: unknown): Gazetteer {
  const file = gazetteerFileSchema.parse(input);
  return new Gazetteer(
    file.locations.map((location) => ({
      name: location.name,
      kind: location.kind,
      predicate: { kind: 'bounds', bounds: location.bounds },
      centroid: location.centroid,
    }))
  );
}

export const DEFAULT_GAZETTEER_PATH = new URL(
  '../../../data/gazetteer.json',
  import.meta.url
);

export function loadGazetteer(path: string | URL = DEFAULT_GAZETTEER_PATH): Gazetteer {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseGazetteer(raw);
}

let sharedGazetteer: Gazetteer | null = null;

/**
 * Process-wide gazetteer, loaded on first use
 */
export function getGazetteer(): Gazetteer {
  if (!sharedGazetteer) {
    sharedGazetteer = loadGazetteer();
  }
  return sharedGazetteer;
}
