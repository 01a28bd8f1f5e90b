/**
 * Static station → district table, used when the station cannot be searched.
 * Loaded from JSON (data/station-districts.json by default).
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const StationTableSchema = z.object({
  city: z.string().min(1),
  stations: z.array(z.object({
    station: z.string().min(1),
    district: z.string().min(1),
  })),
});

export type StationTable = z.infer<typeof StationTableSchema>;

const STATION_SUFFIX = '역';

/** "강남역 " → "강남" */
export function normalizeStationName(name: string): string {
  const trimmed = name.trim();
  return trimmed.endsWith(STATION_SUFFIX) ? trimmed.slice(0, -STATION_SUFFIX.length).trim() : trimmed;
}

/** Provider query for a station: "강남" → "강남역". */
export function stationSearchQuery(name: string): string {
  return `${normalizeStationName(name)}${STATION_SUFFIX}`;
}

export class StationDirectory {
  private readonly districts: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]>) {
    const districts = new Map<string, string>();
    for (const [station, district] of entries) {
      districts.set(normalizeStationName(station), district);
    }
    this.districts = districts;
  }

  static fromTable(table: StationTable): StationDirectory {
    return new StationDirectory(table.stations.map(s => [s.station, s.district] as const));
  }

  districtFor(station: string): string | undefined {
    return this.districts.get(normalizeStationName(station));
  }

  get size(): number {
    return this.districts.size;
  }
}

/**
 * Read and validate a station table. Relative paths resolve against the
 * working directory. Throws on a missing or malformed file.
 */
export function loadStationDirectory(filePath: string): StationDirectory {
  const resolved = path.resolve(process.cwd(), filePath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  return StationDirectory.fromTable(StationTableSchema.parse(raw));
}
