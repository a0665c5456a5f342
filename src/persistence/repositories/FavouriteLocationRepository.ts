import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';

export interface FavouriteLocation {
  id: number;
  name: string;
  admin1?: string;
  country?: string;
  latitude: number;
  longitude: number;
  timezone?: string;
  /** `Name, Region, Country`; unique across favourites. */
  label: string;
  createdAt: number;
}

export type NewFavouriteLocation = Omit<FavouriteLocation, 'id' | 'label' | 'createdAt'>;

interface FavouriteRow {
  id: number;
  name: string;
  admin1: string | null;
  country: string | null;
  latitude: number;
  longitude: number;
  timezone: string | null;
  label: string;
  created_at: number;
}

export function formatLocationLabel(location: Pick<FavouriteLocation, 'name' | 'admin1' | 'country'>): string {
  return [location.name, location.admin1, location.country]
    .filter((part): part is string => Boolean(part && part.trim()))
    .join(', ');
}

function toFavourite(row: FavouriteRow): FavouriteLocation {
  return {
    id: row.id,
    name: row.name,
    admin1: row.admin1 ?? undefined,
    country: row.country ?? undefined,
    latitude: row.latitude,
    longitude: row.longitude,
    timezone: row.timezone ?? undefined,
    label: row.label,
    createdAt: row.created_at,
  };
}

export class FavouriteLocationRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  /** Adds a favourite; returns null when a favourite with the same label already exists. */
  add(location: NewFavouriteLocation): FavouriteLocation | null {
    const label = formatLocationLabel(location);
    const result = this.db
      .prepare(
        `INSERT INTO favourite_locations (name, admin1, country, latitude, longitude, timezone, label)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(label) DO NOTHING`
      )
      .run(
        location.name,
        location.admin1 ?? null,
        location.country ?? null,
        location.latitude,
        location.longitude,
        location.timezone ?? null,
        label
      );

    if (result.changes === 0) {
      return null;
    }
    return this.get(Number(result.lastInsertRowid));
  }

  get(id: number): FavouriteLocation | null {
    const row = this.db
      .prepare<[number], FavouriteRow>(
        `SELECT id, name, admin1, country, latitude, longitude, timezone, label, created_at
         FROM favourite_locations WHERE id = ?`
      )
      .get(id);
    return row ? toFavourite(row) : null;
  }

  /** Favourites in insertion order. */
  list(): FavouriteLocation[] {
    const rows = this.db
      .prepare<[], FavouriteRow>(
        `SELECT id, name, admin1, country, latitude, longitude, timezone, label, created_at
         FROM favourite_locations ORDER BY id ASC`
      )
      .all();
    return rows.map(toFavourite);
  }

  remove(id: number): boolean {
    const result = this.db.prepare('DELETE FROM favourite_locations WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
