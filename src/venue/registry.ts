/**
 * In-memory venue registry.
 *
 * Venues are immutable; loading a venue with an existing id swaps in a
 * new Venue object. Requests that already hold the old object keep
 * mapping against it.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { UnknownVenueError } from '../errors.js';
import type { VenueSummary } from './types.js';
import { parseVenue } from './validate.js';
import type { Venue } from './venue.js';

export class VenueRegistry {
  private venues = new Map<string, Venue>();

  /** Validate raw venue JSON and register the result. */
  load(raw: unknown): Venue {
    const venue = parseVenue(raw);
    this.venues.set(venue.id, venue);
    return venue;
  }

  /** Register a venue already built by `parseVenue`. */
  add(venue: Venue): void {
    this.venues.set(venue.id, venue);
  }

  remove(venueId: string): boolean {
    return this.venues.delete(venueId);
  }

  has(venueId: string): boolean {
    return this.venues.has(venueId);
  }

  get(venueId: string): Venue {
    const venue = this.venues.get(venueId);
    if (!venue) throw new UnknownVenueError(venueId);
    return venue;
  }

  list(): VenueSummary[] {
    return [...this.venues.values()]
      .map((venue) => venue.summary())
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  get size(): number {
    return this.venues.size;
  }
}

/** Read and validate `<dir>/<venueId>.json`. */
export async function loadVenueFile(dir: string, venueId: string): Promise<Venue> {
  const raw = await readFile(join(dir, `${venueId}.json`), 'utf-8');
  return parseVenue(JSON.parse(raw));
}

/**
 * Load every `*.json` venue in a directory. Any invalid venue fails the
 * whole load, so a bad file is caught at startup.
 */
export async function loadVenueDirectory(dir: string, registry = new VenueRegistry()): Promise<VenueRegistry> {
  const files = (await readdir(dir)).filter((f) => f.endsWith('.json')).sort();
  for (const file of files) {
    const raw = await readFile(join(dir, file), 'utf-8');
    registry.load(JSON.parse(raw));
  }
  return registry;
}
