import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseVenue } from '../venue/validate.js';
import type { Venue } from '../venue/venue.js';

export const VENUES_DIR = fileURLToPath(new URL('../../data/venues/', import.meta.url));

/** The bundled ballpark's raw JSON, for tests that edit it before parsing. */
export function readYankeeStadiumJson(): Record<string, unknown> {
  return JSON.parse(readFileSync(`${VENUES_DIR}yankee_stadium.json`, 'utf-8'));
}

/** The bundled ballpark, parsed fresh for each caller. */
export function loadYankeeStadium(): Venue {
  return parseVenue(readYankeeStadiumJson());
}
