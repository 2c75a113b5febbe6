export type { Venue } from './venue.js';
export { parseVenue } from './validate.js';
export { VenueRegistry, loadVenueFile, loadVenueDirectory } from './registry.js';
export type {
  DistanceRange,
  Section,
  SeatmapConfig,
  Tier,
  VenueData,
  VenueSummary,
  VenueType,
} from './types.js';
export { VENUE_TYPES } from './types.js';
