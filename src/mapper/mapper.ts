/**
 * Coordinate mapper: turns a normalized seatmap click into a camera pose.
 *
 * Pure and deterministic. The same click against the same Venue object
 * always yields a bit-identical pose, which is what makes poses usable as
 * render cache keys. Ambiguous clicks are resolved here and reported
 * through `SeatMapping.resolution`, never thrown.
 */

import { InvalidClickError, InvalidVenueConfigError, SectionResolutionError } from '../errors.js';
import {
  clamp01,
  compareSectionIds,
  cylindricalToCartesian,
  interpolateDepth,
  lateralOffset,
  lerp,
  nearestSection,
  pointInPolygon,
} from '../geometry.js';
import type { SeatmapConfig, Section } from '../venue/types.js';
import type { Venue } from '../venue/venue.js';
import { createCameraPose, fieldOfViewForDistance } from './camera.js';
import { getViewProfile } from './profiles.js';
import type { CameraPose, ClickPoint, FovRange, SectionResolution, SeatMapping, ViewProfile } from './types.js';

export interface MapOptions {
  /** Override the venue type's FOV range. */
  fov?: FovRange;
  /** Override the venue type's whole profile. */
  profile?: ViewProfile;
}

export interface ResolvedSection {
  section: Section;
  resolution: SectionResolution;
  candidates: string[];
}

/** Convert a pixel click on the seatmap image to normalized coordinates. */
export function normalizeClick(pixelX: number, pixelY: number, seatmap: SeatmapConfig): ClickPoint {
  return { x: pixelX / seatmap.width, y: pixelY / seatmap.height };
}

/**
 * Find the section a click belongs to.
 *
 * One containing polygon wins outright. Several (overlapping venue data)
 * resolve to the lowest section id. None falls back to the section with
 * the nearest centroid.
 */
export function resolveSection(click: ClickPoint, venue: Venue): ResolvedSection {
  const sections = venue.sections;
  if (sections.length === 0) {
    throw new SectionResolutionError(venue.id);
  }

  const containing = sections.filter((s) => pointInPolygon(click, s.polygon));

  if (containing.length === 1) {
    return { section: containing[0], resolution: 'inside', candidates: [] };
  }

  if (containing.length > 1) {
    const ordered = [...containing].sort((a, b) => compareSectionIds(a.id, b.id));
    return {
      section: ordered[0],
      resolution: 'overlap',
      candidates: ordered.map((s) => s.id),
    };
  }

  const nearest = nearestSection(click, sections);
  if (!nearest) {
    throw new SectionResolutionError(venue.id);
  }
  return { section: nearest.section, resolution: 'nearest', candidates: [] };
}

/**
 * Map a click to a seat: section, row depth, and the camera pose from it.
 *
 * @throws SectionResolutionError when the venue has no sections
 * @throws InvalidClickError when a coordinate is not a finite number
 */
export function mapClick(click: ClickPoint, venue: Venue, options: MapOptions = {}): SeatMapping {
  if (!Number.isFinite(click.x) || !Number.isFinite(click.y)) {
    throw new InvalidClickError(click.x, click.y);
  }
  const point: ClickPoint = { x: clamp01(click.x), y: clamp01(click.y) };

  const { section, resolution, candidates } = resolveSection(point, venue);
  const tier = venue.getTier(section.tierId);
  if (!tier) {
    throw new InvalidVenueConfigError(venue.id, [`section ${section.id}: references unknown tier ${section.tierId}`]);
  }

  const profile = options.profile ?? getViewProfile(venue.type);
  const depthOptions = venue.depthOptions(section);
  const depth = interpolateDepth(point, section.polygon, depthOptions);
  const lateral = lateralOffset(point, section.polygon, depthOptions);

  const distance = lerp(tier.distanceRange.min, tier.distanceRange.max, depth);
  const angle = section.angle + lateral * profile.lateralSpreadDeg;

  const center = venue.data.fieldCenter;
  const position = cylindricalToCartesian(center, distance, angle, tier.elevation);
  const target = cylindricalToCartesian(center, profile.targetOffset, section.angle, 0);
  const fov = fieldOfViewForDistance(distance, profile, options.fov ?? profile.fov);

  return {
    venueId: venue.id,
    sectionId: section.id,
    tierId: tier.id,
    resolution,
    candidates,
    depth,
    row: estimateRow(depth, section.rowCount),
    lateral,
    distance,
    angle,
    pose: createCameraPose(position, target, fov),
  };
}

/** Row under a depth in [0, 1], counted from 1 at the front. */
export function estimateRow(depth: number, rowCount: number | undefined): number | null {
  if (rowCount === undefined) return null;
  return Math.min(rowCount, Math.floor(depth * rowCount) + 1);
}

/** Camera pose for a click. See `mapClick` for the full mapping. */
export function map(click: ClickPoint, venue: Venue, options?: MapOptions): CameraPose {
  return mapClick(click, venue, options).pose;
}
