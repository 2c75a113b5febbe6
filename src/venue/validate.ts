/**
 * Venue validation.
 *
 * Turns loosely typed venue JSON into a frozen Venue, or throws a single
 * InvalidVenueConfigError listing every problem found. Nothing malformed
 * gets past this point, so the mapper never re-checks venue structure.
 */

import { InvalidVenueConfigError } from '../errors.js';
import { DEFAULT_FIELD_POINT, isSimplePolygon } from '../geometry.js';
import type { DepthAxis, Point2D, Point3D } from '../geometry.js';
import { VENUE_TYPES } from './types.js';
import type { Section, SeatmapConfig, Tier, VenueData, VenueType } from './types.js';
import { Venue } from './venue.js';

type Issues = string[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function isVenueType(value: unknown): value is VenueType {
  return typeof value === 'string' && (VENUE_TYPES as readonly string[]).includes(value);
}

/** Read a normalized [x, y] pair. */
function readPair(value: unknown, label: string, issues: Issues): Point2D | null {
  if (!Array.isArray(value) || value.length !== 2 || !isFiniteNumber(value[0]) || !isFiniteNumber(value[1])) {
    issues.push(`${label} must be an [x, y] pair of numbers`);
    return null;
  }
  const [x, y] = value;
  if (x < 0 || x > 1 || y < 0 || y > 1) {
    issues.push(`${label} must lie within [0, 1]`);
    return null;
  }
  return { x, y };
}

function readPoint3D(value: unknown, label: string, issues: Issues): Point3D | null {
  if (!isRecord(value) || !isFiniteNumber(value.x) || !isFiniteNumber(value.y) || !isFiniteNumber(value.z)) {
    issues.push(`${label} must have numeric x, y and z`);
    return null;
  }
  return { x: value.x, y: value.y, z: value.z };
}

function readSeatmap(value: unknown, issues: Issues): SeatmapConfig | null {
  if (!isRecord(value)) {
    issues.push('seatmap is required');
    return null;
  }
  const { file, width, height } = value;
  let ok = true;
  if (typeof file !== 'string') {
    issues.push('seatmap.file must be a string');
    ok = false;
  }
  if (!isFiniteNumber(width) || !Number.isInteger(width) || width <= 0) {
    issues.push('seatmap.width must be a positive integer');
    ok = false;
  }
  if (!isFiniteNumber(height) || !Number.isInteger(height) || height <= 0) {
    issues.push('seatmap.height must be a positive integer');
    ok = false;
  }
  if (!ok || typeof file !== 'string' || !isFiniteNumber(width) || !isFiniteNumber(height)) return null;
  return { file, width, height };
}

function readTiers(value: unknown, issues: Issues): Tier[] {
  if (!isRecord(value) || Object.keys(value).length === 0) {
    issues.push('tiers must map tier numbers to { elevation, distanceRange }');
    return [];
  }

  const tiers: Tier[] = [];
  for (const [key, raw] of Object.entries(value)) {
    const id = Number(key);
    const label = `tier ${key}`;
    if (!Number.isInteger(id)) {
      issues.push(`${label}: tier id must be an integer`);
      continue;
    }
    if (!isRecord(raw)) {
      issues.push(`${label}: must be an object`);
      continue;
    }
    const { elevation, distanceRange } = raw;
    if (!isFiniteNumber(elevation)) {
      issues.push(`${label}: elevation must be a number`);
      continue;
    }
    if (
      !Array.isArray(distanceRange) ||
      distanceRange.length !== 2 ||
      !isFiniteNumber(distanceRange[0]) ||
      !isFiniteNumber(distanceRange[1])
    ) {
      issues.push(`${label}: distanceRange must be [min, max]`);
      continue;
    }
    const [min, max] = distanceRange;
    if (min <= 0 || max <= 0) {
      issues.push(`${label}: distanceRange values must be positive`);
      continue;
    }
    if (min > max) {
      issues.push(`${label}: distanceRange min ${min} exceeds max ${max}`);
      continue;
    }
    tiers.push({ id, elevation, distanceRange: { min, max } });
  }

  return tiers.sort((a, b) => a.id - b.id);
}

function readDepthAxis(value: unknown, label: string, issues: Issues): DepthAxis | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    issues.push(`${label}: depthAxis must be { front, back }`);
    return undefined;
  }
  const front = readPair(value.front, `${label}: depthAxis.front`, issues);
  const back = readPair(value.back, `${label}: depthAxis.back`, issues);
  if (!front || !back) return undefined;
  if (front.x === back.x && front.y === back.y) {
    issues.push(`${label}: depthAxis front and back must differ`);
    return undefined;
  }
  return { front, back };
}

function readSection(raw: unknown, index: number, tierIds: Set<number>, issues: Issues): Section | null {
  if (!isRecord(raw)) {
    issues.push(`sections[${index}] must be an object`);
    return null;
  }

  const id = typeof raw.id === 'number' ? String(raw.id) : raw.id;
  if (!isNonEmptyString(id)) {
    issues.push(`sections[${index}]: id is required`);
    return null;
  }
  const label = `section ${id}`;
  const before = issues.length;

  const tierId = raw.tier;
  if (!isFiniteNumber(tierId) || !Number.isInteger(tierId)) {
    issues.push(`${label}: tier must be an integer`);
  } else if (!tierIds.has(tierId)) {
    issues.push(`${label}: references unknown tier ${tierId}`);
  }

  const angle = raw.angle ?? 0;
  if (!isFiniteNumber(angle)) {
    issues.push(`${label}: angle must be a number`);
  }

  const rowCount = raw.rowCount;
  if (rowCount !== undefined && (!isFiniteNumber(rowCount) || !Number.isInteger(rowCount) || rowCount <= 0)) {
    issues.push(`${label}: rowCount must be a positive integer`);
  }

  const polygon: Point2D[] = [];
  if (!Array.isArray(raw.polygon) || raw.polygon.length < 3) {
    issues.push(`${label}: polygon needs at least 3 vertices`);
  } else {
    raw.polygon.forEach((vertex: unknown, i: number) => {
      const point = readPair(vertex, `${label}: vertex ${i}`, issues);
      if (point) polygon.push(point);
    });
    if (polygon.length === raw.polygon.length && !isSimplePolygon(polygon)) {
      issues.push(`${label}: polygon is degenerate or self-intersecting`);
    }
  }

  const depthAxis = readDepthAxis(raw.depthAxis, label, issues);

  if (issues.length > before || !isFiniteNumber(tierId) || !isFiniteNumber(angle)) return null;

  const section: Section = { id, tierId, polygon, angle };
  if (isFiniteNumber(rowCount)) section.rowCount = rowCount;
  if (depthAxis) section.depthAxis = depthAxis;
  return section;
}

/**
 * Validate raw venue JSON and build a Venue.
 *
 * @throws InvalidVenueConfigError listing every problem found
 */
export function parseVenue(raw: unknown): Venue {
  if (!isRecord(raw)) {
    throw new InvalidVenueConfigError(null, ['venue must be an object']);
  }

  const issues: Issues = [];
  const { name, type, templateId } = raw;
  const venueId = isNonEmptyString(raw.id) ? raw.id : null;
  if (!venueId) issues.push('id is required');
  if (!isNonEmptyString(name)) issues.push('name is required');
  if (!isVenueType(type)) {
    issues.push(`type must be one of ${VENUE_TYPES.join(', ')} (got ${JSON.stringify(type)})`);
  }
  if (!isNonEmptyString(templateId)) issues.push('templateId is required');

  const seatmap = readSeatmap(raw.seatmap, issues);
  const fieldCenter = raw.fieldCenter === undefined
    ? { x: 0, y: 0, z: 0 }
    : readPoint3D(raw.fieldCenter, 'fieldCenter', issues);
  const fieldPoint = raw.seatmapFieldPoint === undefined
    ? DEFAULT_FIELD_POINT
    : readSeatmapFieldPoint(raw.seatmapFieldPoint, issues);

  const tiers = readTiers(raw.tiers, issues);
  const tierIds = new Set(tiers.map((t) => t.id));

  const sections: Section[] = [];
  if (!Array.isArray(raw.sections) || raw.sections.length === 0) {
    issues.push('at least one section is required');
  } else {
    const seen = new Set<string>();
    raw.sections.forEach((entry: unknown, index: number) => {
      const section = readSection(entry, index, tierIds, issues);
      if (!section) return;
      if (seen.has(section.id)) {
        issues.push(`section ${section.id}: duplicate id`);
        return;
      }
      seen.add(section.id);
      sections.push(section);
    });
  }

  if (
    issues.length > 0 ||
    !venueId ||
    !isNonEmptyString(name) ||
    !isVenueType(type) ||
    !isNonEmptyString(templateId) ||
    !seatmap ||
    !fieldCenter ||
    !fieldPoint
  ) {
    throw new InvalidVenueConfigError(venueId, issues);
  }

  const data: VenueData = {
    id: venueId,
    name,
    type,
    templateId,
    seatmap,
    fieldCenter,
    seatmapFieldPoint: { ...fieldPoint },
    tiers,
    sections,
  };
  return new Venue(data);
}

function readSeatmapFieldPoint(value: unknown, issues: Issues): Point2D | null {
  if (!isRecord(value)) {
    issues.push('seatmapFieldPoint must be { x, y }');
    return null;
  }
  return readPair([value.x, value.y], 'seatmapFieldPoint', issues);
}
