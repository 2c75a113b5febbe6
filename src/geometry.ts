/**
 * Pure geometry over normalized seatmap coordinates.
 *
 * Seatmap space is [0,1] x [0,1] with y growing downward, matching the
 * seatmap image. World space is meters around the venue's field center,
 * z up.
 */

export interface Point2D {
  x: number;
  y: number;
}

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

export type Polygon = readonly Point2D[];

/** Explicit front-row and back-row reference points of a section. */
export interface DepthAxis {
  front: Point2D;
  back: Point2D;
}

export interface DepthOptions {
  axis?: DepthAxis;
  /** Where the field sits on the seatmap. Depth grows away from it. */
  fieldPoint?: Point2D;
}

export interface SectionShape {
  id: string;
  polygon: Polygon;
}

export interface NearestSection<T extends SectionShape = SectionShape> {
  sectionId: string;
  distance: number;
  section: T;
}

export const DEFAULT_FIELD_POINT: Point2D = { x: 0.5, y: 0.5 };

const EPSILON = 1e-12;

// -- Scalars --

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

function dot(a: Point2D, b: Point2D): number {
  return a.x * b.x + a.y * b.y;
}

function cross(o: Point2D, a: Point2D, b: Point2D): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

// -- Containment --

function onSegment(p: Point2D, a: Point2D, b: Point2D): boolean {
  if (Math.abs(cross(a, b, p)) > EPSILON) return false;
  return (
    p.x >= Math.min(a.x, b.x) - EPSILON &&
    p.x <= Math.max(a.x, b.x) + EPSILON &&
    p.y >= Math.min(a.y, b.y) - EPSILON &&
    p.y <= Math.max(a.y, b.y) + EPSILON
  );
}

/**
 * Ray-casting containment test. Points on an edge or vertex are inside,
 * so clicks on a shared border always land in some section.
 */
export function pointInPolygon(point: Point2D, polygon: Polygon): boolean {
  const n = polygon.length;
  if (n < 3) return false;

  for (let i = 0, j = n - 1; i < n; j = i++) {
    if (onSegment(point, polygon[j], polygon[i])) return true;
  }

  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const a = polygon[i];
    const b = polygon[j];
    if ((a.y > point.y) !== (b.y > point.y)) {
      const xCross = ((b.x - a.x) * (point.y - a.y)) / (b.y - a.y) + a.x;
      if (point.x < xCross) inside = !inside;
    }
  }
  return inside;
}

// -- Shape metrics --

/** Signed area (shoelace). Positive for counter-clockwise in y-up space. */
export function signedArea(polygon: Polygon): number {
  let sum = 0;
  for (let i = 0; i < polygon.length; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % polygon.length];
    sum += a.x * b.y - b.x * a.y;
  }
  return sum / 2;
}

export function polygonArea(polygon: Polygon): number {
  return Math.abs(signedArea(polygon));
}

/**
 * Area-weighted centroid. Falls back to the vertex mean when the polygon
 * has no area.
 */
export function polygonCentroid(polygon: Polygon): Point2D {
  const n = polygon.length;
  if (n === 0) return { x: 0, y: 0 };

  let area2 = 0;
  let cx = 0;
  let cy = 0;
  for (let i = 0; i < n; i++) {
    const a = polygon[i];
    const b = polygon[(i + 1) % n];
    const c = a.x * b.y - b.x * a.y;
    area2 += c;
    cx += (a.x + b.x) * c;
    cy += (a.y + b.y) * c;
  }

  if (Math.abs(area2) < EPSILON) {
    let sx = 0;
    let sy = 0;
    for (const p of polygon) {
      sx += p.x;
      sy += p.y;
    }
    return { x: sx / n, y: sy / n };
  }

  return { x: cx / (3 * area2), y: cy / (3 * area2) };
}

export function polygonBounds(polygon: Polygon): { minX: number; minY: number; maxX: number; maxY: number } {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of polygon) {
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }
  return { minX, minY, maxX, maxY };
}

/** Whether segments p1-p2 and p3-p4 touch or cross, collinear overlap included. */
export function segmentsIntersect(p1: Point2D, p2: Point2D, p3: Point2D, p4: Point2D): boolean {
  const d1 = cross(p3, p4, p1);
  const d2 = cross(p3, p4, p2);
  const d3 = cross(p1, p2, p3);
  const d4 = cross(p1, p2, p4);

  if (((d1 > EPSILON && d2 < -EPSILON) || (d1 < -EPSILON && d2 > EPSILON)) &&
      ((d3 > EPSILON && d4 < -EPSILON) || (d3 < -EPSILON && d4 > EPSILON))) {
    return true;
  }

  return (
    onSegment(p1, p3, p4) ||
    onSegment(p2, p3, p4) ||
    onSegment(p3, p1, p2) ||
    onSegment(p4, p1, p2)
  );
}

/**
 * A polygon is simple when it has at least three vertices, non-zero area,
 * and no two non-adjacent edges touch.
 */
export function isSimplePolygon(polygon: Polygon): boolean {
  const n = polygon.length;
  if (n < 3) return false;
  if (polygonArea(polygon) < EPSILON) return false;

  for (let i = 0; i < n; i++) {
    const a1 = polygon[i];
    const a2 = polygon[(i + 1) % n];
    if (a1.x === a2.x && a1.y === a2.y) return false;

    for (let j = i + 1; j < n; j++) {
      // Adjacent edges share a vertex by construction.
      if (j === i + 1 || (i === 0 && j === n - 1)) continue;
      const b1 = polygon[j];
      const b2 = polygon[(j + 1) % n];
      if (segmentsIntersect(a1, a2, b1, b2)) return false;
    }
  }
  return true;
}

// -- Section lookup --

const NUMERIC_ID = /^\d+(\.\d+)?$/;

/**
 * Order section ids: numeric ids numerically, then everything else
 * lexically. Used for every deterministic tie-break.
 */
export function compareSectionIds(a: string, b: string): number {
  const aNumeric = NUMERIC_ID.test(a);
  const bNumeric = NUMERIC_ID.test(b);
  if (aNumeric && bNumeric) {
    const diff = Number(a) - Number(b);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  } else if (aNumeric !== bNumeric) {
    return aNumeric ? -1 : 1;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Section whose centroid is closest to the point. Ties go to the lowest
 * section id. Returns null for an empty list.
 */
export function nearestSection<T extends SectionShape>(
  point: Point2D,
  sections: readonly T[],
): NearestSection<T> | null {
  let best: NearestSection<T> | null = null;
  for (const section of sections) {
    const c = polygonCentroid(section.polygon);
    const distance = Math.hypot(point.x - c.x, point.y - c.y);
    if (
      best === null ||
      distance < best.distance ||
      (distance === best.distance && compareSectionIds(section.id, best.sectionId) < 0)
    ) {
      best = { sectionId: section.id, distance, section };
    }
  }
  return best;
}

// -- Depth within a section --

/**
 * Unit direction from front row to back row. An explicit axis wins;
 * otherwise the longest bounding-box dimension (width on ties), pointing
 * away from the field.
 */
export function depthDirection(polygon: Polygon, options: DepthOptions = {}): Point2D {
  const { axis } = options;
  if (axis) {
    const dx = axis.back.x - axis.front.x;
    const dy = axis.back.y - axis.front.y;
    const len = Math.hypot(dx, dy);
    if (len > EPSILON) return { x: dx / len, y: dy / len };
  }

  const field = options.fieldPoint ?? DEFAULT_FIELD_POINT;
  const { minX, minY, maxX, maxY } = polygonBounds(polygon);
  if (maxX - minX >= maxY - minY) {
    return { x: field.x <= (minX + maxX) / 2 ? 1 : -1, y: 0 };
  }
  return { x: 0, y: field.y <= (minY + maxY) / 2 ? 1 : -1 };
}

/** Position of the point along `direction`, normalized by the polygon's extent on it. */
function normalizedProjection(point: Point2D, polygon: Polygon, direction: Point2D): number {
  let min = Infinity;
  let max = -Infinity;
  for (const v of polygon) {
    const d = dot(v, direction);
    if (d < min) min = d;
    if (d > max) max = d;
  }
  const span = max - min;
  if (!(span > EPSILON)) return 0.5;
  return clamp01((dot(point, direction) - min) / span);
}

/**
 * Row depth of a point inside a section: 0 at the front row, 1 at the back.
 */
export function interpolateDepth(point: Point2D, polygon: Polygon, options: DepthOptions = {}): number {
  const { axis } = options;
  if (axis) {
    const dx = axis.back.x - axis.front.x;
    const dy = axis.back.y - axis.front.y;
    const lenSq = dx * dx + dy * dy;
    if (lenSq > EPSILON) {
      return clamp01(((point.x - axis.front.x) * dx + (point.y - axis.front.y) * dy) / lenSq);
    }
  }
  return normalizedProjection(point, polygon, depthDirection(polygon, options));
}

/**
 * Position across the depth axis, in [-0.5, 0.5]. Zero on the section's
 * midline, positive to the right of a spectator facing the field.
 */
export function lateralOffset(point: Point2D, polygon: Polygon, options: DepthOptions = {}): number {
  const dir = depthDirection(polygon, options);
  // Spectator faces -dir; with y growing downward their right is (dir.y, -dir.x).
  const across: Point2D = { x: dir.y, y: -dir.x };
  return normalizedProjection(point, polygon, across) - 0.5;
}

// -- World placement --

/**
 * Place a point on a cylinder around `center`. Angle 0 is the -y side of
 * the center; positive angles turn toward +x.
 */
export function cylindricalToCartesian(
  center: Point3D,
  radius: number,
  angleDeg: number,
  height: number,
): Point3D {
  const rad = degToRad(angleDeg);
  return {
    x: center.x + radius * Math.sin(rad),
    y: center.y - radius * Math.cos(rad),
    z: center.z + height,
  };
}
