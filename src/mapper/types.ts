import type { Point2D, Point3D } from '../geometry.js';

/** Normalized seatmap click, [0,1] x [0,1]. */
export type ClickPoint = Point2D;

export interface CameraPose {
  readonly position: Point3D;
  readonly target: Point3D;
  /** Field of view in degrees. */
  readonly fov: number;
}

/**
 * Euler rotation in radians, renderer convention: the camera looks down
 * -Z at rest, x = pitch (pi/2 looks at the horizon), y = roll, z = yaw.
 */
export interface CameraRotation {
  x: number;
  y: number;
  z: number;
}

/**
 * How the click was matched to a section:
 *   - inside: exactly one polygon contains it
 *   - overlap: several polygons contain it, lowest section id wins
 *   - nearest: no polygon contains it, nearest centroid wins
 */
export type SectionResolution = 'inside' | 'overlap' | 'nearest';

export interface SeatMapping {
  venueId: string;
  sectionId: string;
  tierId: number;
  resolution: SectionResolution;
  /** Sections that contained the click when resolution is 'overlap'. */
  candidates: string[];
  /** Row depth, 0 = front row, 1 = back row. */
  depth: number;
  /** Estimated row counted from 1 at the front, or null when the section has no row count. */
  row: number | null;
  /** Position across the section, -0.5 to 0.5. */
  lateral: number;
  /** Meters from the field center. */
  distance: number;
  /** Degrees around the field center, lateral spread included. */
  angle: number;
  pose: CameraPose;
}

export interface FovRange {
  min: number;
  max: number;
}

/** Per-venue-type camera heuristics. */
export interface ViewProfile {
  /** FOV at or closer than `fovNearDistance` is `fov.max`; at or beyond `fovFarDistance`, `fov.min`. */
  fov: FovRange;
  fovNearDistance: number;
  fovFarDistance: number;
  /** Degrees of angle spread across a section's width. */
  lateralSpreadDeg: number;
  /** Meters the look-at target moves from the field center toward the section. */
  targetOffset: number;
}
