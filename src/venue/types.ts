import type { DepthAxis, Point2D, Point3D, Polygon } from '../geometry.js';

export type VenueType = 'baseball' | 'hockey' | 'basketball' | 'football';

export const VENUE_TYPES: readonly VenueType[] = ['baseball', 'hockey', 'basketball', 'football'];

export interface DistanceRange {
  /** Meters from the field center to the front row. */
  min: number;
  /** Meters from the field center to the back row. */
  max: number;
}

export interface Tier {
  id: number;
  /** Meters above the field plane. */
  elevation: number;
  distanceRange: DistanceRange;
}

export interface Section {
  id: string;
  tierId: number;
  /** Outline on the seatmap, normalized coordinates. */
  polygon: Polygon;
  /** Degrees around the field center. 0 = behind the reference end. */
  angle: number;
  rowCount?: number;
  depthAxis?: DepthAxis;
}

export interface SeatmapConfig {
  file: string;
  /** Image size in pixels, used to normalize pixel clicks. */
  width: number;
  height: number;
}

export interface VenueData {
  id: string;
  name: string;
  type: VenueType;
  /** Scene file the render backend positions the camera in. */
  templateId: string;
  seatmap: SeatmapConfig;
  fieldCenter: Point3D;
  /** Position of the field on the seatmap. */
  seatmapFieldPoint: Point2D;
  /** Ordered by tier id. */
  tiers: Tier[];
  sections: Section[];
}

export interface VenueSummary {
  id: string;
  name: string;
  type: VenueType;
  sectionCount: number;
}
