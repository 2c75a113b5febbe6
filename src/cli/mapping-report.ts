/**
 * Mapping report: runs sample clicks through the mapper and formats the
 * resulting seats for a terminal.
 */

import { lookAtRotation } from '../mapper/camera.js';
import { mapClick, normalizeClick } from '../mapper/mapper.js';
import type { ClickPoint, SeatMapping } from '../mapper/types.js';
import type { SeatmapConfig } from '../venue/types.js';
import type { Venue } from '../venue/venue.js';

export interface SampleClick {
  label: string;
  /** Pixel position on the seatmap image. */
  pixelX: number;
  pixelY: number;
}

export interface LabeledClick {
  label: string;
  point: ClickPoint;
}

/** Reference clicks on a 1280x960 ballpark seatmap. */
export const DEFAULT_SAMPLE_CLICKS: readonly SampleClick[] = [
  { label: 'Center behind home plate', pixelX: 640, pixelY: 720 },
  { label: 'Third base side lower', pixelX: 450, pixelY: 600 },
  { label: 'First base side lower', pixelX: 830, pixelY: 600 },
  { label: 'Upper deck behind home', pixelX: 640, pixelY: 850 },
  { label: 'Outfield, no section', pixelX: 640, pixelY: 100 },
];

export function sampleClicks(seatmap: SeatmapConfig, samples: readonly SampleClick[] = DEFAULT_SAMPLE_CLICKS): LabeledClick[] {
  return samples.map((s) => ({
    label: `${s.label} (${s.pixelX}, ${s.pixelY})`,
    point: normalizeClick(s.pixelX, s.pixelY, seatmap),
  }));
}

/**
 * Parse an "x,y" argument. With `seatmap`, the pair is in pixels;
 * without, it is already normalized.
 */
export function parseClickArg(arg: string, seatmap?: SeatmapConfig): LabeledClick {
  const parts = arg.split(',').map((p) => p.trim());
  const values = parts.map(Number);
  if (parts.length !== 2 || parts.some((p) => p === '') || !values.every(Number.isFinite)) {
    throw new Error(`Expected a click as "x,y", got "${arg}"`);
  }
  const [x, y] = values;
  return {
    label: `Click (${x}, ${y})`,
    point: seatmap ? normalizeClick(x, y, seatmap) : { x, y },
  };
}

export function formatMapping(label: string, mapping: SeatMapping): string[] {
  const { position, target, fov } = mapping.pose;
  const rotation = lookAtRotation(position, target);
  const lines = [
    `${label}:`,
    `  Section: ${mapping.sectionId} (${mapping.resolution})`,
  ];
  if (mapping.candidates.length > 0) {
    lines.push(`  Candidates: ${mapping.candidates.join(', ')}`);
  }
  lines.push(`  Tier: ${mapping.tierId}`);
  if (mapping.row !== null) {
    lines.push(`  Row: ${mapping.row} (estimated)`);
  }
  lines.push(
    `  Depth: ${mapping.depth.toFixed(2)}  Lateral: ${mapping.lateral.toFixed(2)}`,
    `  Angle: ${mapping.angle.toFixed(1)}°  Distance: ${mapping.distance.toFixed(1)} m`,
    `  Camera position: (${position.x.toFixed(1)}, ${position.y.toFixed(1)}, ${position.z.toFixed(1)})`,
    `  Camera rotation: (${rotation.x.toFixed(2)}, ${rotation.y.toFixed(2)}, ${rotation.z.toFixed(2)})`,
    `  FOV: ${fov.toFixed(1)}°`,
  );
  return lines;
}

/** Map each click against `venue` and return the report lines. */
export function mappingReport(venue: Venue, clicks: readonly LabeledClick[]): string[] {
  const lines = [
    `Venue: ${venue.name} (${venue.id})`,
    `Sections defined: ${venue.sections.length}`,
    '-'.repeat(60),
  ];
  for (const click of clicks) {
    lines.push('', ...formatMapping(click.label, mapClick(click.point, venue)));
  }
  return lines;
}
