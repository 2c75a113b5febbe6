/**
 * Render cache keys.
 *
 * Pose values are snapped to a grid before hashing so near-identical
 * clicks share a render. Snapped values are written as integer grid
 * indices, so float noise and -0 cannot split a key.
 */

import { createHash } from 'crypto';
import type { CameraPose } from './types.js';

export interface FingerprintPrecision {
  /** Grid step for position and target, meters. */
  position: number;
  /** Grid step for field of view, degrees. */
  fov: number;
}

export const DEFAULT_FINGERPRINT_PRECISION: FingerprintPrecision = {
  position: 0.5,
  fov: 0.5,
};

/** Index of the grid cell `value` snaps to. */
export function quantize(value: number, step: number): number {
  const index = Math.round(value / step);
  return index === 0 ? 0 : index;
}

/** Canonical, unhashed form of the key. */
export function fingerprintPayload(
  venueId: string,
  templateId: string,
  pose: CameraPose,
  precision: FingerprintPrecision = DEFAULT_FINGERPRINT_PRECISION,
): string {
  const p = precision.position;
  const { position, target } = pose;
  return JSON.stringify([
    venueId,
    templateId,
    quantize(position.x, p),
    quantize(position.y, p),
    quantize(position.z, p),
    quantize(target.x, p),
    quantize(target.y, p),
    quantize(target.z, p),
    quantize(pose.fov, precision.fov),
  ]);
}

export function fingerprint(
  venueId: string,
  templateId: string,
  pose: CameraPose,
  precision: FingerprintPrecision = DEFAULT_FINGERPRINT_PRECISION,
): string {
  return createHash('sha256')
    .update(fingerprintPayload(venueId, templateId, pose, precision))
    .digest('hex');
}
