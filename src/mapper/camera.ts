/**
 * Camera pose construction: field of view by distance and the Euler
 * rotation the render backend needs to aim the camera.
 */

import { clamp01, lerp } from '../geometry.js';
import type { Point3D } from '../geometry.js';
import type { CameraPose, CameraRotation, FovRange, ViewProfile } from './types.js';

/**
 * Field of view for a seat at `distance` meters. Closer seats get a wider
 * view; the result never leaves `range`.
 */
export function fieldOfViewForDistance(
  distance: number,
  profile: ViewProfile,
  range: FovRange = profile.fov,
): number {
  const span = profile.fovFarDistance - profile.fovNearDistance;
  const t = span > 0 ? clamp01((distance - profile.fovNearDistance) / span) : 0;
  const lo = Math.min(range.min, range.max);
  const hi = Math.max(range.min, range.max);
  return lerp(hi, lo, t);
}

export function createCameraPose(position: Point3D, target: Point3D, fov: number): CameraPose {
  return Object.freeze({
    position: Object.freeze({ ...position }),
    target: Object.freeze({ ...target }),
    fov,
  });
}

/** Euler rotation aiming a camera at `position` toward `target`. */
export function lookAtRotation(position: Point3D, target: Point3D): CameraRotation {
  const dx = target.x - position.x;
  const dy = target.y - position.y;
  const dz = target.z - position.z;

  const horizontal = Math.sqrt(dx * dx + dy * dy);
  const total = Math.sqrt(dx * dx + dy * dy + dz * dz);

  if (total === 0) {
    return { x: Math.PI / 2, y: 0, z: 0 };
  }

  let pitch: number;
  if (horizontal > 0) {
    pitch = Math.atan2(dz, horizontal);
  } else {
    pitch = dz > 0 ? Math.PI / 2 : -Math.PI / 2;
  }

  return {
    x: Math.PI / 2 - pitch,
    y: 0,
    z: Math.atan2(dx, dy),
  };
}
