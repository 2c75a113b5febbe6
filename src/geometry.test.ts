import { describe, it, expect } from 'vitest';
import {
  clamp01,
  compareSectionIds,
  cylindricalToCartesian,
  depthDirection,
  interpolateDepth,
  isSimplePolygon,
  lateralOffset,
  lerp,
  nearestSection,
  pointInPolygon,
  polygonArea,
  polygonCentroid,
} from './geometry.js';
import type { Polygon } from './geometry.js';

function poly(...pairs: [number, number][]): Polygon {
  return pairs.map(([x, y]) => ({ x, y }));
}

const unitSquare = poly([0, 0], [1, 0], [1, 1], [0, 1]);
// L shape: a 2x1 bar with a 1x1 block on its left end.
const lShape = poly([0, 0], [2, 0], [2, 1], [1, 1], [1, 2], [0, 2]);

describe('pointInPolygon', () => {
  it('finds interior points', () => {
    expect(pointInPolygon({ x: 0.5, y: 0.5 }, unitSquare)).toBe(true);
  });

  it('treats edges and vertices as inside', () => {
    expect(pointInPolygon({ x: 1, y: 0.5 }, unitSquare)).toBe(true);
    expect(pointInPolygon({ x: 0.5, y: 0 }, unitSquare)).toBe(true);
    expect(pointInPolygon({ x: 0, y: 0 }, unitSquare)).toBe(true);
  });

  it('rejects outside points', () => {
    expect(pointInPolygon({ x: 1.5, y: 0.5 }, unitSquare)).toBe(false);
    expect(pointInPolygon({ x: -0.01, y: 0.5 }, unitSquare)).toBe(false);
  });

  it('handles concave polygons', () => {
    expect(pointInPolygon({ x: 0.5, y: 1.5 }, lShape)).toBe(true);
    expect(pointInPolygon({ x: 1.5, y: 1.5 }, lShape)).toBe(false);
  });

  it('never contains anything with fewer than three vertices', () => {
    expect(pointInPolygon({ x: 0, y: 0 }, poly([0, 0], [1, 1]))).toBe(false);
  });
});

describe('polygonArea and polygonCentroid', () => {
  it('measures area regardless of winding', () => {
    expect(polygonArea(unitSquare)).toBe(1);
    expect(polygonArea([...unitSquare].reverse())).toBe(1);
    expect(polygonArea(lShape)).toBe(3);
  });

  it('weights the centroid by area', () => {
    // Vertex mean would be (1, 1).
    const c = polygonCentroid(lShape);
    expect(c.x).toBeCloseTo(5 / 6, 12);
    expect(c.y).toBeCloseTo(5 / 6, 12);
  });

  it('falls back to the vertex mean for degenerate polygons', () => {
    expect(polygonCentroid(poly([0, 0], [1, 0], [2, 0]))).toEqual({ x: 1, y: 0 });
  });
});

describe('isSimplePolygon', () => {
  it('accepts convex and concave simple polygons', () => {
    expect(isSimplePolygon(unitSquare)).toBe(true);
    expect(isSimplePolygon(lShape)).toBe(true);
  });

  it('rejects self-intersecting polygons', () => {
    const bowtie = poly([0, 0], [1, 1], [1, 0], [0, 1]);
    expect(isSimplePolygon(bowtie)).toBe(false);
  });

  it('rejects degenerate polygons', () => {
    expect(isSimplePolygon(poly([0, 0], [1, 1]))).toBe(false);
    expect(isSimplePolygon(poly([0, 0], [1, 0], [2, 0]))).toBe(false);
    expect(isSimplePolygon(poly([0, 0], [1, 0], [1, 0], [0, 1]))).toBe(false);
  });
});

describe('compareSectionIds', () => {
  it('orders numeric ids numerically, before other ids', () => {
    const ids = ['B', '101', '9', 'A', '10'];
    expect([...ids].sort(compareSectionIds)).toEqual(['9', '10', '101', 'A', 'B']);
  });

  it('is zero for equal ids', () => {
    expect(compareSectionIds('101', '101')).toBe(0);
  });
});

describe('nearestSection', () => {
  const left = { id: '10', polygon: poly([0, 0], [2, 0], [2, 2], [0, 2]) };
  const right = { id: '2', polygon: poly([4, 0], [6, 0], [6, 2], [4, 2]) };

  it('picks the section with the closest centroid', () => {
    const result = nearestSection({ x: 0.5, y: 3 }, [left, right]);
    expect(result?.sectionId).toBe('10');
    expect(result?.section).toBe(left);
  });

  it('breaks exact ties by lowest section id', () => {
    const result = nearestSection({ x: 3, y: 1 }, [left, right]);
    expect(result?.distance).toBe(2);
    expect(result?.sectionId).toBe('2');
  });

  it('returns null with no sections', () => {
    expect(nearestSection({ x: 0, y: 0 }, [])).toBeNull();
  });
});

describe('depth within a section', () => {
  // Taller than wide, below the field point: depth runs down the seatmap.
  const stand = poly([0.375, 0.5], [0.625, 0.5], [0.625, 1], [0.375, 1]);
  const options = { fieldPoint: { x: 0.5, y: 0.25 } };

  it('runs along the longest dimension, away from the field', () => {
    expect(depthDirection(stand, options)).toEqual({ x: 0, y: 1 });

    const leftStand = poly([0.125, 0.375], [0.375, 0.375], [0.375, 0.5], [0.125, 0.5]);
    expect(depthDirection(leftStand, { fieldPoint: { x: 0.5, y: 0.5 } })).toEqual({ x: -1, y: 0 });
  });

  it('prefers an explicit axis', () => {
    const axis = { front: { x: 0, y: 0 }, back: { x: 0, y: -2 } };
    expect(depthDirection(stand, { ...options, axis })).toEqual({ x: 0, y: -1 });
  });

  it('interpolates row depth from front to back', () => {
    expect(interpolateDepth({ x: 0.5, y: 0.5 }, stand, options)).toBe(0);
    expect(interpolateDepth({ x: 0.5, y: 0.75 }, stand, options)).toBe(0.5);
    expect(interpolateDepth({ x: 0.5, y: 1 }, stand, options)).toBe(1);
  });

  it('clamps depth for points beyond the section', () => {
    expect(interpolateDepth({ x: 0.5, y: 1.5 }, stand, options)).toBe(1);
    expect(interpolateDepth({ x: 0.5, y: 0.25 }, stand, options)).toBe(0);
  });

  it('projects onto an explicit front-to-back axis', () => {
    const axis = { front: { x: 0, y: 0.5 }, back: { x: 0, y: 1 } };
    expect(interpolateDepth({ x: 0.5, y: 0.625 }, stand, { axis })).toBe(0.25);
  });

  it('measures lateral offset to the right of a spectator facing the field', () => {
    expect(lateralOffset({ x: 0.5, y: 0.75 }, stand, options)).toBe(0);
    expect(lateralOffset({ x: 0.625, y: 0.75 }, stand, options)).toBe(0.5);
    expect(lateralOffset({ x: 0.375, y: 0.75 }, stand, options)).toBe(-0.5);
  });
});

describe('cylindricalToCartesian', () => {
  const center = { x: 1, y: 2, z: 3 };

  it('places angle 0 on the -y side', () => {
    expect(cylindricalToCartesian(center, 10, 0, 5)).toEqual({ x: 1, y: -8, z: 8 });
  });

  it('turns positive angles toward +x', () => {
    const p = cylindricalToCartesian(center, 10, 90, 0);
    expect(p.x).toBeCloseTo(11, 10);
    expect(p.y).toBeCloseTo(2, 10);
    expect(p.z).toBe(3);
  });
});

describe('lerp and clamp01', () => {
  it('interpolates linearly', () => {
    expect(lerp(20, 40, 0)).toBe(20);
    expect(lerp(20, 40, 0.5)).toBe(30);
    expect(lerp(20, 40, 1)).toBe(40);
  });

  it('clamps into [0, 1]', () => {
    expect(clamp01(-0.2)).toBe(0);
    expect(clamp01(0.3)).toBe(0.3);
    expect(clamp01(1.7)).toBe(1);
  });
});
