/**
 * Geodesic distance helpers.
 *
 * Edge costs and the straight-line fallback both use these, so that road
 * and direct distances stay comparable.
 */

import type { Coordinate, LineGeometry } from "@street-guide/types";
import { positionToCoordinate } from "@street-guide/types";

const EARTH_RADIUS_METERS = 6_371_000;

/**
 * Calculate distance between two coordinates using Haversine formula.
 *
 * @returns Distance in meters
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const toRad = Math.PI / 180;
  const dLat = (b.lat - a.lat) * toRad;
  const dLng = (b.lng - a.lng) * toRad;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLng = Math.sin(dLng / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(a.lat * toRad) * Math.cos(b.lat * toRad) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(h));
}

/**
 * Calculate the total length of a path in meters.
 */
export function calculatePathLength(coords: Coordinate[]): number {
  let total = 0;
  for (let i = 0; i < coords.length - 1; i++) {
    total += haversineDistance(coords[i]!, coords[i + 1]!);
  }
  return total;
}

/** Split a line geometry into its parts, one coordinate list per part */
export function lineParts(geometry: LineGeometry): Coordinate[][] {
  const parts =
    geometry.type === "LineString" ? [geometry.coordinates] : geometry.coordinates;
  return parts.map((part) => part.map(positionToCoordinate));
}

/**
 * Geodesic length of a line geometry in meters.
 * Multi-part lines sum their parts; the gaps between parts are not counted.
 */
export function lineLength(geometry: LineGeometry): number {
  let total = 0;
  for (const part of lineParts(geometry)) {
    total += calculatePathLength(part);
  }
  return total;
}
