/**
 * Geographic utility types.
 */

/** Geographic coordinate (WGS84) */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** Axis-aligned bounding box in WGS84 coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/** Convert a GeoJSON position ([lng, lat, ...]) to a Coordinate */
export function positionToCoordinate(position: readonly number[]): Coordinate {
  return { lng: position[0] ?? 0, lat: position[1] ?? 0 };
}

/** Convert a Coordinate to a GeoJSON position */
export function coordinateToPosition(coord: Coordinate): [number, number] {
  return [coord.lng, coord.lat];
}
