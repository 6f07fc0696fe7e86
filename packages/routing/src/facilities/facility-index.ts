/**
 * In-memory index of points of interest.
 *
 * Category filters are case-insensitive substring matches, so "bank" finds
 * "Bank" as well as "Microfinance Bank".
 */

import type { Coordinate, FacilityTarget, PointFeature } from "@street-guide/types";
import { haversineDistance } from "@street-guide/builder";

/** A facility paired with its distance from a query point */
export interface FacilityMatch {
  feature: PointFeature;
  distanceMeters: number;
}

export function categoryMatches(category: string, query: string): boolean {
  return category.toLowerCase().includes(query.toLowerCase());
}

export class FacilityIndex {
  private readonly features: readonly PointFeature[];

  constructor(features: Iterable<PointFeature>) {
    this.features = Object.freeze([...features].sort((a, b) => a.id - b.id));
  }

  get size(): number {
    return this.features.length;
  }

  all(): readonly PointFeature[] {
    return this.features;
  }

  /** Features whose category contains `query`, ascending id */
  byCategory(query: string): PointFeature[] {
    return this.features.filter((f) => categoryMatches(f.category, query));
  }

  /**
   * Nearest feature of a category, or null when none match.
   * Ties go to the lower feature id.
   */
  nearest(coord: Coordinate, category: string): FacilityMatch | null {
    let best: FacilityMatch | null = null;
    for (const feature of this.features) {
      if (!categoryMatches(feature.category, category)) continue;
      const distanceMeters = haversineDistance(coord, feature.coordinate);
      if (!best || distanceMeters < best.distanceMeters) {
        best = { feature, distanceMeters };
      }
    }
    return best;
  }

  /** Features within `radiusMeters` of a point, nearest first */
  within(coord: Coordinate, radiusMeters: number): FacilityMatch[] {
    const matches: FacilityMatch[] = [];
    for (const feature of this.features) {
      const distanceMeters = haversineDistance(coord, feature.coordinate);
      if (distanceMeters <= radiusMeters) matches.push({ feature, distanceMeters });
    }
    return matches.sort(
      (a, b) => a.distanceMeters - b.distanceMeters || a.feature.id - b.feature.id
    );
  }
}

export function toFacilityTarget(feature: PointFeature): FacilityTarget {
  return {
    name: feature.name,
    category: feature.category,
    coordinate: { lat: feature.coordinate.lat, lng: feature.coordinate.lng },
  };
}
