import { describe, it, expect } from "vitest";
import { area } from "@turf/turf";
import { GeoQueryService, SEARCH_MAX_RESULTS } from "./geo-query.service.js";
import { buildStreetNetwork } from "./network.service.js";
import { A, ISLAND, SURULERE, fixtureData } from "../test-support/street-fixture.js";

function service(overrides: Parameters<typeof fixtureData>[0] = {}): GeoQueryService {
  return new GeoQueryService(buildStreetNetwork(fixtureData(overrides)));
}

function names(collection: { features: { properties: { name: string } }[] }): string[] {
  return collection.features.map((f) => f.properties.name);
}

describe("GeoQueryService", () => {
  describe("featuresByCategory", () => {
    it("matches categories by substring, case-insensitively, in id order", () => {
      const result = service().featuresByCategory("bank");

      expect(names(result)).toEqual(["Harbour Bank", "Corner Microfinance"]);
      expect(result.features[0]!.geometry.coordinates).toEqual([3.351, 6.501]);
      expect(result.features[0]!.properties.category).toBe("Bank");
    });

    it("returns an empty collection for unknown categories", () => {
      expect(service().featuresByCategory("Stadium")).toEqual({
        type: "FeatureCollection",
        features: [],
      });
    });
  });

  describe("buffer", () => {
    it("returns points within the radius", () => {
      expect(names(service().buffer(A, 30))).toEqual(["Corner Microfinance"]);
    });

    it("orders points nearest first", () => {
      expect(names(service().buffer(A, 500))).toEqual([
        "Corner Microfinance",
        "Harbour Bank",
        "Surulere School",
      ]);
    });
  });

  describe("layers", () => {
    it("lists districts by name", () => {
      expect(names(service().lcdas())).toEqual(["Surulere", "Island"]);
    });

    it("drops short roads and labels unnamed ones", () => {
      const roads = service().roadsLayer();

      expect(names(roads)).toEqual(["Bode Thomas Street", "Adeniran Ogunsanya", "Road"]);
      expect(roads.features[0]!.geometry).toEqual({
        type: "LineString",
        coordinates: [
          [3.35, 6.5],
          [3.351, 6.5],
        ],
      });
    });

    it("rounds road coordinates to five decimals", () => {
      const topology = fixtureData().topology;
      const [first] = topology.edges;
      const roads = service({
        topology: {
          ...topology,
          edges: first
            ? [
                {
                  ...first,
                  geometry: {
                    type: "LineString",
                    coordinates: [
                      [3.3500012, 6.5000049],
                      [3.3510041, 6.4999996],
                    ],
                  },
                },
              ]
            : [],
        },
      }).roadsLayer();

      expect(roads.features[0]!.geometry).toEqual({
        type: "LineString",
        coordinates: [
          [3.35, 6.5],
          [3.351, 6.5],
        ],
      });
    });

    it("returns the boundary with its properties", () => {
      const boundary = service().boundary();

      expect(boundary.features).toHaveLength(1);
      expect(boundary.features[0]!.properties).toEqual({ name: "Project Area" });
    });
  });

  describe("search", () => {
    it("ignores queries shorter than two characters", () => {
      expect(service().search("s")).toEqual([]);
    });

    it("searches points, then roads, then districts", () => {
      const results = service().search("sur");

      expect(results.map((r) => [r.name, r.category])).toEqual([
        ["Surulere School", "School"],
        ["Surulere", "District"],
      ]);
      expect(results[0]).toMatchObject({ lng: 3.352, lat: 6.502 });
      expect(results[1]!.lng).toBeCloseTo(3.35, 9);
      expect(results[1]!.lat).toBeCloseTo(6.5, 9);
    });

    it("places roads at their centroid", () => {
      const [road] = service().search("THOMAS");

      expect(road?.category).toBe("Road");
      expect(road?.lng).toBeCloseTo(3.3505, 9);
      expect(road?.lat).toBeCloseTo(6.5, 9);
    });

    it("stops at the result limit", () => {
      const points = Array.from({ length: 12 }, (_, i) => ({
        id: i + 1,
        name: `Shop ${i + 1}`,
        category: "Shop",
        coordinate: A,
      }));

      const results = service({ points }).search("shop");

      expect(results).toHaveLength(SEARCH_MAX_RESULTS);
      expect(results[9]!.name).toBe("Shop 10");
    });
  });

  describe("identify", () => {
    it("finds the district containing a point", () => {
      expect(names(service().identify({ lng: 3.35, lat: 6.5 }))).toEqual(["Surulere"]);
    });

    it("returns nothing outside every district", () => {
      expect(service().identify({ lng: 3.0, lat: 6.0 }).features).toEqual([]);
    });
  });

  describe("stats", () => {
    it("counts points per category, most common first then by label", () => {
      const extra = { id: 5, name: "Second School", category: "School", coordinate: A };
      const s = service({ points: [...fixtureData().points, extra] }).stats();

      expect(s.poi_stats).toEqual([
        { label: "School", value: 2 },
        { label: "Bank", value: 1 },
        { label: "Clinic", value: 1 },
        { label: "Microfinance Bank", value: 1 },
      ]);
    });

    it("totals road length and district area", () => {
      const s = service().stats();

      expect(s.total_road_km).toBe(0.35);
      expect(s.total_area_sqkm).toBe(
        Math.round(((area(SURULERE) + area(ISLAND)) / 1_000_000) * 100) / 100
      );
    });
  });

  describe("lcdaStats", () => {
    it("describes one district", () => {
      const s = service().lcdaStats("Surulere");

      expect(s.lcda_name).toBe("Surulere");
      expect(s.area_sqkm).toBe(Math.round((area(SURULERE) / 1_000_000) * 100) / 100);
      expect(s.road_count).toBe(3);
      expect(s.longest_road).toBe("Adeniran Ogunsanya (111m)");
      expect(s.poi_stats.map((p) => [p.label, p.value])).toEqual([
        ["Bank", 1],
        ["Microfinance Bank", 1],
        ["School", 1],
      ]);
      expect(s.poi_stats[0]!.items).toEqual([{ name: "Harbour Bank", lat: 6.501, lng: 3.351 }]);
    });

    it("reports zeros for an unknown district", () => {
      expect(service().lcdaStats("Nowhere")).toEqual({
        lcda_name: "Nowhere",
        area_sqkm: 0,
        road_count: 0,
        longest_road: "None (0m)",
        poi_stats: [],
      });
    });
  });
});
