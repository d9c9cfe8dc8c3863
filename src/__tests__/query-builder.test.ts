import { describe, test } from "node:test";
import assert from "node:assert";
import { parseToolArgs } from "../forms/utils";
import {
  inaturalistSearchArgs,
  nearbyPlacesArgs,
  searchObservationsArgs,
  searchPlacesArgs,
  searchProjectsArgs,
  searchTaxaArgs,
  similarSpeciesArgs,
  speciesCountsArgs,
} from "../forms/toolArgs";
import { EntityResolver } from "../integrations/entity-resolver";
import {
  buildNearbyPlacesQuery,
  buildObservationsQuery,
  buildPlacesSearchQuery,
  buildProjectsQuery,
  buildSimilarSpeciesQuery,
  buildSourceSearchQuery,
  buildSpeciesCountsQuery,
  buildTaxaSearchQuery,
} from "../integrations/query-builder";
import { NotFoundError, ValidationError } from "../utils/errors";
import { FakeUpstream, createTestClient } from "./helpers/testHelpers";

function resolverFor(upstream: FakeUpstream) {
  const { client } = createTestClient(upstream);
  return new EntityResolver(client);
}

function assertValidation(run: () => unknown, message: string, field: string, value: unknown) {
  assert.throws(run, (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.strictEqual(error.message, message);
    assert.deepStrictEqual(error.context, { field, value });
    return true;
  });
}

void describe("Parameter Builder", () => {
  void describe("search_observations", () => {
    void test("should apply page defaults", async () => {
      const upstream = new FakeUpstream();
      const args = parseToolArgs(searchObservationsArgs, {});

      const { query, resolved } = await buildObservationsQuery(args, resolverFor(upstream));

      assert.deepStrictEqual(query, { page: 1, per_page: 20 });
      assert.deepStrictEqual(resolved, {});
    });

    void test("should clamp per_page to 200", async () => {
      const args = parseToolArgs(searchObservationsArgs, { per_page: 500 });

      const { query } = await buildObservationsQuery(args, resolverFor(new FakeUpstream()));

      assert.strictEqual(query.per_page, 200);
    });

    void test("should default the radius when coordinates are given", async () => {
      const args = parseToolArgs(searchObservationsArgs, { lat: -33.87, lng: 151.21 });

      const { query } = await buildObservationsQuery(args, resolverFor(new FakeUpstream()));

      assert.deepStrictEqual(query, { page: 1, per_page: 20, lat: -33.87, lng: 151.21, radius: 10 });
    });

    void test("should forward dates, quality grade and iconic taxa", async () => {
      const args = parseToolArgs(searchObservationsArgs, {
        d1: "2024-03-01",
        d2: "2024-03-31",
        quality_grade: "research",
        iconic_taxa: "Aves",
      });

      const { query } = await buildObservationsQuery(args, resolverFor(new FakeUpstream()));

      assert.deepStrictEqual(query, {
        page: 1,
        per_page: 20,
        d1: "2024-03-01",
        d2: "2024-03-31",
        quality_grade: "research",
        iconic_taxa: "Aves",
      });
    });

    void test("should treat null arguments as omitted", async () => {
      const args = parseToolArgs(searchObservationsArgs, { place_id: null, per_page: null, taxon_name: null });

      const { query } = await buildObservationsQuery(args, resolverFor(new FakeUpstream()));

      assert.deepStrictEqual(query, { page: 1, per_page: 20 });
    });

    void test("should use ids without consulting the resolver", async () => {
      const upstream = new FakeUpstream();
      const args = parseToolArgs(searchObservationsArgs, {
        place_id: 6744,
        place_name: "Australia",
        taxon_id: 43236,
        taxon_name: "platypus",
      });

      const { query, resolved } = await buildObservationsQuery(args, resolverFor(upstream));

      assert.strictEqual(query.place_id, 6744);
      assert.strictEqual(query.taxon_id, 43236);
      assert.deepStrictEqual(resolved, {});
      assert.strictEqual(upstream.requests.length, 0);
    });
  });

  void describe("get_species_counts", () => {
    void test("should resolve the place before the taxon", async () => {
      const upstream = new FakeUpstream()
        .on("/places/autocomplete", {
          status: 200,
          body: { results: [{ id: 10211, name: "Yellowstone", display_name: "Yellowstone National Park, US" }] },
        })
        .on("/taxa/autocomplete", {
          status: 200,
          body: { results: [{ id: 41638, name: "Canis lupus", preferred_common_name: "Gray Wolf" }] },
        });
      const args = parseToolArgs(speciesCountsArgs, { place_name: "Yellowstone", taxon_name: "wolf" });

      const { query, resolved } = await buildSpeciesCountsQuery(args, resolverFor(upstream));

      assert.deepStrictEqual(
        upstream.requests.map((request) => request.endpoint),
        ["/places/autocomplete", "/taxa/autocomplete"]
      );
      assert.deepStrictEqual(query, { per_page: 20, place_id: 10211, taxon_id: 41638 });
      assert.deepStrictEqual(resolved, {
        place: { id: 10211, query: "Yellowstone", matched_name: "Yellowstone National Park, US" },
        taxon: { id: 41638, query: "wolf", matched_name: "Gray Wolf (Canis lupus)" },
      });
    });

    void test("should stop at an unknown place name", async () => {
      const upstream = new FakeUpstream()
        .on("/places/autocomplete", { status: 200, body: { results: [] } })
        .on("/taxa/autocomplete", { status: 200, body: { results: [{ id: 1 }] } });
      const args = parseToolArgs(speciesCountsArgs, { place_name: "Atlantis", taxon_name: "wolf" });

      await assert.rejects(buildSpeciesCountsQuery(args, resolverFor(upstream)), NotFoundError);
      assert.strictEqual(upstream.requests.length, 1);
    });
  });

  void describe("argument validation", () => {
    void test("should require lng alongside lat", () => {
      assertValidation(
        () => parseToolArgs(searchObservationsArgs, { lat: 10 }),
        "Invalid arguments: lng: lat and lng must be provided together",
        "lng",
        undefined
      );
    });

    void test("should reject a radius without coordinates", () => {
      assertValidation(
        () => parseToolArgs(speciesCountsArgs, { radius: 5 }),
        "Invalid arguments: radius: radius requires lat and lng",
        "radius",
        5
      );
    });

    void test("should reject an out-of-range latitude", () => {
      assertValidation(
        () => parseToolArgs(searchObservationsArgs, { lat: 95, lng: 0 }),
        "Invalid arguments: lat: Latitude must be between -90 and 90",
        "lat",
        95
      );
    });

    void test("should reject a malformed date", () => {
      assertValidation(
        () => parseToolArgs(searchObservationsArgs, { d1: "2024/03/01" }),
        "Invalid arguments: d1: Date must be in YYYY-MM-DD format",
        "d1",
        "2024/03/01"
      );
    });

    void test("should reject a fractional taxon id", () => {
      assertValidation(
        () => parseToolArgs(similarSpeciesArgs, { taxon_id: 1.5 }),
        "Invalid arguments: taxon_id: Must be an integer",
        "taxon_id",
        1.5
      );
    });

    void test("should require a search term", () => {
      assertValidation(
        () => parseToolArgs(searchTaxaArgs, {}),
        "Invalid arguments: q: Required",
        "q",
        undefined
      );
    });

    void test("should reject a blank search term", () => {
      assertValidation(
        () => parseToolArgs(searchPlacesArgs, { q: "   " }),
        "Invalid arguments: q: Cannot be empty",
        "q",
        "   "
      );
    });
  });

  void describe("search_taxa", () => {
    void test("should clamp per_page to 30", () => {
      const args = parseToolArgs(searchTaxaArgs, { q: "fox", per_page: 1000 });

      assert.deepStrictEqual(buildTaxaSearchQuery(args), { q: "fox", per_page: 30 });
    });

    void test("should send is_active and rank when given", () => {
      const args = parseToolArgs(searchTaxaArgs, { q: "Ornithorhynchus", is_active: false, rank: "species" });

      assert.deepStrictEqual(buildTaxaSearchQuery(args), {
        q: "Ornithorhynchus",
        per_page: 10,
        is_active: "false",
        rank: "species",
      });
    });
  });

  void describe("search_places", () => {
    void test("should default per_page to 10", () => {
      const args = parseToolArgs(searchPlacesArgs, { q: " Costa Rica " });

      assert.deepStrictEqual(buildPlacesSearchQuery(args), { q: "Costa Rica", per_page: 10 });
    });
  });

  void describe("get_nearby_places", () => {
    void test("should build a box around the point", () => {
      const args = parseToolArgs(nearbyPlacesArgs, { lat: 10.1, lng: 20.2 });

      assert.deepStrictEqual(buildNearbyPlacesQuery(args), { nelat: 10.6, nelng: 20.7, swlat: 9.6, swlng: 19.7 });
    });

    void test("should clip the box to valid coordinates", () => {
      const args = parseToolArgs(nearbyPlacesArgs, { lat: 89.8, lng: 179.9 });

      assert.deepStrictEqual(buildNearbyPlacesQuery(args), { nelat: 90, nelng: 180, swlat: 89.3, swlng: 179.4 });
    });

    void test("should require both coordinates", () => {
      assert.throws(() => parseToolArgs(nearbyPlacesArgs, { lat: 10 }), ValidationError);
    });
  });

  void describe("search_projects", () => {
    void test("should include only the filters given", () => {
      const args = parseToolArgs(searchProjectsArgs, { q: "butterflies", lat: -33.87, lng: 151.21, place_id: 6744 });

      assert.deepStrictEqual(buildProjectsQuery(args), {
        per_page: 10,
        q: "butterflies",
        lat: -33.87,
        lng: 151.21,
        place_id: 6744,
      });
    });

    void test("should work with no filters", () => {
      assert.deepStrictEqual(buildProjectsQuery(parseToolArgs(searchProjectsArgs, undefined)), { per_page: 10 });
    });
  });

  void describe("get_similar_species", () => {
    void test("should pass taxon and optional place", () => {
      const args = parseToolArgs(similarSpeciesArgs, { taxon_id: 48662, place_id: 1 });

      assert.deepStrictEqual(buildSimilarSpeciesQuery(args), { taxon_id: 48662, place_id: 1 });
    });
  });

  void describe("inaturalist_search", () => {
    void test("should default to every source", () => {
      const args = parseToolArgs(inaturalistSearchArgs, { q: "monarch" });

      assert.deepStrictEqual(args.sources, ["taxa", "places", "projects", "users"]);
    });

    void test("should normalise and de-duplicate sources", () => {
      const args = parseToolArgs(inaturalistSearchArgs, { q: "monarch", sources: " Taxa, places ,taxa" });

      assert.deepStrictEqual(args.sources, ["taxa", "places"]);
    });

    void test("should reject an unknown source", () => {
      assertValidation(
        () => parseToolArgs(inaturalistSearchArgs, { q: "monarch", sources: "taxa,plants" }),
        "Invalid arguments: sources: Unknown source 'plants'. Expected any of: taxa, places, projects, users",
        "sources",
        "taxa,plants"
      );
    });

    void test("should build one query per source", () => {
      const args = parseToolArgs(inaturalistSearchArgs, { q: "monarch", per_page: 5 });

      assert.deepStrictEqual(buildSourceSearchQuery(args, "places"), { q: "monarch", sources: "places", per_page: 5 });
    });
  });
});
