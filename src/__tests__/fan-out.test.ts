import { describe, test } from "node:test";
import assert from "node:assert";
import { parseToolArgs } from "../forms/utils";
import { inaturalistSearchArgs } from "../forms/toolArgs";
import { fanOutSearch } from "../integrations/fan-out";
import { NetworkError, UpstreamError } from "../utils/errors";
import { FakeUpstream, createTestClient, type FakeReply } from "./helpers/testHelpers";

const taxaReply: FakeReply = {
  status: 200,
  body: {
    total_results: 2,
    results: [
      { type: "Taxon", score: 9.1, record: { id: 48662, name: "Danaus plexippus", preferred_common_name: "Monarch" } },
      { type: "Observation", record: { id: 77 } },
    ],
  },
};
const placesReply: FakeReply = {
  status: 200,
  body: { total_results: 1, results: [{ type: "Place", record: { id: 97394, name: "Monarch Grove" } }] },
};
const projectsReply: FakeReply = {
  status: 200,
  body: { total_results: 1, results: [{ type: "Project", record: { id: 5, slug: "monarch-watch", title: "Monarch Watch" } }] },
};

function withSource(source: string) {
  return (params: Record<string, string>) => params.sources === source;
}

void describe("Fan-Out Aggregator", () => {
  void test("should succeed with one failing source out of four", async () => {
    const upstream = new FakeUpstream()
      .onMatch("/search", withSource("taxa"), taxaReply)
      .onMatch("/search", withSource("places"), placesReply)
      .onMatch("/search", withSource("projects"), projectsReply)
      .onMatch("/search", withSource("users"), { status: 500 });
    const { client } = createTestClient(upstream);

    const result = await fanOutSearch(client, parseToolArgs(inaturalistSearchArgs, { q: "monarch" }));

    assert.strictEqual(result.query, "monarch");
    assert.deepStrictEqual(result.sources, ["taxa", "places", "projects", "users"]);
    assert.strictEqual(result.partial_failure, true);
    assert.deepStrictEqual(result.results.taxa, {
      status: "ok",
      total_results: 2,
      items: [{ type: "taxon", id: 48662, scientific_name: "Danaus plexippus", common_name: "Monarch" }],
    });
    assert.deepStrictEqual(result.results.places, {
      status: "ok",
      total_results: 1,
      items: [{ type: "place", id: 97394, name: "Monarch Grove", display_name: "Monarch Grove" }],
    });
    assert.deepStrictEqual(result.results.projects, {
      status: "ok",
      total_results: 1,
      items: [
        {
          type: "project",
          id: 5,
          url: "https://www.inaturalist.test/projects/monarch-watch",
          title: "Monarch Watch",
        },
      ],
    });
    assert.deepStrictEqual(result.results.users, {
      status: "error",
      error: { kind: "UPSTREAM_ERROR", message: "iNaturalist API error: HTTP 500", status_code: 500 },
    });
  });

  void test("should query each requested source once", async () => {
    const upstream = new FakeUpstream()
      .onMatch("/search", withSource("taxa"), taxaReply)
      .onMatch("/search", withSource("places"), placesReply);
    const { client } = createTestClient(upstream);

    const result = await fanOutSearch(
      client,
      parseToolArgs(inaturalistSearchArgs, { q: "monarch", sources: "places,taxa", per_page: 3 })
    );

    assert.strictEqual(result.partial_failure, false);
    assert.deepStrictEqual(Object.keys(result.results), ["places", "taxa"]);
    assert.deepStrictEqual(
      upstream.requests.map((request) => request.params),
      [
        { q: "monarch", sources: "places", per_page: "3" },
        { q: "monarch", sources: "taxa", per_page: "3" },
      ]
    );
  });

  void test("should describe a network failure for one source", async () => {
    const upstream = new FakeUpstream()
      .onMatch("/search", withSource("taxa"), taxaReply)
      .onMatch("/search", withSource("users"), { error: new TypeError("fetch failed") });
    const { client } = createTestClient(upstream);

    const result = await fanOutSearch(client, parseToolArgs(inaturalistSearchArgs, { q: "monarch", sources: "taxa,users" }));

    assert.deepStrictEqual(result.results.users, {
      status: "error",
      error: { kind: "NETWORK_ERROR", message: "Network error connecting to iNaturalist: fetch failed" },
    });
  });

  void test("should fail when every source fails", async () => {
    const upstream = new FakeUpstream()
      .onMatch("/search", withSource("taxa"), { status: 503 })
      .onMatch("/search", withSource("places"), { status: 400 });
    const { client } = createTestClient(upstream);

    await assert.rejects(
      fanOutSearch(client, parseToolArgs(inaturalistSearchArgs, { q: "monarch", sources: "taxa,places" })),
      (error: unknown) => {
        assert.ok(error instanceof UpstreamError);
        assert.strictEqual(
          error.message,
          "All search sources failed (taxa: iNaturalist API error: HTTP 503; places: iNaturalist API error: HTTP 400)"
        );
        assert.strictEqual(error.statusCode, 503);
        assert.strictEqual(error.endpoint, "/search");
        return true;
      }
    );
  });

  void test("should report cancellation rather than a combined failure", async () => {
    const upstream = new FakeUpstream().on("/search", taxaReply);
    const { client } = createTestClient(upstream);
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      fanOutSearch(client, parseToolArgs(inaturalistSearchArgs, { q: "monarch" }), { signal: controller.signal }),
      (error: unknown) => {
        assert.ok(error instanceof NetworkError);
        assert.strictEqual(error.cancelled, true);
        return true;
      }
    );
    assert.strictEqual(upstream.requests.length, 0);
  });
});
