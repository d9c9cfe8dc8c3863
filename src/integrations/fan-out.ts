/**
 * Fan-Out Aggregator
 *
 * Runs the same search term against several resource kinds at once. Each
 * source succeeds or fails on its own; the call only fails when every
 * requested source failed.
 */

import { logger } from "@/utils/logger";
import { NetworkError, UpstreamError, isToolError } from "@/utils/errors";
import type { InaturalistSearchArgs, SearchSource } from "@/forms/toolArgs";
import type { RequestOptions } from "./base-integration-client";
import type { INaturalistClient } from "./inaturalist";
import { normalizeSearchResult, type SearchItem } from "./normalizers";
import { buildSourceSearchQuery } from "./query-builder";

export interface SourceFailure {
  kind: string;
  message: string;
  status_code?: number;
}

export type SourceOutcome =
  | { status: "ok"; total_results: number; items: SearchItem[] }
  | { status: "error"; error: SourceFailure };

export interface FanOutResult {
  query: string;
  sources: SearchSource[];
  results: Partial<Record<SearchSource, SourceOutcome>>;
  /** True when at least one source failed but not all of them */
  partial_failure: boolean;
}

function describeFailure(error: unknown): SourceFailure {
  if (isToolError(error)) {
    const failure: SourceFailure = { kind: error.code, message: error.message };
    if (error instanceof UpstreamError && error.statusCode !== undefined) {
      failure.status_code = error.statusCode;
    }
    return failure;
  }
  return {
    kind: "TOOL_EXECUTION_ERROR",
    message: error instanceof Error ? error.message : String(error),
  };
}

async function searchSource(
  client: INaturalistClient,
  args: InaturalistSearchArgs,
  source: SearchSource,
  options?: RequestOptions
): Promise<SourceOutcome> {
  const response = await client.search(buildSourceSearchQuery(args, source), options);
  const hits = response.results ?? [];
  const items: SearchItem[] = [];
  for (const hit of hits) {
    const item = normalizeSearchResult(hit, client.siteUrl);
    if (item) {
      items.push(item);
    }
  }
  return { status: "ok", total_results: response.total_results ?? items.length, items };
}

export async function fanOutSearch(
  client: INaturalistClient,
  args: InaturalistSearchArgs,
  options?: RequestOptions
): Promise<FanOutResult> {
  const sources = args.sources;
  const settled = await Promise.allSettled(
    sources.map((source) => searchSource(client, args, source, options))
  );

  const results: Partial<Record<SearchSource, SourceOutcome>> = {};
  const failures: { source: SearchSource; error: unknown }[] = [];

  settled.forEach((outcome, index) => {
    const source = sources[index];
    if (outcome.status === "fulfilled") {
      results[source] = outcome.value;
    } else {
      failures.push({ source, error: outcome.reason });
      results[source] = { status: "error", error: describeFailure(outcome.reason) };
    }
  });

  if (failures.length > 0 && failures.length === sources.length) {
    const cancelled = failures.find(({ error }) => error instanceof NetworkError && error.cancelled);
    if (cancelled) {
      throw cancelled.error;
    }
    const statusCode = failures
      .map(({ error }) => (error instanceof UpstreamError ? error.statusCode : undefined))
      .find((code) => code !== undefined);
    const detail = failures.map(({ source, error }) => `${source}: ${describeFailure(error).message}`).join("; ");
    throw new UpstreamError(`All search sources failed (${detail})`, "/search", statusCode);
  }

  if (failures.length > 0) {
    logger.warn(
      `Search for '${args.q}' partially failed: ${failures.map(({ source }) => source).join(", ")}`
    );
  }

  return {
    query: args.q,
    sources,
    results,
    partial_failure: failures.length > 0,
  };
}
