/**
 * Parameter Builder
 *
 * One procedure per tool that turns validated tool arguments into the
 * canonical upstream query. Names are resolved to ids here, place before
 * taxon, so a failed place lookup stops the call before any other request.
 */

import {
  DEFAULT_RADIUS_KM,
  type InaturalistSearchArgs,
  type NearbyPlacesArgs,
  type ObservationFilterArgs,
  type SearchObservationsArgs,
  type SearchPlacesArgs,
  type SearchProjectsArgs,
  type SearchSource,
  type SearchTaxaArgs,
  type SimilarSpeciesArgs,
  type SpeciesCountsArgs,
} from "@/forms/toolArgs";
import type { RequestOptions, UpstreamQuery } from "./base-integration-client";
import { toReference, type EntityResolver, type ResolvedId } from "./entity-resolver";

/** Half the side of the box used to look up places around a point, in degrees */
export const NEARBY_BOX_DEGREES = 0.5;

export interface ResolvedNames {
  place?: ResolvedId;
  taxon?: ResolvedId;
}

export interface BuiltQuery {
  query: UpstreamQuery;
  /** Names that had to be looked up, and what they resolved to */
  resolved: ResolvedNames;
}

/**
 * Shared location, taxon, date and quality filters of the observation tools.
 * Mutates `query` in place so parameter order stays stable.
 */
async function applyObservationFilters(
  query: UpstreamQuery,
  args: ObservationFilterArgs,
  resolver: EntityResolver,
  options?: RequestOptions
): Promise<ResolvedNames> {
  const resolved: ResolvedNames = {};

  if (args.lat !== undefined && args.lng !== undefined) {
    query.lat = args.lat;
    query.lng = args.lng;
    query.radius = args.radius ?? DEFAULT_RADIUS_KM;
  }

  const place = toReference(args.place_id, args.place_name);
  if (place) {
    const resolution = await resolver.resolve("place", place, options);
    query.place_id = resolution.id;
    if (resolution.resolved) {
      resolved.place = resolution.resolved;
    }
  }

  const taxon = toReference(args.taxon_id, args.taxon_name);
  if (taxon) {
    const resolution = await resolver.resolve("taxon", taxon, options);
    query.taxon_id = resolution.id;
    if (resolution.resolved) {
      resolved.taxon = resolution.resolved;
    }
  }

  if (args.d1) query.d1 = args.d1;
  if (args.d2) query.d2 = args.d2;
  if (args.quality_grade) query.quality_grade = args.quality_grade;
  if (args.iconic_taxa) query.iconic_taxa = args.iconic_taxa;

  return resolved;
}

export async function buildObservationsQuery(
  args: SearchObservationsArgs,
  resolver: EntityResolver,
  options?: RequestOptions
): Promise<BuiltQuery> {
  const query: UpstreamQuery = { page: args.page, per_page: args.per_page };
  const resolved = await applyObservationFilters(query, args, resolver, options);
  return { query, resolved };
}

export async function buildSpeciesCountsQuery(
  args: SpeciesCountsArgs,
  resolver: EntityResolver,
  options?: RequestOptions
): Promise<BuiltQuery> {
  const query: UpstreamQuery = { per_page: args.per_page };
  const resolved = await applyObservationFilters(query, args, resolver, options);
  return { query, resolved };
}

export function buildTaxaSearchQuery(args: SearchTaxaArgs): UpstreamQuery {
  const query: UpstreamQuery = { q: args.q, per_page: args.per_page };
  if (args.is_active !== undefined) {
    query.is_active = String(args.is_active);
  }
  if (args.rank) {
    query.rank = args.rank;
  }
  return query;
}

export function buildPlacesSearchQuery(args: SearchPlacesArgs): UpstreamQuery {
  return { q: args.q, per_page: args.per_page };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// Keeps 0.1 + 0.5 style float noise out of the URL.
function roundCoordinate(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Bounding box of +/- NEARBY_BOX_DEGREES around the point, clipped to valid
 * coordinates
 */
export function buildNearbyPlacesQuery(args: NearbyPlacesArgs): UpstreamQuery {
  return {
    nelat: roundCoordinate(clamp(args.lat + NEARBY_BOX_DEGREES, -90, 90)),
    nelng: roundCoordinate(clamp(args.lng + NEARBY_BOX_DEGREES, -180, 180)),
    swlat: roundCoordinate(clamp(args.lat - NEARBY_BOX_DEGREES, -90, 90)),
    swlng: roundCoordinate(clamp(args.lng - NEARBY_BOX_DEGREES, -180, 180)),
  };
}

export function buildProjectsQuery(args: SearchProjectsArgs): UpstreamQuery {
  const query: UpstreamQuery = { per_page: args.per_page };
  if (args.q) {
    query.q = args.q;
  }
  if (args.lat !== undefined && args.lng !== undefined) {
    query.lat = args.lat;
    query.lng = args.lng;
  }
  if (args.place_id !== undefined) {
    query.place_id = args.place_id;
  }
  return query;
}

export function buildSimilarSpeciesQuery(args: SimilarSpeciesArgs): UpstreamQuery {
  const query: UpstreamQuery = { taxon_id: args.taxon_id };
  if (args.place_id !== undefined) {
    query.place_id = args.place_id;
  }
  return query;
}

/**
 * Query for a single source of the cross-resource search
 */
export function buildSourceSearchQuery(args: InaturalistSearchArgs, source: SearchSource): UpstreamQuery {
  return { q: args.q, sources: source, per_page: args.per_page };
}
