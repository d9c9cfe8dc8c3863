/**
 * Tool dispatch table
 *
 * Each handler validates its raw arguments, builds the upstream query,
 * calls the client and normalizes what comes back. Handlers return plain
 * data; serialization and error shaping happen in the server core.
 */

import { parseToolArgs } from "@/forms/utils";
import {
  getTaxonArgs,
  inaturalistSearchArgs,
  nearbyPlacesArgs,
  searchObservationsArgs,
  searchPlacesArgs,
  searchProjectsArgs,
  searchTaxaArgs,
  similarSpeciesArgs,
  speciesCountsArgs,
} from "@/forms/toolArgs";
import { NotFoundError, UpstreamError } from "@/utils/errors";
import type { RequestOptions } from "@/integrations/base-integration-client";
import type { EntityResolver } from "@/integrations/entity-resolver";
import { fanOutSearch } from "@/integrations/fan-out";
import type { INaturalistClient, INatTaxon } from "@/integrations/inaturalist";
import {
  normalizeObservation,
  normalizePlace,
  normalizeProject,
  normalizeSpeciesCounts,
  normalizeTaxonDetail,
  normalizeTaxonSummary,
} from "@/integrations/normalizers";
import {
  buildNearbyPlacesQuery,
  buildObservationsQuery,
  buildPlacesSearchQuery,
  buildProjectsQuery,
  buildSimilarSpeciesQuery,
  buildSpeciesCountsQuery,
  buildTaxaSearchQuery,
  type ResolvedNames,
} from "@/integrations/query-builder";
import type { ToolName } from "./tool-definitions";

export const NEARBY_PLACES_LIMIT = 10;

export interface ToolContext {
  client: INaturalistClient;
  resolver: EntityResolver;
  signal?: AbortSignal;
}

export type ToolHandler = (args: unknown, context: ToolContext) => Promise<object>;

function resolvedBlock(resolved: ResolvedNames) {
  return resolved.place || resolved.taxon ? { resolved } : {};
}

async function fetchTaxon(client: INaturalistClient, taxonId: number, options: RequestOptions): Promise<INatTaxon> {
  const notFound = () => new NotFoundError(`No taxon found with ID ${taxonId}.`, "taxon", taxonId);
  try {
    const response = await client.getTaxon(taxonId, options);
    const taxon = response.results?.[0];
    if (!taxon) {
      throw notFound();
    }
    return taxon;
  } catch (error) {
    if (error instanceof UpstreamError && error.statusCode === 404) {
      throw notFound();
    }
    throw error;
  }
}

async function searchObservations(rawArgs: unknown, { client, resolver, signal }: ToolContext) {
  const args = parseToolArgs(searchObservationsArgs, rawArgs);
  const { query, resolved } = await buildObservationsQuery(args, resolver, { signal });
  const response = await client.getObservations(query, { signal });
  const results = response.results ?? [];

  return {
    total_results: response.total_results ?? results.length,
    page: args.page,
    per_page: args.per_page,
    ...resolvedBlock(resolved),
    observations: results.map((observation) => normalizeObservation(observation, client.siteUrl)),
  };
}

async function getSpeciesCounts(rawArgs: unknown, { client, resolver, signal }: ToolContext) {
  const args = parseToolArgs(speciesCountsArgs, rawArgs);
  const { query, resolved } = await buildSpeciesCountsQuery(args, resolver, { signal });
  const response = await client.getSpeciesCounts(query, { signal });
  const results = response.results ?? [];

  return {
    total_results: response.total_results ?? results.length,
    ...resolvedBlock(resolved),
    species: normalizeSpeciesCounts(results),
  };
}

async function searchTaxa(rawArgs: unknown, { client, signal }: ToolContext) {
  const args = parseToolArgs(searchTaxaArgs, rawArgs);
  const response = await client.autocompleteTaxa(buildTaxaSearchQuery(args), { signal });
  const results = response.results ?? [];

  return {
    query: args.q,
    total_results: response.total_results ?? results.length,
    taxa: results.map(normalizeTaxonSummary),
  };
}

async function getTaxon(rawArgs: unknown, { client, signal }: ToolContext) {
  const args = parseToolArgs(getTaxonArgs, rawArgs);
  const taxon = await fetchTaxon(client, args.taxon_id, { signal });
  return { taxon: normalizeTaxonDetail(taxon, client.siteUrl) };
}

async function searchPlaces(rawArgs: unknown, { client, signal }: ToolContext) {
  const args = parseToolArgs(searchPlacesArgs, rawArgs);
  const response = await client.autocompletePlaces(buildPlacesSearchQuery(args), { signal });
  const results = response.results ?? [];

  return {
    query: args.q,
    total_results: response.total_results ?? results.length,
    places: results.map(normalizePlace),
  };
}

async function getNearbyPlaces(rawArgs: unknown, { client, signal }: ToolContext) {
  const args = parseToolArgs(nearbyPlacesArgs, rawArgs);
  const response = await client.getNearbyPlaces(buildNearbyPlacesQuery(args), { signal });
  const standard = response.results?.standard ?? [];
  const community = response.results?.community ?? [];

  return {
    lat: args.lat,
    lng: args.lng,
    standard_total: standard.length,
    community_total: community.length,
    standard: standard.slice(0, NEARBY_PLACES_LIMIT).map(normalizePlace),
    community: community.slice(0, NEARBY_PLACES_LIMIT).map(normalizePlace),
  };
}

async function searchProjects(rawArgs: unknown, { client, signal }: ToolContext) {
  const args = parseToolArgs(searchProjectsArgs, rawArgs);
  const response = await client.getProjects(buildProjectsQuery(args), { signal });
  const results = response.results ?? [];

  return {
    total_results: response.total_results ?? results.length,
    projects: results.map((project) => normalizeProject(project, client.siteUrl)),
  };
}

async function getSimilarSpecies(rawArgs: unknown, { client, signal }: ToolContext) {
  const args = parseToolArgs(similarSpeciesArgs, rawArgs);
  // The taxon is fetched first so an unknown id stops before the statistics query.
  const taxon = await fetchTaxon(client, args.taxon_id, { signal });
  const response = await client.getSimilarSpecies(buildSimilarSpeciesQuery(args), { signal });
  const results = response.results ?? [];

  return {
    taxon: normalizeTaxonSummary(taxon),
    ...(args.place_id !== undefined ? { place_id: args.place_id } : {}),
    similar_species: normalizeSpeciesCounts(results),
  };
}

async function inaturalistSearch(rawArgs: unknown, { client, signal }: ToolContext) {
  const args = parseToolArgs(inaturalistSearchArgs, rawArgs);
  return fanOutSearch(client, args, { signal });
}

export const toolHandlers: Record<ToolName, ToolHandler> = {
  search_observations: searchObservations,
  get_species_counts: getSpeciesCounts,
  search_taxa: searchTaxa,
  get_taxon: getTaxon,
  search_places: searchPlaces,
  get_nearby_places: getNearbyPlaces,
  search_projects: searchProjects,
  get_similar_species: getSimilarSpecies,
  inaturalist_search: inaturalistSearch,
};
