/**
 * iNaturalist Integration Client
 *
 * Client for the public iNaturalist v1 API:
 * - Observations and per-species observation counts
 * - Taxa (autocomplete and detail)
 * - Places (autocomplete and bounding-box lookup)
 * - Projects, similar-species statistics and the cross-resource search
 *
 * API Documentation: https://api.inaturalist.org/v1/docs/
 * No authentication required for read-only access
 */

import { getConfig, type INaturalistConfig } from "@/config";
import {
  BaseIntegrationClient,
  type IntegrationClientDeps,
  type RequestOptions,
  type UpstreamQuery,
} from "./base-integration-client";
import { RateGovernor } from "./rate-governor";

export interface INatPhoto {
  id?: number;
  url?: string;
  square_url?: string;
  medium_url?: string;
  attribution?: string;
  license_code?: string | null;
}

export interface INatConservationStatus {
  status?: string;
  status_name?: string;
  authority?: string;
  iucn?: number;
}

export interface INatTaxon {
  id: number;
  name?: string;
  preferred_common_name?: string;
  rank?: string;
  rank_level?: number;
  observations_count?: number;
  iconic_taxon_name?: string;
  is_active?: boolean;
  matched_term?: string;
  ancestor_ids?: number[];
  ancestors?: INatTaxon[];
  conservation_status?: INatConservationStatus | null;
  conservation_statuses?: INatConservationStatus[];
  wikipedia_summary?: string | null;
  wikipedia_url?: string | null;
  default_photo?: INatPhoto | null;
}

export interface INatUser {
  id: number;
  login?: string;
  name?: string | null;
  observations_count?: number;
  icon_url?: string | null;
}

export interface INatObservation {
  id: number;
  uri?: string;
  taxon?: INatTaxon | null;
  user?: INatUser | null;
  observed_on?: string | null;
  observed_on_details?: { date?: string } | null;
  place_guess?: string | null;
  quality_grade?: string;
  /** "lat,lng" */
  location?: string | null;
  /** [lng, lat] */
  geojson?: { type?: string; coordinates?: number[] } | null;
  photos?: INatPhoto[];
}

export interface INatPlace {
  id: number;
  name?: string;
  display_name?: string;
  place_type?: number | null;
  admin_level?: number | null;
  bounding_box_geojson?: { type?: string; coordinates?: number[][][] } | null;
}

export interface INatProject {
  id: number;
  title?: string;
  slug?: string;
  description?: string | null;
  place_id?: number | null;
  project_type?: string;
  observations_count?: number;
  members_count?: number;
  icon?: string | null;
}

export interface INatSpeciesCount {
  count: number;
  taxon?: INatTaxon | null;
}

export type INatSearchResult =
  | { type: "Taxon"; score?: number; record?: INatTaxon | null }
  | { type: "Place"; score?: number; record?: INatPlace | null }
  | { type: "Project"; score?: number; record?: INatProject | null }
  | { type: "User"; score?: number; record?: INatUser | null };

export interface INatPagedResponse<T> {
  total_results?: number;
  page?: number;
  per_page?: number;
  results: T[];
}

export interface INatNearbyPlacesResponse {
  total_results?: number;
  results: {
    standard?: INatPlace[];
    community?: INatPlace[];
  };
}

/**
 * iNaturalist Client
 *
 * Every method issues exactly one upstream GET through the shared governor.
 */
export class INaturalistClient extends BaseIntegrationClient {
  protected serviceName = "iNaturalist";
  readonly siteUrl: string;

  constructor(clientConfig: INaturalistConfig, deps: Partial<IntegrationClientDeps> = {}) {
    const governor =
      deps.governor ??
      new RateGovernor({
        maxRequests: clientConfig.maxRequestsPerMinute,
        windowMs: clientConfig.windowMs,
        clock: deps.clock,
      });

    super(
      {
        baseUrl: clientConfig.baseUrl,
        maxRetries: clientConfig.maxRetries,
        retryDelaysMs: clientConfig.retryDelaysMs,
        timeoutMs: clientConfig.timeoutMs,
        headers: { "User-Agent": clientConfig.userAgent },
      },
      { ...deps, governor }
    );

    this.siteUrl = clientConfig.siteUrl;
    this.logInit();
  }

  async getObservations(query: UpstreamQuery, options?: RequestOptions) {
    return this.get<INatPagedResponse<INatObservation>>("/observations", query, options);
  }

  async getSpeciesCounts(query: UpstreamQuery, options?: RequestOptions) {
    return this.get<INatPagedResponse<INatSpeciesCount>>("/observations/species_counts", query, options);
  }

  async autocompleteTaxa(query: UpstreamQuery, options?: RequestOptions) {
    return this.get<INatPagedResponse<INatTaxon>>("/taxa/autocomplete", query, options);
  }

  async getTaxon(taxonId: number, options?: RequestOptions) {
    return this.get<INatPagedResponse<INatTaxon>>(`/taxa/${taxonId}`, undefined, options);
  }

  async autocompletePlaces(query: UpstreamQuery, options?: RequestOptions) {
    return this.get<INatPagedResponse<INatPlace>>("/places/autocomplete", query, options);
  }

  async getNearbyPlaces(query: UpstreamQuery, options?: RequestOptions) {
    return this.get<INatNearbyPlacesResponse>("/places/nearby", query, options);
  }

  async getProjects(query: UpstreamQuery, options?: RequestOptions) {
    return this.get<INatPagedResponse<INatProject>>("/projects", query, options);
  }

  async getSimilarSpecies(query: UpstreamQuery, options?: RequestOptions) {
    return this.get<INatPagedResponse<INatSpeciesCount>>("/identifications/similar_species", query, options);
  }

  async search(query: UpstreamQuery, options?: RequestOptions) {
    return this.get<INatPagedResponse<INatSearchResult>>("/search", query, options);
  }
}

let clientInstance: INaturalistClient | null = null;

/**
 * Get the process-wide iNaturalist client (and with it the shared rate governor)
 */
export function getINaturalistClient(): INaturalistClient {
  if (!clientInstance) {
    clientInstance = new INaturalistClient(getConfig().inaturalist);
  }
  return clientInstance;
}
