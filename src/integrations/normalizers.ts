/**
 * Response Normalizer
 *
 * Reduces iNaturalist payloads to the small records the tools promise.
 * Fields missing upstream are left out of the record; nothing here throws
 * on absent data.
 */

import type {
  INatConservationStatus,
  INatObservation,
  INatPhoto,
  INatPlace,
  INatProject,
  INatSearchResult,
  INatSpeciesCount,
  INatTaxon,
  INatUser,
} from "./inaturalist";

export const WIKIPEDIA_SUMMARY_MAX_LENGTH = 300;
export const PROJECT_DESCRIPTION_MAX_LENGTH = 200;

export interface Coordinates {
  lat: number;
  lng: number;
}

export interface BoundingBox {
  swlat: number;
  swlng: number;
  nelat: number;
  nelng: number;
}

export interface ObservationSpecies {
  taxon_id: number;
  scientific_name?: string;
  common_name?: string;
  rank?: string;
}

export interface NormalizedObservation {
  id: number;
  url: string;
  species?: ObservationSpecies;
  observer?: string;
  observed_on?: string;
  place_guess?: string;
  coordinates?: Coordinates;
  quality_grade?: string;
  thumbnail_url?: string;
  photo_url?: string;
}

export interface TaxonSummary {
  id: number;
  scientific_name?: string;
  common_name?: string;
  rank?: string;
  observations_count?: number;
  photo_url?: string;
}

export interface AncestorSummary {
  id: number;
  rank?: string;
  scientific_name?: string;
  common_name?: string;
}

export interface ConservationStatus {
  status: string;
  status_name?: string;
  authority?: string;
}

export interface TaxonDetail extends TaxonSummary {
  url: string;
  ancestors: AncestorSummary[];
  conservation_status?: ConservationStatus;
  wikipedia_summary?: string;
  wikipedia_url?: string;
}

export interface SpeciesCount {
  count: number;
  taxon: TaxonSummary;
}

export interface NormalizedPlace {
  id: number;
  name?: string;
  display_name?: string;
  place_type?: number;
  admin_level?: number;
  bounding_box?: BoundingBox;
}

export interface NormalizedProject {
  id: number;
  title?: string;
  url: string;
  description?: string;
  place_id?: number;
  project_type?: string;
  observations_count?: number;
  members_count?: number;
}

export interface NormalizedUser {
  id: number;
  login?: string;
  name?: string;
  url: string;
  observations_count?: number;
}

export type SearchItem =
  | ({ type: "taxon" } & TaxonSummary)
  | ({ type: "place" } & NormalizedPlace)
  | ({ type: "project" } & NormalizedProject)
  | ({ type: "user" } & NormalizedUser);

function setIfPresent<T, K extends keyof T>(target: T, key: K, value: T[K] | null | undefined) {
  if (value !== undefined && value !== null) {
    target[key] = value;
  }
}

function nonEmpty(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

export function stripHtml(text: string): string {
  return text
    .replace(/<[^>]+>/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function photoUrl(photo: INatPhoto | null | undefined): string | undefined {
  if (!photo) {
    return undefined;
  }
  return nonEmpty(photo.medium_url) ?? nonEmpty(photo.url);
}

function pointCoordinates(observation: INatObservation): Coordinates | undefined {
  const point = observation.geojson?.coordinates;
  if (point && point.length >= 2 && Number.isFinite(point[0]) && Number.isFinite(point[1])) {
    return { lat: point[1], lng: point[0] };
  }
  if (observation.location) {
    const [lat, lng] = observation.location.split(",").map(Number);
    if (Number.isFinite(lat) && Number.isFinite(lng)) {
      return { lat, lng };
    }
  }
  return undefined;
}

export function normalizeObservation(observation: INatObservation, siteUrl: string): NormalizedObservation {
  const result: NormalizedObservation = {
    id: observation.id,
    url: `${siteUrl}/observations/${observation.id}`,
  };

  const taxon = observation.taxon;
  if (taxon) {
    const species: ObservationSpecies = { taxon_id: taxon.id };
    setIfPresent(species, "scientific_name", nonEmpty(taxon.name));
    setIfPresent(species, "common_name", nonEmpty(taxon.preferred_common_name));
    setIfPresent(species, "rank", nonEmpty(taxon.rank));
    result.species = species;
  }

  setIfPresent(result, "observer", nonEmpty(observation.user?.login));
  setIfPresent(result, "observed_on", nonEmpty(observation.observed_on_details?.date) ?? nonEmpty(observation.observed_on));
  setIfPresent(result, "place_guess", nonEmpty(observation.place_guess));
  setIfPresent(result, "coordinates", pointCoordinates(observation));
  setIfPresent(result, "quality_grade", nonEmpty(observation.quality_grade));

  // Upstream hands out square thumbnails; the medium rendition lives at the same path.
  const thumbnail = nonEmpty(observation.photos?.[0]?.url);
  if (thumbnail) {
    result.thumbnail_url = thumbnail;
    result.photo_url = thumbnail.replace("square", "medium");
  }

  return result;
}

export function normalizeTaxonSummary(taxon: INatTaxon): TaxonSummary {
  const result: TaxonSummary = { id: taxon.id };
  setIfPresent(result, "scientific_name", nonEmpty(taxon.name));
  setIfPresent(result, "common_name", nonEmpty(taxon.preferred_common_name));
  setIfPresent(result, "rank", nonEmpty(taxon.rank));
  setIfPresent(result, "observations_count", taxon.observations_count);
  setIfPresent(result, "photo_url", photoUrl(taxon.default_photo));
  return result;
}

function normalizeConservationStatus(taxon: INatTaxon): ConservationStatus | undefined {
  const raw: INatConservationStatus | undefined =
    taxon.conservation_status ?? taxon.conservation_statuses?.[0];
  if (!raw?.status) {
    return undefined;
  }
  const result: ConservationStatus = { status: raw.status };
  setIfPresent(result, "status_name", nonEmpty(raw.status_name));
  setIfPresent(result, "authority", nonEmpty(raw.authority));
  return result;
}

export function normalizeTaxonDetail(taxon: INatTaxon, siteUrl: string): TaxonDetail {
  const ancestors = (taxon.ancestors ?? [])
    // "Life" sits above kingdom and carries no information for a reader.
    .filter((ancestor) => ancestor.rank !== "stateofmatter")
    .map((ancestor) => {
      const summary: AncestorSummary = { id: ancestor.id };
      setIfPresent(summary, "rank", nonEmpty(ancestor.rank));
      setIfPresent(summary, "scientific_name", nonEmpty(ancestor.name));
      setIfPresent(summary, "common_name", nonEmpty(ancestor.preferred_common_name));
      return summary;
    });

  const result: TaxonDetail = {
    ...normalizeTaxonSummary(taxon),
    url: `${siteUrl}/taxa/${taxon.id}`,
    ancestors,
  };
  setIfPresent(result, "conservation_status", normalizeConservationStatus(taxon));

  if (taxon.wikipedia_summary) {
    const summary = stripHtml(taxon.wikipedia_summary);
    if (summary) {
      result.wikipedia_summary = truncate(summary, WIKIPEDIA_SUMMARY_MAX_LENGTH);
    }
  }
  setIfPresent(result, "wikipedia_url", nonEmpty(taxon.wikipedia_url));

  return result;
}

/**
 * Returns null for an entry that carries no taxon
 */
export function normalizeSpeciesCount(item: INatSpeciesCount): SpeciesCount | null {
  if (!item.taxon) {
    return null;
  }
  return { count: item.count, taxon: normalizeTaxonSummary(item.taxon) };
}

export function normalizeSpeciesCounts(items: INatSpeciesCount[]): SpeciesCount[] {
  const counts: SpeciesCount[] = [];
  for (const item of items) {
    const count = normalizeSpeciesCount(item);
    if (count) {
      counts.push(count);
    }
  }
  return counts;
}

function boundingBox(place: INatPlace): BoundingBox | undefined {
  const ring = place.bounding_box_geojson?.coordinates?.[0];
  if (!ring || ring.length < 3) {
    return undefined;
  }
  const lngs = ring.map((point) => point[0]);
  const lats = ring.map((point) => point[1]);
  return {
    swlat: Math.min(...lats),
    swlng: Math.min(...lngs),
    nelat: Math.max(...lats),
    nelng: Math.max(...lngs),
  };
}

export function normalizePlace(place: INatPlace): NormalizedPlace {
  const result: NormalizedPlace = { id: place.id };
  setIfPresent(result, "name", nonEmpty(place.name));
  setIfPresent(result, "display_name", nonEmpty(place.display_name) ?? nonEmpty(place.name));
  setIfPresent(result, "place_type", place.place_type);
  setIfPresent(result, "admin_level", place.admin_level);
  setIfPresent(result, "bounding_box", boundingBox(place));
  return result;
}

export function normalizeProject(project: INatProject, siteUrl: string): NormalizedProject {
  const result: NormalizedProject = {
    id: project.id,
    url: `${siteUrl}/projects/${project.slug ?? project.id}`,
  };
  setIfPresent(result, "title", nonEmpty(project.title));

  if (project.description) {
    const description = stripHtml(project.description);
    if (description) {
      result.description = truncate(description, PROJECT_DESCRIPTION_MAX_LENGTH);
    }
  }

  setIfPresent(result, "place_id", project.place_id);
  setIfPresent(result, "project_type", nonEmpty(project.project_type));
  setIfPresent(result, "observations_count", project.observations_count);
  setIfPresent(result, "members_count", project.members_count);
  return result;
}

export function normalizeUser(user: INatUser, siteUrl: string): NormalizedUser {
  const result: NormalizedUser = {
    id: user.id,
    url: `${siteUrl}/people/${user.login ?? user.id}`,
  };
  setIfPresent(result, "login", nonEmpty(user.login));
  setIfPresent(result, "name", nonEmpty(user.name));
  setIfPresent(result, "observations_count", user.observations_count);
  return result;
}

/**
 * Normalize one hit of the cross-resource search; unknown record types
 * and hits without a record are dropped
 */
export function normalizeSearchResult(hit: INatSearchResult, siteUrl: string): SearchItem | null {
  switch (hit.type) {
    case "Taxon":
      return hit.record ? { type: "taxon", ...normalizeTaxonSummary(hit.record) } : null;
    case "Place":
      return hit.record ? { type: "place", ...normalizePlace(hit.record) } : null;
    case "Project":
      return hit.record ? { type: "project", ...normalizeProject(hit.record, siteUrl) } : null;
    case "User":
      return hit.record ? { type: "user", ...normalizeUser(hit.record, siteUrl) } : null;
    default:
      return null;
  }
}
