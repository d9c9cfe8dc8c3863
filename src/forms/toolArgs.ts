import { z } from "zod";
import { optional, trimmedString, withDefault } from "./utils";

/**
 * Argument schemas for every tool. Defaults and per_page ceilings here are
 * part of the published tool contract.
 */

export const OBSERVATIONS_MAX_PER_PAGE = 200;
export const TAXA_SEARCH_MAX_PER_PAGE = 30;
export const DEFAULT_RADIUS_KM = 10;

const latitude = z.number().min(-90, "Latitude must be between -90 and 90").max(90, "Latitude must be between -90 and 90");
const longitude = z
  .number()
  .min(-180, "Longitude must be between -180 and 180")
  .max(180, "Longitude must be between -180 and 180");
const positiveInt = z.number().int("Must be an integer").positive("Must be a positive integer");
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be in YYYY-MM-DD format");

/**
 * Positive page size with a default, clamped (never rejected) above `max`
 */
const perPage = (defaultValue: number, max?: number) =>
  withDefault(positiveInt, defaultValue).transform((value: number) =>
    max === undefined ? value : Math.min(value, max)
  );

type CoordinateArgs = { lat?: number; lng?: number; radius?: number };

function requireCoordinatePair(args: CoordinateArgs, ctx: z.RefinementCtx) {
  if ((args.lat === undefined) !== (args.lng === undefined)) {
    const missing = args.lat === undefined ? "lat" : "lng";
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [missing],
      message: "lat and lng must be provided together",
    });
  }
  if (args.radius !== undefined && args.lat === undefined && args.lng === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["radius"],
      message: "radius requires lat and lng",
    });
  }
}

const observationFilters = {
  lat: optional(latitude),
  lng: optional(longitude),
  radius: optional(z.number().positive("Radius must be positive")),
  place_name: optional(trimmedString()),
  place_id: optional(positiveInt),
  taxon_name: optional(trimmedString()),
  taxon_id: optional(positiveInt),
  d1: optional(isoDate),
  d2: optional(isoDate),
  quality_grade: optional(trimmedString()),
  iconic_taxa: optional(trimmedString()),
};

export const searchObservationsArgs = z
  .object({
    ...observationFilters,
    page: withDefault(positiveInt, 1),
    per_page: perPage(20, OBSERVATIONS_MAX_PER_PAGE),
  })
  .superRefine(requireCoordinatePair);

export const speciesCountsArgs = z
  .object({
    ...observationFilters,
    per_page: perPage(20, OBSERVATIONS_MAX_PER_PAGE),
  })
  .superRefine(requireCoordinatePair);

export const searchTaxaArgs = z.object({
  q: trimmedString(),
  is_active: optional(z.boolean()),
  rank: optional(trimmedString()),
  per_page: perPage(10, TAXA_SEARCH_MAX_PER_PAGE),
});

export const getTaxonArgs = z.object({
  taxon_id: positiveInt,
});

export const searchPlacesArgs = z.object({
  q: trimmedString(),
  per_page: perPage(10),
});

export const nearbyPlacesArgs = z.object({
  lat: latitude,
  lng: longitude,
});

export const searchProjectsArgs = z
  .object({
    q: optional(trimmedString()),
    lat: optional(latitude),
    lng: optional(longitude),
    place_id: optional(positiveInt),
    per_page: perPage(10),
  })
  .superRefine(requireCoordinatePair);

export const similarSpeciesArgs = z.object({
  taxon_id: positiveInt,
  place_id: optional(positiveInt),
});

export const SEARCH_SOURCES = ["taxa", "places", "projects", "users"] as const;
export type SearchSource = (typeof SEARCH_SOURCES)[number];

function isSearchSource(value: string): value is SearchSource {
  return SEARCH_SOURCES.some((source) => source === value);
}

/**
 * Comma-separated source list; omitted or blank means all four sources.
 */
const searchSources = optional(z.string()).transform((val: string | undefined, ctx): SearchSource[] => {
  const names = (val ?? "")
    .split(",")
    .map((name) => name.trim().toLowerCase())
    .filter((name) => name.length > 0);
  if (names.length === 0) {
    return [...SEARCH_SOURCES];
  }

  const sources: SearchSource[] = [];
  for (const name of names) {
    if (!isSearchSource(name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown source '${name}'. Expected any of: ${SEARCH_SOURCES.join(", ")}`,
      });
      return z.NEVER;
    }
    if (!sources.includes(name)) {
      sources.push(name);
    }
  }
  return sources;
});

export const inaturalistSearchArgs = z.object({
  q: trimmedString(),
  sources: searchSources,
  per_page: perPage(10),
});

export type SearchObservationsArgs = z.infer<typeof searchObservationsArgs>;
export type SpeciesCountsArgs = z.infer<typeof speciesCountsArgs>;
export type ObservationFilterArgs = Omit<SpeciesCountsArgs, "per_page">;
export type SearchTaxaArgs = z.infer<typeof searchTaxaArgs>;
export type GetTaxonArgs = z.infer<typeof getTaxonArgs>;
export type SearchPlacesArgs = z.infer<typeof searchPlacesArgs>;
export type NearbyPlacesArgs = z.infer<typeof nearbyPlacesArgs>;
export type SearchProjectsArgs = z.infer<typeof searchProjectsArgs>;
export type SimilarSpeciesArgs = z.infer<typeof similarSpeciesArgs>;
export type InaturalistSearchArgs = z.infer<typeof inaturalistSearchArgs>;
