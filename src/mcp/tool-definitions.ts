/**
 * Tool catalog advertised through tools/list
 *
 * Defaults and maxima stated in the descriptions are enforced by the
 * argument schemas in forms/toolArgs.ts.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";

export const TOOL_NAMES = [
  "search_observations",
  "get_species_counts",
  "search_taxa",
  "get_taxon",
  "search_places",
  "get_nearby_places",
  "search_projects",
  "get_similar_species",
  "inaturalist_search",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

const locationProperties = {
  lat: { type: "number", description: "Latitude for location-based search" },
  lng: { type: "number", description: "Longitude for location-based search" },
  radius: { type: "number", description: "Search radius in km (use with lat/lng, default 10)" },
  place_name: {
    type: "string",
    description: 'Place name to search within (e.g. "Australia", "Yellowstone"). Ignored when place_id is given.',
  },
  place_id: { type: "integer", description: "iNaturalist place ID to search within" },
  taxon_name: {
    type: "string",
    description: "Species or taxon common/scientific name to filter by. Ignored when taxon_id is given.",
  },
  taxon_id: { type: "integer", description: "iNaturalist taxon ID to filter by" },
  d1: { type: "string", description: "Start date (YYYY-MM-DD)" },
  d2: { type: "string", description: "End date (YYYY-MM-DD)" },
  quality_grade: { type: "string", description: 'Filter by quality: "research", "needs_id", or "casual"' },
  iconic_taxa: {
    type: "string",
    description:
      "Filter by group: Aves, Mammalia, Reptilia, Amphibia, Actinopterygii, Mollusca, Arachnida, Insecta, Plantae, Fungi, etc.",
  },
};

export const toolDefinitions: Tool[] = [
  {
    name: "search_observations",
    description: "Search iNaturalist observations by location, species, date, and more.",
    inputSchema: {
      type: "object",
      properties: {
        ...locationProperties,
        page: { type: "integer", description: "Page number (default 1)" },
        per_page: { type: "integer", description: "Results per page (default 20, max 200)" },
      },
    },
  },
  {
    name: "get_species_counts",
    description:
      'Get species observed at a location, ranked by observation count. Great for answering "what wildlife will I see here?"',
    inputSchema: {
      type: "object",
      properties: {
        ...locationProperties,
        per_page: { type: "integer", description: "Number of species to return (default 20, max 200)" },
      },
    },
  },
  {
    name: "search_taxa",
    description: "Search for species or taxa by common or scientific name.",
    inputSchema: {
      type: "object",
      properties: {
        q: {
          type: "string",
          description: 'Search query (common or scientific name, e.g. "platypus", "Ornithorhynchus")',
        },
        is_active: { type: "boolean", description: "Only show currently accepted taxa (default: all)" },
        rank: {
          type: "string",
          description: "Filter by taxonomic rank (species, genus, family, order, class, phylum, kingdom)",
        },
        per_page: { type: "integer", description: "Number of results (default 10, max 30)" },
      },
      required: ["q"],
    },
  },
  {
    name: "get_taxon",
    description:
      "Get detailed information about a specific taxon by ID: ancestry, conservation status, Wikipedia summary and photo.",
    inputSchema: {
      type: "object",
      properties: {
        taxon_id: { type: "integer", description: "The iNaturalist taxon ID" },
      },
      required: ["taxon_id"],
    },
  },
  {
    name: "search_places",
    description: "Search for iNaturalist places by name. Returns place IDs you can use in other tools.",
    inputSchema: {
      type: "object",
      properties: {
        q: { type: "string", description: 'Place name to search for (e.g. "Yellowstone", "Costa Rica")' },
        per_page: { type: "integer", description: "Number of results (default 10)" },
      },
      required: ["q"],
    },
  },
  {
    name: "get_nearby_places",
    description: "Find iNaturalist places near a set of coordinates.",
    inputSchema: {
      type: "object",
      properties: {
        lat: { type: "number", description: "Latitude" },
        lng: { type: "number", description: "Longitude" },
      },
      required: ["lat", "lng"],
    },
  },
  {
    name: "search_projects",
    description: "Search for iNaturalist community projects (bioblitzes, surveys, regional biodiversity projects).",
    inputSchema: {
      type: "object",
      properties: {
        q: { type: "string", description: 'Search query (e.g. "birds Sydney", "butterflies")' },
        lat: { type: "number", description: "Latitude to find nearby projects" },
        lng: { type: "number", description: "Longitude to find nearby projects" },
        place_id: { type: "integer", description: "iNaturalist place ID to filter by" },
        per_page: { type: "integer", description: "Number of results (default 10)" },
      },
    },
  },
  {
    name: "get_similar_species",
    description: "Get species commonly confused with a given taxon. Useful for wildlife identification.",
    inputSchema: {
      type: "object",
      properties: {
        taxon_id: { type: "integer", description: "The iNaturalist taxon ID to find similar species for" },
        place_id: { type: "integer", description: "Optional place ID to get regionally relevant results" },
      },
      required: ["taxon_id"],
    },
  },
  {
    name: "inaturalist_search",
    description:
      "Search across iNaturalist taxa, places, projects, and users at once. Each source is reported separately; one failing source does not fail the search.",
    inputSchema: {
      type: "object",
      properties: {
        q: { type: "string", description: 'Search query (e.g. "monarch butterfly migration")' },
        sources: {
          type: "string",
          description: 'Comma-separated types to include: "taxa", "places", "projects", "users" (default: all)',
        },
        per_page: { type: "integer", description: "Number of results per source (default 10)" },
      },
      required: ["q"],
    },
  },
];
