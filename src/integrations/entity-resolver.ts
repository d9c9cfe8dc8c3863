/**
 * Entity Resolver
 *
 * Turns a human-supplied place or taxon name into an iNaturalist id by
 * asking the matching autocomplete endpoint for its single best result.
 * This is a best-effort match: the top-ranked result wins and callers never
 * see the alternatives.
 */

import { logger } from "@/utils/logger";
import { NotFoundError, type NotFoundKind } from "@/utils/errors";
import type { RequestOptions } from "./base-integration-client";
import type { INaturalistClient } from "./inaturalist";

export interface ResolvedId {
  id: number;
  /** The name the caller supplied */
  query: string;
  /** Upstream's label for the match it picked */
  matched_name: string;
}

/**
 * A place or taxon given either by id or by name
 */
export type EntityReference = { kind: "id"; id: number } | { kind: "name"; name: string };

/**
 * Build a reference from a pair of mutually substitutable arguments.
 * An id always wins over a name.
 */
export function toReference(id: number | undefined, name: string | undefined): EntityReference | undefined {
  if (id !== undefined) {
    return { kind: "id", id };
  }
  if (name !== undefined) {
    return { kind: "name", name };
  }
  return undefined;
}

export interface ReferenceResolution {
  id: number;
  /** Present only when a name had to be looked up */
  resolved?: ResolvedId;
}

export class EntityResolver {
  constructor(private readonly client: INaturalistClient) {}

  async resolveTaxon(name: string, options?: RequestOptions): Promise<ResolvedId> {
    const response = await this.client.autocompleteTaxa({ q: name, per_page: 1 }, options);
    const top = response.results?.[0];
    if (!top) {
      throw new NotFoundError(
        `Could not find a taxon matching '${name}'. Try a different name or use taxon_id.`,
        "taxon",
        name
      );
    }

    const scientific = top.name ?? name;
    const matched = top.preferred_common_name ? `${top.preferred_common_name} (${scientific})` : scientific;
    logger.debug(`Resolved taxon '${name}' to ${top.id} (${matched})`);
    return { id: top.id, query: name, matched_name: matched };
  }

  async resolvePlace(name: string, options?: RequestOptions): Promise<ResolvedId> {
    const response = await this.client.autocompletePlaces({ q: name, per_page: 1 }, options);
    const top = response.results?.[0];
    if (!top) {
      throw new NotFoundError(
        `Could not find a place matching '${name}'. Try a different name or use lat/lng.`,
        "place",
        name
      );
    }

    const matched = top.display_name ?? top.name ?? name;
    logger.debug(`Resolved place '${name}' to ${top.id} (${matched})`);
    return { id: top.id, query: name, matched_name: matched };
  }

  /**
   * Resolve a reference to a single id. Id references never touch the network.
   */
  async resolve(
    kind: NotFoundKind,
    reference: EntityReference,
    options?: RequestOptions
  ): Promise<ReferenceResolution> {
    if (reference.kind === "id") {
      return { id: reference.id };
    }
    const resolved =
      kind === "place"
        ? await this.resolvePlace(reference.name, options)
        : await this.resolveTaxon(reference.name, options);
    return { id: resolved.id, resolved };
  }
}
