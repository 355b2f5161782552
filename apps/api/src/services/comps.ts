import { HttpError, UpstreamUnavailableError } from '../errors.js';
import { boundingBox } from '../geo.js';
import { normalizeListings } from '../normalize.js';
import { errorMessage } from '../records.js';
import type { StaysSearchQuery } from '../providers/airbnb.js';
import type { BoxPolicy, GeoPoint, RawListing, SearchFilters, SearchResult } from '../types.js';

export interface CompsQuery {
  center: GeoPoint;
  radiusMi: number;
  filters: SearchFilters;
}

export interface CompsDeps {
  policy: BoxPolicy;
  searchStays: (query: StaysSearchQuery) => Promise<RawListing[]>;
}

/**
 * Box around the center, upstream search, then normalization in upstream
 * order. Only the upstream call can fail, and it always fails as
 * UpstreamUnavailableError.
 */
export async function searchComps(query: CompsQuery, deps: CompsDeps): Promise<SearchResult> {
  const box = boundingBox(query.center, query.radiusMi, deps.policy);

  let raws: RawListing[];
  try {
    raws = await deps.searchStays({ box, filters: query.filters });
  } catch (err) {
    if (err instanceof HttpError) throw err;
    throw new UpstreamUnavailableError(`Airbnb search failed: ${errorMessage(err)}`);
  }

  const listings = normalizeListings(raws);

  return {
    center: { lat: query.center.lat, lon: query.center.lon },
    radius_mi: query.radiusMi,
    count: listings.length,
    bounding_box: box,
    listings
  };
}
