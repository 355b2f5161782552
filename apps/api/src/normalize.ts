import { getPath, isRecord, toNumeric, toText } from './records.js';
import type { ListingId, RawListing, SlimListing } from './types.js';

export type Accessor<T> = (raw: RawListing) => T | undefined;

type FieldSources = {
  readonly [K in keyof SlimListing]: ReadonlyArray<Accessor<NonNullable<SlimListing[K]>>>;
};

function toId(v: unknown): ListingId | undefined {
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
  return toText(v);
}

function toPrice(v: unknown): number | string | undefined {
  if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
  return toText(v);
}

function at<T>(keys: readonly string[], coerce: (v: unknown) => T | undefined): Accessor<T> {
  return (raw) => coerce(getPath(raw, keys));
}

/** Candidate locations per output field, highest priority first. */
export const FIELD_SOURCES: FieldSources = {
  id: [
    at(['listing', 'id'], toId),
    at(['listing', 'listingId'], toId),
    at(['id'], toId),
    at(['listingId'], toId)
  ],
  classic_id: [
    at(['listing', 'legacyId'], toId),
    at(['listing', 'listingId'], toId),
    at(['legacyId'], toId),
    at(['listingId'], toId)
  ],
  title: [at(['listing', 'name'], toText), at(['listing', 'title'], toText), at(['title'], toText)],
  // Search results carry the quote beside `listing`; older shapes put it under
  // `listing` or use a plain `price` object. An amount anywhere beats a label.
  price: [
    at(['pricingQuote', 'rate', 'amount'], toPrice),
    at(['listing', 'pricingQuote', 'rate', 'amount'], toPrice),
    at(['price', 'rate', 'amount'], toPrice),
    at(['pricingQuote', 'label'], toPrice),
    at(['listing', 'pricingQuote', 'label'], toPrice),
    at(['price', 'label'], toPrice)
  ],
  guest_capacity: [at(['personCapacity'], toNumeric)],
  rating: [at(['listing', 'avgRating'], toNumeric), at(['rating', 'guestSatisfaction'], toNumeric)],
  reviews: [at(['listing', 'reviewsCount'], toNumeric), at(['rating', 'reviewsCount'], toNumeric)],
  latitude: [
    at(['listing', 'lat'], toNumeric),
    at(['listing', 'coordinates', 'latitude'], toNumeric),
    at(['coordinates', 'latitude'], toNumeric)
  ],
  longitude: [
    at(['listing', 'lng'], toNumeric),
    at(['listing', 'coordinates', 'longitude'], toNumeric),
    at(['coordinates', 'longitude'], toNumeric)
  ],
  url: [at(['listing', 'url'], toText), at(['url'], toText)]
};

export function firstPresent<T>(raw: RawListing, accessors: ReadonlyArray<Accessor<T>>): T | null {
  for (const accessor of accessors) {
    const value = accessor(raw);
    if (value !== undefined) return value;
  }
  return null;
}

/**
 * Maps one upstream record to the slim schema. Never throws: a field with no
 * usable candidate is null, and a non-object input yields all nulls.
 *
 * Long internal ids are passed through untouched in `id`; `classic_id` is only
 * filled from a dedicated field, never derived from `id`.
 */
export function normalizeListing(input: unknown): SlimListing {
  const raw: RawListing = isRecord(input) ? input : {};
  const s = FIELD_SOURCES;

  return {
    id: firstPresent(raw, s.id),
    classic_id: firstPresent(raw, s.classic_id),
    title: firstPresent(raw, s.title),
    price: firstPresent(raw, s.price),
    guest_capacity: firstPresent(raw, s.guest_capacity),
    rating: firstPresent(raw, s.rating),
    reviews: firstPresent(raw, s.reviews),
    latitude: firstPresent(raw, s.latitude),
    longitude: firstPresent(raw, s.longitude),
    url: firstPresent(raw, s.url)
  };
}

export function normalizeListings(raws: readonly unknown[]): SlimListing[] {
  return raws.map((raw) => normalizeListing(raw));
}
