export type BoxPolicy = 'flat' | 'corrected';

export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface BoundingBox {
  readonly neLat: number;
  readonly neLon: number;
  readonly swLat: number;
  readonly swLon: number;
}

// Shape is owned by the upstream and drifts between schema versions.
export type RawListing = Record<string, unknown>;

export type ListingId = string | number;

export interface SlimListing {
  id: ListingId | null;
  classic_id: ListingId | null; // short id accepted by /rooms and calendar endpoints
  title: string | null;
  price: number | string | null; // amount or formatted label, as supplied
  guest_capacity: number | null;
  rating: number | null;
  reviews: number | null;
  latitude: number | null;
  longitude: number | null;
  url: string | null;
}

export interface SearchFilters {
  checkIn?: string; // YYYY-MM-DD
  checkOut?: string;
  priceMin?: number;
  priceMax?: number;
}

export interface SearchResult {
  center: GeoPoint;
  radius_mi: number;
  count: number;
  bounding_box: BoundingBox;
  listings: SlimListing[];
}

export interface CalendarDay {
  date: string; // YYYY-MM-DD
  available: boolean | null;
  minNights: number | null;
  maxNights: number | null;
}

export interface ListingSnapshot {
  calendar: CalendarDay[];
  details: Record<string, unknown>;
  pricing: Record<string, unknown> | null;
}

export interface SearchRecord {
  id: string;
  query: string;
  center: GeoPoint;
  radius_mi: number;
  createdAt: string; // ISO
  retrievedAt: string; // ISO
  count: number;
}
