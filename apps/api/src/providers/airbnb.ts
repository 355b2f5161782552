import { getEnv } from '../env.js';
import { UpstreamUnavailableError } from '../errors.js';
import { errorMessage, getArray, getNested, getPath, getString, isRecord, toNumeric } from '../records.js';
import type { BoundingBox, CalendarDay, RawListing, SearchFilters } from '../types.js';

type RawParam = { filterName: string; filterValues: string[] };

export interface StaysSearchQuery {
  box: BoundingBox;
  filters: SearchFilters;
}

const SEARCH_ZOOM_LEVEL = 12;

const PAGE_HEADERS = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  'Accept-Language': 'en',
  'Cache-Control': 'no-cache',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36'
};

const API_KEY_PATTERN = /"api_config":\{"key":"([^"]+)"/;
const DEFERRED_STATE_PATTERN = /<script[^>]*id="data-deferred-state-0"[^>]*>([\s\S]*?)<\/script>/;

let apiKeyRequest: Promise<string> | undefined;

export function clearApiKeyCache(): void {
  apiKeyRequest = undefined;
}

async function airbnbFetch(url: URL, init: RequestInit): Promise<Response> {
  let res: Response;
  try {
    res = await fetch(url, init);
  } catch (err) {
    throw new UpstreamUnavailableError(`Airbnb request failed: ${errorMessage(err)}`);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new UpstreamUnavailableError(`Airbnb request failed (${res.status}): ${text.slice(0, 200)}`, res.status);
  }

  return res;
}

async function airbnbJson(url: URL, init: RequestInit): Promise<Record<string, unknown>> {
  const res = await airbnbFetch(url, init);

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new UpstreamUnavailableError(`Airbnb returned a non-JSON payload: ${errorMessage(err)}`, res.status);
  }

  if (!isRecord(body)) {
    throw new UpstreamUnavailableError('Airbnb returned an unexpected payload', res.status);
  }

  const errors = getArray(body, 'errors');
  if (errors && errors.length > 0 && !getNested(body, 'data')) {
    const message = getString(errors[0], 'message');
    throw new UpstreamUnavailableError(`Airbnb GraphQL error: ${message ?? 'unknown'}`, res.status);
  }

  return body;
}

async function loadApiKey(): Promise<string> {
  const env = getEnv();
  const res = await airbnbFetch(new URL('/', env.AIRBNB_BASE_URL), { headers: PAGE_HEADERS });
  const html = await res.text();

  const match = API_KEY_PATTERN.exec(html);
  if (!match) {
    throw new UpstreamUnavailableError('Airbnb API key not found; the landing page markup may have changed');
  }
  return match[1];
}

/**
 * Public web API key embedded in the landing page. Concurrent callers share
 * one request; a failed request is forgotten so the next call retries.
 */
export function fetchApiKey(): Promise<string> {
  if (!apiKeyRequest) {
    apiKeyRequest = loadApiKey().catch((err: unknown) => {
      apiKeyRequest = undefined;
      throw err;
    });
  }
  return apiKeyRequest;
}

function requireHash(hash: string | undefined, operation: string): string {
  if (!hash) {
    throw new UpstreamUnavailableError(`No persisted query hash configured for ${operation}`);
  }
  return hash;
}

function graphqlUrl(operation: string, hash: string): URL {
  const env = getEnv();
  const url = new URL(`/api/v3/${operation}/${hash}`, env.AIRBNB_BASE_URL);
  url.searchParams.set('operationName', operation);
  url.searchParams.set('locale', env.AIRBNB_LANGUAGE);
  url.searchParams.set('currency', env.AIRBNB_CURRENCY);
  return url;
}

async function apiHeaders(): Promise<Record<string, string>> {
  return {
    Accept: 'application/json',
    'Content-Type': 'application/json',
    'X-Airbnb-Api-Key': await fetchApiKey()
  };
}

export function buildSearchParams(box: BoundingBox, filters: SearchFilters): RawParam[] {
  const params: Array<[string, string | number | undefined]> = [
    ['refinement_paths', '/homes'],
    ['tab_id', 'home_tab'],
    ['channel', 'EXPLORE'],
    ['search_type', 'user_map_move'],
    ['search_by_map', 'true'],
    ['zoom_level', SEARCH_ZOOM_LEVEL],
    ['ne_lat', box.neLat],
    ['ne_lng', box.neLon],
    ['sw_lat', box.swLat],
    ['sw_lng', box.swLon],
    ['date_picker_type', filters.checkIn ? 'calendar' : 'flexible_dates'],
    ['checkin', filters.checkIn],
    ['checkout', filters.checkOut],
    ['price_filter_input_type', filters.priceMin !== undefined || filters.priceMax !== undefined ? 0 : undefined],
    ['price_min', filters.priceMin],
    ['price_max', filters.priceMax]
  ];

  const out: RawParam[] = [];
  for (const [filterName, value] of params) {
    if (value === undefined) continue;
    out.push({ filterName, filterValues: [String(value)] });
  }
  return out;
}

function extractSearchPage(body: Record<string, unknown>): { results: RawListing[]; nextCursor?: string } {
  const staysSearch = getPath(body, ['data', 'presentation', 'staysSearch']);
  const results = getNested(staysSearch, 'results');

  const listings =
    getArray(results, 'searchResults') ??
    getArray(getNested(results, 'mapResults'), 'mapSearchResults') ??
    getArray(getNested(staysSearch, 'mapResults'), 'mapSearchResults');

  if (!listings) {
    throw new UpstreamUnavailableError('Airbnb search payload has no result list');
  }

  const nextCursor = getString(getNested(results, 'paginationInfo'), 'nextPageCursor');
  return { results: listings.filter(isRecord), nextCursor: nextCursor || undefined };
}

/**
 * Every listing inside the box, in upstream order, following pagination
 * cursors up to AIRBNB_SEARCH_MAX_PAGES pages.
 */
export async function searchStays(query: StaysSearchQuery): Promise<RawListing[]> {
  const env = getEnv();
  const hash = requireHash(env.AIRBNB_SEARCH_HASH, 'StaysSearch');
  const url = graphqlUrl('StaysSearch', hash);
  const headers = await apiHeaders();
  const rawParams = buildSearchParams(query.box, query.filters);

  const all: RawListing[] = [];
  let cursor: string | undefined;

  for (let page = 0; page < env.AIRBNB_SEARCH_MAX_PAGES; page += 1) {
    const staysSearchRequest = {
      cursor,
      requestedPageType: 'STAYS_SEARCH',
      metadataOnly: false,
      searchType: 'user_map_move',
      treatmentFlags: [],
      rawParams
    };

    const body = await airbnbJson(url, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        operationName: 'StaysSearch',
        variables: {
          staysSearchRequest,
          staysMapSearchRequestV2: staysSearchRequest,
          isLeanTreatment: false
        },
        extensions: { persistedQuery: { version: 1, sha256Hash: hash } }
      })
    });

    const { results, nextCursor } = extractSearchPage(body);
    all.push(...results);

    if (!nextCursor || results.length === 0) break;
    cursor = nextCursor;
  }

  return all;
}

function extractDeferredState(html: string): unknown {
  const match = DEFERRED_STATE_PATTERN.exec(html);
  if (!match) return undefined;
  try {
    return JSON.parse(match[1]);
  } catch (err) {
    throw new UpstreamUnavailableError(`Listing page state is not valid JSON: ${errorMessage(err)}`);
  }
}

/** Listing metadata from the server-rendered state of the room page. */
export async function getListingDetails(roomId: string): Promise<Record<string, unknown>> {
  const env = getEnv();
  const res = await airbnbFetch(new URL(`/rooms/${roomId}`, env.AIRBNB_BASE_URL), { headers: PAGE_HEADERS });
  const state = extractDeferredState(await res.text());

  // niobeMinimalClientData is a list of [queryKey, payload] pairs.
  const entries = getArray(state, 'niobeMinimalClientData') ?? [];
  for (const entry of entries) {
    if (!Array.isArray(entry)) continue;
    const page = getPath(entry[1], ['data', 'presentation', 'stayProductDetailPage']);
    if (isRecord(page)) return page;
  }

  throw new UpstreamUnavailableError(`No listing details found for room ${roomId}`);
}

function stayListingId(roomId: string): string {
  return Buffer.from(`StayListing:${roomId}`).toString('base64');
}

function findDisplayPrice(body: Record<string, unknown>): Record<string, unknown> | null {
  const page = getPath(body, ['data', 'presentation', 'stayProductDetailPage']);
  const sections = getArray(getNested(page, 'sections'), 'sections') ?? [];
  for (const s of sections) {
    const price = getPath(s, ['section', 'structuredDisplayPrice']);
    if (isRecord(price)) return price;
  }
  return null;
}

/** Price breakdown shown in the booking panel, or null when the stay is not quotable. */
export async function getPricing(
  roomId: string,
  checkIn: string,
  checkOut: string,
  adults: number
): Promise<Record<string, unknown> | null> {
  const env = getEnv();
  const hash = requireHash(env.AIRBNB_PDP_HASH, 'StaysPdpSections');
  const url = graphqlUrl('StaysPdpSections', hash);

  url.searchParams.set(
    'variables',
    JSON.stringify({
      id: stayListingId(roomId),
      pdpSectionsRequest: {
        adults: String(adults),
        checkIn,
        checkOut,
        layouts: ['SIDEBAR', 'SINGLE_COLUMN'],
        sectionIds: ['BOOK_IT_FLOATING_FOOTER', 'BOOK_IT_SIDEBAR']
      }
    })
  );
  url.searchParams.set('extensions', JSON.stringify({ persistedQuery: { version: 1, sha256Hash: hash } }));

  const body = await airbnbJson(url, { method: 'GET', headers: await apiHeaders() });
  return findDisplayPrice(body);
}

function parseIsoDate(value: string): { year: number; month: number } {
  const [year, month] = value.split('-').map((p) => Number(p));
  return { year, month };
}

/** Calendar months touched by [checkIn, checkOut], inclusive. */
export function monthsSpanned(checkIn: string, checkOut: string): number {
  const from = parseIsoDate(checkIn);
  const to = parseIsoDate(checkOut);
  return Math.max((to.year - from.year) * 12 + (to.month - from.month) + 1, 1);
}

function toCalendarDay(raw: unknown): CalendarDay | undefined {
  if (!isRecord(raw)) return undefined;
  const date = getString(raw, 'calendarDate');
  if (!date) return undefined;

  const available = raw.available;
  return {
    date,
    available: typeof available === 'boolean' ? available : null,
    minNights: toNumeric(raw.minNights) ?? null,
    maxNights: toNumeric(raw.maxNights) ?? null
  };
}

/** Day-by-day availability from check-in through check-out. */
export async function getCalendar(roomId: string, checkIn: string, checkOut: string): Promise<CalendarDay[]> {
  const env = getEnv();
  const hash = requireHash(env.AIRBNB_CALENDAR_HASH, 'PdpAvailabilityCalendar');
  const url = graphqlUrl('PdpAvailabilityCalendar', hash);
  const { year, month } = parseIsoDate(checkIn);

  url.searchParams.set(
    'variables',
    JSON.stringify({
      request: { count: monthsSpanned(checkIn, checkOut), listingId: roomId, month, year }
    })
  );
  url.searchParams.set('extensions', JSON.stringify({ persistedQuery: { version: 1, sha256Hash: hash } }));

  const body = await airbnbJson(url, { method: 'GET', headers: await apiHeaders() });
  const months = getArray(getPath(body, ['data', 'merlin', 'pdpAvailabilityCalendar']), 'calendarMonths');
  if (!months) {
    throw new UpstreamUnavailableError(`Airbnb calendar payload has no months for room ${roomId}`);
  }

  const days: CalendarDay[] = [];
  for (const m of months) {
    for (const raw of getArray(m, 'days') ?? []) {
      const day = toCalendarDay(raw);
      if (day && day.date >= checkIn && day.date <= checkOut) days.push(day);
    }
  }
  return days;
}
