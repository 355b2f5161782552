import { describe, expect, it, vi } from 'vitest';
import request from 'supertest';

vi.mock('../src/providers/airbnb.js', () => {
  return {
    searchStays: vi.fn(),
    getListingDetails: vi.fn(),
    getPricing: vi.fn(),
    getCalendar: vi.fn()
  };
});

vi.mock('../src/repositories/searchRepository.js', () => {
  return {
    createSearchWithResults: vi.fn(async () => ({ searchId: 'search_test_1' })),
    findRecentSearchByQueryKey: vi.fn(async () => null),
    deleteSearch: vi.fn(async () => undefined),
    getSearch: vi.fn(async () => null),
    listRecentSearches: vi.fn(async () => [])
  };
});

import { createApp } from '../src/app.js';
import { UpstreamUnavailableError } from '../src/errors.js';
import { boundingBox } from '../src/geo.js';
import { searchStays } from '../src/providers/airbnb.js';
import { createSearchWithResults, findRecentSearchByQueryKey } from '../src/repositories/searchRepository.js';
import { TEST_TOKEN, testEnv } from './helpers.js';

const app = createApp(testEnv());

const RALEIGH = { lat: '35.8378', lon: '-78.6424', radius: '5', token: TEST_TOKEN };

const LOFT_SLIM = {
  id: 27955738,
  classic_id: null,
  title: 'Loft',
  price: '$120/night',
  guest_capacity: null,
  rating: null,
  reviews: null,
  latitude: null,
  longitude: null,
  url: null
};

describe('GET /v1/search auth', () => {
  it('returns 401 without a token', async () => {
    const res = await request(app).get('/v1/search').query({ lat: '1', lon: '1' });
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'UNAUTHORIZED', message: 'Invalid token' });
  });

  it('returns 401 with the wrong token', async () => {
    const res = await request(app).get('/v1/search').query({ ...RALEIGH, token: 'nope' });
    expect(res.status).toBe(401);
    expect(vi.mocked(searchStays)).not.toHaveBeenCalled();
  });

  it('accepts the token from the X-API-Token header', async () => {
    vi.mocked(searchStays).mockResolvedValueOnce([]);

    const res = await request(app)
      .get('/v1/search')
      .set('X-API-Token', TEST_TOKEN)
      .query({ lat: '35.8378', lon: '-78.6424' });

    expect(res.status).toBe(200);
    expect(res.body.count).toBe(0);
  });
});

describe('GET /v1/search validation', () => {
  it('returns 400 when lat is missing', async () => {
    const res = await request(app).get('/v1/search').query({ lon: '-78.6', token: TEST_TOKEN });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('VALIDATION_ERROR');
    expect(res.body.details.fieldErrors.lat).toBeDefined();
  });

  it('rejects a zero or negative radius', async () => {
    for (const radius of ['0', '-3']) {
      const res = await request(app).get('/v1/search').query({ ...RALEIGH, radius });
      expect(res.status).toBe(400);
      expect(res.body.details.fieldErrors.radius).toBeDefined();
    }
  });

  it('rejects out-of-range coordinates', async () => {
    const res = await request(app).get('/v1/search').query({ ...RALEIGH, lat: '91', lon: '181' });
    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.lat).toBeDefined();
    expect(res.body.details.fieldErrors.lon).toBeDefined();
  });

  it('requires check_in and check_out together', async () => {
    const res = await request(app).get('/v1/search').query({ ...RALEIGH, check_in: '2025-06-01' });
    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.check_out).toEqual(['check_in and check_out go together']);
  });

  it('rejects check_out on or before check_in', async () => {
    const res = await request(app)
      .get('/v1/search')
      .query({ ...RALEIGH, check_in: '2025-06-04', check_out: '2025-06-04' });
    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.check_out).toEqual(['check_out must be after check_in']);
  });

  it('rejects an invalid calendar date', async () => {
    const res = await request(app)
      .get('/v1/search')
      .query({ ...RALEIGH, check_in: '2025-02-30', check_out: '2025-03-02' });
    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.check_in).toEqual(['Invalid calendar date']);
  });

  it('rejects an inverted price range', async () => {
    const res = await request(app).get('/v1/search').query({ ...RALEIGH, price_min: '300', price_max: '100' });
    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.price_max).toEqual(['price_max must be >= price_min']);
  });
});

describe('GET /v1/search', () => {
  it('returns the slim listings with the query echoed back', async () => {
    vi.mocked(searchStays).mockResolvedValueOnce([
      { listing: { id: 27955738, name: 'Loft' }, price: { label: '$120/night' } },
      { id: '555', title: 'Bungalow', coordinates: { latitude: 35.8, longitude: -78.6 } }
    ]);

    const res = await request(app)
      .get('/v1/search')
      .query({ ...RALEIGH, check_in: '2025-06-01', check_out: '2025-06-04', price_min: '50', price_max: '400' });

    expect(res.status).toBe(200);
    expect(res.body.center).toEqual({ lat: 35.8378, lon: -78.6424 });
    expect(res.body.radius_mi).toBe(5);
    expect(res.body.count).toBe(2);
    expect(res.body.listings[0]).toEqual(LOFT_SLIM);
    expect(res.body.listings[1].id).toBe('555');
    expect(res.body.listings[1].latitude).toBe(35.8);
    expect(res.body.searchId).toBeUndefined();

    const [query] = vi.mocked(searchStays).mock.calls[0];
    expect(query.box.neLat).toBeCloseTo(35.8378 + 5 / 69, 10);
    expect(query.box.swLon).toBeCloseTo(-78.6424 - 5 / 69, 10);
    expect(query.filters).toEqual({ checkIn: '2025-06-01', checkOut: '2025-06-04', priceMin: 50, priceMax: 400 });
    expect(vi.mocked(createSearchWithResults)).not.toHaveBeenCalled();
  });

  it('defaults the radius to 5 miles', async () => {
    vi.mocked(searchStays).mockResolvedValueOnce([]);

    const res = await request(app).get('/v1/search').query({ lat: '10', lon: '20', token: TEST_TOKEN });

    expect(res.status).toBe(200);
    expect(res.body.radius_mi).toBe(5);
    expect(res.body.bounding_box.neLat).toBeCloseTo(10 + 5 / 69, 10);
  });

  it('returns 502 when the upstream search fails', async () => {
    vi.mocked(searchStays).mockRejectedValueOnce(new UpstreamUnavailableError('Airbnb request failed (503): busy', 503));

    const res = await request(app).get('/v1/search').query(RALEIGH);

    expect(res.status).toBe(502);
    expect(res.body).toEqual({ error: 'UPSTREAM_UNAVAILABLE', message: 'Airbnb request failed (503): busy' });
  });

  it('returns 502 for an unexpected search error', async () => {
    vi.mocked(searchStays).mockRejectedValueOnce(new Error('boom'));

    const res = await request(app).get('/v1/search').query(RALEIGH);

    expect(res.status).toBe(502);
    expect(res.body.message).toBe('Airbnb search failed: boom');
  });
});

describe('GET /v1/search with the corrected box policy', () => {
  const corrected = createApp(testEnv({ BBOX_POLICY: 'corrected' }));

  it('rejects latitudes next to the poles', async () => {
    const res = await request(corrected).get('/v1/search').query({ ...RALEIGH, lat: '89.5' });
    expect(res.status).toBe(400);
    expect(res.body.details.fieldErrors.lat).toBeDefined();
  });

  it('widens the longitude offset', async () => {
    vi.mocked(searchStays).mockResolvedValueOnce([]);

    const res = await request(corrected).get('/v1/search').query({ lat: '60', lon: '0', radius: '69', token: TEST_TOKEN });

    expect(res.status).toBe(200);
    expect(res.body.bounding_box.neLon).toBeCloseTo(2, 10);
  });
});

describe('GET /v1/search with history enabled', () => {
  const withHistory = createApp(testEnv({ SEARCH_HISTORY_ENABLED: true }));

  it('stores a fresh search and returns its id', async () => {
    vi.mocked(searchStays).mockResolvedValueOnce([{ listing: { id: 27955738, name: 'Loft' }, price: { label: '$120/night' } }]);

    const res = await request(withHistory).get('/v1/search').query(RALEIGH);

    expect(res.status).toBe(200);
    expect(res.body.searchId).toBe('search_test_1');
    expect(res.body.listings).toEqual([LOFT_SLIM]);

    const [stored] = vi.mocked(createSearchWithResults).mock.calls[0];
    expect(stored.queryKey).toBe('comps:35.8378,-78.6424|r:5|dates:-|price:-|box:flat');
    expect(stored.result.count).toBe(1);
  });

  it('answers a repeated search from the cache', async () => {
    vi.mocked(findRecentSearchByQueryKey).mockResolvedValueOnce({
      searchId: 'search_cached_1',
      result: {
        center: { lat: 35.8378, lon: -78.6424 },
        radius_mi: 5,
        count: 1,
        bounding_box: { neLat: 1, neLon: 2, swLat: 3, swLon: 4 },
        listings: [LOFT_SLIM]
      }
    });

    const res = await request(withHistory).get('/v1/search').query(RALEIGH);

    expect(res.status).toBe(200);
    expect(res.headers['x-cache']).toBe('HIT');
    expect(res.body.searchId).toBe('search_cached_1');
    expect(res.body.cached).toBe(true);
    expect(res.body.listings).toEqual([LOFT_SLIM]);
    expect(vi.mocked(searchStays)).not.toHaveBeenCalled();
    expect(vi.mocked(createSearchWithResults)).not.toHaveBeenCalled();
  });

  it('echoes the requested center on a hit stored for a nearby point', async () => {
    vi.mocked(findRecentSearchByQueryKey).mockResolvedValueOnce({
      searchId: 'search_cached_2',
      result: {
        center: { lat: 35.83776, lon: -78.6424 },
        radius_mi: 5,
        count: 1,
        bounding_box: boundingBox({ lat: 35.83776, lon: -78.6424 }, 5),
        listings: [LOFT_SLIM]
      }
    });

    const res = await request(withHistory).get('/v1/search').query({ ...RALEIGH, lat: '35.83784' });

    expect(res.status).toBe(200);
    expect(res.headers['x-cache']).toBe('HIT');
    expect(vi.mocked(findRecentSearchByQueryKey).mock.calls[0][0].queryKey).toBe(
      'comps:35.8378,-78.6424|r:5|dates:-|price:-|box:flat'
    );
    expect(res.body.center).toEqual({ lat: 35.83784, lon: -78.6424 });
    expect(res.body.radius_mi).toBe(5);
    expect(res.body.bounding_box.neLat).toBeCloseTo(35.83784 + 5 / 69, 10);
    expect(res.body.bounding_box.swLat).toBeCloseTo(35.83784 - 5 / 69, 10);
    expect(res.body.listings).toEqual([LOFT_SLIM]);
  });
});

describe('health', () => {
  it('GET /health needs no token', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('GET /health/firestore reports history as disabled', async () => {
    const res = await request(app).get('/health/firestore');
    expect(res.body).toEqual({ ok: true, enabled: false });
  });
});
