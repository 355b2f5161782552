import { randomUUID } from 'node:crypto';
import admin from 'firebase-admin';
import { z } from 'zod';
import { getFirestore } from '../firebase.js';
import { errorMessage } from '../records.js';
import type { SearchRecord, SearchResult, SlimListing } from '../types.js';

const idSchema = z.union([z.string(), z.number()]).nullable();

const slimListingSchema = z.object({
  id: idSchema,
  classic_id: idSchema,
  title: z.string().nullable(),
  price: z.union([z.number(), z.string()]).nullable(),
  guest_capacity: z.number().nullable(),
  rating: z.number().nullable(),
  reviews: z.number().nullable(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  url: z.string().nullable()
});

const timestampSchema = z.instanceof(admin.firestore.Timestamp);

const searchDocSchema = z.object({
  query: z.string(),
  center: z.object({ lat: z.number(), lon: z.number() }),
  radius_mi: z.number(),
  count: z.number().int(),
  bounding_box: z.object({ neLat: z.number(), neLon: z.number(), swLat: z.number(), swLon: z.number() }),
  createdAt: timestampSchema,
  retrievedAt: timestampSchema
});

const cacheDocSchema = z.object({
  searchId: z.string().min(1),
  updatedAt: timestampSchema
});

type SearchDoc = z.infer<typeof searchDocSchema>;

export interface StoredSearch extends SearchRecord {
  result: SearchResult;
}

// Firestore batches are limited to 500 writes.
const BATCH_SIZE = 450;

function listingDocId(position: number): string {
  return String(position).padStart(5, '0');
}

function toRecord(id: string, doc: SearchDoc): SearchRecord {
  return {
    id,
    query: doc.query,
    center: doc.center,
    radius_mi: doc.radius_mi,
    count: doc.count,
    createdAt: doc.createdAt.toDate().toISOString(),
    retrievedAt: doc.retrievedAt.toDate().toISOString()
  };
}

export async function createSearchWithResults(params: {
  query: string;
  queryKey?: string;
  result: SearchResult;
}): Promise<{ searchId: string }> {
  const db = getFirestore();

  const searchId = randomUUID();
  const now = admin.firestore.Timestamp.now();
  const { listings, ...summary } = params.result;

  const searchRef = db.collection('searches').doc(searchId);
  const writes: Array<(batch: admin.firestore.WriteBatch) => void> = [];

  writes.push((batch) =>
    batch.set(searchRef, {
      query: params.query,
      ...(params.queryKey ? { queryKey: params.queryKey } : {}),
      center: summary.center,
      radius_mi: summary.radius_mi,
      count: summary.count,
      bounding_box: { ...summary.bounding_box },
      createdAt: now,
      retrievedAt: now
    })
  );

  const listingsCol = searchRef.collection('listings');
  listings.forEach((listing, position) => {
    writes.push((batch) => batch.set(listingsCol.doc(listingDocId(position)), { ...listing, position }));
  });

  // The cache pointer goes last so it never names a search whose listings are partly written.
  if (params.queryKey) {
    const cacheRef = db.collection('searchCache').doc(params.queryKey);
    writes.push((batch) =>
      batch.set(cacheRef, { query: params.query, searchId, count: summary.count, updatedAt: now }, { merge: true })
    );
  }

  for (let index = 0; index < writes.length; index += BATCH_SIZE) {
    const batch = db.batch();
    for (const write of writes.slice(index, index + BATCH_SIZE)) write(batch);
    await batch.commit();
  }

  return { searchId };
}

export async function getSearch(searchId: string): Promise<StoredSearch | null> {
  const db = getFirestore();
  const searchRef = db.collection('searches').doc(searchId);

  const searchSnap = await searchRef.get();
  if (!searchSnap.exists) return null;

  const parsed = searchDocSchema.safeParse(searchSnap.data());
  if (!parsed.success) {
    console.warn('[history] stored search has an unexpected shape', { searchId, error: parsed.error.message });
    return null;
  }

  const listingsSnap = await searchRef.collection('listings').orderBy('position').get();
  const listings: SlimListing[] = [];
  for (const doc of listingsSnap.docs) {
    const listing = slimListingSchema.safeParse(doc.data());
    if (listing.success) listings.push(listing.data);
  }

  const doc = parsed.data;
  return {
    ...toRecord(searchId, doc),
    result: {
      center: doc.center,
      radius_mi: doc.radius_mi,
      count: listings.length,
      bounding_box: doc.bounding_box,
      listings
    }
  };
}

export async function findRecentSearchByQueryKey(params: {
  queryKey: string;
  maxAgeMs: number;
}): Promise<{ searchId: string; result: SearchResult } | null> {
  const db = getFirestore();
  const cacheRef = db.collection('searchCache').doc(params.queryKey);

  let cacheSnap: admin.firestore.DocumentSnapshot;
  try {
    cacheSnap = await cacheRef.get();
  } catch (err) {
    // Best-effort cache. If Firestore lookup fails for any reason, do not block searches.
    console.warn('[cache] searchCache read failed', { queryKey: params.queryKey, error: errorMessage(err) });
    return null;
  }

  if (!cacheSnap.exists) return null;
  const cache = cacheDocSchema.safeParse(cacheSnap.data());
  if (!cache.success) return null;

  if (Date.now() - cache.data.updatedAt.toMillis() > params.maxAgeMs) return null;

  let search: StoredSearch | null;
  try {
    search = await getSearch(cache.data.searchId);
  } catch (err) {
    console.warn('[cache] getSearch failed', {
      queryKey: params.queryKey,
      searchId: cache.data.searchId,
      error: errorMessage(err)
    });
    return null;
  }
  if (!search) return null;
  return { searchId: search.id, result: search.result };
}

export async function listRecentSearches(limit = 10): Promise<SearchRecord[]> {
  const db = getFirestore();
  const snap = await db.collection('searches').orderBy('createdAt', 'desc').limit(limit).get();

  const records: SearchRecord[] = [];
  for (const doc of snap.docs) {
    const parsed = searchDocSchema.safeParse(doc.data());
    if (parsed.success) records.push(toRecord(doc.id, parsed.data));
  }
  return records;
}

export async function deleteSearch(searchId: string): Promise<void> {
  const db = getFirestore();
  const searchRef = db.collection('searches').doc(searchId);

  // Read metadata first so we can clean up the cache pointer if present.
  let cacheKey: string | null = null;
  try {
    const snap = await searchRef.get();
    const queryKey: unknown = snap.exists ? snap.get('queryKey') : undefined;
    if (typeof queryKey === 'string' && queryKey.trim()) cacheKey = queryKey;
  } catch (err) {
    console.warn('[history] failed to read search metadata for cache cleanup', { searchId, error: errorMessage(err) });
  }

  // Firestore doesn't cascade deletes into subcollections.
  const docs = (await searchRef.collection('listings').get()).docs;
  for (let index = 0; index < docs.length; index += BATCH_SIZE) {
    const batch = db.batch();
    for (const doc of docs.slice(index, index + BATCH_SIZE)) batch.delete(doc.ref);
    await batch.commit();
  }

  await searchRef.delete();

  if (cacheKey) {
    try {
      const pointer = await db.collection('searchCache').doc(cacheKey).get();
      // Only drop the pointer when it still refers to this search.
      if (pointer.get('searchId') === searchId) await pointer.ref.delete();
    } catch (err) {
      console.warn('[history] failed to delete cache pointer', { searchId, cacheKey, error: errorMessage(err) });
    }
  }
}
