import type { Env } from '../src/env.js';

export const TEST_TOKEN = 'test-token';

export function testEnv(overrides: Partial<Env> = {}): Env {
  return {
    PORT: 4000,
    API_TOKEN: TEST_TOKEN,
    BBOX_POLICY: 'flat',
    AIRBNB_BASE_URL: 'https://www.airbnb.com',
    AIRBNB_CURRENCY: 'USD',
    AIRBNB_LANGUAGE: 'en',
    AIRBNB_SEARCH_MAX_PAGES: 5,
    SEARCH_HISTORY_ENABLED: false,
    ...overrides
  };
}
