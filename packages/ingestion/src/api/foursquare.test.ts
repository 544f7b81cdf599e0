import { describe, it, expect } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import { fakeAdapter, noSleep, type FakeRoute } from '../testing/fakes';
import type { VenueQuery } from './types';
import { FoursquareVenueService, isUnitedStates, toVenueDetails, venueIdFromUrl } from './foursquare';

const PUB = {
  id: 'fsq1',
  name: 'The Pub ',
  location: {
    formattedAddress: ['1 Main St', 'San Diego, CA 92101'],
    lat: 32.7,
    lng: -117.1,
    cc: 'US',
    country: 'United States',
  },
  categories: [{ name: 'Pub' }, { name: 'Brewery' }],
};

function query(overrides: Partial<VenueQuery> = {}): VenueQuery {
  return { venue: 'the pub', checkinUrl: null, untappdUrl: null, foursquareUrl: null, near: null, ...overrides };
}

function service(route: FakeRoute, seen: InternalAxiosRequestConfig[] = []): FoursquareVenueService {
  return new FoursquareVenueService({
    apiUrl: 'https://api.test/v2',
    credentials: { clientId: 'test-client', clientSecret: 'test-secret' },
    timeoutMs: 1000,
    minIntervalMs: 0,
    policy: { maxAttempts: 2, backoffMs: 10, sleep: noSleep },
    http: axios.create({ adapter: fakeAdapter(route, seen) }),
    now: () => new Date(2026, 9, 19),
  });
}

describe('helpers', () => {
  it('reads venue ids from URLs', () => {
    expect(venueIdFromUrl('https://foursquare.com/v/the-pub/fsq1')).toBe('fsq1');
    expect(venueIdFromUrl('https://foursquare.com/v/the-pub/fsq1/?ref=x')).toBe('fsq1');
  });

  it('recognises United States venues by code or name', () => {
    expect(isUnitedStates({ cc: 'US' })).toBe(true);
    expect(isUnitedStates({ country: 'United States' })).toBe(true);
    expect(isUnitedStates({ cc: 'CA', country: 'Canada' })).toBe(false);
  });

  it('turns a venue into location details', () => {
    expect(toVenueDetails(PUB)).toEqual({
      address: '1 Main St, San Diego, CA 92101',
      coordinates: { latitude: 32.7, longitude: -117.1 },
      categories: ['Pub', 'Brewery'],
      inUnitedStates: true,
    });
    expect(toVenueDetails({ id: 'x', name: 'Private', location: { cc: 'US' } })).toBeNull();
    expect(toVenueDetails({ id: 'x', name: 'Nowhere' })).toBeNull();
  });
});

describe('FoursquareVenueService', () => {
  it('searches near known coordinates in standard mode', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const foursquare = service(() => ({
      status: 200,
      data: { response: { venues: [{ id: 'other', name: 'Another Pub' }, PUB] } },
    }), seen);

    const outcome = await foursquare.lookup(
      query({ untappdUrl: 'https://untappd.com/v/the-pub/12345', near: { latitude: 32.7, longitude: -117.1 } }),
      'standard',
    );

    expect(seen[0].url).toBe('/venues/search');
    expect(seen[0].params).toEqual({
      client_id: 'test-client',
      client_secret: 'test-secret',
      v: '20261019',
      query: 'the pub',
      intent: 'browse',
      limit: 10,
      ll: '32.7,-117.1',
      radius: 25000,
    });
    expect(outcome).toEqual({
      kind: 'found',
      match: {
        untappdUrl: 'https://untappd.com/v/the-pub/12345',
        foursquareUrl: 'https://foursquare.com/v/fsq1',
        details: {
          address: '1 Main St, San Diego, CA 92101',
          coordinates: { latitude: 32.7, longitude: -117.1 },
          categories: ['Pub', 'Brewery'],
          inUnitedStates: true,
        },
      },
    });
  });

  it('matches by venue id when the venue URL is known', async () => {
    const foursquare = service(() => ({
      status: 200,
      data: { response: { venues: [{ ...PUB, id: 'fsq0' }, { ...PUB, name: 'Renamed' }] } },
    }));

    const outcome = await foursquare.lookup(query({ foursquareUrl: 'https://foursquare.com/v/the-pub/fsq1' }), 'standard');

    expect(outcome).toMatchObject({
      kind: 'found',
      match: { foursquareUrl: 'https://foursquare.com/v/the-pub/fsq1' },
    });
  });

  it('reports no matching venue as not found', async () => {
    const foursquare = service(() => ({ status: 200, data: { response: { venues: [] } } }));
    expect(await foursquare.lookup(query(), 'standard')).toEqual({ kind: 'not_found', hint: null });
  });

  it('reads venue details by id in premium mode', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const foursquare = service(() => ({ status: 200, data: { response: { venue: PUB } } }), seen);

    const outcome = await foursquare.lookup(query({ foursquareUrl: 'https://foursquare.com/v/the-pub/fsq1' }), 'premium');

    expect(seen[0].url).toBe('/venues/fsq1');
    expect(outcome.kind).toBe('found');
  });

  it('treats an unknown venue id as not found', async () => {
    const foursquare = service(() => ({ status: 400, data: { meta: { code: 400, errorType: 'param_error' } } }));
    const outcome = await foursquare.lookup(query({ foursquareUrl: 'https://foursquare.com/v/v9/fsq9' }), 'premium');
    expect(outcome).toEqual({ kind: 'not_found', hint: null });
  });

  it('searches globally with a wider window in premium mode without an id', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const foursquare = service(() => ({ status: 200, data: { response: { venues: [PUB] } } }), seen);

    await foursquare.lookup(query({ near: { latitude: 32.7, longitude: -117.1 } }), 'premium');

    expect(seen[0].params).toMatchObject({ intent: 'global', limit: 50 });
    expect(seen[0].params).not.toHaveProperty('ll');
  });

  it('treats 403 as rate limiting', async () => {
    const foursquare = service(() => ({ status: 403 }));
    expect(await foursquare.lookup(query(), 'standard')).toEqual({
      kind: 'failed',
      reason: 'status 403',
      rateLimited: true,
    });
  });

  it('fails when the quota stays exhausted', async () => {
    const foursquare = service(() => ({ status: 429 }));
    expect(await foursquare.lookup(query(), 'standard')).toMatchObject({ kind: 'failed', rateLimited: true });
  });

  it('ignores a malformed search response', async () => {
    const foursquare = service(() => ({ status: 200, data: { unexpected: true } }));
    expect(await foursquare.lookup(query(), 'standard')).toEqual({ kind: 'not_found', hint: null });
  });
});
