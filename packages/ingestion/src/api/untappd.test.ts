import { describe, it, expect } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import { fakeAdapter, noSleep, type FakeReply } from '../testing/fakes';
import type { VenueQuery } from './types';
import { parseCheckinPage, parseVenuePage, UntappdVenueService } from './untappd';

const CHECKIN_URL = 'https://untappd.com/user/hopfan/checkin/101';
const VENUE_URL = 'https://untappd.com/v/the-pub/12345';

const CHECKIN_PAGE = `<html><body>
  <div class="checkin"><p class="location"><a href="/v/the-pub/12345">The Pub</a></p></div>
</body></html>`;

const VENUE_PAGE = `<html><head>
  <meta property="place:location:latitude" content="32.7">
  <meta property="place:location:longitude" content="-117.1">
  <meta property="business:contact_data:country_name" content="United States">
</head><body>
  <div class="venue-header">
    <p class="address">1 Main St
      San Diego, CA</p>
    <p class="category">Pub</p>
  </div>
  <div class="venue-social">
    <a class="fs track-click" href="https://foursquare.com/v/the-pub/fsq1?ref=untappd">Foursquare</a>
  </div>
</body></html>`;

const VENUE_PAGE_NO_ADDRESS = `<html><head>
  <meta property="place:location:latitude" content="32.7">
  <meta property="place:location:longitude" content="-117.1">
</head><body>
  <div class="venue-social">
    <a class="fs track-click" href="https://foursquare.com/v/the-pub/fsq1">Foursquare</a>
  </div>
</body></html>`;

function query(overrides: Partial<VenueQuery> = {}): VenueQuery {
  return { venue: 'The Pub', checkinUrl: CHECKIN_URL, untappdUrl: null, foursquareUrl: null, near: null, ...overrides };
}

function service(pages: Record<string, FakeReply>, seen: InternalAxiosRequestConfig[] = []): UntappdVenueService {
  const http = axios.create({
    adapter: fakeAdapter(config => pages[config.url ?? ''] ?? { status: 404 }, seen),
  });
  return new UntappdVenueService({
    baseUrl: 'https://untappd.com',
    timeoutMs: 1000,
    minIntervalMs: 0,
    policy: { maxAttempts: 2, backoffMs: 10, sleep: noSleep },
    http,
  });
}

describe('page parsing', () => {
  it('finds the venue link of a check-in', () => {
    expect(parseCheckinPage(CHECKIN_PAGE)).toBe('/v/the-pub/12345');
    expect(parseCheckinPage('<html><body><p>No venue</p></body></html>')).toBeNull();
  });

  it('reads location data from a venue page', () => {
    expect(parseVenuePage(VENUE_PAGE)).toEqual({
      foursquareUrl: 'https://foursquare.com/v/the-pub/fsq1',
      coordinates: { latitude: 32.7, longitude: -117.1 },
      address: '1 Main St San Diego, CA',
      categories: ['Pub'],
      country: 'United States',
    });
  });

  it('leaves absent fields null', () => {
    expect(parseVenuePage('<html><body></body></html>')).toEqual({
      foursquareUrl: null,
      coordinates: null,
      address: null,
      categories: null,
      country: null,
    });
  });
});

describe('UntappdVenueService', () => {
  it('follows the check-in to the venue page', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const untappd = service({
      [CHECKIN_URL]: { status: 200, data: CHECKIN_PAGE },
      [VENUE_URL]: { status: 200, data: VENUE_PAGE },
    }, seen);

    const outcome = await untappd.lookup(query());

    expect(seen.map(config => config.url)).toEqual([CHECKIN_URL, VENUE_URL]);
    expect(outcome).toEqual({
      kind: 'found',
      match: {
        untappdUrl: VENUE_URL,
        foursquareUrl: 'https://foursquare.com/v/the-pub/fsq1',
        details: {
          address: '1 Main St San Diego, CA',
          coordinates: { latitude: 32.7, longitude: -117.1 },
          categories: ['Pub'],
          inUnitedStates: true,
        },
      },
    });
  });

  it('goes straight to a known venue page', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const untappd = service({ [VENUE_URL]: { status: 200, data: VENUE_PAGE } }, seen);

    const outcome = await untappd.lookup(query({ untappdUrl: VENUE_URL }));

    expect(outcome.kind).toBe('found');
    expect(seen.map(config => config.url)).toEqual([VENUE_URL]);
  });

  it('hands back what it learned when the page lacks an address', async () => {
    const untappd = service({
      [CHECKIN_URL]: { status: 200, data: CHECKIN_PAGE },
      [VENUE_URL]: { status: 200, data: VENUE_PAGE_NO_ADDRESS },
    });

    expect(await untappd.lookup(query())).toEqual({
      kind: 'not_found',
      hint: {
        untappdUrl: VENUE_URL,
        foursquareUrl: 'https://foursquare.com/v/the-pub/fsq1',
        near: { latitude: 32.7, longitude: -117.1 },
      },
    });
  });

  it('reports a deleted check-in as not found', async () => {
    const untappd = service({});
    expect(await untappd.lookup(query())).toEqual({ kind: 'not_found', hint: null });
  });

  it('reports a venue without check-in link as not found without fetching', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const untappd = service({}, seen);
    expect(await untappd.lookup(query({ checkinUrl: null }))).toEqual({ kind: 'not_found', hint: null });
    expect(seen).toEqual([]);
  });

  it('treats a 403 as rate limiting', async () => {
    const untappd = service({ [CHECKIN_URL]: { status: 403 } });
    expect(await untappd.lookup(query())).toEqual({ kind: 'failed', reason: 'status 403', rateLimited: true });
  });

  it('fails after repeated server errors', async () => {
    const untappd = service({ [CHECKIN_URL]: { status: 502 } });
    const outcome = await untappd.lookup(query());
    expect(outcome).toMatchObject({ kind: 'failed', rateLimited: false });
  });
});
