import type { AxiosInstance } from 'axios';
import { format } from 'date-fns';
import { z } from 'zod';
import type { FoursquareCredentials } from '../config';
import { createLogger } from '../logger';
import { createHttpClient, getWithRetry, responseStatus, RetriesExhaustedError, type RetryPolicy } from './http';
import { RateLimiter } from './rateLimiter';
import type { VenueDetails } from '../storage/venueLocations';
import type { LocationService, LookupMode, LookupOutcome, VenueQuery } from './types';

const logger = createLogger('foursquare');

const SEARCH_RADIUS_METERS = 25_000;
const SEARCH_LIMIT = 10;
const PREMIUM_SEARCH_LIMIT = 50;

const venueSchema = z.object({
  id: z.string(),
  name: z.string(),
  location: z.object({
    formattedAddress: z.union([z.array(z.string()), z.string()]).optional(),
    lat: z.number().optional(),
    lng: z.number().optional(),
    cc: z.string().optional(),
    country: z.string().optional(),
  }).optional(),
  categories: z.array(z.object({ name: z.string() })).optional(),
});

export type FoursquareVenue = z.infer<typeof venueSchema>;

const searchResponseSchema = z.object({
  response: z.object({ venues: z.array(venueSchema).default([]) }),
});

const detailsResponseSchema = z.object({
  response: z.object({ venue: venueSchema }),
});

export function isUnitedStates(location: { cc?: string; country?: string }): boolean {
  return location.cc === 'US' || location.country === 'United States';
}

/** Foursquare venue id from a venue URL such as `https://foursquare.com/v/the-pub/4b0d8c`. */
export function venueIdFromUrl(url: string): string | null {
  const id = url.split('?')[0].replace(/\/+$/, '').split('/').pop();
  return id ? id : null;
}

export function toVenueDetails(venue: FoursquareVenue): VenueDetails | null {
  const location = venue.location;
  if (!location) return null;

  const formatted = location.formattedAddress;
  const addressLines = formatted === undefined ? [] : Array.isArray(formatted) ? formatted : [formatted];
  const address = addressLines.length > 0 ? addressLines.join(', ') : null;
  const coordinates = location.lat !== undefined && location.lng !== undefined
    ? { latitude: location.lat, longitude: location.lng }
    : null;
  // Private addresses come back without any location data
  if (address === null && coordinates === null) return null;

  return {
    address,
    coordinates,
    categories: venue.categories ? venue.categories.map(category => category.name) : null,
    inUnitedStates: location.cc === undefined && location.country === undefined ? null : isUnitedStates(location),
  };
}

export interface FoursquareVenueServiceConfig {
  apiUrl: string;
  credentials: FoursquareCredentials;
  timeoutMs: number;
  minIntervalMs: number;
  policy: RetryPolicy;
  http?: AxiosInstance;
  rateLimiter?: RateLimiter;
  now?: () => Date;
}

/**
 * Location service B. Standard mode searches venues by name near known
 * coordinates; premium mode reads venue details by id, or searches globally
 * with a wider result window when no id is known.
 */
export class FoursquareVenueService implements LocationService {
  readonly name = 'foursquare';
  private readonly http: AxiosInstance;
  private readonly rateLimiter: RateLimiter;
  private readonly now: () => Date;

  constructor(private readonly config: FoursquareVenueServiceConfig) {
    this.http = config.http ?? createHttpClient({ baseUrl: config.apiUrl, timeoutMs: config.timeoutMs });
    this.rateLimiter = config.rateLimiter ?? new RateLimiter({
      minIntervalMs: config.minIntervalMs,
      sleep: config.policy.sleep,
    });
    this.now = config.now ?? (() => new Date());
  }

  async lookup(query: VenueQuery, mode: LookupMode): Promise<LookupOutcome> {
    const venueId = query.foursquareUrl ? venueIdFromUrl(query.foursquareUrl) : null;
    try {
      const venue = mode === 'premium' && venueId
        ? await this.details(venueId)
        : await this.search(query, venueId, mode);
      if (!venue) return { kind: 'not_found', hint: null };

      const details = toVenueDetails(venue);
      if (!details) return { kind: 'not_found', hint: null };

      return {
        kind: 'found',
        match: {
          untappdUrl: query.untappdUrl,
          foursquareUrl: query.foursquareUrl ?? `https://foursquare.com/v/${venue.id}`,
          details,
        },
      };
    } catch (err) {
      if (err instanceof RetriesExhaustedError) {
        return { kind: 'failed', reason: err.message, rateLimited: err.rateLimited };
      }
      const status = responseStatus(err);
      if (status !== null) {
        logger.warn({ venue: query.venue, status, mode }, 'Foursquare rejected request');
        return { kind: 'failed', reason: `status ${status}`, rateLimited: status === 403 };
      }
      throw err;
    }
  }

  private async search(query: VenueQuery, venueId: string | null, mode: LookupMode): Promise<FoursquareVenue | null> {
    const near = mode === 'standard' ? query.near : null;
    const params: Record<string, string | number> = {
      ...this.authParams(),
      query: query.venue,
      intent: near ? 'browse' : 'global',
      limit: mode === 'premium' ? PREMIUM_SEARCH_LIMIT : SEARCH_LIMIT,
    };
    if (near) {
      params.ll = `${near.latitude},${near.longitude}`;
      params.radius = SEARCH_RADIUS_METERS;
    }

    const response = await getWithRetry<unknown>(this.http, '/venues/search', { params }, {
      service: this.name,
      policy: this.config.policy,
      rateLimiter: this.rateLimiter,
    });
    const parsed = searchResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      logger.warn({ venue: query.venue, issues: parsed.error.issues.length }, 'Unexpected search response');
      return null;
    }

    const venues = parsed.data.response.venues;
    if (venueId) {
      return venues.find(venue => venue.id === venueId) ?? null;
    }
    const wanted = query.venue.trim().toLowerCase();
    return venues.find(venue => venue.name.trim().toLowerCase() === wanted) ?? null;
  }

  private async details(venueId: string): Promise<FoursquareVenue | null> {
    try {
      const response = await getWithRetry<unknown>(
        this.http,
        `/venues/${encodeURIComponent(venueId)}`,
        { params: this.authParams() },
        { service: this.name, policy: this.config.policy, rateLimiter: this.rateLimiter },
      );
      const parsed = detailsResponseSchema.safeParse(response.data);
      return parsed.success ? parsed.data.response.venue : null;
    } catch (err) {
      // Param error: the venue id no longer exists
      const status = responseStatus(err);
      if (status === 400 || status === 404) return null;
      throw err;
    }
  }

  private authParams(): Record<string, string> {
    return {
      client_id: this.config.credentials.clientId,
      client_secret: this.config.credentials.clientSecret,
      v: format(this.now(), 'yyyyMMdd'),
    };
  }
}
