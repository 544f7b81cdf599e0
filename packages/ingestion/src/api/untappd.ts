import * as cheerio from 'cheerio';
import type { AxiosInstance } from 'axios';
import { createLogger, describeError } from '../logger';
import { createHttpClient, getWithRetry, responseStatus, RetriesExhaustedError, type RetryPolicy } from './http';
import { RateLimiter } from './rateLimiter';
import { isUnitedStates } from './foursquare';
import type { Coordinates, VenueDetails } from '../storage/venueLocations';
import type { LocationService, LookupOutcome, VenueHint, VenueQuery } from './types';

const logger = createLogger('untappd');

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0',
];

const SELECTORS = {
  checkinVenueLink: 'p.location a[href]',
  foursquareLink: 'div.venue-social a.fs.track-click[href]',
  latitude: 'meta[property="place:location:latitude"]',
  longitude: 'meta[property="place:location:longitude"]',
  address: '.venue-header p.address',
  category: '.venue-header p.category',
  country: 'meta[property="business:contact_data:country_name"]',
} as const;

export interface UntappdVenuePage {
  foursquareUrl: string | null;
  coordinates: Coordinates | null;
  address: string | null;
  categories: string[] | null;
  country: string | null;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Venue path linked from a check-in page, e.g. `/v/the-pub/12345`. */
export function parseCheckinPage(html: string): string | null {
  const $ = cheerio.load(html);
  return $(SELECTORS.checkinVenueLink).first().attr('href') ?? null;
}

export function parseVenuePage(html: string): UntappdVenuePage {
  const $ = cheerio.load(html);
  const foursquareHref = $(SELECTORS.foursquareLink).first().attr('href');
  const latitude = Number($(SELECTORS.latitude).attr('content'));
  const longitude = Number($(SELECTORS.longitude).attr('content'));
  const hasCoordinates = $(SELECTORS.latitude).length > 0 && $(SELECTORS.longitude).length > 0
    && Number.isFinite(latitude) && Number.isFinite(longitude);
  const address = collapse($(SELECTORS.address).first().text());
  const categories = $(SELECTORS.category)
    .toArray()
    .map(node => collapse($(node).text()))
    .filter(name => name.length > 0);
  const country = collapse($(SELECTORS.country).attr('content') ?? '');

  return {
    // Desktop and mobile links differ only by tracking parameters
    foursquareUrl: foursquareHref ? foursquareHref.split('?')[0] : null,
    coordinates: hasCoordinates ? { latitude, longitude } : null,
    address: address || null,
    categories: categories.length > 0 ? categories : null,
    country: country || null,
  };
}

export interface UntappdVenueServiceConfig {
  baseUrl: string;
  timeoutMs: number;
  minIntervalMs: number;
  policy: RetryPolicy;
  http?: AxiosInstance;
  rateLimiter?: RateLimiter;
}

/**
 * Location service A: follows a check-in to its venue page on the check-in
 * service and reads the location data published there.
 */
export class UntappdVenueService implements LocationService {
  readonly name = 'untappd';
  private readonly http: AxiosInstance;
  private readonly rateLimiter: RateLimiter;

  constructor(private readonly config: UntappdVenueServiceConfig) {
    this.http = config.http ?? createHttpClient({ timeoutMs: config.timeoutMs });
    this.rateLimiter = config.rateLimiter ?? new RateLimiter({
      minIntervalMs: config.minIntervalMs,
      jitterMs: config.minIntervalMs / 4,
      sleep: config.policy.sleep,
    });
  }

  async lookup(query: VenueQuery): Promise<LookupOutcome> {
    try {
      const venueUrl = query.untappdUrl ?? await this.findVenueUrl(query);
      if (!venueUrl) {
        return { kind: 'not_found', hint: null };
      }

      const html = await this.fetchPage(venueUrl);
      if (html === null) {
        // Venue deleted or merged into another
        return { kind: 'not_found', hint: null };
      }

      const page = parseVenuePage(html);
      const hint: VenueHint = {
        untappdUrl: venueUrl,
        foursquareUrl: page.foursquareUrl,
        near: page.coordinates,
      };
      if (!page.address || !page.coordinates) {
        return { kind: 'not_found', hint };
      }

      const details: VenueDetails = {
        address: page.address,
        coordinates: page.coordinates,
        categories: page.categories,
        inUnitedStates: page.country ? isUnitedStates({ country: page.country }) : null,
      };
      return { kind: 'found', match: { untappdUrl: venueUrl, foursquareUrl: page.foursquareUrl, details } };
    } catch (err) {
      if (err instanceof RetriesExhaustedError) {
        return { kind: 'failed', reason: err.message, rateLimited: err.rateLimited };
      }
      const status = responseStatus(err);
      if (status !== null) {
        logger.warn({ venue: query.venue, status }, 'Untappd rejected request');
        return { kind: 'failed', reason: `status ${status}`, rateLimited: status === 403 };
      }
      throw err;
    }
  }

  private async findVenueUrl(query: VenueQuery): Promise<string | null> {
    if (!query.checkinUrl) return null;
    const html = await this.fetchPage(query.checkinUrl);
    if (html === null) {
      logger.debug({ venue: query.venue, checkinUrl: query.checkinUrl }, 'Check-in no longer exists');
      return null;
    }
    const path = parseCheckinPage(html);
    if (!path) return null;
    try {
      return new URL(path, this.config.baseUrl).toString();
    } catch (err) {
      logger.warn({ venue: query.venue, path, error: describeError(err) }, 'Unusable venue link');
      return null;
    }
  }

  /** Page HTML, or null when the page does not exist. */
  private async fetchPage(url: string): Promise<string | null> {
    const userAgent = USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
    try {
      const response = await getWithRetry<string>(
        this.http,
        url,
        { responseType: 'text', headers: { 'User-Agent': userAgent, Accept: 'text/html' } },
        { service: this.name, policy: this.config.policy, rateLimiter: this.rateLimiter },
      );
      return String(response.data);
    } catch (err) {
      if (responseStatus(err) === 404) return null;
      throw err;
    }
  }
}
