import type { Coordinates, VenueDetails } from '../storage/venueLocations';

export type LookupMode = 'standard' | 'premium';

export interface VenueQuery {
  venue: string;
  /** Check-in URL of the first post naming the venue. */
  checkinUrl: string | null;
  untappdUrl: string | null;
  foursquareUrl: string | null;
  near: Coordinates | null;
}

/** Identifiers a lookup learned without finding usable location data. */
export interface VenueHint {
  untappdUrl: string | null;
  foursquareUrl: string | null;
  near: Coordinates | null;
}

export interface VenueMatch {
  untappdUrl: string | null;
  foursquareUrl: string | null;
  details: VenueDetails;
}

export type LookupOutcome =
  | { kind: 'found'; match: VenueMatch }
  | { kind: 'not_found'; hint: VenueHint | null }
  | { kind: 'failed'; reason: string; rateLimited: boolean };

export interface LocationService {
  readonly name: string;
  lookup(query: VenueQuery, mode: LookupMode): Promise<LookupOutcome>;
}

/** A feed entry: the fields the parser reads, plus the entry as published. */
export interface FeedPost {
  id: string;
  title: string;
  link: string;
  summary: string;
  published: string;
  /** The `<item>` element's XML. */
  raw: string;
}

/** Posts stored before `raw` was kept have no raw entry. */
export interface StoredPost extends Omit<FeedPost, 'raw'> {
  raw?: string;
  breweryId: string;
}

export interface FeedSource {
  /** Posts of one brewery's feed, newest first. */
  listPosts(breweryId: string): Promise<FeedPost[]>;
}
