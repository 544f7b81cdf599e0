import { formatFlag, readTable, writeTable, type CsvRow } from './csv';

export const VENUE_LOCATIONS_HEADER = [
  'venue',
  'untappd_url',
  'foursquare_url',
  'address',
  'lat',
  'long',
  'categories',
  'in_united_states',
] as const;

export type VenueStatus = 'RESOLVED' | 'MISSING' | 'UNAVAILABLE';

export const MISSING_MARKER = 'Missing';
export const UNAVAILABLE_MARKER = 'Unavailable';
export const UNCATEGORIZED = 'Uncategorized';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/** Location data for a venue; null marks a field the lookup did not supply. */
export interface VenueDetails {
  address: string | null;
  coordinates: Coordinates | null;
  categories: string[] | null;
  inUnitedStates: boolean | null;
}

export interface VenueLocation extends VenueDetails {
  venue: string;
  status: VenueStatus;
  untappdUrl: string | null;
  foursquareUrl: string | null;
}

export const EMPTY_DETAILS: VenueDetails = {
  address: null,
  coordinates: null,
  categories: null,
  inUnitedStates: null,
};

function markerFor(status: VenueStatus): string {
  switch (status) {
    case 'RESOLVED':
      return '';
    case 'MISSING':
      return MISSING_MARKER;
    case 'UNAVAILABLE':
      return UNAVAILABLE_MARKER;
  }
}

export function toCsvRow(location: VenueLocation): CsvRow {
  const marker = markerFor(location.status);
  const cell = (value: string | null): string => value ?? marker;
  const { coordinates, categories, inUnitedStates } = location;
  return [
    location.venue,
    cell(location.untappdUrl),
    cell(location.foursquareUrl),
    cell(location.address),
    coordinates ? String(coordinates.latitude) : marker,
    coordinates ? String(coordinates.longitude) : marker,
    categories === null ? marker : categories.length > 0 ? categories.join(', ') : UNCATEGORIZED,
    inUnitedStates === null ? marker : formatFlag(inUnitedStates),
  ];
}

function isMarker(cell: string): boolean {
  return cell === '' || cell === MISSING_MARKER || cell === UNAVAILABLE_MARKER;
}

function statusOf(locationCells: string[]): VenueStatus {
  if (locationCells.includes(UNAVAILABLE_MARKER)) return 'UNAVAILABLE';
  if (locationCells.includes(MISSING_MARKER)) return 'MISSING';
  // A row with nothing resolved was written before any lookup completed.
  if (locationCells.every(cell => cell === '')) return 'MISSING';
  return 'RESOLVED';
}

function parseCoordinate(cell: string): number | null {
  if (isMarker(cell)) return null;
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
}

export function fromCsvRow(row: CsvRow): VenueLocation {
  const [venue = '', untappdUrl = '', foursquareUrl = '', address = '', lat = '', long = '', categories = '', inUs = ''] = row;
  const latitude = parseCoordinate(lat);
  const longitude = parseCoordinate(long);
  return {
    venue,
    status: statusOf([address, lat, long, categories, inUs]),
    untappdUrl: isMarker(untappdUrl) ? null : untappdUrl,
    foursquareUrl: isMarker(foursquareUrl) ? null : foursquareUrl,
    address: isMarker(address) ? null : address,
    coordinates: latitude !== null && longitude !== null ? { latitude, longitude } : null,
    categories: isMarker(categories) ? null : categories === UNCATEGORIZED ? [] : categories.split(', '),
    inUnitedStates: inUs === 'True' ? true : inUs === 'False' ? false : null,
  };
}

const TRANSITIONS: Record<VenueStatus, readonly VenueStatus[]> = {
  MISSING: ['MISSING', 'RESOLVED', 'UNAVAILABLE'],
  RESOLVED: [],
  UNAVAILABLE: [],
};

export class VenueTransitionError extends Error {
  constructor(venue: string, from: VenueStatus | null, to: VenueStatus) {
    super(`Venue "${venue}" cannot move from ${from ?? 'new'} to ${to}`);
    this.name = 'VenueTransitionError';
  }
}

export function canTransition(from: VenueStatus | null, to: VenueStatus): boolean {
  if (from === null) return to !== 'UNAVAILABLE';
  return TRANSITIONS[from].includes(to);
}

export class VenueLocationTable {
  private readonly rows = new Map<string, VenueLocation>();

  static fromCsv(raw: string | null): VenueLocationTable {
    const table = new VenueLocationTable();
    for (const row of readTable('Venue locations', raw, VENUE_LOCATIONS_HEADER)) {
      const location = fromCsvRow(row);
      if (location.venue) table.rows.set(location.venue, location);
    }
    return table;
  }

  get(venue: string): VenueLocation | undefined {
    return this.rows.get(venue);
  }

  /** Stores a new or updated location, rejecting transitions out of a terminal status. */
  set(location: VenueLocation): void {
    const current = this.rows.get(location.venue)?.status ?? null;
    if (!canTransition(current, location.status)) {
      throw new VenueTransitionError(location.venue, current, location.status);
    }
    this.rows.set(location.venue, location);
  }

  list(): VenueLocation[] {
    return [...this.rows.values()];
  }

  withStatus(status: VenueStatus): VenueLocation[] {
    return this.list().filter(location => location.status === status);
  }

  get size(): number {
    return this.rows.size;
  }

  toCsv(): string {
    return writeTable(VENUE_LOCATIONS_HEADER, this.list().map(toCsvRow));
  }
}
