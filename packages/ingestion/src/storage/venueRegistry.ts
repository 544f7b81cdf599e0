import { readTable, writeTable } from './csv';

export const VENUE_REGISTRY_HEADER = ['venue', 'url'] as const;

export interface VenueRegistryEntry {
  venue: string;
  /** Check-in URL of the first post that mentioned the venue. */
  firstSeenUrl: string;
}

export class VenueRegistry {
  private readonly entries = new Map<string, VenueRegistryEntry>();

  static fromCsv(raw: string | null): VenueRegistry {
    const registry = new VenueRegistry();
    for (const [venue, url] of readTable('Venue registry', raw, VENUE_REGISTRY_HEADER)) {
      if (venue) registry.add({ venue, firstSeenUrl: url ?? '' });
    }
    return registry;
  }

  has(venue: string): boolean {
    return this.entries.has(venue);
  }

  /** Records the venue unless it is already registered. */
  add(entry: VenueRegistryEntry): boolean {
    if (entry.venue.length === 0 || this.entries.has(entry.venue)) return false;
    this.entries.set(entry.venue, entry);
    return true;
  }

  list(): VenueRegistryEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  toCsv(): string {
    return writeTable(
      VENUE_REGISTRY_HEADER,
      this.list().map(entry => [entry.venue, entry.firstSeenUrl]),
    );
  }
}
