import { z } from 'zod';
import { describeError } from '../logger';
import { usernameFromLink } from '../ingestion/normalizer';
import type { StoredPost } from '../api/types';
import type { AggregateRow } from '../storage/aggregate';

export class PostFormatError extends Error {
  constructor(readonly postId: number, detail: string) {
    super(`Post ${postId} is malformed: ${detail}`);
    this.name = 'PostFormatError';
  }
}

const storedPostSchema = z.object({
  id: z.string(),
  title: z.string(),
  link: z.string(),
  summary: z.string().default(''),
  published: z.string().default(''),
  raw: z.string().optional(),
  breweryId: z.string(),
});

// Beer names that contain " at " themselves; the venue follows the second one.
const BEERS_NAMED_AT = ['victory at sea', 'murder at schrute farm...death by fire'];

const VENUE_SEPARATOR = ' at ';
const DRINKING_SEPARATOR = ' is drinking ';
const RATING_SUFFIX = '/5 Stars';

function splitAtOccurrence(text: string, separator: string, occurrence: number): [string, string] {
  const parts = text.split(separator);
  return [parts.slice(0, occurrence).join(separator), parts.slice(occurrence).join(separator)];
}

export function decodeStoredPost(postId: number, raw: string): StoredPost {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new PostFormatError(postId, describeError(err));
  }
  const parsed = storedPostSchema.safeParse(json);
  if (!parsed.success) {
    throw new PostFormatError(postId, parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
  }
  return parsed.data;
}

/** Beer and venue from "<user> is drinking a <beer> at <venue>". */
export function parseTitle(postId: number, title: string): { beer: string; location: string } {
  const lower = title.toLowerCase();
  const occurrence = BEERS_NAMED_AT.some(name => lower.includes(name)) ? 2 : 1;
  const [drinking, location] = splitAtOccurrence(title, VENUE_SEPARATOR, occurrence);

  const drinkingParts = drinking.split(DRINKING_SEPARATOR);
  if (drinkingParts.length < 2) {
    throw new PostFormatError(postId, `title has no "${DRINKING_SEPARATOR.trim()}": ${title}`);
  }
  // Drop the article: "a Sculpin" -> "Sculpin"
  const beerWithArticle = drinkingParts[1];
  const space = beerWithArticle.indexOf(' ');
  if (space < 0) {
    throw new PostFormatError(postId, `title has no beer name: ${title}`);
  }
  return { beer: beerWithArticle.slice(space + 1), location };
}

/** Comment and rating from "<comment> (<rating>/5 Stars)". */
export function parseSummary(summary: string): { comment: string; rating: number | null } {
  const open = summary.lastIndexOf('(');
  if (open < 0) return { comment: summary, rating: null };

  const ratingText = summary.slice(open + 1).split(RATING_SUFFIX)[0].trim();
  const rating = ratingText.length > 0 ? Number(ratingText) : NaN;
  return {
    comment: summary.slice(0, open),
    rating: Number.isFinite(rating) ? rating : null,
  };
}

export function parsePost(postId: number, post: StoredPost): AggregateRow {
  const { beer, location } = parseTitle(postId, post.title);
  const { comment, rating } = parseSummary(post.summary);
  let username: string;
  try {
    username = usernameFromLink(post.link);
  } catch (err) {
    throw new PostFormatError(postId, describeError(err));
  }

  return {
    guid: postId,
    username,
    brewery: post.breweryId,
    beer,
    location,
    comment,
    rating,
    date: post.published,
    url: post.link,
  };
}
