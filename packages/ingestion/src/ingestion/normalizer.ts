/**
 * Numeric post id from a check-in URL, e.g.
 * `https://untappd.com/user/someone/checkin/756802330` -> 756802330.
 */
export function extractPostId(raw: string): number {
  const last = raw.split('?')[0].replace(/\/+$/, '').split('/').pop() ?? '';
  if (!/^\d+$/.test(last)) throw new Error(`No post id in "${raw}"`);
  const id = Number(last);
  if (!Number.isSafeInteger(id)) throw new Error(`Post id out of range in "${raw}"`);
  return id;
}

/** User name segment of a check-in link (third from the end). */
export function usernameFromLink(link: string): string {
  const segments = link.replace(/\/+$/, '').split('/');
  const username = segments[segments.length - 3];
  if (!username) throw new Error(`No user name in "${link}"`);
  return username;
}
