/**
 * @file join-path.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Result of matching an upgrade request URL against {prefix}/{sessionId}.
 */
export type JoinTarget =
  | { kind: 'join'; sessionId: string }
  | { kind: 'malformed'; reason: string }
  | { kind: 'not-found' };

/**
 * Extracts the session id from a join URL such as `/ws/abc123`.
 * Only the first segment after the prefix counts; the query string is ignored.
 */
export function parseJoinPath(rawUrl: string | undefined, prefix: string): JoinTarget {
  let pathname: string;
  try {
    pathname = new URL(rawUrl ?? '/', 'http://localhost').pathname;
  } catch {
    return { kind: 'not-found' };
  }

  if (pathname === prefix) {
    return { kind: 'malformed', reason: 'Missing session id' };
  }
  if (!pathname.startsWith(`${prefix}/`)) {
    return { kind: 'not-found' };
  }

  const [segment = ''] = pathname.slice(prefix.length + 1).split('/');

  let sessionId: string;
  try {
    sessionId = decodeURIComponent(segment);
  } catch {
    return { kind: 'malformed', reason: 'Invalid session id encoding' };
  }

  if (sessionId.trim().length === 0) {
    return { kind: 'malformed', reason: 'Missing session id' };
  }

  return { kind: 'join', sessionId };
}
