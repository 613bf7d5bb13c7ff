/**
 * Player identity for the request handler.
 *
 * The player id keys the completed-session record served by
 * `GET /api/player`. It travels in an HttpOnly cookie, or in the
 * X-Player-Id header for browsers that block third-party cookies.
 */

import { parse, serialize } from 'cookie';

export const PLAYER_COOKIE = 'playerId';
export const PLAYER_HEADER = 'X-Player-Id';

/** One year, in seconds */
const PLAYER_COOKIE_MAX_AGE = 60 * 60 * 24 * 365;

export interface PlayerIdentity {
  playerId: string;
  /** Set-Cookie value carrying the id, refreshed on every call */
  cookie: string;
}

export function readPlayerId(request: Request): string | null {
  const cookieHeader = request.headers.get('Cookie');
  if (cookieHeader) {
    const fromCookie: string | undefined = parse(cookieHeader)[PLAYER_COOKIE];
    if (fromCookie) {
      return fromCookie;
    }
  }
  const fromHeader = request.headers.get(PLAYER_HEADER)?.trim();
  return fromHeader ? fromHeader : null;
}

/**
 * Cross-origin HTTPS requests need SameSite=None; Secure for the browser
 * to send the cookie back.
 */
export function serializePlayerCookie(playerId: string, request: Request): string {
  const url = new URL(request.url);
  const isHttps = url.protocol === 'https:';
  const origin = request.headers.get('Origin');
  const crossSite = isHttps && origin !== null && origin !== url.origin;

  return serialize(PLAYER_COOKIE, playerId, {
    path: '/',
    maxAge: PLAYER_COOKIE_MAX_AGE,
    httpOnly: true,
    sameSite: crossSite ? 'none' : 'lax',
    secure: isHttps,
  });
}

export function resolvePlayer(request: Request, createId: () => string): PlayerIdentity {
  const playerId = readPlayerId(request) ?? createId();
  return { playerId, cookie: serializePlayerCookie(playerId, request) };
}
