/**
 * Anonymous Session Middleware
 *
 * Players have no accounts; a `session_id` cookie ties their stories and
 * jobs together. The cookie is issued on first contact and reused after.
 */

import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import { getCookie, setCookie } from 'hono/cookie';

const SESSION_COOKIE = 'session_id';

export type SessionContext = {
  sessionId: string;
};

// Anything else in the cookie is replaced with a fresh id
const SESSION_ID_PATTERN = /^[A-Za-z0-9-]{8,64}$/;

export const sessionMiddleware = createMiddleware<{ Variables: SessionContext }>(async (c, next) => {
  let sessionId = getCookie(c, SESSION_COOKIE);

  if (!sessionId || !SESSION_ID_PATTERN.test(sessionId)) {
    sessionId = randomUUID();
    setCookie(c, SESSION_COOKIE, sessionId, {
      httpOnly: true,
      path: '/',
      sameSite: 'Lax',
    });
  }

  c.set('sessionId', sessionId);
  await next();
});
