import { timingSafeEqual } from 'node:crypto';
import type { RequestHandler } from 'express';
import { UnauthorizedError } from '../errors.js';
import { sendError } from '../http.js';

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** Accepts the token from the `X-API-Token` header or the `token` query parameter. */
export function requireToken(expected: string): RequestHandler {
  return (req, res, next) => {
    const fromQuery = typeof req.query.token === 'string' ? req.query.token : undefined;
    const provided = req.get('x-api-token') ?? fromQuery;

    if (!provided || !tokensMatch(provided, expected)) {
      sendError(res, new UnauthorizedError());
      return;
    }
    next();
  };
}
