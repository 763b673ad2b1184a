/**
 * API-key authentication for REST routes.
 *
 * `authenticate()` resolves the `X-API-Key` header to an identity and
 * attaches it to the request; handlers read it back with `currentIdentity()`.
 *
 * @module middleware/auth
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Identity } from '@switchboard/shared/chat-schemas';
import { AuthenticationError } from '../lib/errors.js';
import type { IdentityStore } from '../services/chat/identity-store.js';

const authenticated = new WeakMap<Request, Identity>();

export function authenticate(identities: IdentityStore): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const apiKey = req.get('x-api-key');
    const identity = apiKey ? identities.getByApiKey(apiKey) : null;
    if (!identity) {
      next(new AuthenticationError());
      return;
    }
    authenticated.set(req, identity);
    next();
  };
}

/** @throws AuthenticationError when `authenticate()` did not run for this request */
export function currentIdentity(req: Request): Identity {
  const identity = authenticated.get(req);
  if (!identity) throw new AuthenticationError();
  return identity;
}
