import session, { Store } from 'express-session';
import { RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { SessionConfig } from '../config';

/**
 * Cookie-backed session over an external store. Nothing is written to the
 * store until a login assigns the auth record.
 */
export function createSessionMiddleware(config: SessionConfig, store: Store): RequestHandler {
  return session({
    name: config.cookieName,
    secret: config.secret,
    store,
    genid: () => uuidv4(),
    resave: false,
    saveUninitialized: false,
    rolling: true,
    cookie: {
      httpOnly: true,
      sameSite: 'lax',
      secure: config.secureCookie,
      maxAge: config.ttlSeconds * 1000
    }
  });
}
