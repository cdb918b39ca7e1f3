import { Buffer } from 'node:buffer';
import crypto from 'node:crypto';
import type { RequestHandler } from 'express';
import { OAuth2Client } from 'google-auth-library';
import type { User } from '@switchyard/domain';
import {
  BadRequestError,
  BlankItemError,
  InternalError,
  InvalidTokenError,
  MissingTokenError
} from './httpError.js';

export type AuthenticatedUser = {
  name: string;
};

export type LocalAuthConfig = {
  mode: 'local';
  defaultUserName: string;
};

export type TokenAuthConfig = {
  mode: 'token';
  tokenSecret: string;
  tokenTtlMs: number;
  googleClientId?: string;
};

export type AuthConfig = LocalAuthConfig | TokenAuthConfig;

/** The slice of the coordinator authentication needs. */
export type UserDirectory = {
  getUser: (name: string) => User;
  ensureUser: (name: string) => User;
};

export type Authenticator = (authorization: string | undefined) => AuthenticatedUser;

const encodeBase64Url = (input: string | Buffer): string =>
  Buffer.from(input)
    .toString('base64')
    .replace(/=/g, '')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');

const signPayload = (payload: object, secret: string): string => {
  const header = { alg: 'HS256', typ: 'JWT' };
  const encodedHeader = encodeBase64Url(JSON.stringify(header));
  const encodedPayload = encodeBase64Url(JSON.stringify(payload));
  const data = `${encodedHeader}.${encodedPayload}`;
  const signature = crypto.createHmac('sha256', secret).update(data).digest();
  return `${data}.${encodeBase64Url(signature)}`;
};

const verifySignature = (token: string, secret: string): Record<string, unknown> | null => {
  const [encodedHeader, encodedPayload, encodedSignature, ...rest] = token.split('.');

  if (!encodedHeader || !encodedPayload || !encodedSignature || rest.length > 0) {
    return null;
  }

  const data = `${encodedHeader}.${encodedPayload}`;
  const expected = crypto.createHmac('sha256', secret).update(data).digest();
  const provided = Buffer.from(encodedSignature, 'base64url');

  if (expected.length !== provided.length || !crypto.timingSafeEqual(expected, provided)) {
    return null;
  }

  try {
    const payload: unknown = JSON.parse(Buffer.from(encodedPayload, 'base64url').toString('utf-8'));
    return payload && typeof payload === 'object' ? (payload as Record<string, unknown>) : null;
  } catch {
    return null;
  }
};

export const createAccessToken = (
  user: AuthenticatedUser,
  { tokenSecret, tokenTtlMs }: Pick<TokenAuthConfig, 'tokenSecret' | 'tokenTtlMs'>
): string => {
  if (!tokenSecret) {
    throw new InternalError('Token signing secret is not configured');
  }

  const now = Date.now();
  const payload = {
    sub: user.name,
    iat: Math.floor(now / 1000),
    exp: Math.floor((now + tokenTtlMs) / 1000)
  };

  try {
    return signPayload(payload, tokenSecret);
  } catch {
    throw new InternalError('Failed to sign authentication token');
  }
};

export const verifyAccessToken = (token: string, config: Pick<TokenAuthConfig, 'tokenSecret'>): string => {
  const payload = verifySignature(token, config.tokenSecret);

  if (!payload || typeof payload.sub !== 'string' || !payload.sub || typeof payload.exp !== 'number') {
    throw new InvalidTokenError();
  }

  if (payload.exp * 1000 <= Date.now()) {
    throw new InvalidTokenError('Authentication token has expired');
  }

  return payload.sub;
};

const readBearerToken = (authorization: string | undefined): string => {
  const header = authorization?.trim() ?? '';

  if (!header) {
    throw new MissingTokenError();
  }

  if (!header.startsWith('Bearer ')) {
    throw new InvalidTokenError();
  }

  const token = header.slice(7).trim();
  if (!token) {
    throw new MissingTokenError();
  }

  return token;
};

/**
 * Resolves an Authorization header to an existing user. Local mode skips tokens and
 * acts as the configured default user.
 */
export const createAuthenticator = (config: AuthConfig, users: UserDirectory): Authenticator => {
  if (config.mode === 'local') {
    return () => ({ name: users.ensureUser(config.defaultUserName).name });
  }

  return (authorization) => {
    const username = verifyAccessToken(readBearerToken(authorization), config);
    return { name: users.getUser(username).name };
  };
};

export const createAuthMiddleware = (authenticate: Authenticator): RequestHandler =>
  (req, _res, next) => {
    try {
      req.user = authenticate(req.header('authorization'));
      next();
    } catch (error) {
      next(error);
    }
  };

export const createLoginHandler = (config: TokenAuthConfig, users: UserDirectory): RequestHandler =>
  (req, res) => {
    const raw: unknown = req.body?.username;

    if (raw !== undefined && raw !== null && typeof raw !== 'string') {
      throw new BadRequestError('username must be a string', 'username');
    }

    const username = typeof raw === 'string' ? raw.trim() : '';
    if (!username) {
      throw new BlankItemError('username');
    }

    const user: AuthenticatedUser = { name: users.ensureUser(username).name };
    const token = createAccessToken(user, config);

    res.status(201).json({ token, user });
  };

export const createGoogleLoginHandler = (
  config: TokenAuthConfig & { googleClientId: string },
  users: UserDirectory
): RequestHandler => {
  const client = new OAuth2Client(config.googleClientId);

  return async (req, res, next) => {
    const credential = typeof req.body?.credential === 'string' ? req.body.credential.trim() : '';

    if (!credential) {
      next(new BlankItemError('credential'));
      return;
    }

    let username: string;
    try {
      const ticket = await client.verifyIdToken({
        idToken: credential,
        audience: config.googleClientId
      });
      const payload = ticket.getPayload();
      username = payload?.email ?? payload?.sub ?? '';
    } catch {
      next(new InvalidTokenError('Invalid sign-in credential'));
      return;
    }

    if (!username) {
      next(new InvalidTokenError('Invalid sign-in credential'));
      return;
    }

    try {
      const user: AuthenticatedUser = { name: users.ensureUser(username).name };
      res.json({ token: createAccessToken(user, config), user });
    } catch (error) {
      next(error);
    }
  };
};
