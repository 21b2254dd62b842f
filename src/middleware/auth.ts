import { createHash } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { KeyRegistry } from '../services/keyRegistry.js';
import { tierAtLeast } from '../services/tiers.js';
import { ForbiddenError, UnauthenticatedError } from '../errors.js';
import type { GatewayContext, Tier } from '../types/gateway.js';

// Extend Express Request type to carry the resolved caller
declare global {
  namespace Express {
    interface Request {
      gateway?: GatewayContext;
    }
  }
}

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Extracts the key from an `Authorization: Bearer <key>` header.
 * Returns undefined for a missing header or any other scheme.
 */
export function extractBearerKey(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  return BEARER_PATTERN.exec(header)?.[1];
}

/**
 * Rate limiter identity for an API key. Keys are hashed so raw credentials
 * never end up in the limiter's store.
 */
export function keyIdentity(apiKey: string): string {
  return `key:${createHash('sha256').update(apiKey).digest('hex').slice(0, 32)}`;
}

export function anonymousIdentity(req: Request): string {
  return `ip:${req.ip ?? req.socket.remoteAddress ?? 'unknown'}`;
}

/**
 * Middleware that requires a valid bearer API key.
 * Attaches the key record, tier and limiter identity to `req.gateway`.
 */
export function requireApiKey(registry: KeyRegistry): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const apiKey = extractBearerKey(req.headers.authorization);

    if (!apiKey) {
      next(new UnauthenticatedError('Missing or malformed Authorization header; expected "Bearer <api-key>"'));
      return;
    }

    const record = registry.getKey(apiKey);

    if (!record) {
      next(new UnauthenticatedError('Invalid API key'));
      return;
    }

    req.gateway = {
      identity: keyIdentity(apiKey),
      tier: record.tier,
      apiKey: record,
    };

    next();
  };
}

/**
 * Middleware that rejects callers below `required`. Must be used after
 * `requireApiKey`.
 */
export function requireTier(required: Tier): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const tier = req.gateway?.tier;

    if (!tier) {
      next(new UnauthenticatedError());
      return;
    }

    if (!tierAtLeast(tier, required)) {
      next(new ForbiddenError(`${capitalize(required)} tier required`));
      return;
    }

    next();
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
