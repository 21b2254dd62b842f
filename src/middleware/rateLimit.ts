import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { RateLimiter, RateLimitDecision } from '../services/rateLimiter.js';
import type { MetricsCollector } from '../services/metrics.js';
import { BackendUnavailableError, RateLimitedError } from '../errors.js';
import { Tier } from '../types/gateway.js';
import { anonymousIdentity } from './auth.js';

export interface RateLimitOptions {
    /** Policy applied to callers without an API key. */
    anonymousTier?: Tier;
}

function rejectMessage(decision: Extract<RateLimitDecision, { admitted: false }>): string {
    switch (decision.reason) {
        case 'concurrency':
            return `Too many concurrent requests (limit ${decision.limit})`;
        case 'burst':
            return 'Burst limit exceeded';
        case 'minute':
            return `Rate limit exceeded: ${decision.limit} requests per minute`;
        case 'hour':
            return 'Hourly request quota exceeded';
    }
}

/**
 * Middleware that enforces the caller's tier policy. This is the only place
 * rate limits are applied; individual routes declare none of their own.
 * Must be used after `requireApiKey`, or with `anonymousTier` on public routes.
 *
 * An admitted request holds one concurrency slot until its response
 * finishes or the connection closes, whichever comes first.
 */
export const enforceRateLimit = (
    limiter: RateLimiter,
    metrics: MetricsCollector,
    options: RateLimitOptions = {},
): RequestHandler => {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!req.gateway) {
            req.gateway = { identity: anonymousIdentity(req) };
        }
        const { identity } = req.gateway;
        const tier = req.gateway.tier ?? options.anonymousTier ?? Tier.FREE;
        const tierLabel = req.gateway.tier ?? 'anonymous';

        limiter.admit(identity, tier).then(
            (decision) => {
                if (!decision.admitted) {
                    metrics.recordRateLimitHit(tierLabel);
                    next(new RateLimitedError(decision.retryAfterSeconds, rejectMessage(decision)));
                    return;
                }

                const { lease } = decision;
                // The caller may have gone away while the store was consulted.
                if (res.closed) {
                    lease.release();
                    return;
                }
                res.once('finish', lease.release);
                res.once('close', lease.release);

                res.setHeader('X-RateLimit-Limit', decision.limit);
                res.setHeader('X-RateLimit-Remaining', decision.remaining);
                res.setHeader('X-RateLimit-Reset', decision.resetSeconds);

                next();
            },
            (err: unknown) => {
                next(new BackendUnavailableError('Rate limiter unavailable', { cause: err }));
            },
        );
    };
};
