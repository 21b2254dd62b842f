export enum Tier {
    FREE = 'free',
    PRO = 'pro',
    ENTERPRISE = 'enterprise',
}

export interface RateLimitPolicy {
    requestsPerMinute: number;
    requestsPerHour: number;
    maxConcurrentRequests: number;
    burstLimit: number; // Requests allowed inside any one-second window
}

/**
 * Wire form of a policy, as returned by /generate-key and /key-info.
 */
export interface RateLimitPolicyView {
    requests_per_minute: number;
    requests_per_hour: number;
    concurrent_requests: number;
    burst_limit: number;
}

export interface ApiKeyRecord {
    key: string;
    tier: Tier;
    createdAt: Date;
}

/**
 * Per-request state attached by the auth and rate-limit stages.
 */
export interface GatewayContext {
    identity: string;
    tier?: Tier;
    apiKey?: ApiKeyRecord;
}

export type GatewayLogger = Pick<Console, 'log' | 'warn' | 'error'>;
