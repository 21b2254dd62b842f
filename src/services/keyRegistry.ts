import { randomInt } from 'node:crypto';
import { Tier, type ApiKeyRecord } from '../types/gateway.js';
import { TIERS } from './tiers.js';
import { IssuanceLimitError } from '../errors.js';

const KEY_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const KEY_SUFFIX_LENGTH = 16;
const MAX_ISSUE_ATTEMPTS = 5;
export const DEFAULT_MAX_ISSUED_KEYS = 1000;

export const DEFAULT_API_KEYS: ReadonlyArray<{ key: string; tier: Tier }> = [
    { key: 'demo-key-free', tier: Tier.FREE },
    { key: 'demo-key-pro', tier: Tier.PRO },
    { key: 'demo-key-enterprise', tier: Tier.ENTERPRISE },
];

export interface KeyRegistryOptions {
    prefix?: string;
    seed?: ReadonlyArray<{ key: string; tier: Tier }>;
    /** Source of key suffixes; defaults to a CSPRNG. */
    generateSuffix?: () => string;
    /** Upper bound on keys held from `issueKey`. Seeded keys do not count. */
    maxIssuedKeys?: number;
}

function randomSuffix(): string {
    let suffix = '';
    for (let i = 0; i < KEY_SUFFIX_LENGTH; i++) {
        suffix += KEY_ALPHABET[randomInt(KEY_ALPHABET.length)];
    }
    return suffix;
}

/**
 * In-memory table of API keys and the tier that owns each one.
 * Lookups are read-only; issuance and revocation are administrative.
 */
export class KeyRegistry {
    private apiKeys: Map<string, ApiKeyRecord> = new Map();
    private readonly prefix: string;
    private readonly generateSuffix: () => string;
    private readonly maxIssuedKeys: number;
    private issuedKeys: Set<string> = new Set();

    constructor(options: KeyRegistryOptions = {}) {
        this.prefix = options.prefix ?? 'gw';
        this.generateSuffix = options.generateSuffix ?? randomSuffix;
        this.maxIssuedKeys = options.maxIssuedKeys ?? DEFAULT_MAX_ISSUED_KEYS;

        for (const { key, tier } of options.seed ?? DEFAULT_API_KEYS) {
            this.registerKey(key, tier);
        }
    }

    /**
     * Registers an existing key under a tier, replacing any previous record.
     */
    public registerKey(key: string, tier: Tier): ApiKeyRecord {
        const record: ApiKeyRecord = {
            key,
            tier,
            createdAt: new Date(),
        };
        this.apiKeys.set(key, record);
        this.issuedKeys.delete(key);
        return record;
    }

    public getKey(key: string): ApiKeyRecord | undefined {
        return this.apiKeys.get(key);
    }

    /**
     * @returns the owning tier, or undefined when the key is unknown
     */
    public resolveTier(key: string): Tier | undefined {
        return this.apiKeys.get(key)?.tier;
    }

    /**
     * Issues a new key of the form `<prefix>-<tier>-<suffix>`.
     * A suffix that collides with an existing key is drawn again. Once
     * `maxIssuedKeys` issued keys are held, issuance is refused until one
     * is revoked.
     */
    public issueKey(tier: Tier): ApiKeyRecord {
        if (this.issuedKeys.size >= this.maxIssuedKeys) {
            throw new IssuanceLimitError(this.maxIssuedKeys);
        }
        for (let attempt = 0; attempt < MAX_ISSUE_ATTEMPTS; attempt++) {
            const key = `${this.prefix}-${tier}-${this.generateSuffix()}`;
            if (!this.apiKeys.has(key)) {
                const record = this.registerKey(key, tier);
                this.issuedKeys.add(key);
                return record;
            }
        }
        throw new Error(`Unable to issue a unique API key after ${MAX_ISSUE_ATTEMPTS} attempts`);
    }

    public issuedCount(): number {
        return this.issuedKeys.size;
    }

    public revokeKey(key: string): boolean {
        this.issuedKeys.delete(key);
        return this.apiKeys.delete(key);
    }

    public listKeys(): Record<Tier, string[]> {
        const grouped: Record<Tier, string[]> = {
            [Tier.FREE]: [],
            [Tier.PRO]: [],
            [Tier.ENTERPRISE]: [],
        };
        for (const record of this.apiKeys.values()) {
            grouped[record.tier].push(record.key);
        }
        for (const tier of TIERS) {
            grouped[tier].sort();
        }
        return grouped;
    }

    /**
     * Clears all keys (useful for tests)
     */
    public reset() {
        this.apiKeys.clear();
        this.issuedKeys.clear();
    }
}
