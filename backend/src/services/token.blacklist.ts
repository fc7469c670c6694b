/**========================================================================
 **                          TOKEN BLACKLIST
 *? expiring set of revoked token ids (jti)
 *? an entry only needs to outlive the token it revokes
 *========================================================================**/

export interface TokenBlacklist {
    revoke(jti: string, expiresAt: Date): Promise<void>;
    isRevoked(jti: string): Promise<boolean>;
}

// the subset of the ioredis client used here
export interface ExpiringKeyStore {
    set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
    exists(key: string): Promise<number>;
}

export const BLACKLIST_PREFIX = 'blacklist:';

function secondsUntil(expiresAt: Date, now: number): number {
    return Math.ceil((expiresAt.getTime() - now) / 1000);
}

export class RedisTokenBlacklist implements TokenBlacklist {
    constructor(private redis: ExpiringKeyStore) {}

    async revoke(jti: string, expiresAt: Date): Promise<void> {
        const ttl = secondsUntil(expiresAt, Date.now());
        // already expired: nothing left to revoke
        if (ttl <= 0) return;

        await this.redis.set(`${BLACKLIST_PREFIX}${jti}`, '1', 'EX', ttl);
    }

    async isRevoked(jti: string): Promise<boolean> {
        return (await this.redis.exists(`${BLACKLIST_PREFIX}${jti}`)) > 0;
    }
}

// used when REDIS_URL is unset; entries are lost on restart
export class MemoryTokenBlacklist implements TokenBlacklist {
    private entries = new Map<string, number>();

    constructor(private now: () => number = Date.now) {}

    async revoke(jti: string, expiresAt: Date): Promise<void> {
        const expiry = expiresAt.getTime();
        if (expiry <= this.now()) return;

        this.entries.set(jti, expiry);
    }

    async isRevoked(jti: string): Promise<boolean> {
        this.purgeExpired();
        return this.entries.has(jti);
    }

    get size(): number {
        this.purgeExpired();
        return this.entries.size;
    }

    private purgeExpired() {
        const now = this.now();
        for (const [jti, expiry] of this.entries) {
            if (expiry <= now) this.entries.delete(jti);
        }
    }
}
