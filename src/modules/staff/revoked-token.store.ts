import { RedisClient } from '../../connections/redis';

/**
 * Refresh tokens revoked on logout, remembered until they would have expired anyway
 */
export interface RevokedTokenStore {
  revoke(jti: string, ttlSeconds: number): Promise<void>;
  isRevoked(jti: string): Promise<boolean>;
}

const REVOKED_KEY_PREFIX = 'revoked:refresh:';

export class RedisRevokedTokenStore implements RevokedTokenStore {
  constructor(private readonly client: RedisClient) {}

  async revoke(jti: string, ttlSeconds: number): Promise<void> {
    await this.client.set(`${REVOKED_KEY_PREFIX}${jti}`, '1', { EX: Math.max(1, ttlSeconds) });
  }

  async isRevoked(jti: string): Promise<boolean> {
    return (await this.client.exists(`${REVOKED_KEY_PREFIX}${jti}`)) === 1;
  }
}

/**
 * Process-local store for runs without Redis
 */
export class InMemoryRevokedTokenStore implements RevokedTokenStore {
  private readonly revoked = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  async revoke(jti: string, ttlSeconds: number): Promise<void> {
    const now = this.now();

    // Drop entries whose tokens have expired anyway
    for (const [storedJti, expiresAt] of this.revoked) {
      if (expiresAt <= now) {
        this.revoked.delete(storedJti);
      }
    }

    this.revoked.set(jti, now + Math.max(1, ttlSeconds) * 1000);
  }

  get size(): number {
    return this.revoked.size;
  }

  async isRevoked(jti: string): Promise<boolean> {
    const expiresAt = this.revoked.get(jti);
    if (expiresAt === undefined) {
      return false;
    }
    if (expiresAt <= this.now()) {
      this.revoked.delete(jti);
      return false;
    }
    return true;
  }
}
