import { InMemoryRevokedTokenStore } from './revoked-token.store';

describe('InMemoryRevokedTokenStore', () => {
  let clock: number;
  let store: InMemoryRevokedTokenStore;

  beforeEach(() => {
    clock = Date.parse('2026-01-05T08:00:00.000Z');
    store = new InMemoryRevokedTokenStore(() => clock);
  });

  it('remembers a revoked token until it would have expired', async () => {
    await store.revoke('jti-1', 60);

    await expect(store.isRevoked('jti-1')).resolves.toBe(true);
    clock += 60 * 1000;
    await expect(store.isRevoked('jti-1')).resolves.toBe(false);
  });

  it('drops expired entries on the next revocation', async () => {
    await store.revoke('jti-1', 60);
    await store.revoke('jti-2', 3600);
    clock += 2 * 60 * 1000;

    await store.revoke('jti-3', 60);

    expect(store.size).toBe(2);
    await expect(store.isRevoked('jti-2')).resolves.toBe(true);
    await expect(store.isRevoked('jti-3')).resolves.toBe(true);
  });
});
