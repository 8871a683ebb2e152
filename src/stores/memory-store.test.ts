import { describe, expect, test } from 'vitest';
import { TokenRecord, TokenStoreError } from '../token-store.js';
import { InMemoryTokenStore } from './memory-store.js';

const now = 1_700_000_000;

const makeRecord = (overrides: Partial<TokenRecord> = {}): TokenRecord => ({
  tokenId: 'tok-1',
  subject: { userId: 'u-1', username: 'alice', roles: ['user'], groups: ['team-a'] },
  remainingUses: 2,
  issuedAt: now,
  expiresAt: now + 60,
  ...overrides,
});

describe('InMemoryTokenStore', () => {
  test('decrements and deletes the record on the use that reaches zero', async () => {
    const store = new InMemoryTokenStore();
    await store.create(makeRecord());

    const first = await store.consume('tok-1', now);
    expect(first).toMatchObject({ status: 'consumed', record: { remainingUses: 1 } });
    expect((await store.get('tok-1'))?.remainingUses).toBe(1);

    const second = await store.consume('tok-1', now);
    expect(second).toMatchObject({ status: 'consumed', record: { remainingUses: 0 } });
    expect(await store.get('tok-1')).toBeNull();

    expect(await store.consume('tok-1', now)).toEqual({ status: 'not_found' });
  });

  test('refuses to create over an existing record', async () => {
    const store = new InMemoryTokenStore();
    await store.create(makeRecord());
    await expect(store.create(makeRecord({ remainingUses: 99 }))).rejects.toMatchObject({
      code: 'conflict' satisfies TokenStoreError['code'],
    });
    expect((await store.get('tok-1'))?.remainingUses).toBe(2);
  });

  test('treats an expired record as gone', async () => {
    const store = new InMemoryTokenStore();
    await store.create(makeRecord());
    expect(await store.consume('tok-1', now + 60)).toEqual({ status: 'not_found' });
    expect(await store.get('tok-1')).toBeNull();
  });

  test('hands out copies that cannot alter stored state', async () => {
    const store = new InMemoryTokenStore();
    const record = makeRecord();
    await store.create(record);
    record.remainingUses = 50;
    record.subject.roles.push('admin');

    const stored = await store.get('tok-1');
    expect(stored?.remainingUses).toBe(2);
    expect(stored?.subject.roles).toEqual(['user']);
  });

  test('delete reports whether a record existed', async () => {
    const store = new InMemoryTokenStore();
    await store.create(makeRecord());
    expect(await store.delete('tok-1')).toBe(true);
    expect(await store.delete('tok-1')).toBe(false);
    expect(await store.consume('tok-1', now)).toEqual({ status: 'not_found' });
  });

  test('serializes concurrent consumers despite latency', async () => {
    const store = new InMemoryTokenStore({ latencyMs: 2 });
    await store.create(makeRecord({ remainingUses: 1 }));

    const results = await Promise.all([store.consume('tok-1', now), store.consume('tok-1', now)]);
    expect(results.filter((result) => result.status === 'consumed')).toHaveLength(1);
    expect(results.filter((result) => result.status === 'not_found')).toHaveLength(1);
  });

  test('frees expired records when full and keeps live ones', async () => {
    const store = new InMemoryTokenStore({ maxEntries: 2 });
    await store.create(makeRecord({ tokenId: 'live', expiresAt: now + 900 }));
    await store.create(makeRecord({ tokenId: 'dead', expiresAt: now - 1 }));
    await store.create(makeRecord({ tokenId: 'new' }));

    expect(store.size).toBe(2);
    expect(await store.get('dead')).toBeNull();
    expect(await store.get('new')).not.toBeNull();
    expect(await store.consume('live', now)).toMatchObject({ status: 'consumed', record: { remainingUses: 1 } });
  });

  test('refuses a new record rather than dropping a live one', async () => {
    const store = new InMemoryTokenStore({ maxEntries: 2 });
    await store.create(makeRecord({ tokenId: 'a' }));
    await store.create(makeRecord({ tokenId: 'b' }));

    await expect(store.create(makeRecord({ tokenId: 'c' }))).rejects.toMatchObject({
      code: 'store_unavailable',
      message: 'token store is full (2 live records)',
    });
    expect(store.size).toBe(2);
    expect(await store.get('a')).not.toBeNull();
    expect(await store.get('c')).toBeNull();
  });

  test('keeps records inside the grace window when full', async () => {
    const store = new InMemoryTokenStore({ maxEntries: 1, graceSeconds: 30 });
    await store.create(makeRecord({ tokenId: 'late', expiresAt: now - 10 }));

    await expect(store.create(makeRecord({ tokenId: 'next' }))).rejects.toMatchObject({ code: 'store_unavailable' });
    await store.create(makeRecord({ tokenId: 'later', issuedAt: now + 20 }));

    expect(await store.get('late')).toBeNull();
    expect(await store.get('later')).not.toBeNull();
  });
});
