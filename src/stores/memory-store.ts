import { setTimeout as sleep } from 'node:timers/promises';
import { ConsumeResult, TokenRecord, TokenStore, TokenStoreError } from '../token-store.js';

export interface InMemoryTokenStoreOptions {
  maxEntries?: number;
  /** Seconds past `expiresAt` that a record is still kept, matching the verifier's clock tolerance. */
  graceSeconds?: number;
  /** Delay before each operation's critical section, so concurrent calls interleave. */
  latencyMs?: number;
}

const cloneRecord = (record: TokenRecord): TokenRecord => ({
  ...record,
  subject: { ...record.subject, roles: [...record.subject.roles], groups: [...record.subject.groups] },
});

/**
 * Process-local store. Each operation awaits its simulated latency first and
 * then runs to completion without yielding, which gives the same atomicity a
 * conditional update has on a networked backend.
 */
export class InMemoryTokenStore implements TokenStore {
  private records = new Map<string, TokenRecord>();
  private readonly maxEntries: number;
  private readonly graceSeconds: number;
  private readonly latencyMs: number;

  constructor(options: InMemoryTokenStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? 10_000;
    this.graceSeconds = options.graceSeconds ?? 0;
    this.latencyMs = options.latencyMs ?? 0;
  }

  get size(): number {
    return this.records.size;
  }

  async create(record: TokenRecord): Promise<void> {
    await this.pause();
    if (this.records.has(record.tokenId)) {
      throw new TokenStoreError('conflict', `token ${record.tokenId} already exists`);
    }

    // issuedAt is the issuer's clock at the moment of this write.
    if (this.records.size >= this.maxEntries) {
      this.evictExpired(record.issuedAt);
    }
    if (this.records.size >= this.maxEntries) {
      throw new TokenStoreError('store_unavailable', `token store is full (${this.maxEntries} live records)`);
    }

    this.records.set(record.tokenId, cloneRecord(record));
  }

  async consume(tokenId: string, now: number): Promise<ConsumeResult> {
    await this.pause();
    const record = this.records.get(tokenId);
    if (!record) {
      return { status: 'not_found' };
    }

    if (now >= record.expiresAt) {
      this.records.delete(tokenId);
      return { status: 'not_found' };
    }

    if (record.remainingUses <= 0) {
      this.records.delete(tokenId);
      return { status: 'exhausted' };
    }

    record.remainingUses -= 1;
    if (record.remainingUses === 0) {
      this.records.delete(tokenId);
    }

    return { status: 'consumed', record: cloneRecord(record) };
  }

  async delete(tokenId: string): Promise<boolean> {
    await this.pause();
    return this.records.delete(tokenId);
  }

  async get(tokenId: string): Promise<TokenRecord | null> {
    await this.pause();
    const record = this.records.get(tokenId);
    return record ? cloneRecord(record) : null;
  }

  private async pause(): Promise<void> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
  }

  private evictExpired(now: number) {
    for (const [tokenId, record] of this.records) {
      if (now >= record.expiresAt + this.graceSeconds) {
        this.records.delete(tokenId);
      }
    }
  }
}
