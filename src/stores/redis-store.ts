import { z } from 'zod';
import { ConsumeResult, SubjectSchema, TokenRecord, TokenStore, TokenStoreError } from '../token-store.js';

/** The slice of the ioredis client the store uses. */
export interface RedisCommands {
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  hgetall(key: string): Promise<Record<string, string>>;
  del(key: string): Promise<number>;
}

export interface RedisTokenStoreOptions {
  redis: RedisCommands;
  keyPrefix?: string;
  /** Seconds past `expiresAt` before Redis drops the key. */
  graceSeconds?: number;
}

// KEYS[1] = record key; ARGV = record json, remaining uses, key expiry
export const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return 0
end
redis.call('HSET', KEYS[1], 'record', ARGV[1], 'remainingUses', ARGV[2])
redis.call('EXPIREAT', KEYS[1], ARGV[3])
return 1
`;

// KEYS[1] = record key. Replies {0} missing, {-1} exhausted, {1, remaining, record json}.
export const CONSUME_SCRIPT = `
local remaining = tonumber(redis.call('HGET', KEYS[1], 'remainingUses'))
if remaining == nil then
  return {0}
end
if remaining <= 0 then
  redis.call('DEL', KEYS[1])
  return {-1}
end
remaining = redis.call('HINCRBY', KEYS[1], 'remainingUses', -1)
local record = redis.call('HGET', KEYS[1], 'record')
if remaining <= 0 then
  redis.call('DEL', KEYS[1])
end
return {1, remaining, record}
`;

const StoredRecordSchema = z.object({
  subject: SubjectSchema,
  expiresAt: z.number().int(),
  issuedAt: z.number().int(),
});

const ConsumeReplySchema = z.union([
  z.tuple([z.literal(0)]),
  z.tuple([z.literal(-1)]),
  z.tuple([z.literal(1), z.number().int().nonnegative(), z.string()]),
]);

/**
 * Redis-backed store. Create and consume each run as one Lua script, which
 * Redis executes atomically, so the quota holds across every process that
 * shares the instance. Key expiry mirrors the token's `expiresAt`.
 */
export class RedisTokenStore implements TokenStore {
  private readonly redis: RedisCommands;
  private readonly keyPrefix: string;
  private readonly graceSeconds: number;

  constructor(options: RedisTokenStoreOptions) {
    this.redis = options.redis;
    this.keyPrefix = options.keyPrefix ?? 'token:';
    this.graceSeconds = options.graceSeconds ?? 0;
  }

  async create(record: TokenRecord): Promise<void> {
    const payload = JSON.stringify({
      subject: record.subject,
      expiresAt: record.expiresAt,
      issuedAt: record.issuedAt,
    });
    const expireAt = record.expiresAt + this.graceSeconds;
    const created = await this.call(() =>
      this.redis.eval(CREATE_SCRIPT, 1, this.key(record.tokenId), payload, record.remainingUses, expireAt),
    );
    if (created !== 1) {
      throw new TokenStoreError('conflict', `token ${record.tokenId} already exists`);
    }
  }

  async consume(tokenId: string, now: number): Promise<ConsumeResult> {
    const raw = await this.call(() => this.redis.eval(CONSUME_SCRIPT, 1, this.key(tokenId)));
    const reply = ConsumeReplySchema.safeParse(raw);
    if (!reply.success) {
      throw new TokenStoreError('store_unavailable', 'unexpected reply from consume script');
    }

    const data = reply.data;
    if (data.length === 3) {
      const [, remainingUses, json] = data;
      const stored = this.parseStored(json);
      // Redis evicts on EXPIREAT with second granularity; treat the boundary second as gone.
      if (now >= stored.expiresAt) {
        return { status: 'not_found' };
      }
      return { status: 'consumed', record: { tokenId, remainingUses, ...stored } };
    }

    return data[0] === -1 ? { status: 'exhausted' } : { status: 'not_found' };
  }

  async delete(tokenId: string): Promise<boolean> {
    const removed = await this.call(() => this.redis.del(this.key(tokenId)));
    return removed > 0;
  }

  async get(tokenId: string): Promise<TokenRecord | null> {
    const hash = await this.call(() => this.redis.hgetall(this.key(tokenId)));
    if (hash.record === undefined || hash.remainingUses === undefined) {
      return null;
    }

    return {
      tokenId,
      remainingUses: Number.parseInt(hash.remainingUses, 10),
      ...this.parseStored(hash.record),
    };
  }

  private key(tokenId: string): string {
    return `${this.keyPrefix}${tokenId}`;
  }

  private parseStored(json: string): z.infer<typeof StoredRecordSchema> {
    let value: unknown;
    try {
      value = JSON.parse(json);
    } catch (err) {
      throw new TokenStoreError('store_unavailable', 'stored token record is not valid JSON', { cause: err });
    }

    const parsed = StoredRecordSchema.safeParse(value);
    if (!parsed.success) {
      throw new TokenStoreError('store_unavailable', 'stored token record has an unexpected shape');
    }
    return parsed.data;
  }

  private async call<T>(command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (err) {
      if (err instanceof TokenStoreError) {
        throw err;
      }
      throw new TokenStoreError('store_unavailable', 'redis command failed', { cause: err });
    }
  }
}
