import { z } from 'zod';

export const SubjectSchema = z.object({
  userId: z.string().min(1),
  username: z.string().min(1),
  roles: z.array(z.string()).default([]),
  groups: z.array(z.string()).default([]),
});

export type Subject = z.infer<typeof SubjectSchema>;
export type SubjectInput = z.input<typeof SubjectSchema>;

export interface TokenRecord {
  tokenId: string;
  subject: Subject;
  remainingUses: number;
  expiresAt: number; // unix seconds
  issuedAt: number; // unix seconds
}

export type ConsumeResult =
  | { status: 'consumed'; record: TokenRecord }
  | { status: 'exhausted' }
  | { status: 'not_found' };

/**
 * Backing store for token records.
 *
 * `create` and `consume` must each be a single atomic primitive of the
 * backend: create refuses an existing key, and consume decrements only while
 * `remainingUses > 0`, deleting the record in the same step once it reaches
 * zero. Callers never read a record and write back a computed value.
 */
export interface TokenStore {
  create(record: TokenRecord): Promise<void>;
  consume(tokenId: string, now: number): Promise<ConsumeResult>;
  delete(tokenId: string): Promise<boolean>;
  get(tokenId: string): Promise<TokenRecord | null>;
}

export type TokenStoreErrorCode = 'store_unavailable' | 'timeout' | 'conflict';

export class TokenStoreError extends Error {
  constructor(public readonly code: TokenStoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TokenStoreError';
  }
}

export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TokenStoreError('timeout', `${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
