import { ConsumeResult, TokenStore, TokenStoreError, withTimeout } from './token-store.js';

export interface ConsumptionLimiterOptions {
  store: TokenStore;
  timeoutMs?: number;
  /** Same tolerance the verifier gives jose, so a token it accepts is still live at the store. */
  clockToleranceSeconds?: number;
  nowProvider?: () => number; // unix seconds
}

const defaultNow = () => Math.floor(Date.now() / 1000);

/**
 * Spends one use of a token. The decrement is delegated whole to the store's
 * conditional update; nothing here reads the counter before writing it.
 */
export class ConsumptionLimiter {
  private readonly store: TokenStore;
  private readonly timeoutMs: number;
  private readonly clockToleranceSeconds: number;
  private readonly now: () => number;

  constructor(options: ConsumptionLimiterOptions) {
    this.store = options.store;
    this.timeoutMs = options.timeoutMs ?? 2000;
    this.clockToleranceSeconds = options.clockToleranceSeconds ?? 0;
    this.now = options.nowProvider ?? defaultNow;
  }

  async consume(tokenId: string): Promise<ConsumeResult> {
    const now = this.now() - this.clockToleranceSeconds;
    try {
      return await withTimeout(this.store.consume(tokenId, now), this.timeoutMs, 'token consume');
    } catch (err) {
      const message = err instanceof Error ? err.message : 'token store failed during consume';
      throw new TokenStoreError('store_unavailable', message, { cause: err });
    }
  }
}
