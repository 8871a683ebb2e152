import { randomUUID } from 'node:crypto';
import { SignJWT } from 'jose';
import { AuditLogger, NoopAuditLogger } from './audit.js';
import { IssuanceError } from './errors.js';
import { SigningKey } from './signing.js';
import { SubjectInput, SubjectSchema, TokenRecord, TokenStore, withTimeout } from './token-store.js';

export interface TokenIssuerOptions {
  store: TokenStore;
  signingKey: SigningKey;
  issuer: string;
  ttlSeconds: number;
  maxUses: number;
  storeTimeoutMs?: number;
  auditLogger?: AuditLogger;
  nowProvider?: () => number; // unix seconds
  idGenerator?: () => string;
}

export interface IssuedToken {
  token: string;
  tokenId: string;
  issuedAt: number;
  expiresAt: number;
  remainingUses: number;
}

const defaultNow = () => Math.floor(Date.now() / 1000);

export class TokenIssuer {
  private readonly now: () => number;
  private readonly nextId: () => string;
  private readonly storeTimeoutMs: number;
  private readonly audit: AuditLogger;

  constructor(private readonly options: TokenIssuerOptions) {
    if (!Number.isInteger(options.maxUses) || options.maxUses < 1) {
      throw new RangeError(`maxUses must be a positive integer, got ${options.maxUses}`);
    }
    if (!Number.isInteger(options.ttlSeconds) || options.ttlSeconds < 1) {
      throw new RangeError(`ttlSeconds must be a positive integer, got ${options.ttlSeconds}`);
    }
    this.now = options.nowProvider ?? defaultNow;
    this.nextId = options.idGenerator ?? randomUUID;
    this.storeTimeoutMs = options.storeTimeoutMs ?? 2000;
    this.audit = options.auditLogger ?? new NoopAuditLogger();
  }

  /**
   * Signs a token for `input` and persists its record. The record write
   * happens before the token leaves this method; if it fails the caller gets
   * an {@link IssuanceError} and no token.
   */
  async issue(input: SubjectInput): Promise<IssuedToken> {
    const subject = SubjectSchema.parse(input);
    const issuedAt = this.now();
    const expiresAt = issuedAt + this.options.ttlSeconds;
    const tokenId = this.nextId();

    const record: TokenRecord = {
      tokenId,
      subject,
      remainingUses: this.options.maxUses,
      issuedAt,
      expiresAt,
    };

    const { algorithm, secret } = this.options.signingKey;
    const token = await new SignJWT({
      username: subject.username,
      roles: subject.roles,
      groups: subject.groups,
    })
      .setProtectedHeader({ alg: algorithm, typ: 'JWT' })
      .setIssuer(this.options.issuer)
      .setSubject(subject.userId)
      .setJti(tokenId)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(secret);

    try {
      await withTimeout(this.options.store.create(record), this.storeTimeoutMs, 'token create');
    } catch (err) {
      await this.audit.record({
        outcome: 'issuance_failed',
        tokenId,
        sub: subject.userId,
        timestamp: issuedAt,
        reason: err instanceof Error ? err.message : String(err),
      });
      throw new IssuanceError('failed to persist token record', { cause: err });
    }

    await this.audit.record({ outcome: 'issued', tokenId, sub: subject.userId, timestamp: issuedAt });

    return {
      token,
      tokenId,
      issuedAt,
      expiresAt,
      remainingUses: record.remainingUses,
    };
  }

  /** Deletes the record outright. Returns false when nothing was stored under `tokenId`. */
  async revoke(tokenId: string): Promise<boolean> {
    const removed = await withTimeout(this.options.store.delete(tokenId), this.storeTimeoutMs, 'token revoke');
    await this.audit.record({
      outcome: 'revoked',
      tokenId,
      timestamp: this.now(),
      reason: removed ? undefined : 'not_found',
    });
    return removed;
  }
}
