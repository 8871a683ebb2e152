import { errors, jwtVerify, JWTPayload } from 'jose';
import { z } from 'zod';
import { AuditLogger, NoopAuditLogger } from './audit.js';
import { TokenVerificationError } from './errors.js';
import { ConsumptionLimiter } from './limiter.js';
import { SigningKey } from './signing.js';
import { ConsumeResult, TokenStoreError } from './token-store.js';

export interface VerifierOptions {
  signingKey: SigningKey;
  issuer: string;
  limiter: ConsumptionLimiter;
  auditLogger?: AuditLogger;
  clockToleranceSeconds?: number;
  nowProvider?: () => number; // unix seconds
}

export type HeaderBag = Record<string, string | string[] | undefined>;

export interface VerifiedIdentity {
  tokenId: string;
  userId: string;
  username: string;
  roles: string[];
  groups: string[];
  expiresAt: number;
  remainingUses: number;
}

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  jti: z.string().min(1),
  exp: z.number().int(),
  username: z.string().min(1),
  roles: z.array(z.string()).default([]),
  groups: z.array(z.string()).default([]),
});

const defaultNow = () => Math.floor(Date.now() / 1000);

const BEARER_PREFIX = /^bearer(?:\s+|$)/i;

function readHeader(headers: HeaderBag, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== name) continue;
    const first = Array.isArray(value) ? value[0] : value;
    if (first !== undefined && first.trim() !== '') {
      return first;
    }
  }
  return undefined;
}

/**
 * Pulls the raw token out of `Authorization`, or `X-Authorization` when the
 * standard header is absent. Both `Bearer <token>` and a bare token are taken.
 */
export function extractCredential(headers: HeaderBag): string {
  const header = readHeader(headers, 'authorization') ?? readHeader(headers, 'x-authorization');
  if (header === undefined) {
    throw new TokenVerificationError('missing_credential', 'authorization header missing');
  }

  const raw = header.trim();
  const token = BEARER_PREFIX.test(raw) ? raw.replace(BEARER_PREFIX, '') : raw;

  if (!token) {
    throw new TokenVerificationError('malformed_credential', 'bearer scheme without a token');
  }
  if (/\s/.test(token)) {
    throw new TokenVerificationError('malformed_credential', 'authorization header is not a single token');
  }

  return token;
}

function toVerificationError(err: unknown): TokenVerificationError {
  if (err instanceof errors.JWTExpired) {
    return new TokenVerificationError('expired_token', 'token expired');
  }
  if (err instanceof errors.JWSSignatureVerificationFailed || err instanceof errors.JOSEAlgNotAllowed) {
    return new TokenVerificationError('invalid_signature', 'token signature invalid');
  }
  const cause = err instanceof Error ? err.message : String(err);
  return new TokenVerificationError('malformed_credential', 'token could not be decoded', { cause });
}

function detail(err: TokenVerificationError, key: string): string | undefined {
  const value = err.details?.[key];
  return typeof value === 'string' ? value : undefined;
}

export class TokenVerifier {
  private readonly now: () => number;
  private readonly clockTolerance: number;
  private readonly audit: AuditLogger;

  constructor(private readonly options: VerifierOptions) {
    this.now = options.nowProvider ?? defaultNow;
    this.clockTolerance = options.clockToleranceSeconds ?? 0;
    this.audit = options.auditLogger ?? new NoopAuditLogger();
  }

  /**
   * Authenticates one request. A structurally valid, unexpired token spends
   * one use here, before any handler runs, whatever the handler's outcome.
   */
  async verify(headers: HeaderBag): Promise<VerifiedIdentity> {
    try {
      const identity = await this.verifyAndConsume(headers);
      await this.audit.record({
        outcome: 'allowed',
        tokenId: identity.tokenId,
        sub: identity.userId,
        remainingUses: identity.remainingUses,
        timestamp: this.now(),
      });
      return identity;
    } catch (err) {
      if (err instanceof TokenVerificationError) {
        await this.audit.record({
          outcome: err.code,
          tokenId: detail(err, 'tokenId'),
          reason: detail(err, 'reason') ?? err.message,
          timestamp: this.now(),
        });
      }
      throw err;
    }
  }

  private async verifyAndConsume(headers: HeaderBag): Promise<VerifiedIdentity> {
    const token = extractCredential(headers);
    const { algorithm, secret } = this.options.signingKey;

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, secret, {
        algorithms: [algorithm],
        issuer: this.options.issuer,
        requiredClaims: ['sub', 'jti', 'exp'],
        clockTolerance: this.clockTolerance,
        currentDate: new Date(this.now() * 1000),
      }));
    } catch (err) {
      throw toVerificationError(err);
    }

    const parsed = ClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TokenVerificationError('malformed_credential', 'token claims malformed', {
        issues: parsed.error.issues.map((issue) => issue.path.join('.')),
      });
    }
    const claims = parsed.data;

    let outcome: ConsumeResult;
    try {
      outcome = await this.options.limiter.consume(claims.jti);
    } catch (err) {
      if (err instanceof TokenStoreError) {
        throw new TokenVerificationError('store_unavailable', 'token store unavailable', {
          tokenId: claims.jti,
          reason: err.message,
        });
      }
      throw err;
    }

    if (outcome.status !== 'consumed') {
      throw new TokenVerificationError('token_exhausted', 'token revoked or expired', {
        tokenId: claims.jti,
        reason: outcome.status,
      });
    }

    return {
      tokenId: claims.jti,
      userId: claims.sub,
      username: claims.username,
      roles: claims.roles,
      groups: claims.groups,
      expiresAt: claims.exp,
      remainingUses: outcome.record.remainingUses,
    };
  }
}
