import type { BaseLogger } from 'pino';
import { VerificationErrorCode } from './errors.js';

export type AuditOutcome = 'allowed' | 'issued' | 'issuance_failed' | 'revoked' | VerificationErrorCode;

export interface AuditEvent {
  outcome: AuditOutcome;
  tokenId?: string;
  sub?: string;
  reason?: string;
  remainingUses?: number;
  timestamp: number;
}

export interface AuditLogger {
  record(event: AuditEvent): Promise<void>;
}

const INFRASTRUCTURE_OUTCOMES: ReadonlySet<AuditOutcome> = new Set(['store_unavailable', 'issuance_failed']);
const SUCCESS_OUTCOMES: ReadonlySet<AuditOutcome> = new Set(['allowed', 'issued', 'revoked']);

/**
 * Writes audit events as structured pino lines. Infrastructure failures go
 * out at error level, rejected credentials at warn, everything else at info.
 */
export class PinoAuditLogger implements AuditLogger {
  constructor(private readonly logger: BaseLogger) {}

  async record(event: AuditEvent): Promise<void> {
    const line = { event: 'auth.audit', ...event };
    if (INFRASTRUCTURE_OUTCOMES.has(event.outcome)) {
      this.logger.error(line, 'token store failure');
    } else if (SUCCESS_OUTCOMES.has(event.outcome)) {
      this.logger.info(line, `token ${event.outcome}`);
    } else {
      this.logger.warn(line, 'token rejected');
    }
  }
}

export class NoopAuditLogger implements AuditLogger {
  async record(): Promise<void> {
    // intentionally empty
  }
}
