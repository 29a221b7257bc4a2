import type { Logger } from 'pino'
import type { OtpKind, UserClass } from '@passgate/shared-types'
import type { LookupMissReason } from '../otp/types'

export type VerifyFailureReason = LookupMissReason | 'CONFLICT' | 'STORE_UNAVAILABLE'

export type IssueFailureReason = 'STORE_UNAVAILABLE' | 'IDENTITY_UNAVAILABLE'

/**
 * Lifecycle events for the audit trail. Codes never appear here; failure
 * reasons do, since the sink is not visible to the requester.
 */
export type OtpAuditEvent =
  | {
      type: 'OTP_ISSUED'
      at: number
      kind: OtpKind
      email: string
      userClass: UserClass
      accountId: string | null
      expiresAt: number
    }
  | { type: 'OTP_ISSUE_FAILED'; at: number; email: string; userClass: UserClass; reason: IssueFailureReason }
  | {
      type: 'OTP_VERIFIED'
      at: number
      kind: OtpKind
      email: string
      userClass: UserClass
      accountId: string | null
    }
  | { type: 'OTP_VERIFY_FAILED'; at: number; email: string; userClass: UserClass; reason: VerifyFailureReason }
  | { type: 'OTP_CLEANUP'; at: number; before: number; removed: number }
  | { type: 'OTP_REVOKED'; at: number; email: string; userClass: UserClass; removed: number }

export type OtpAuditEventType = OtpAuditEvent['type']

/** Fire-and-forget; `emit` must not block on I/O. */
export interface OtpAuditSink {
  emit(event: OtpAuditEvent): void
}

const FAILURE_EVENTS: ReadonlySet<OtpAuditEventType> = new Set(['OTP_ISSUE_FAILED', 'OTP_VERIFY_FAILED'])

export const createPinoAuditSink = (logger: Logger): OtpAuditSink => {
  const audit = logger.child({ channel: 'audit' })

  return {
    emit: (event) => {
      const logData = { ...event, timestamp: new Date(event.at).toISOString() }

      if (FAILURE_EVENTS.has(event.type)) {
        audit.warn(logData, `[AUDIT FAIL] ${event.type}`)
      } else {
        audit.info(logData, `[AUDIT] ${event.type}`)
      }
    },
  }
}

