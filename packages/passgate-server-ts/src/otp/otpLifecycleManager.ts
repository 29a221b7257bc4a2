import { OTP_CODE_LENGTH } from '@passgate/shared-types'
import type { Logger } from 'pino'
import { createPinoAuditSink, type OtpAuditEvent, type OtpAuditSink, type VerifyFailureReason } from '../audit/auditSink'
import { createLogger } from '../logging/logger'
import { systemClock, type Clock } from './clock'
import { cryptoCodeGenerator, type CodeGenerator } from './codeGenerator'
import type { SignupIdentityResolver } from './identityResolver'
import { normalizeEmail, type OtpStore } from './otpStore'
import type {
  IssuedOtp,
  IssueOtpError,
  IssueOtpOptions,
  LookupMissReason,
  MaintenanceError,
  OtpKind,
  OtpLifecycleOptions,
  OtpRecord,
  OtpResult,
  OtpTarget,
  UserClass,
  VerifiedOtp,
  VerifyOtpError,
} from './types'

export interface OtpLifecycleDependencies {
  store: OtpStore
  resolver: SignupIdentityResolver
  generator?: CodeGenerator
  clock?: Clock
  auditSink?: OtpAuditSink
  logger?: Logger
}

const DEFAULTS = {
  ttlSeconds: 300,
  codeLength: OTP_CODE_LENGTH,
} as const

// Signup records are checked before account records. Fixed, not configurable.
const LOOKUP_ORDER = ['signup', 'account'] as const satisfies readonly OtpKind[]

const INVALID_CODE: VerifyOtpError = { code: 'INVALID_CODE', message: 'Invalid or expired code. Please request a new one.' }

const STORE_UNAVAILABLE: MaintenanceError = {
  code: 'STORE_UNAVAILABLE',
  message: 'Verification codes are temporarily unavailable. Please try again.',
}

const isNumericCode = (code: string, length: number): boolean => code.length === length && /^\d+$/.test(code)

const shouldBypass = (env: OtpLifecycleOptions['env'], bypassCode?: string): boolean => {
  return env !== 'production' && Boolean(bypassCode)
}

const toVerified = (record: OtpRecord): VerifiedOtp =>
  record.kind === 'signup' ? { kind: 'signup', account: null } : { kind: 'account', account: record.account }

/**
 * Issue/verify state machine for one (email, userClass) scope:
 * NONE -> ISSUED -> VERIFIED | EXPIRED. Holds no OTP state of its own; all
 * coordination goes through the store.
 */
export class OtpLifecycleManager {
  private readonly generator: CodeGenerator
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly auditSink: OtpAuditSink

  constructor(
    private readonly deps: OtpLifecycleDependencies,
    private readonly options: OtpLifecycleOptions
  ) {
    this.generator = deps.generator ?? cryptoCodeGenerator
    this.clock = deps.clock ?? systemClock
    this.logger = deps.logger ?? createLogger({ env: options.env })
    this.auditSink = deps.auditSink ?? createPinoAuditSink(this.logger)
  }

  async issueOtp(
    email: string,
    userClass: UserClass,
    options: IssueOtpOptions = {}
  ): Promise<OtpResult<IssuedOtp, IssueOtpError>> {
    const normalized = normalizeEmail(email)
    const ttlSeconds = options.ttlSeconds ?? this.options.ttlSeconds ?? DEFAULTS.ttlSeconds
    const codeLength = this.options.codeLength ?? DEFAULTS.codeLength

    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      return {
        success: false,
        error: { code: 'INVALID_TTL', message: 'ttlSeconds must be a positive number.' },
      }
    }

    if (options.forcedCode !== undefined) {
      if (this.options.env === 'production') {
        return {
          success: false,
          error: { code: 'FORCED_CODE_NOT_ALLOWED', message: 'Forced codes are disabled in production.' },
        }
      }
      if (!isNumericCode(options.forcedCode, codeLength)) {
        return {
          success: false,
          error: { code: 'INVALID_FORCED_CODE', message: `Forced code must be ${codeLength} digits.` },
        }
      }
    }

    let target: OtpTarget
    try {
      const identity = await this.deps.resolver.resolve(normalized, userClass)
      target =
        identity.status === 'inactive_account'
          ? { kind: 'account', account: identity.account }
          : { kind: 'signup', account: null }
    } catch (error) {
      this.logger.error({ err: error, userClass }, 'Identity lookup failed while issuing OTP')
      this.emit({
        type: 'OTP_ISSUE_FAILED',
        at: this.clock.now(),
        email: normalized,
        userClass,
        reason: 'IDENTITY_UNAVAILABLE',
      })
      return { success: false, error: STORE_UNAVAILABLE }
    }

    const bypassCode = shouldBypass(this.options.env, this.options.bypassCode) ? this.options.bypassCode : undefined
    const code = options.forcedCode ?? bypassCode ?? this.generator.generate(codeLength)

    const stored = await this.deps.store.put({ ...target, email: normalized, userClass, code, ttlSeconds })
    if (!stored.success) {
      this.logger.error({ err: stored.error, userClass, kind: target.kind }, 'Failed to store OTP')
      this.emit({ type: 'OTP_ISSUE_FAILED', at: this.clock.now(), email: normalized, userClass, reason: 'STORE_UNAVAILABLE' })
      return { success: false, error: STORE_UNAVAILABLE }
    }

    const record = stored.data
    this.emit({
      type: 'OTP_ISSUED',
      at: record.createdAt,
      kind: record.kind,
      email: record.email,
      userClass: record.userClass,
      accountId: record.account?.accountId ?? null,
      expiresAt: record.expiresAt,
    })

    return { success: true, data: { ...toVerified(record), code: record.code, expiresAt: record.expiresAt } }
  }

  async verifyOtp(email: string, userClass: UserClass, code: string): Promise<OtpResult<VerifiedOtp, VerifyOtpError>> {
    const normalized = normalizeEmail(email)
    const misses: LookupMissReason[] = []

    for (const kind of LOOKUP_ORDER) {
      const lookup = await this.deps.store.findValid(kind, normalized, userClass, code)
      if (!lookup.success) {
        return this.failVerification(normalized, userClass, 'STORE_UNAVAILABLE', lookup.error)
      }

      if (!lookup.data.found) {
        misses.push(lookup.data.reason)
        continue
      }

      const record = lookup.data.record
      const marked = await this.deps.store.markVerified(record)
      if (!marked.success) {
        const reason = marked.error.code === 'CONFLICT' ? 'CONFLICT' : 'STORE_UNAVAILABLE'
        return this.failVerification(normalized, userClass, reason, marked.error)
      }

      this.emit({
        type: 'OTP_VERIFIED',
        at: this.clock.now(),
        kind: record.kind,
        email: normalized,
        userClass,
        accountId: record.account?.accountId ?? null,
      })
      return { success: true, data: toVerified(record) }
    }

    const reason = misses.find((miss) => miss !== 'NOT_FOUND') ?? 'NOT_FOUND'
    return this.failVerification(normalized, userClass, reason)
  }

  /** Maintenance sweep; not on the request path. */
  async cleanupExpired(now?: number): Promise<OtpResult<number, MaintenanceError>> {
    const before = now ?? this.clock.now()
    const deleted = await this.deps.store.deleteExpired(before)
    if (!deleted.success) {
      this.logger.warn({ err: deleted.error }, 'Expired OTP cleanup failed')
      return { success: false, error: STORE_UNAVAILABLE }
    }

    this.emit({ type: 'OTP_CLEANUP', at: this.clock.now(), before, removed: deleted.data })
    return { success: true, data: deleted.data }
  }

  /** Drops both kinds of record for the scope, e.g. after the account was activated elsewhere. */
  async revokeOtps(email: string, userClass: UserClass): Promise<OtpResult<number, MaintenanceError>> {
    const normalized = normalizeEmail(email)
    const revoked = await this.deps.store.revokeScope(normalized, userClass)
    if (!revoked.success) {
      this.logger.warn({ err: revoked.error, userClass }, 'Failed to revoke OTPs')
      return { success: false, error: STORE_UNAVAILABLE }
    }

    this.emit({ type: 'OTP_REVOKED', at: this.clock.now(), email: normalized, userClass, removed: revoked.data })
    return { success: true, data: revoked.data }
  }

  private failVerification(
    email: string,
    userClass: UserClass,
    reason: VerifyFailureReason,
    cause?: unknown
  ): OtpResult<VerifiedOtp, VerifyOtpError> {
    this.emit({ type: 'OTP_VERIFY_FAILED', at: this.clock.now(), email, userClass, reason })

    if (reason === 'STORE_UNAVAILABLE') {
      this.logger.error({ err: cause, userClass }, 'OTP store unavailable during verification')
      return { success: false, error: STORE_UNAVAILABLE }
    }

    return { success: false, error: INVALID_CODE }
  }

  private emit(event: OtpAuditEvent): void {
    try {
      this.auditSink.emit(event)
    } catch (error) {
      this.logger.warn({ err: error, event: event.type }, 'Audit sink rejected event')
    }
  }
}
