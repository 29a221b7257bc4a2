import { randomUUID } from 'node:crypto'
import type { Logger } from 'pino'
import type { RedisLike } from '../redis/types'
import { systemClock, type Clock } from './clock'
import {
  OtpRecordSchema,
  type FindValidOutcome,
  type OtpKind,
  type OtpRecord,
  type PutOtpInput,
  type StoreError,
  type StoreResult,
  type UserClass,
} from './types'

/**
 * Durable home of OTP records. One record per (kind, email, userClass);
 * every write is a single atomic step so concurrent requests settle here.
 */
export interface OtpStore {
  put(input: PutOtpInput): Promise<StoreResult<OtpRecord>>
  findValid(kind: OtpKind, email: string, userClass: UserClass, code: string): Promise<StoreResult<FindValidOutcome>>
  /** Fails with CONFLICT when another caller already retired or replaced the record. */
  markVerified(record: OtpRecord): Promise<StoreResult<void>>
  deleteExpired(before: number): Promise<StoreResult<number>>
  revokeScope(email: string, userClass: UserClass): Promise<StoreResult<number>>
}

export interface RedisOtpStoreOptions {
  clock?: Clock
  logger?: Logger
  /** Keep verified records (flagged) until they expire instead of deleting them. */
  retainVerified?: boolean
  sweepBatchSize?: number
  keyPrefix?: {
    record?: string
    expiryIndex?: string
  }
}

const DEFAULTS = {
  sweepBatchSize: 500,
  prefixes: {
    record: 'otp:',
    expiryIndex: 'otp-expiry',
  },
} as const

export const normalizeEmail = (email: string): string => email.toLowerCase().trim()

export const constantTimeEqual = (a: string, b: string): boolean => {
  const maxLength = Math.max(a.length, b.length)
  let result = a.length ^ b.length
  for (let i = 0; i < maxLength; i++) {
    result |= (a.charCodeAt(i) || 0) ^ (b.charCodeAt(i) || 0)
  }
  return result === 0
}

const unavailable = (operation: string, cause: unknown): { success: false; error: StoreError } => ({
  success: false,
  error: { code: 'STORE_UNAVAILABLE', message: `OTP store unavailable during ${operation}`, cause },
})

export class RedisOtpStore implements OtpStore {
  private readonly clock: Clock
  private readonly recordPrefix: string
  private readonly indexKey: string
  private readonly sweepBatchSize: number

  constructor(
    private readonly redis: RedisLike,
    private readonly options: RedisOtpStoreOptions = {}
  ) {
    this.clock = options.clock ?? systemClock
    this.recordPrefix = options.keyPrefix?.record ?? DEFAULTS.prefixes.record
    this.indexKey = options.keyPrefix?.expiryIndex ?? DEFAULTS.prefixes.expiryIndex
    this.sweepBatchSize = options.sweepBatchSize ?? DEFAULTS.sweepBatchSize
  }

  recordKey(kind: OtpKind, email: string, userClass: UserClass): string {
    return `${this.recordPrefix}${kind}:${userClass}:${normalizeEmail(email)}`
  }

  async put(input: PutOtpInput): Promise<StoreResult<OtpRecord>> {
    if (input.account && input.account.userClass !== input.userClass) {
      throw new Error(`Account ${input.account.accountId} is ${input.account.userClass}, not ${input.userClass}`)
    }
    if (!(input.ttlSeconds > 0)) {
      throw new RangeError(`ttlSeconds must be positive, got ${input.ttlSeconds}`)
    }

    const now = this.clock.now()
    const base = {
      id: randomUUID(),
      email: normalizeEmail(input.email),
      userClass: input.userClass,
      code: input.code,
      createdAt: now,
      expiresAt: now + input.ttlSeconds * 1000,
      verified: false,
      verifiedAt: null,
    }
    const record: OtpRecord =
      input.kind === 'signup'
        ? { ...base, kind: 'signup', account: null }
        : { ...base, kind: 'account', account: input.account }

    try {
      await this.redis.setIndexed(
        this.recordKey(record.kind, record.email, record.userClass),
        this.indexKey,
        JSON.stringify(record),
        record.expiresAt
      )
    } catch (error) {
      return unavailable('put', error)
    }

    return { success: true, data: record }
  }

  async findValid(
    kind: OtpKind,
    email: string,
    userClass: UserClass,
    code: string
  ): Promise<StoreResult<FindValidOutcome>> {
    const key = this.recordKey(kind, email, userClass)

    let stored: string | null
    try {
      stored = await this.redis.get(key)
    } catch (error) {
      return unavailable('findValid', error)
    }

    if (!stored) return { success: true, data: { found: false, reason: 'NOT_FOUND' } }

    // A corrupt entry is left in place: the next put overwrites it and the
    // sweep removes it, whereas deleting here could race a concurrent put.
    let parseResult: ReturnType<typeof OtpRecordSchema.safeParse>
    try {
      parseResult = OtpRecordSchema.safeParse(JSON.parse(stored))
    } catch {
      this.options.logger?.warn({ kind, userClass }, 'OTP record is not valid JSON')
      return { success: true, data: { found: false, reason: 'NOT_FOUND' } }
    }

    if (!parseResult.success) {
      this.options.logger?.warn({ kind, userClass }, 'OTP record failed schema validation')
      return { success: true, data: { found: false, reason: 'NOT_FOUND' } }
    }

    const record = parseResult.data
    if (record.verified) return { success: true, data: { found: false, reason: 'ALREADY_VERIFIED' } }
    if (record.expiresAt <= this.clock.now()) return { success: true, data: { found: false, reason: 'EXPIRED' } }
    if (!constantTimeEqual(record.code, code)) {
      return { success: true, data: { found: false, reason: 'CODE_MISMATCH' } }
    }

    return { success: true, data: { found: true, record } }
  }

  async markVerified(record: OtpRecord): Promise<StoreResult<void>> {
    const replacement = this.options.retainVerified
      ? JSON.stringify({ ...record, verified: true, verifiedAt: this.clock.now() })
      : null

    let retired: number
    try {
      retired = await this.redis.retireIfUnverified(
        this.recordKey(record.kind, record.email, record.userClass),
        this.indexKey,
        record.id,
        replacement
      )
    } catch (error) {
      return unavailable('markVerified', error)
    }

    if (retired === 0) {
      return { success: false, error: { code: 'CONFLICT', message: 'OTP record was already verified or replaced' } }
    }

    return { success: true, data: undefined }
  }

  async deleteExpired(before: number): Promise<StoreResult<number>> {
    let removed = 0
    try {
      for (;;) {
        const batch = await this.redis.sweepIndexed(this.indexKey, before, this.sweepBatchSize)
        removed += batch
        if (batch < this.sweepBatchSize) break
      }
    } catch (error) {
      return unavailable('deleteExpired', error)
    }

    return { success: true, data: removed }
  }

  async revokeScope(email: string, userClass: UserClass): Promise<StoreResult<number>> {
    try {
      const removed = await this.redis.delIndexed(
        [this.recordKey('signup', email, userClass), this.recordKey('account', email, userClass)],
        this.indexKey
      )
      return { success: true, data: removed }
    } catch (error) {
      return unavailable('revokeScope', error)
    }
  }
}
