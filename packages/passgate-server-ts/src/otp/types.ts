import { z } from 'zod'
import {
  AccountRefSchema,
  UserClassSchema,
  type AccountRef,
  type OtpKind,
  type PassgateEnvironment,
  type UserClass,
} from '@passgate/shared-types'

const OtpRecordBaseSchema = z.object({
  id: z.string(),
  email: z.string(),
  userClass: UserClassSchema,
  code: z.string(),
  createdAt: z.number(),
  expiresAt: z.number(),
  verified: z.boolean(),
  verifiedAt: z.number().nullable(),
})

/**
 * Stored OTP record, tagged by kind. Signup records never carry an account;
 * account records always do.
 */
export const OtpRecordSchema = z.discriminatedUnion('kind', [
  OtpRecordBaseSchema.extend({ kind: z.literal('signup'), account: z.null() }),
  OtpRecordBaseSchema.extend({ kind: z.literal('account'), account: AccountRefSchema }),
])

export type OtpRecord = z.infer<typeof OtpRecordSchema>

export type OtpTarget = { kind: 'signup'; account: null } | { kind: 'account'; account: AccountRef }

export type PutOtpInput = OtpTarget & {
  email: string
  userClass: UserClass
  code: string
  ttlSeconds: number
}

/** Why a lookup found nothing usable. Audit-only; callers never see it. */
export type LookupMissReason = 'NOT_FOUND' | 'CODE_MISMATCH' | 'EXPIRED' | 'ALREADY_VERIFIED'

export type FindValidOutcome = { found: true; record: OtpRecord } | { found: false; reason: LookupMissReason }

export type StoreError =
  | { code: 'STORE_UNAVAILABLE'; message: string; cause?: unknown }
  | { code: 'CONFLICT'; message: string }

export type StoreResult<T> = { success: true; data: T } | { success: false; error: StoreError }

export type OtpResult<T, E extends OtpError = OtpError> = { success: true; data: T } | { success: false; error: E }

export type OtpError =
  | { code: 'STORE_UNAVAILABLE'; message: string }
  | { code: 'INVALID_CODE'; message: string }
  | { code: 'FORCED_CODE_NOT_ALLOWED'; message: string }
  | { code: 'INVALID_FORCED_CODE'; message: string }
  | { code: 'INVALID_TTL'; message: string }

export type IssueOtpError = Extract<
  OtpError,
  { code: 'STORE_UNAVAILABLE' | 'FORCED_CODE_NOT_ALLOWED' | 'INVALID_FORCED_CODE' | 'INVALID_TTL' }
>

export type VerifyOtpError = Extract<OtpError, { code: 'STORE_UNAVAILABLE' | 'INVALID_CODE' }>

export type MaintenanceError = Extract<OtpError, { code: 'STORE_UNAVAILABLE' }>

export type IssuedOtp = OtpTarget & {
  code: string
  expiresAt: number
}

export type VerifiedOtp = OtpTarget

export interface IssueOtpOptions {
  /** Must be positive and finite; anything else is rejected with INVALID_TTL. */
  ttlSeconds?: number
  /** Test/ops override. Refused in production. */
  forcedCode?: string
}

export interface OtpLifecycleOptions {
  env: PassgateEnvironment
  bypassCode?: string
  ttlSeconds?: number
  codeLength?: number
}

export type { AccountRef, OtpKind, UserClass }
