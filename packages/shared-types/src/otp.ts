import { z } from 'zod'

import { OtpErrorSchemas } from './otp-errors'

// ============================================
// Common OTP Schemas
// ============================================

export const OTP_CODE_LENGTH = 6 as const

/**
 * User class - live for production users, demo for sandbox users.
 * OTP scopes never cross classes.
 */
export const UserClassSchema = z.enum(['live', 'demo'])
export type UserClass = z.infer<typeof UserClassSchema>

/**
 * OTP record kind
 * - signup: issued before any account exists for the email
 * - account: bound to an existing account awaiting activation or reset
 */
export const OtpKindSchema = z.enum(['signup', 'account'])
export type OtpKind = z.infer<typeof OtpKindSchema>

export const AccountRefSchema = z.object({
    userClass: UserClassSchema,
    accountId: z.string().min(1),
})
export type AccountRef = z.infer<typeof AccountRefSchema>

/**
 * Numeric code of exactly `length` digits. Servers configured with a
 * non-default `otp.codeLength` must validate with the matching length.
 */
export const createOtpCodeSchema = (length: number = OTP_CODE_LENGTH) =>
    z.string().regex(/^\d+$/, 'Code must be numeric').length(length)

export const OtpCodeSchema = createOtpCodeSchema()

// ============================================
// Request OTP
// ============================================

export const OtpRequestSchema = z.object({
    email: z.email(),
    userClass: UserClassSchema,
})
export type OtpRequest = z.infer<typeof OtpRequestSchema>

/**
 * The code itself is never part of the response; it only travels by email.
 */
export const OtpRequestResponseSchema = z.object({
    success: z.boolean(),
    expiresAt: z.number(),
    message: z.string(),
})
export type OtpRequestResponse = z.infer<typeof OtpRequestResponseSchema>

export const OtpRequestErrorSchema = z.discriminatedUnion('error', [
    OtpErrorSchemas.VALIDATION_ERROR,
    OtpErrorSchemas.STORE_UNAVAILABLE,
    OtpErrorSchemas.DELIVERY_FAILED,
    OtpErrorSchemas.FORCED_CODE_NOT_ALLOWED,
    OtpErrorSchemas.INVALID_FORCED_CODE,
    OtpErrorSchemas.INVALID_TTL,
])
export type OtpRequestError = z.infer<typeof OtpRequestErrorSchema>

// ============================================
// Verify OTP
// ============================================

export const createOtpVerifySchema = (codeLength: number = OTP_CODE_LENGTH) =>
    z.object({
        email: z.email(),
        userClass: UserClassSchema,
        code: createOtpCodeSchema(codeLength),
    })

export const OtpVerifySchema = createOtpVerifySchema()
export type OtpVerify = z.infer<typeof OtpVerifySchema>

/**
 * Verify response
 * - kind 'signup': caller creates the account next
 * - kind 'account': caller activates (or resets) the referenced account
 */
export const OtpVerifyResponseSchema = z.discriminatedUnion('kind', [
    z.object({
        success: z.literal(true),
        kind: z.literal('signup'),
        account: z.null(),
    }),
    z.object({
        success: z.literal(true),
        kind: z.literal('account'),
        account: AccountRefSchema,
    }),
])
export type OtpVerifyResponse = z.infer<typeof OtpVerifyResponseSchema>

export const OtpVerifyErrorSchema = z.discriminatedUnion('error', [
    OtpErrorSchemas.VALIDATION_ERROR,
    OtpErrorSchemas.INVALID_CODE,
    OtpErrorSchemas.STORE_UNAVAILABLE,
])
export type OtpVerifyError = z.infer<typeof OtpVerifyErrorSchema>
