import { z } from 'zod'

import { CommonErrorSchemas, makeError } from './common-errors'

/**
 * Error schemas for the OTP endpoints.
 *
 * `INVALID_CODE` deliberately carries no detail: wrong, expired, reused and
 * never-issued codes all look the same to the caller.
 */
export const OtpErrorSchemas = {
    VALIDATION_ERROR: CommonErrorSchemas.VALIDATION_ERROR,
    INTERNAL_ERROR: CommonErrorSchemas.INTERNAL_ERROR,

    STORE_UNAVAILABLE: makeError('STORE_UNAVAILABLE', {
        message: z.string(),
    }),

    INVALID_CODE: makeError('INVALID_CODE', {
        message: z.string(),
    }),

    DELIVERY_FAILED: makeError('DELIVERY_FAILED', {
        message: z.string(),
    }),

    FORCED_CODE_NOT_ALLOWED: makeError('FORCED_CODE_NOT_ALLOWED', {
        message: z.string(),
    }),

    INVALID_FORCED_CODE: makeError('INVALID_FORCED_CODE', {
        message: z.string(),
    }),

    /** Per-call ttlSeconds was not a positive finite number. */
    INVALID_TTL: makeError('INVALID_TTL', {
        message: z.string(),
    }),
} as const
