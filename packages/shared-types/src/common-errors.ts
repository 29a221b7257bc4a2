import { z } from 'zod'

/**
 * Helper to define an error schema with a literal error code.
 * Used across all domain error registries for consistency.
 *
 * @example
 * const MyDomainErrors = {
 *   MY_ERROR: makeError('MY_ERROR', { someField: z.string() }),
 * }
 */
export const makeError = <Code extends string, Shape extends z.ZodRawShape>(
    code: Code,
    shape: Shape,
) =>
    z.object({
        error: z.literal(code),
        ...shape,
    })

/**
 * Errors shared by every passgate endpoint, independent of the OTP domain.
 */
export const CommonErrorSchemas = {
    /**
     * Request body failed Zod validation.
     * Returned with HTTP 400.
     */
    VALIDATION_ERROR: makeError('VALIDATION_ERROR', {
        message: z.string(),
        details: z.unknown(),
    }),

    /**
     * Server encountered an unexpected error.
     * Returned with HTTP 500.
     */
    INTERNAL_ERROR: makeError('INTERNAL_ERROR', {
        message: z.string(),
        requestId: z.string().optional(),
    }),
} as const
