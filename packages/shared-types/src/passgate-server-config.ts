import { z } from 'zod'

import { OTP_CODE_LENGTH } from './otp'

/**
 * Shared configuration schema for the server-side passgate primitives.
 *
 * Framework-agnostic: the host reads env vars (or any other source),
 * validates into this schema, then wires the SDK primitives.
 */

export const PASSGATE_ENVIRONMENTS = ['production', 'development', 'test'] as const

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
export type LogLevel = z.infer<typeof LogLevelSchema>

export const PassgateOtpConfigSchema = z
    .object({
        ttlSeconds: z.number().int().positive().optional(),
        codeLength: z.number().int().min(4).max(12).optional(),
        retainVerified: z.boolean().optional(),
        bypassCode: z.string().regex(/^\d+$/).optional(),
    })
    .strict()
    .refine(
        (otp) => otp.bypassCode === undefined || otp.bypassCode.length === (otp.codeLength ?? OTP_CODE_LENGTH),
        { message: 'bypassCode must have codeLength digits', path: ['bypassCode'] },
    )

export type PassgateOtpConfig = z.infer<typeof PassgateOtpConfigSchema>

export const PassgateSmtpConfigSchema = z
    .object({
        host: z.string().min(1),
        port: z.number().int().positive(),
        username: z.string().min(1).optional(),
        password: z.string().min(1).optional(),
        from: z.string().min(1),
        secure: z.boolean().optional(),
    })
    .strict()

export type PassgateSmtpConfig = z.infer<typeof PassgateSmtpConfigSchema>

export const PassgateServerConfigSchema = z
    .object({
        env: z.enum(PASSGATE_ENVIRONMENTS),

        redis: z
            .object({
                url: z.string().min(1).optional(),
                keyPrefix: z.string().min(1).optional(),
            })
            .strict(),

        otp: PassgateOtpConfigSchema.optional(),

        cleanup: z
            .object({
                enabled: z.boolean().optional(),
                schedule: z.string().min(1).optional(),
            })
            .strict()
            .optional(),

        smtp: PassgateSmtpConfigSchema.optional(),

        logLevel: LogLevelSchema.optional(),
    })
    .strict()

export type PassgateServerConfig = z.infer<typeof PassgateServerConfigSchema>
export type PassgateEnvironment = PassgateServerConfig['env']
