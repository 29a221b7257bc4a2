import { PassgateServerConfigSchema, type PassgateServerConfig } from '@passgate/shared-types'

type Env = Record<string, string | undefined>

const envStr = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim()
  return value ? value : undefined
}

// Non-numeric input becomes NaN so the schema rejects it instead of silently defaulting.
const envInt = (env: Env, key: string): number | undefined => {
  const value = envStr(env, key)
  return value === undefined ? undefined : Number(value)
}

const envBool = (env: Env, key: string): boolean | undefined => {
  const value = envStr(env, key)
  if (value === undefined) return undefined
  return value.toLowerCase() === 'true' || value === '1'
}

/**
 * Reads the passgate server config from environment variables and validates
 * it. Throws a ZodError describing every invalid variable.
 */
export const loadServerConfigFromEnv = (env: Env = process.env): PassgateServerConfig => {
  const smtpHost = envStr(env, 'SMTP_HOST')

  return PassgateServerConfigSchema.parse({
    env: envStr(env, 'APP_ENV') ?? 'development',
    redis: {
      url: envStr(env, 'REDIS_URL'),
      keyPrefix: envStr(env, 'REDIS_KEY_PREFIX'),
    },
    otp: {
      ttlSeconds: envInt(env, 'OTP_TTL_SECONDS'),
      codeLength: envInt(env, 'OTP_CODE_LENGTH'),
      retainVerified: envBool(env, 'OTP_RETAIN_VERIFIED'),
      bypassCode: envStr(env, 'AUTH_BYPASS_CODE'),
    },
    cleanup: {
      enabled: envBool(env, 'OTP_CLEANUP_ENABLED'),
      schedule: envStr(env, 'OTP_CLEANUP_SCHEDULE'),
    },
    smtp: smtpHost
      ? {
          host: smtpHost,
          port: envInt(env, 'SMTP_PORT') ?? 587,
          username: envStr(env, 'SMTP_USERNAME'),
          password: envStr(env, 'SMTP_PASSWORD'),
          from: envStr(env, 'SMTP_FROM'),
          secure: envBool(env, 'SMTP_SECURE'),
        }
      : undefined,
    logLevel: envStr(env, 'LOG_LEVEL'),
  })
}
