import { PassgateServerConfigSchema, type PassgateServerConfig } from '@passgate/shared-types'
import type { Logger } from 'pino'
import { createPinoAuditSink, type OtpAuditSink } from './audit/auditSink'
import { SmtpDeliveryGateway } from './delivery/smtpDeliveryGateway'
import type { OtpDeliveryGateway } from './delivery/types'
import { createLogger } from './logging/logger'
import type { Clock } from './otp/clock'
import type { CodeGenerator } from './otp/codeGenerator'
import type { SignupIdentityResolver } from './otp/identityResolver'
import { OtpCleanupScheduler } from './otp/otpCleanupScheduler'
import { OtpLifecycleManager } from './otp/otpLifecycleManager'
import { RedisOtpStore } from './otp/otpStore'
import { createRedisClientFromConfig } from './redis/redisClient'
import type { RedisLike } from './redis/types'

export interface CreatePassgateOptions {
  resolver: SignupIdentityResolver
  /** Defaults to an ioredis client built from `config.redis`. */
  redis?: RedisLike
  delivery?: OtpDeliveryGateway
  logger?: Logger
  auditSink?: OtpAuditSink
  clock?: Clock
  generator?: CodeGenerator
}

export interface Passgate {
  manager: OtpLifecycleManager
  store: RedisOtpStore
  delivery: OtpDeliveryGateway | null
  cleanup: OtpCleanupScheduler | null
  logger: Logger
  close: () => Promise<void>
}

/**
 * Wires the OTP primitives from a validated config. The cleanup scheduler is
 * created but not started; call `cleanup.start()` once the host is ready.
 */
export const createPassgate = (config: PassgateServerConfig, options: CreatePassgateOptions): Passgate => {
  const parsed = PassgateServerConfigSchema.parse(config)
  const logger = options.logger ?? createLogger({ env: parsed.env, level: parsed.logLevel })
  const redis = options.redis ?? createRedisClientFromConfig(parsed)

  const store = new RedisOtpStore(redis, {
    clock: options.clock,
    logger,
    retainVerified: parsed.otp?.retainVerified,
  })

  const manager = new OtpLifecycleManager(
    {
      store,
      resolver: options.resolver,
      generator: options.generator,
      clock: options.clock,
      auditSink: options.auditSink ?? createPinoAuditSink(logger),
      logger,
    },
    {
      env: parsed.env,
      ttlSeconds: parsed.otp?.ttlSeconds,
      codeLength: parsed.otp?.codeLength,
      bypassCode: parsed.otp?.bypassCode,
    }
  )

  const delivery = options.delivery ?? (parsed.smtp ? SmtpDeliveryGateway.fromConfig(parsed.smtp, logger) : null)

  const cleanup =
    parsed.cleanup?.enabled === false
      ? null
      : new OtpCleanupScheduler({ manager, logger, schedule: parsed.cleanup?.schedule })

  return {
    manager,
    store,
    delivery,
    cleanup,
    logger,
    close: async () => {
      cleanup?.stop()
      await redis.quit()
    },
  }
}
