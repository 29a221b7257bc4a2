export * from './audit/auditSink'
export * from './config/loadServerConfig'
export * from './createPassgate'
export * from './delivery/smtpDeliveryGateway'
export * from './delivery/types'
export * from './logging/logger'
export * from './otp/clock'
export * from './otp/codeGenerator'
export * from './otp/identityResolver'
export * from './otp/otpCleanupScheduler'
export * from './otp/otpLifecycleManager'
export * from './otp/otpStore'
export * from './otp/types'
export * from './redis/redisClient'
export * from './redis/types'
export * from './redis/withKeyPrefix'
