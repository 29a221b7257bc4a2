import pino, { type Logger } from 'pino'
import type { LogLevel, PassgateEnvironment } from '@passgate/shared-types'

export type { Logger }

export interface CreateLoggerOptions {
  env?: PassgateEnvironment
  level?: LogLevel
  name?: string
}

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  const env = options.env ?? 'development'

  return pino({
    name: options.name,
    level: options.level ?? (env === 'test' ? 'silent' : 'info'),
    transport: env === 'development' ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
    base: {
      service: 'passgate',
      env,
    },
  })
}
