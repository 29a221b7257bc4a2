import Redis from 'ioredis'
import { PassgateServerConfigSchema, type PassgateServerConfig } from '@passgate/shared-types'
import {
  DEL_INDEXED_SCRIPT,
  RETIRE_IF_UNVERIFIED_SCRIPT,
  SET_INDEXED_SCRIPT,
  SWEEP_INDEXED_SCRIPT,
} from './scripts'
import type { RedisLike } from './types'
import { withKeyPrefix } from './withKeyPrefix'

export interface CreateRedisClientOptions {
  url?: string
  keyPrefix?: string
}

/**
 * Default Redis URL for local development.
 */
export const getDefaultRedisUrl = (): string => 'redis://localhost:6379'

const toCount = (reply: unknown): number => (typeof reply === 'number' ? reply : Number(reply) || 0)

export const createRedisClient = (options: CreateRedisClientOptions = {}): RedisLike => {
  const url = options.url ?? process.env.REDIS_URL ?? getDefaultRedisUrl()

  // Commands fail fast instead of queueing while disconnected; the caller
  // sees STORE_UNAVAILABLE and decides whether to retry.
  const client = new Redis(url, {
    retryStrategy: (times) => {
      if (times > 10) return null
      return Math.min(times * 100, 3000)
    },
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: false,
  })

  const redis: RedisLike = {
    get: (key) => client.get(key),
    setIndexed: async (key, indexKey, value, score) => {
      await client.eval(SET_INDEXED_SCRIPT, 2, key, indexKey, value, String(score), String(Math.ceil(score)))
    },
    retireIfUnverified: async (key, indexKey, expectedId, replacement) =>
      toCount(await client.eval(RETIRE_IF_UNVERIFIED_SCRIPT, 2, key, indexKey, expectedId, replacement ?? '')),
    sweepIndexed: async (indexKey, maxScore, limit) =>
      toCount(await client.eval(SWEEP_INDEXED_SCRIPT, 1, indexKey, String(maxScore), String(limit))),
    delIndexed: async (keys, indexKey) => {
      if (keys.length === 0) return 0
      return toCount(await client.eval(DEL_INDEXED_SCRIPT, keys.length + 1, ...keys, indexKey))
    },
    quit: () => client.quit(),
  }

  return options.keyPrefix ? withKeyPrefix(redis, options.keyPrefix) : redis
}

export const createRedisClientFromConfig = (config: PassgateServerConfig): RedisLike => {
  const parsed = PassgateServerConfigSchema.parse(config)
  return createRedisClient({
    url: parsed.redis.url,
    keyPrefix: parsed.redis.keyPrefix,
  })
}
