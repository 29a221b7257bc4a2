import type { RedisLike } from './types'

export const withKeyPrefix = (redis: RedisLike, keyPrefix: string): RedisLike => {
  const prefix = keyPrefix.endsWith(':') ? keyPrefix : `${keyPrefix}:`

  return {
    get: (key) => redis.get(`${prefix}${key}`),
    setIndexed: (key, indexKey, value, score) =>
      redis.setIndexed(`${prefix}${key}`, `${prefix}${indexKey}`, value, score),
    retireIfUnverified: (key, indexKey, expectedId, replacement) =>
      redis.retireIfUnverified(`${prefix}${key}`, `${prefix}${indexKey}`, expectedId, replacement),
    sweepIndexed: (indexKey, maxScore, limit) => redis.sweepIndexed(`${prefix}${indexKey}`, maxScore, limit),
    delIndexed: (keys, indexKey) =>
      redis.delIndexed(
        keys.map((key) => `${prefix}${key}`),
        `${prefix}${indexKey}`
      ),
    quit: () => redis.quit(),
  }
}
