import assert from 'node:assert/strict'
import { test } from 'node:test'

import { RedisOtpStore } from '../src/otp/otpStore'
import { withKeyPrefix } from '../src/redis/withKeyPrefix'
import { FakeClock } from './fakeClock'
import { FakeRedis } from './fakeRedis'
import { silentLogger } from './helpers'

const setup = (options: { retainVerified?: boolean; sweepBatchSize?: number } = {}) => {
  const redis = new FakeRedis()
  const clock = new FakeClock()
  const store = new RedisOtpStore(redis, { clock, logger: silentLogger, ...options })
  return { redis, clock, store }
}

test('RedisOtpStore.put stores a normalized record and indexes its expiry', async () => {
  const { redis, clock, store } = setup()

  const put = await store.put({
    kind: 'signup',
    account: null,
    email: '  User@Example.com ',
    userClass: 'live',
    code: '123456',
    ttlSeconds: 300,
  })
  assert.equal(put.success, true)
  if (!put.success) return

  assert.equal(put.data.email, 'user@example.com')
  assert.equal(put.data.verified, false)
  assert.equal(put.data.verifiedAt, null)
  assert.equal(put.data.expiresAt, clock.now() + 300_000)
  assert.deepEqual(redis.keys(), ['otp:signup:live:user@example.com'])
  assert.equal(redis.score('otp-expiry', 'otp:signup:live:user@example.com'), clock.now() + 300_000)
})

test('RedisOtpStore.put replaces the previous record for the same scope', async () => {
  const { redis, store } = setup()

  await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '111111', ttlSeconds: 60 })
  await store.put({ kind: 'signup', account: null, email: 'A@x.com', userClass: 'live', code: '222222', ttlSeconds: 60 })

  assert.deepEqual(redis.keys(), ['otp:signup:live:a@x.com'])

  const old = await store.findValid('signup', 'a@x.com', 'live', '111111')
  assert.deepEqual(old, { success: true, data: { found: false, reason: 'CODE_MISMATCH' } })

  const current = await store.findValid('signup', 'a@x.com', 'live', '222222')
  assert.equal(current.success && current.data.found, true)
})

test('RedisOtpStore.put rejects an account from another user class', async () => {
  const { store } = setup()

  await assert.rejects(
    store.put({
      kind: 'account',
      account: { userClass: 'demo', accountId: '7' },
      email: 'a@x.com',
      userClass: 'live',
      code: '123456',
      ttlSeconds: 60,
    }),
    /Account 7 is demo, not live/
  )
})

test('RedisOtpStore.findValid reports why nothing usable was found', async () => {
  const { clock, store } = setup({ retainVerified: true })

  const missing = await store.findValid('signup', 'a@x.com', 'live', '123456')
  assert.deepEqual(missing, { success: true, data: { found: false, reason: 'NOT_FOUND' } })

  const put = await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '123456', ttlSeconds: 60 })
  assert.equal(put.success, true)
  if (!put.success) return

  const marked = await store.markVerified(put.data)
  assert.equal(marked.success, true)

  const verified = await store.findValid('signup', 'a@x.com', 'live', '123456')
  assert.deepEqual(verified, { success: true, data: { found: false, reason: 'ALREADY_VERIFIED' } })

  await store.put({ kind: 'signup', account: null, email: 'b@x.com', userClass: 'live', code: '654321', ttlSeconds: 60 })
  clock.advanceBy(60_000)

  const expired = await store.findValid('signup', 'b@x.com', 'live', '654321')
  assert.deepEqual(expired, { success: true, data: { found: false, reason: 'EXPIRED' } })
})

test('RedisOtpStore.findValid treats a corrupt entry as not found and leaves it in place', async () => {
  const { redis, store } = setup()

  redis.rawSet('otp:signup:live:a@x.com', 'not-json')
  const result = await store.findValid('signup', 'a@x.com', 'live', '123456')
  assert.deepEqual(result, { success: true, data: { found: false, reason: 'NOT_FOUND' } })
  assert.deepEqual(redis.keys(), ['otp:signup:live:a@x.com'])

  redis.rawSet('otp:signup:live:a@x.com', JSON.stringify({ code: '123456' }))
  const invalidShape = await store.findValid('signup', 'a@x.com', 'live', '123456')
  assert.deepEqual(invalidShape, { success: true, data: { found: false, reason: 'NOT_FOUND' } })
})

test('RedisOtpStore.markVerified succeeds once and then reports a conflict', async () => {
  const { redis, store } = setup()

  const put = await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'demo', code: '123456', ttlSeconds: 60 })
  assert.equal(put.success, true)
  if (!put.success) return

  const first = await store.markVerified(put.data)
  assert.deepEqual(first, { success: true, data: undefined })
  assert.deepEqual(redis.keys(), [])
  assert.equal(redis.score('otp-expiry', 'otp:signup:demo:a@x.com'), undefined)

  const second = await store.markVerified(put.data)
  assert.equal(second.success, false)
  if (second.success) return
  assert.equal(second.error.code, 'CONFLICT')
})

test('RedisOtpStore.markVerified refuses a record that was replaced after lookup', async () => {
  const { store } = setup()

  const first = await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '111111', ttlSeconds: 60 })
  assert.equal(first.success, true)
  if (!first.success) return

  await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '222222', ttlSeconds: 60 })

  const marked = await store.markVerified(first.data)
  assert.equal(marked.success, false)
  if (marked.success) return
  assert.equal(marked.error.code, 'CONFLICT')

  const current = await store.findValid('signup', 'a@x.com', 'live', '222222')
  assert.equal(current.success && current.data.found, true)
})

test('RedisOtpStore.markVerified keeps a flagged record when retainVerified is set', async () => {
  const { redis, clock, store } = setup({ retainVerified: true })

  const put = await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '123456', ttlSeconds: 60 })
  assert.equal(put.success, true)
  if (!put.success) return

  clock.advanceBy(5_000)
  await store.markVerified(put.data)

  const raw = await redis.get('otp:signup:live:a@x.com')
  assert.notEqual(raw, null)
  const stored: unknown = JSON.parse(raw ?? '')
  assert.deepEqual(stored, { ...put.data, verified: true, verifiedAt: put.data.createdAt + 5_000 })
})

test('RedisOtpStore records expire in Redis on their own, retained records included', async () => {
  const clock = new FakeClock()
  const redis = new FakeRedis(clock)
  const store = new RedisOtpStore(redis, { clock, logger: silentLogger, retainVerified: true })
  const key = 'otp:signup:live:a@x.com'

  const put = await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '123456', ttlSeconds: 60 })
  assert.equal(put.success, true)
  if (!put.success) return
  assert.equal(redis.expiresAt(key), put.data.expiresAt)

  assert.deepEqual(await store.markVerified(put.data), { success: true, data: undefined })
  assert.equal(redis.expiresAt(key), put.data.expiresAt)

  clock.advanceBy(60_000)
  assert.deepEqual(redis.keys(), [])
  assert.deepEqual(await store.findValid('signup', 'a@x.com', 'live', '123456'), {
    success: true,
    data: { found: false, reason: 'NOT_FOUND' },
  })

  // Only the index entry is left for the sweep.
  assert.equal(redis.indexSize('otp-expiry'), 1)
  assert.deepEqual(await store.deleteExpired(clock.now()), { success: true, data: 1 })
  assert.equal(redis.indexSize('otp-expiry'), 0)
})

test('RedisOtpStore.deleteExpired removes only records whose expiry has passed', async () => {
  const { redis, clock, store } = setup()

  await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '111111', ttlSeconds: 60 })
  await store.put({ kind: 'signup', account: null, email: 'b@x.com', userClass: 'live', code: '222222', ttlSeconds: 60 })
  clock.advanceBy(61_000)

  // Renewed after expiry: must survive the sweep.
  await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '333333', ttlSeconds: 60 })

  const deleted = await store.deleteExpired(clock.now())
  assert.deepEqual(deleted, { success: true, data: 1 })
  assert.deepEqual(redis.keys(), ['otp:signup:live:a@x.com'])
})

test('RedisOtpStore.deleteExpired includes records expiring exactly at the cutoff', async () => {
  const { redis, clock, store } = setup()

  await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '111111', ttlSeconds: 60 })

  const early = await store.deleteExpired(clock.now() + 59_999)
  assert.deepEqual(early, { success: true, data: 0 })

  const exact = await store.deleteExpired(clock.now() + 60_000)
  assert.deepEqual(exact, { success: true, data: 1 })
  assert.deepEqual(redis.keys(), [])
})

test('RedisOtpStore.deleteExpired sweeps in batches until nothing is due', async () => {
  const { redis, clock, store } = setup({ sweepBatchSize: 2 })

  for (const email of ['a@x.com', 'b@x.com', 'c@x.com', 'd@x.com', 'e@x.com']) {
    await store.put({ kind: 'signup', account: null, email, userClass: 'demo', code: '123456', ttlSeconds: 1 })
  }
  clock.advanceBy(1_000)

  const deleted = await store.deleteExpired(clock.now())
  assert.deepEqual(deleted, { success: true, data: 5 })
  assert.deepEqual(redis.keys(), [])
})

test('RedisOtpStore.revokeScope removes both kinds for one scope only', async () => {
  const { redis, store } = setup()

  await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '111111', ttlSeconds: 60 })
  await store.put({
    kind: 'account',
    account: { userClass: 'live', accountId: '42' },
    email: 'a@x.com',
    userClass: 'live',
    code: '222222',
    ttlSeconds: 60,
  })
  await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'demo', code: '333333', ttlSeconds: 60 })

  const revoked = await store.revokeScope('A@X.com', 'live')
  assert.deepEqual(revoked, { success: true, data: 2 })
  assert.deepEqual(redis.keys(), ['otp:signup:demo:a@x.com'])
})

test('RedisOtpStore surfaces Redis failures as STORE_UNAVAILABLE', async () => {
  const { redis, store } = setup()
  redis.setUnavailable(true)

  const put = await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '123456', ttlSeconds: 60 })
  assert.equal(put.success, false)
  if (put.success) return
  assert.equal(put.error.code, 'STORE_UNAVAILABLE')

  const lookup = await store.findValid('signup', 'a@x.com', 'live', '123456')
  assert.equal(lookup.success, false)

  const swept = await store.deleteExpired(Date.now())
  assert.equal(swept.success, false)
})

test('RedisOtpStore works behind a key prefix', async () => {
  const redis = new FakeRedis()
  const clock = new FakeClock()
  const store = new RedisOtpStore(withKeyPrefix(redis, 'passgate'), { clock })

  await store.put({ kind: 'signup', account: null, email: 'a@x.com', userClass: 'live', code: '123456', ttlSeconds: 10 })
  assert.deepEqual(redis.keys(), ['passgate:otp:signup:live:a@x.com'])
  assert.equal(redis.score('passgate:otp-expiry', 'passgate:otp:signup:live:a@x.com'), clock.now() + 10_000)

  clock.advanceBy(10_000)
  const deleted = await store.deleteExpired(clock.now())
  assert.deepEqual(deleted, { success: true, data: 1 })
  assert.deepEqual(redis.keys(), [])
})
