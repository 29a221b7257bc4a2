/**
 * The slice of Redis the OTP store needs. The `*Indexed` operations keep a
 * value key and its entry in a sorted-set index in step; each one runs as a
 * single atomic step on the server.
 */
export type RedisLike = {
  get: (key: string) => Promise<string | null>
  /** SET `key` to `value`, expiring at `score` (epoch ms), and score it in `indexKey`. */
  setIndexed: (key: string, indexKey: string, value: string, score: number) => Promise<void>
  /**
   * Retire the JSON record at `key` iff its `id` equals `expectedId` and it is
   * not yet `verified`: overwrite it with `replacement` (keeping its expiry), or delete it (and its
   * index entry) when `replacement` is null. Resolves 1 when retired, 0 when
   * the record is gone, replaced or already verified.
   */
  retireIfUnverified: (key: string, indexKey: string, expectedId: string, replacement: string | null) => Promise<number>
  /** Delete up to `limit` keys scored `<= maxScore` in `indexKey`, with their index entries. */
  sweepIndexed: (indexKey: string, maxScore: number, limit: number) => Promise<number>
  /** Delete `keys` and their index entries; resolves the number of keys that existed. */
  delIndexed: (keys: string[], indexKey: string) => Promise<number>
  quit: () => Promise<unknown>
}
