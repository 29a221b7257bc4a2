// Index members are the full (already prefixed) value keys, so the sweep can
// delete them without knowing the prefix. Record keys also carry a PXAT
// expiry, so Redis drops them even when no sweep runs (needs Redis >= 6.2).

export const SET_INDEXED_SCRIPT = `
redis.call('SET', KEYS[1], ARGV[1], 'PXAT', ARGV[3])
redis.call('ZADD', KEYS[2], ARGV[2], KEYS[1])
return 1
`

export const RETIRE_IF_UNVERIFIED_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then
  return 0
end
local ok, record = pcall(cjson.decode, current)
if not ok or type(record) ~= 'table' or record.id ~= ARGV[1] or record.verified == true then
  return 0
end
if ARGV[2] == '' then
  redis.call('DEL', KEYS[1])
  redis.call('ZREM', KEYS[2], KEYS[1])
else
  redis.call('SET', KEYS[1], ARGV[2], 'KEEPTTL')
end
return 1
`

export const SWEEP_INDEXED_SCRIPT = `
local members = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[1], 'LIMIT', 0, tonumber(ARGV[2]))
for _, member in ipairs(members) do
  redis.call('DEL', member)
  redis.call('ZREM', KEYS[1], member)
end
return #members
`

export const DEL_INDEXED_SCRIPT = `
local index = KEYS[#KEYS]
local removed = 0
for i = 1, #KEYS - 1 do
  removed = removed + redis.call('DEL', KEYS[i])
  redis.call('ZREM', index, KEYS[i])
end
return removed
`
