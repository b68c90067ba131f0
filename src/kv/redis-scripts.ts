/**
 * Lua scripts for the Redis substrate
 */

/**
 * Writes one entry atomically: the revision counter, the entry hash and its
 * TTL change together, so concurrent writers to one key land in revision
 * order.
 *
 * KEYS[1]: kv:<bucket>:rev
 * KEYS[2]: kv:<bucket>:e:<key>
 *
 * ARGV[1]: value (base64)
 * ARGV[2]: created_ms
 * ARGV[3]: ttlMs
 *
 * Returns: the new revision
 */
export const PUT_ENTRY_SCRIPT = `
local revision = redis.call('INCR', KEYS[1])
redis.call('HSET', KEYS[2], 'value', ARGV[1], 'revision', tostring(revision), 'created_ms', ARGV[2])
redis.call('PEXPIRE', KEYS[2], ARGV[3])
return revision
`;
