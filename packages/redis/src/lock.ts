import { randomUUID } from 'node:crypto'

// KEYS[1] lock key, ARGV[1] owner token, ARGV[2] new ttl in ms, or "0" to delete.
const OWNED_LOCK_LUA = `
  if redis.call("get", KEYS[1]) ~= ARGV[1] then
    return 0
  end
  if ARGV[2] == "0" then
    return redis.call("del", KEYS[1])
  end
  return redis.call("pexpire", KEYS[1], ARGV[2])
`

export const DEFAULT_LOCK_TTL_MS = 120_000

/**
 * The commands a lock issues. An ioredis client satisfies it.
 */
export interface LockClient {
  set(key: string, value: string, mode: 'PX', ttlMs: number, condition: 'NX'): Promise<'OK' | null>
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>
}

/**
 * A key held under a random owner token until it expires. Only the owner
 * can extend or delete it.
 */
export class RedisLock {
  private constructor(
    private readonly client: LockClient,
    readonly key: string,
    readonly token: string,
    readonly ttlMs: number
  ) {}

  /**
   * Null when someone else holds the key.
   */
  static async acquire(client: LockClient, key: string, ttlMs = DEFAULT_LOCK_TTL_MS): Promise<RedisLock | null> {
    if (ttlMs <= 0) {
      throw new RangeError(`Lock ttl must be positive, got ${ttlMs}`)
    }
    const token = randomUUID()
    const reply = await client.set(key, token, 'PX', ttlMs, 'NX')
    return reply === 'OK' ? new RedisLock(client, key, token, ttlMs) : null
  }

  /** Expire ttlMs from now. False once the key expired or changed owner. */
  extend(): Promise<boolean> {
    return this.whileOwned(String(this.ttlMs))
  }

  release(): Promise<boolean> {
    return this.whileOwned('0')
  }

  private async whileOwned(ttl: string): Promise<boolean> {
    const reply = await this.client.eval(OWNED_LOCK_LUA, 1, this.key, this.token, ttl)
    return Number(reply) === 1
  }
}
