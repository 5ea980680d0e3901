/**
 * Centralized Redis key patterns.
 * All keys and TTLs defined here for consistency.
 */
export const RedisKeys = {
  // Follow-up session (SEPARATE keys, different lifetimes)
  followUpPending: (userId: string) => `followup:${userId}:pending`,
  followUpNewAccount: (userId: string) => `followup:${userId}:new-account`,

  // Turn serialization
  lock: (userId: string) => `lock:${userId}`,
};

/**
 * TTL constants in seconds
 */
export const RedisTTL = {
  FOLLOW_UP_PENDING: 600, // 10 minutes
  FOLLOW_UP_NEW_ACCOUNT: 7 * 24 * 3600, // 7 days
  LOCK: 30, // 30 seconds, longer than an interpreter call
};
