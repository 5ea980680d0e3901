import { Injectable, Logger } from '@nestjs/common';
import { RedisService, RedisKeys, RedisTTL } from '../redis';
import { debugLog } from '../common/utils/debug-logger';
import { parseFollowUpSession } from './event-guardrails.service';
import { FollowUpSession, emptySession } from './follow-up.types';

/**
 * Follow-up session storage.
 *
 * Manages two separate Redis keys per user:
 * - `followup:{userId}:pending` - descriptor + co-pending batch (10m TTL)
 * - `followup:{userId}:new-account` - batch waiting for a new account (7d TTL)
 *
 * Redis failures never break a turn: reads fall back to an empty session,
 * failed writes are logged and dropped.
 */
@Injectable()
export class FollowUpSessionService {
  private readonly log = new Logger(FollowUpSessionService.name);

  constructor(private readonly redis: RedisService) {}

  async load(userId: string): Promise<FollowUpSession> {
    try {
      const [pending, stash] = await Promise.all([
        this.redis.get(RedisKeys.followUpPending(userId)),
        this.redis.get(RedisKeys.followUpNewAccount(userId)),
      ]);
      if (!pending && !stash) return emptySession();

      const session = parseFollowUpSession(
        parseJson(pending),
        parseJson(stash),
      );
      if (!session) {
        this.log.warn(`[load] Discarding unreadable session for user ${userId}`);
        return emptySession();
      }
      return session;
    } catch (err) {
      this.log.warn(`[load] Redis error for user ${userId}`, err);
      return emptySession();
    }
  }

  async save(userId: string, session: FollowUpSession): Promise<void> {
    try {
      await Promise.all([
        this.savePending(userId, session),
        this.saveStash(userId, session),
      ]);
      debugLog.store.state('Session saved', {
        userId,
        pending: session.pendingPartialData?.originalIntent ?? null,
        copending: session.pendingEvents.length,
        stashed: session.pendingTransactionsForNewAccount.length,
      });
    } catch (err) {
      this.log.warn(`[save] Redis error for user ${userId}`, err);
    }
  }

  async clear(userId: string): Promise<void> {
    try {
      await Promise.all([
        this.redis.del(RedisKeys.followUpPending(userId)),
        this.redis.del(RedisKeys.followUpNewAccount(userId)),
      ]);
    } catch (err) {
      this.log.warn(`[clear] Redis error for user ${userId}`, err);
    }
  }

  private async savePending(userId: string, session: FollowUpSession) {
    const key = RedisKeys.followUpPending(userId);
    if (!session.pendingPartialData && session.pendingEvents.length === 0) {
      await this.redis.del(key);
      return;
    }
    await this.redis.set(
      key,
      JSON.stringify({
        pendingPartialData: session.pendingPartialData,
        pendingEvents: session.pendingEvents,
      }),
      RedisTTL.FOLLOW_UP_PENDING,
    );
  }

  private async saveStash(userId: string, session: FollowUpSession) {
    const key = RedisKeys.followUpNewAccount(userId);
    if (session.pendingTransactionsForNewAccount.length === 0) {
      await this.redis.del(key);
      return;
    }
    await this.redis.set(
      key,
      JSON.stringify({
        pendingTransactionsForNewAccount: session.pendingTransactionsForNewAccount,
      }),
      RedisTTL.FOLLOW_UP_NEW_ACCOUNT,
    );
  }
}

function parseJson(json: string | null): unknown {
  return json ? JSON.parse(json) : null;
}
