import { Controller, Get } from '@nestjs/common';
import { RedisHealth, RedisHealthIndicator } from './redis/redis.health';

@Controller()
export class AppController {
  constructor(private readonly redisHealth: RedisHealthIndicator) {}

  @Get('health')
  async health(): Promise<{ status: 'ok' | 'degraded'; redis: RedisHealth }> {
    const { redis } = await this.redisHealth.check();
    return { status: redis.status === 'up' ? 'ok' : 'degraded', redis };
  }
}
