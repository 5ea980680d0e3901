import { Global, Module } from '@nestjs/common';
import { RedisHealthIndicator } from './redis.health';
import { RedisService } from './redis.service';

/**
 * Global Redis module providing the store and its health check.
 */
@Global()
@Module({
  providers: [RedisService, RedisHealthIndicator],
  exports: [RedisService, RedisHealthIndicator],
})
export class RedisModule {}
