import { Module } from '@nestjs/common';
import { EventGuardrailsService } from './event-guardrails.service';
import { FollowUpSessionService } from './follow-up-session.service';
import { FollowUpManager } from './follow-up.manager';

@Module({
  providers: [
    // Plain class with default builders and handler
    { provide: FollowUpManager, useFactory: () => new FollowUpManager() },
    FollowUpSessionService,
    EventGuardrailsService,
  ],
  exports: [FollowUpManager, FollowUpSessionService, EventGuardrailsService],
})
export class FollowUpModule {}
