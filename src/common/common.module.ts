import { Global, Module } from '@nestjs/common';
import { CLOCK, SystemClock } from './clock';
import { EVENT_PUBLISHER, EventEmitterPublisher } from './events/event-publisher';

@Global()
@Module({
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    { provide: EVENT_PUBLISHER, useClass: EventEmitterPublisher },
  ],
  exports: [CLOCK, EVENT_PUBLISHER],
})
export class CommonModule {}
