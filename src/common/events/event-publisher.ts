import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DomainEvent } from './domain-event';

export interface EventPublisher {
  publish(event: DomainEvent): void;
  publishAll(events: readonly DomainEvent[]): void;
}

export const EVENT_PUBLISHER = 'EVENT_PUBLISHER';

/**
 * Publishes on the in-process bus; a broker bridge subscribes to the same
 * event names.
 */
@Injectable()
export class EventEmitterPublisher implements EventPublisher {
  private readonly logger = new Logger(EventEmitterPublisher.name);

  constructor(private readonly eventEmitter: EventEmitter2) {}

  publish(event: DomainEvent): void {
    this.logger.debug(`Publishing ${event.type} (${event.eventId})`);
    this.eventEmitter.emit(event.type, event);
  }

  publishAll(events: readonly DomainEvent[]): void {
    events.forEach((event) => this.publish(event));
  }
}
