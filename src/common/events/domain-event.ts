import { randomUUID } from 'crypto';

export interface DomainEvent<TType extends string = string, TPayload = unknown> {
  readonly eventId: string;
  readonly type: TType;
  readonly occurredAt: Date;
  /** Id of the inbound event or command that caused this one. */
  readonly causationId?: string;
  readonly payload: TPayload;
}

export function domainEvent<TType extends string, TPayload>(
  type: TType,
  payload: TPayload,
  occurredAt: Date,
  causationId?: string,
): DomainEvent<TType, TPayload> {
  return { eventId: randomUUID(), type, occurredAt, causationId, payload };
}
