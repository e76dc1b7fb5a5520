import { PrizeType } from '../../raffles/domain/prize';

export enum NotificationStatus {
  PENDING = 'pending',
  SENT = 'sent',
  FAILED = 'failed',
}

export enum ClaimStatus {
  PENDING_CLAIM = 'pending_claim',
  CLAIMED = 'claimed',
  EXPIRED = 'expired',
}

export enum DeliveryStatus {
  NOT_STARTED = 'not_started',
  IN_TRANSIT = 'in_transit',
  DELIVERED = 'delivered',
}

/** Prize as it was when the winner was drawn. */
export interface PrizeSnapshot {
  readonly name: string;
  readonly description: string;
  readonly type: PrizeType;
  readonly value: number;
  readonly tier: number;
}

export interface Winner {
  readonly id: string;
  readonly raffleId: string;
  readonly prizeId: string;
  readonly prize: PrizeSnapshot;
  readonly ticketId: string;
  readonly ticketNumber: string;
  readonly userId: string;
  readonly drawNumber: number;
  /** 1-based order in which the winner was picked. */
  readonly position: number;
  readonly seed: string;
  readonly algorithm: string;
  readonly notificationStatus: NotificationStatus;
  readonly claimStatus: ClaimStatus;
  readonly deliveryStatus: DeliveryStatus;
  readonly selectedAt: Date;
}
