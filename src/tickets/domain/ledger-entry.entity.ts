import { TicketSource } from './ticket.entity';

export enum LedgerEntryKind {
  ISSUE = 'issue',
  TRANSFER_IN = 'transfer_in',
  TRANSFER_OUT = 'transfer_out',
  REVOKE = 'revoke',
}

/** Ledger sources beyond the upstream issuance sources. */
export enum LedgerAdjustmentSource {
  TRANSFER = 'transfer',
  REVOCATION = 'revocation',
}

export type LedgerSource = TicketSource | LedgerAdjustmentSource;

/**
 * Append-only movement of a user's tickets in one raffle. A user's balance is
 * the sum of their deltas.
 */
export interface LedgerEntry {
  readonly id: string;
  readonly userId: string;
  readonly raffleId: string;
  readonly delta: number;
  readonly resultingBalance: number;
  readonly kind: LedgerEntryKind;
  readonly source: LedgerSource;
  /** Unique together with `source`. */
  readonly sourceReference: string;
  readonly causationId?: string;
  readonly ticketIds: readonly string[];
  readonly createdAt: Date;
}

export interface LedgerSummary {
  readonly netTickets: number;
  /** Users whose balance is above zero. */
  readonly participants: number;
}
