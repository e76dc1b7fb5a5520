/** Outbound event names, used as EventEmitter2 event keys and broker routing keys. */
export const RaffleEvents = {
  RAFFLE_ACTIVATED: 'raffle.activated',
  TICKETS_ISSUED: 'raffle.tickets.issued',
  TICKET_ISSUANCE_FAILED: 'raffle.tickets.issuance-failed',
  DRAW_COMPLETED: 'raffle.draw.completed',
  WINNER_SELECTED: 'raffle.winner.selected',
} as const;

/** Inbound event names consumed from upstream services. */
export const InboundEvents = {
  TICKETS_GENERATED: 'raffle.tickets.generated',
  AD_ENGAGEMENT_QUALIFIED: 'ad.engagement.qualified',
} as const;
