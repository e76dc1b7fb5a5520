import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { toHttpException } from '../../common/http-errors';
import { Result } from '../../common/result';
import { RaffleEngineError } from '../../common/errors';
import { DrawEngineService } from '../../draws/application/draw-engine.service';
import { formatTicketNumber } from '../../tickets/domain/ticket-number';
import { canBeTransferred } from '../../tickets/domain/ticket.entity';
import { TicketLedgerService } from '../../tickets/application/ticket-ledger.service';
import { RevokeTicketDto, TransferTicketDto } from '../application/dto/ticket-commands.dto';
import { RaffleOrchestratorService } from '../application/raffle-orchestrator.service';

function unwrapOrThrow<T>(result: Result<T, RaffleEngineError>): T {
  if (!result.ok) {
    throw toHttpException(result.error);
  }
  return result.value;
}

@Controller()
export class RaffleOperationsController {
  constructor(
    private readonly orchestrator: RaffleOrchestratorService,
    private readonly ticketLedger: TicketLedgerService,
    private readonly drawEngine: DrawEngineService,
  ) {}

  @Post('raffles/:id/draw')
  async triggerDraw(@Param('id') id: string) {
    const { raffle, outcome, shortfall } = unwrapOrThrow(await this.orchestrator.triggerDraw(id));
    return {
      raffleId: raffle.id,
      status: raffle.status,
      poolSize: outcome?.poolSize ?? 0,
      seed: outcome?.seed,
      merkleRoot: outcome?.merkleRoot,
      winners: (outcome?.winners ?? []).map((w) => ({
        position: w.position,
        userId: w.userId,
        ticketNumber: formatTicketNumber(w.ticketNumber),
        prizeId: w.prizeId,
        prizeName: w.prize.name,
      })),
      unawarded: outcome?.unawarded ?? [],
      warning: shortfall?.message,
    };
  }

  @Get('raffles/:id/users/:userId/tickets')
  async userTickets(@Param('id') raffleId: string, @Param('userId') userId: string) {
    const [balance, tickets, history] = await Promise.all([
      this.ticketLedger.getBalance(userId, raffleId),
      this.ticketLedger.findUserTickets(userId, raffleId),
      this.ticketLedger.history(userId, raffleId),
    ]);
    return {
      raffleId,
      userId,
      balance,
      tickets: tickets.map((ticket) => ({ ...ticket, transferable: canBeTransferred(ticket) })),
      history,
    };
  }

  @Get('users/:userId/winnings')
  async winnings(@Param('userId') userId: string) {
    const winners = await this.drawEngine.findWinningsOf(userId);
    return winners.map((w) => ({
      raffleId: w.raffleId,
      ticketNumber: formatTicketNumber(w.ticketNumber),
      prizeId: w.prizeId,
      prizeName: w.prize.name,
      prizeValue: w.prize.value,
      claimStatus: w.claimStatus,
      selectedAt: w.selectedAt,
    }));
  }

  @Get('tickets/by-number/:ticketNumber')
  async ticketByNumber(@Param('ticketNumber') ticketNumber: string) {
    return unwrapOrThrow(await this.ticketLedger.findByNumber(ticketNumber));
  }

  @Post('tickets/:ticketId/transfer')
  async transfer(@Param('ticketId') ticketId: string, @Body() dto: TransferTicketDto) {
    return unwrapOrThrow(
      await this.orchestrator.transferTicket({ ticketId, toUserId: dto.toUserId, reason: dto.reason }),
    );
  }

  @Post('tickets/:ticketId/revoke')
  async revoke(@Param('ticketId') ticketId: string, @Body() dto: RevokeTicketDto) {
    return unwrapOrThrow(
      await this.orchestrator.revokeTicket({ ticketId, status: dto.status, reason: dto.reason }),
    );
  }
}
