import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../../common/clock';
import { NotFoundError, RaffleEngineError, ValidationError } from '../../common/errors';
import { EVENT_PUBLISHER, EventPublisher } from '../../common/events/event-publisher';
import { toHttpException } from '../../common/http-errors';
import { Result } from '../../common/result';
import { DrawEngineService } from '../../draws/application/draw-engine.service';
import { generateServerSeed, hashServerSeed } from '../../draws/domain/fairness-seed';
import { formatTicketNumber } from '../../tickets/domain/ticket-number';
import { TicketLedgerService } from '../../tickets/application/ticket-ledger.service';
import { createPrizePool, totalPrizeValue } from '../domain/prize';
import {
  CreateRaffleInput,
  Raffle,
  RaffleStatus,
  createParticipationRules,
  createRaffle,
  remainingParticipantSlots,
} from '../domain/raffle.entity';
import { RAFFLE_REPOSITORY, RaffleRepository } from '../domain/raffle.repository';
import * as stateMachine from '../domain/raffle-state-machine';
import { CreateRaffleDto } from './dto/create-raffle.dto';
import { RaffleResponseDto, ReconciliationResponseDto } from './dto/raffle-response.dto';
import { RaffleActionDto, UpdateParticipationRulesDto, UpdatePrizePoolDto } from './dto/update-raffle.dto';
import { WinnerResponseDto } from './dto/winner-response.dto';

@Injectable()
export class RafflesService {
  private readonly logger = new Logger(RafflesService.name);

  constructor(
    @Inject(RAFFLE_REPOSITORY)
    private readonly raffleRepository: RaffleRepository,
    private readonly ticketLedger: TicketLedgerService,
    private readonly drawEngine: DrawEngineService,
    @Inject(EVENT_PUBLISHER)
    private readonly eventPublisher: EventPublisher,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  private toResponse(raffle: Raffle): RaffleResponseDto {
    const { schedule, participationRules, statistics, metadata, fairness } = raffle;
    return {
      id: raffle.id,
      name: raffle.name,
      description: raffle.description,
      type: raffle.type,
      status: raffle.status,
      registrationStart: schedule.registrationStart,
      registrationEnd: schedule.registrationEnd,
      drawDate: schedule.drawDate,
      minTicketsToParticipate: participationRules.minTicketsToParticipate,
      maxTicketsPerUser: participationRules.maxTicketsPerUser,
      maxParticipants: participationRules.maxParticipants,
      prizes: raffle.prizePool.map((prize) => ({ ...prize })),
      totalPrizeValue: totalPrizeValue(raffle.prizePool),
      eligibilityCriteria: raffle.eligibilityCriteria,
      currentParticipants: statistics.currentParticipants,
      remainingParticipantSlots: remainingParticipantSlots(raffle),
      totalTicketsIssued: statistics.totalTicketsIssued,
      totalTicketsRevoked: statistics.totalTicketsRevoked,
      winnersSelected: statistics.winnersSelected,
      oneWinPerUser: raffle.drawPolicy.oneWinPerUser,
      serverSeedHash: fairness?.serverSeedHash,
      serverSeed: raffle.status === RaffleStatus.COMPLETED ? fairness?.serverSeed : undefined,
      createdBy: metadata.createdBy,
      updatedBy: metadata.updatedBy,
      tags: [...metadata.tags],
      notes: metadata.notes,
      recreatedFrom: metadata.recreatedFrom,
      version: raffle.version,
      createdAt: raffle.createdAt,
      updatedAt: raffle.updatedAt,
    };
  }

  private unwrapOrThrow<T>(result: Result<T, RaffleEngineError>): T {
    if (!result.ok) {
      throw toHttpException(result.error);
    }
    return result.value;
  }

  private async load(id: string): Promise<Raffle> {
    const raffle = await this.raffleRepository.findById(id);
    if (!raffle) {
      throw toHttpException(new NotFoundError(`Raffle with id ${id} not found`));
    }
    return raffle;
  }

  /**
   * Load, change and save with the version check; a concurrent writer turns
   * into a 409.
   */
  private async mutate(
    id: string,
    change: (raffle: Raffle, now: Date) => Result<Raffle, RaffleEngineError>,
  ): Promise<Raffle> {
    const raffle = await this.load(id);
    const changed = this.unwrapOrThrow(change(raffle, this.clock.now()));
    try {
      return await this.raffleRepository.save(changed);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  async create(dto: CreateRaffleDto): Promise<RaffleResponseDto> {
    const input: CreateRaffleInput = {
      name: dto.name,
      description: dto.description,
      type: dto.type,
      schedule: dto.schedule,
      participationRules: dto.participationRules,
      prizes: dto.prizes,
      eligibilityCriteria: dto.eligibilityCriteria,
      drawPolicy: dto.oneWinPerUser === undefined ? undefined : { oneWinPerUser: dto.oneWinPerUser },
      createdBy: dto.createdBy,
      tags: dto.tags,
      notes: dto.notes,
    };
    const raffle = this.unwrapOrThrow(createRaffle(input, this.clock.now()));
    const created = await this.raffleRepository.create(raffle);
    this.logger.log(`Created ${created.type} raffle ${created.id} (${created.name})`);
    return this.toResponse(created);
  }

  async findById(id: string): Promise<RaffleResponseDto> {
    return this.toResponse(await this.load(id));
  }

  async findAll(status?: RaffleStatus): Promise<RaffleResponseDto[]> {
    const raffles = await this.raffleRepository.findAll(status);
    return raffles.map((r) => this.toResponse(r));
  }

  async findWinners(id: string): Promise<WinnerResponseDto[]> {
    await this.load(id);
    const winners = await this.drawEngine.findWinners(id);
    return winners.map((winner) => ({
      id: winner.id,
      position: winner.position,
      userId: winner.userId,
      ticketNumber: formatTicketNumber(winner.ticketNumber),
      prizeId: winner.prizeId,
      prizeName: winner.prize.name,
      prizeType: winner.prize.type,
      prizeValue: winner.prize.value,
      tier: winner.prize.tier,
      claimStatus: winner.claimStatus,
      selectedAt: winner.selectedAt,
    }));
  }

  async updatePrizePool(id: string, dto: UpdatePrizePoolDto): Promise<RaffleResponseDto> {
    const updated = await this.mutate(id, (raffle, now) => {
      const prizes = createPrizePool(dto.prizes);
      if (!prizes.ok) {
        return prizes;
      }
      return stateMachine.updatePrizePool(this.touchedBy(raffle, dto.updatedBy), prizes.value, now);
    });
    return this.toResponse(updated);
  }

  async updateParticipationRules(id: string, dto: UpdateParticipationRulesDto): Promise<RaffleResponseDto> {
    const updated = await this.mutate(id, (raffle, now) => {
      const rules = createParticipationRules({
        minTicketsToParticipate: dto.minTicketsToParticipate,
        maxTicketsPerUser: dto.maxTicketsPerUser,
        maxParticipants: dto.maxParticipants,
      });
      if (!rules.ok) {
        return rules;
      }
      return stateMachine.updateParticipationRules(this.touchedBy(raffle, dto.updatedBy), rules.value, now);
    });
    return this.toResponse(updated);
  }

  /**
   * Opens the raffle for entries and commits to a fresh server seed; only its
   * hash is published until the draw.
   */
  async activate(id: string, dto: RaffleActionDto = {}): Promise<RaffleResponseDto> {
    const raffle = await this.load(id);
    const serverSeed = generateServerSeed();
    const { raffle: activated, event } = this.unwrapOrThrow(
      stateMachine.activate(raffle, {
        now: this.clock.now(),
        activatedBy: dto.performedBy,
        fairness: { serverSeed, serverSeedHash: hashServerSeed(serverSeed) },
      }),
    );

    let saved: Raffle;
    try {
      saved = await this.raffleRepository.save(activated);
    } catch (error) {
      throw toHttpException(error);
    }
    this.eventPublisher.publish(event);
    this.logger.log(`Raffle ${id} activated`);
    return this.toResponse(saved);
  }

  async pause(id: string, dto: RaffleActionDto = {}): Promise<RaffleResponseDto> {
    const paused = await this.mutate(id, (raffle, now) => stateMachine.pause(raffle, now, dto.performedBy));
    this.logger.log(`Raffle ${id} paused`);
    return this.toResponse(paused);
  }

  async resume(id: string, dto: RaffleActionDto = {}): Promise<RaffleResponseDto> {
    const resumed = await this.mutate(id, (raffle, now) => stateMachine.resume(raffle, now, dto.performedBy));
    this.logger.log(`Raffle ${id} resumed`);
    return this.toResponse(resumed);
  }

  async cancel(id: string, dto: RaffleActionDto = {}): Promise<RaffleResponseDto> {
    const cancelled = await this.mutate(id, (raffle, now) =>
      stateMachine.cancel(raffle, { now, reason: dto.reason, cancelledBy: dto.performedBy }),
    );
    this.logger.warn(`Raffle ${id} cancelled${dto.reason ? `: ${dto.reason}` : ''}`);
    return this.toResponse(cancelled);
  }

  /** Closes the raffle without drawing. */
  async complete(id: string, dto: RaffleActionDto = {}): Promise<RaffleResponseDto> {
    const completed = await this.mutate(id, (raffle, now) => stateMachine.complete(raffle, now, dto.performedBy));
    this.logger.log(`Raffle ${id} completed without draw`);
    return this.toResponse(completed);
  }

  /**
   * New Draft copied from a cancelled raffle. The schedule keeps its
   * durations and starts now; prizes start unawarded.
   */
  async recreate(id: string, dto: RaffleActionDto = {}): Promise<RaffleResponseDto> {
    const original = await this.load(id);
    if (original.status !== RaffleStatus.CANCELLED) {
      throw toHttpException(
        new ValidationError(`Only cancelled raffles can be recreated; raffle ${id} is ${original.status}`),
      );
    }

    const now = this.clock.now();
    const { registrationStart, registrationEnd, drawDate } = original.schedule;
    const registrationMs = registrationEnd.getTime() - registrationStart.getTime();
    const drawGapMs = drawDate.getTime() - registrationEnd.getTime();

    const recreated = this.unwrapOrThrow(
      createRaffle(
        {
          name: original.name,
          description: original.description,
          type: original.type,
          schedule: {
            registrationStart: now,
            registrationEnd: new Date(now.getTime() + registrationMs),
            drawDate: new Date(now.getTime() + registrationMs + drawGapMs),
          },
          participationRules: original.participationRules,
          prizes: original.prizePool.map(({ id: _prizeId, quantityAwarded: _awarded, ...prize }) => prize),
          eligibilityCriteria: original.eligibilityCriteria,
          drawPolicy: original.drawPolicy,
          createdBy: dto.performedBy ?? original.metadata.createdBy,
          tags: [...original.metadata.tags],
          recreatedFrom: original.id,
        },
        now,
      ),
    );
    const created = await this.raffleRepository.create(recreated);
    this.logger.log(`Raffle ${created.id} recreated from cancelled raffle ${id}`);
    return this.toResponse(created);
  }

  /**
   * Compares the ledger with the statistics cached on the raffle.
   */
  async reconcile(id: string): Promise<ReconciliationResponseDto> {
    const raffle = await this.load(id);
    const summary = await this.ticketLedger.summarize(id);
    const { statistics } = raffle;
    const cachedNetTickets = statistics.totalTicketsIssued - statistics.totalTicketsRevoked;
    const consistent =
      summary.netTickets === cachedNetTickets && summary.participants === statistics.currentParticipants;

    if (!consistent) {
      this.logger.warn(
        `Raffle ${id} statistics drifted from ledger: ` +
          `tickets ${cachedNetTickets} vs ${summary.netTickets}, ` +
          `participants ${statistics.currentParticipants} vs ${summary.participants}`,
      );
    }

    return {
      raffleId: id,
      ledgerNetTickets: summary.netTickets,
      ledgerParticipants: summary.participants,
      cachedNetTickets,
      cachedParticipants: statistics.currentParticipants,
      consistent,
    };
  }

  private touchedBy(raffle: Raffle, updatedBy?: string): Raffle {
    return updatedBy ? { ...raffle, metadata: { ...raffle.metadata, updatedBy } } : raffle;
  }
}
