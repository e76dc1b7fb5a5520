import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseEnumPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { RafflesService } from '../application/raffles.service';
import { CreateRaffleDto } from '../application/dto/create-raffle.dto';
import { RaffleActionDto, UpdateParticipationRulesDto, UpdatePrizePoolDto } from '../application/dto/update-raffle.dto';
import { RaffleStatus } from '../domain/raffle.entity';

@Controller('raffles')
export class RafflesController {
  constructor(private readonly rafflesService: RafflesService) {}

  @Get()
  async findAll(@Query('status', new ParseEnumPipe(RaffleStatus, { optional: true })) status?: RaffleStatus) {
    return this.rafflesService.findAll(status);
  }

  @Get(':id')
  async findById(@Param('id') id: string) {
    return this.rafflesService.findById(id);
  }

  @Get(':id/winners')
  async findWinners(@Param('id') id: string) {
    return this.rafflesService.findWinners(id);
  }

  @Get(':id/reconciliation')
  async reconcile(@Param('id') id: string) {
    return this.rafflesService.reconcile(id);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() dto: CreateRaffleDto) {
    return this.rafflesService.create(dto);
  }

  @Put(':id/prizes')
  async updatePrizePool(@Param('id') id: string, @Body() dto: UpdatePrizePoolDto) {
    return this.rafflesService.updatePrizePool(id, dto);
  }

  @Put(':id/rules')
  async updateParticipationRules(@Param('id') id: string, @Body() dto: UpdateParticipationRulesDto) {
    return this.rafflesService.updateParticipationRules(id, dto);
  }

  @Post(':id/activate')
  async activate(@Param('id') id: string, @Body() dto: RaffleActionDto) {
    return this.rafflesService.activate(id, dto);
  }

  @Post(':id/pause')
  async pause(@Param('id') id: string, @Body() dto: RaffleActionDto) {
    return this.rafflesService.pause(id, dto);
  }

  @Post(':id/resume')
  async resume(@Param('id') id: string, @Body() dto: RaffleActionDto) {
    return this.rafflesService.resume(id, dto);
  }

  @Post(':id/cancel')
  async cancel(@Param('id') id: string, @Body() dto: RaffleActionDto) {
    return this.rafflesService.cancel(id, dto);
  }

  @Post(':id/complete')
  async complete(@Param('id') id: string, @Body() dto: RaffleActionDto) {
    return this.rafflesService.complete(id, dto);
  }

  @Post(':id/recreate')
  @HttpCode(HttpStatus.CREATED)
  async recreate(@Param('id') id: string, @Body() dto: RaffleActionDto) {
    return this.rafflesService.recreate(id, dto);
  }
}
