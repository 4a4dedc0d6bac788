import { BadRequestException, Body, Controller, Get, NotFoundException, Param, Post, Query } from '@nestjs/common';
import { SchedulerService } from './scheduler.service';
import { DedupStoreService } from '../database/dedup-store.service';
import { MatchQueryDto, PollConfigDto } from '../common/dto';
import { ConfigError, SchedulerStateError } from '../common/errors';

@Controller('monitor')
export class SchedulerController {
  constructor(
    private readonly schedulerService: SchedulerService,
    private readonly dedupStore: DedupStoreService,
  ) {}

  @Get('status')
  async getStatus() {
    return this.schedulerService.getStatus();
  }

  @Post('start')
  start(@Body() body: PollConfigDto) {
    try {
      const config = this.schedulerService.start(body);
      return { success: true, message: 'Surveillance démarrée', config };
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  @Post('stop')
  async stop() {
    await this.schedulerService.stop();
    return { success: true, message: 'Surveillance arrêtée' };
  }

  /**
   * Corps optionnel: sans configuration, le cycle utilise celle de la surveillance active
   */
  @Post('run-once')
  async runOnce(@Body() body: unknown) {
    const hasConfig = typeof body === 'object' && body !== null && Object.keys(body).length > 0;
    try {
      return await this.schedulerService.runOnce(hasConfig ? body : undefined);
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  @Get('matches')
  async listMatches(@Query() query: MatchQueryDto) {
    const matches = await this.dedupStore.listMatches(query);
    return { count: matches.length, matches };
  }

  @Get('matches/:id')
  async getMatch(@Param('id') id: string) {
    const match = await this.dedupStore.getMatch(id);
    if (!match) {
      throw new NotFoundException(`Aucune correspondance pour ${id}`);
    }
    return match;
  }

  private toHttpError(error: unknown): unknown {
    if (error instanceof ConfigError || error instanceof SchedulerStateError) {
      return new BadRequestException(error.message);
    }
    return error;
  }
}
