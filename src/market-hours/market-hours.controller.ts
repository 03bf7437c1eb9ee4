import { Controller, Get, Logger, Param, Query, UseGuards } from '@nestjs/common';
import { ApiKeyGuard } from '../auth.guard';
import { WeekQueryDto } from './dto/week-query.dto';
import { MarketHoursService } from './market-hours.service';
import { NextEvent, OpenNowResponse, ResolvedHours, WeekSchedule } from './market-hours.interface';

@Controller('market-hours') // Esto resultará en /api/market-hours por el prefijo global
@UseGuards(ApiKeyGuard)
export class MarketHoursController {
  private readonly logger = new Logger(MarketHoursController.name);

  constructor(private readonly marketHoursService: MarketHoursService) {}

  @Get('today')
  async getToday(): Promise<ResolvedHours> {
    this.logger.log('GET /api/market-hours/today');
    return this.marketHoursService.getToday();
  }

  @Get('week')
  async getWeek(@Query() query: WeekQueryDto): Promise<WeekSchedule> {
    this.logger.log(`GET /api/market-hours/week?startDate=${query.startDate ?? ''}`);
    return this.marketHoursService.getWeek(query.startDate);
  }

  @Get('next')
  async getNextEvent(): Promise<NextEvent> {
    this.logger.log('GET /api/market-hours/next');
    return this.marketHoursService.getNextEvent();
  }

  @Get('date/:date')
  async getForDate(@Param('date') date: string): Promise<ResolvedHours> {
    this.logger.log(`GET /api/market-hours/date/${date}`);
    return this.marketHoursService.getForDate(date);
  }

  @Get('is-open')
  async isOpenNow(): Promise<OpenNowResponse> {
    this.logger.log('GET /api/market-hours/is-open');
    return this.marketHoursService.isOpenNow();
  }
}
