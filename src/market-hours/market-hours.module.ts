import { Module } from '@nestjs/common';
import { CalendarModule } from '../calendar/calendar.module';
import { clockProvider } from '../common/clock';
import { MarketHoursController } from './market-hours.controller';
import { MarketHoursService } from './market-hours.service';
import { NextEventService } from './next-event.service';

@Module({
  imports: [CalendarModule],
  controllers: [MarketHoursController],
  providers: [clockProvider, MarketHoursService, NextEventService],
  exports: [MarketHoursService],
})
export class MarketHoursModule {}
