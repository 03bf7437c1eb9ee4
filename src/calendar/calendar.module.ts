import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { clockProvider } from '../common/clock';
import { CalendarEnrichmentService } from './calendar-enrichment.service';
import { CalendarRefreshController } from './calendar-refresh.controller';
import { CalendarRefreshService } from './calendar-refresh.service';
import { CalendarRunEntity } from './calendar-run.entity';
import { calendarTablesProvider } from './calendar-tables';
import { CALENDAR_STORE } from './calendar.constants';
import { CalendarGeneratorService } from './calendar.generator';
import { TypeOrmCalendarStore } from './calendar.store';
import { TradingDayEntity } from './trading-day.entity';

@Module({
  imports: [TypeOrmModule.forFeature([TradingDayEntity, CalendarRunEntity])],
  controllers: [CalendarRefreshController],
  providers: [
    clockProvider,
    calendarTablesProvider,
    CalendarGeneratorService,
    CalendarEnrichmentService,
    CalendarRefreshService,
    { provide: CALENDAR_STORE, useClass: TypeOrmCalendarStore },
  ],
  exports: [CALENDAR_STORE, CalendarGeneratorService],
})
export class CalendarModule {}
