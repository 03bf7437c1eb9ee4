import { Controller, Get, Inject, Post, UseGuards } from '@nestjs/common';
import { ApiKeyGuard } from '../auth.guard';
import { CALENDAR_STORE } from './calendar.constants';
import { CalendarRefreshService } from './calendar-refresh.service';
import { CalendarStore } from './calendar.store';

@Controller('calendar/refresh')
@UseGuards(ApiKeyGuard)
export class CalendarRefreshController {
  constructor(
    private readonly refreshService: CalendarRefreshService,
    @Inject(CALENDAR_STORE) private readonly store: CalendarStore,
  ) {}

  /**
   * 🔍 Estado del refresco automático
   * GET /calendar/refresh/status
   */
  @Get('status')
  getStatus() {
    const status = this.refreshService.getStatus();
    return {
      ...status,
      message: status.isPaused ? 'Calendar refresh paused' : 'Calendar refresh active',
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * 📄 Última ejecución registrada (procedencia de los datos)
   * GET /calendar/refresh/last-run
   */
  @Get('last-run')
  async getLastRun() {
    const lastRun = await this.store.getLastRun();

    if (!lastRun) {
      return {
        message: 'No calendar refresh data available yet',
        data: null,
      };
    }

    return {
      lastUpdated: lastRun.ranAt.toISOString(),
      status: lastRun.status,
      source: lastRun.source,
      data: lastRun.payload,
    };
  }

  /**
   * 🎯 Refresco manual inmediato
   * POST /calendar/refresh/run
   */
  @Post('run')
  async run() {
    return this.refreshService.runRefresh('manual');
  }

  /**
   * ⏸️ Pausar el refresco automático
   * POST /calendar/refresh/pause
   */
  @Post('pause')
  pause() {
    this.refreshService.pause();
    return {
      success: true,
      status: 'paused',
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * ▶️ Reanudar el refresco automático
   * POST /calendar/refresh/resume
   */
  @Post('resume')
  resume() {
    this.refreshService.resume();
    return {
      success: true,
      status: 'active',
      timestamp: new Date().toISOString(),
    };
  }
}
