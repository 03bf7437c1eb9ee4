import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression, SchedulerRegistry } from '@nestjs/schedule';
import { Clock, CLOCK } from '../common/clock';
import { addDays, utcDateOf } from '../common/time.util';
import { AppConfig } from '../config/configuration';
import { CalendarEnrichmentService } from './calendar-enrichment.service';
import { CALENDAR_STORE } from './calendar.constants';
import { CalendarGeneratorService } from './calendar.generator';
import { CalendarRefreshResult, EnrichmentResult, RefreshTrigger } from './calendar.interface';
import { CalendarStore } from './calendar.store';

export const CALENDAR_REFRESH_JOB = 'calendarRefresh';
// La tarea se despierta cada hora y solo refresca a la hora configurada
export const CALENDAR_REFRESH_CRON = CronExpression.EVERY_HOUR;

const SOURCE_LABEL = 'NYSE+NASDAQ+Fallback';

@Injectable()
export class CalendarRefreshService implements OnApplicationBootstrap {
  private readonly logger = new Logger(CalendarRefreshService.name);

  // 🟢 Control de pausa
  private isPaused = false;

  // Ejecución en curso: una petición concurrente se une a ella
  private inFlight: Promise<CalendarRefreshResult> | null = null;

  private lastResult: CalendarRefreshResult | null = null;

  constructor(
    private readonly generator: CalendarGeneratorService,
    private readonly enrichmentService: CalendarEnrichmentService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService<AppConfig, true>,
    @Inject(CALENDAR_STORE) private readonly store: CalendarStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async onApplicationBootstrap() {
    const { refreshEnabled, refreshOnStartup } = this.configService.get('calendar', { infer: true });

    if (!refreshEnabled) {
      this.logger.log('Refresco del calendario deshabilitado por configuración');
      this.pause();
      return;
    }

    if (refreshOnStartup) {
      this.logger.log('🚀 Refresco inicial del calendario al arrancar');
      await this.runRefresh('startup');
    }
  }

  // 🟢 Métodos de control
  pause() {
    this.isPaused = true;

    try {
      this.schedulerRegistry.getCronJob(CALENDAR_REFRESH_JOB).stop();
      this.logger.warn('⏸️ Refresco del calendario PAUSADO');
    } catch (error) {
      this.logger.warn(`⚠️ No se pudo pausar la tarea cron: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  resume() {
    this.isPaused = false;

    try {
      this.schedulerRegistry.getCronJob(CALENDAR_REFRESH_JOB).start();
      this.logger.log('▶️ Refresco del calendario REANUDADO');
    } catch (error) {
      this.logger.warn(`⚠️ No se pudo reanudar la tarea cron: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  getStatus() {
    return {
      isPaused: this.isPaused,
      isRunning: this.inFlight !== null,
      cronExpression: `0 0 ${this.refreshHour} * * *`,
      timezone: 'UTC',
      nextRun: this.isPaused ? null : this.getNextRunTime(),
      lastResult: this.lastResult,
    };
  }

  /**
   * 🎯 Tarea diaria: regenerar el calendario a CALENDAR_REFRESH_HOUR (UTC)
   */
  @Cron(CALENDAR_REFRESH_CRON, {
    name: CALENDAR_REFRESH_JOB,
    timeZone: 'UTC',
  })
  async refreshDaily() {
    if (this.isPaused) {
      this.logger.debug('⏸️ Refresco pausado - saltando ejecución');
      return;
    }
    if (this.clock.now().getUTCHours() !== this.refreshHour) {
      return;
    }
    await this.runRefresh('scheduled');
  }

  /**
   * Ejecuta enriquecimiento + generación + escritura. Nunca hay dos
   * ejecuciones a la vez: si ya hay una en curso se devuelve esa misma.
   */
  runRefresh(trigger: RefreshTrigger): Promise<CalendarRefreshResult> {
    if (this.inFlight) {
      this.logger.warn(`⏳ Refresco ya en curso, la petición (${trigger}) se une a él`);
      return this.inFlight;
    }

    this.inFlight = this.execute(trigger).finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async execute(trigger: RefreshTrigger): Promise<CalendarRefreshResult> {
    const startTime = Date.now();
    const { lookbackDays, lookaheadDays, enrichmentEnabled } = this.configService.get('calendar', { infer: true });

    const today = utcDateOf(this.clock.now());
    const startDate = addDays(today, -lookbackDays);
    const endDate = addDays(today, lookaheadDays);

    this.logger.log(`🗓️ Refrescando calendario ${startDate} → ${endDate} (${trigger})`);

    let sources: EnrichmentResult[] = [];
    let daysGenerated = 0;

    try {
      if (enrichmentEnabled) {
        sources = await this.enrichmentService.fetchSources();
      }

      const days = this.generator.generate(startDate, endDate);
      daysGenerated = days.length;
      await this.store.putBatch(days);

      await this.store.recordRun({
        status: 'success',
        source: SOURCE_LABEL,
        payload: {
          trigger,
          startDate,
          endDate,
          daysGenerated,
          tablesVersion: this.generator.tablesVersion,
          sources,
        },
      });

      const result: CalendarRefreshResult = {
        status: 'success',
        trigger,
        startDate,
        endDate,
        daysGenerated,
        sources,
        durationMs: Date.now() - startTime,
      };
      this.logger.log(`🎉 Calendario actualizado: ${daysGenerated} días en ${result.durationMs}ms`);
      this.lastResult = result;
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`❌ Falló el refresco del calendario: ${message}`);

      try {
        await this.store.recordRun({
          status: 'failed',
          source: 'error',
          payload: { trigger, error: message },
        });
      } catch (recordError) {
        this.logger.error(
          `❌ No se pudo registrar el fallo del refresco: ${recordError instanceof Error ? recordError.message : String(recordError)}`,
        );
      }

      const result: CalendarRefreshResult = {
        status: 'failed',
        trigger,
        startDate,
        endDate,
        daysGenerated,
        sources,
        durationMs: Date.now() - startTime,
        error: message,
      };
      this.lastResult = result;
      return result;
    }
  }

  private get refreshHour(): number {
    return this.configService.get('calendar', { infer: true }).refreshHourUtc;
  }

  /**
   * ⏰ Próxima ejecución (CALENDAR_REFRESH_HOUR, UTC)
   */
  private getNextRunTime(): Date {
    const now = this.clock.now();
    const nextRun = new Date(
      Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), this.refreshHour, 0, 0, 0),
    );

    if (nextRun <= now) {
      nextRun.setUTCDate(nextRun.getUTCDate() + 1);
    }

    return nextRun;
  }
}
