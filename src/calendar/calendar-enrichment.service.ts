import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { Clock, CLOCK } from '../common/clock';
import { AppConfig } from '../config/configuration';
import { EnrichmentResult } from './calendar.interface';

export interface EnrichmentSource {
  source: string;
  url: string;
}

export const ENRICHMENT_SOURCES: EnrichmentSource[] = [
  { source: 'NYSE', url: 'https://www.nyse.com/markets/hours-calendars' },
  { source: 'NASDAQ', url: 'https://www.nasdaq.com/market-activity/stock-market-holiday-calendar' },
];

/**
 * Consulta las páginas oficiales de horarios. El resultado solo se guarda como
 * procedencia del refresco: las tablas estáticas son la fuente del
 * calendario y un fallo aquí nunca interrumpe la generación.
 */
@Injectable()
export class CalendarEnrichmentService {
  private readonly logger = new Logger(CalendarEnrichmentService.name);

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async fetchSources(sources: EnrichmentSource[] = ENRICHMENT_SOURCES): Promise<EnrichmentResult[]> {
    return Promise.all(sources.map((source) => this.fetchSource(source)));
  }

  private async fetchSource({ source, url }: EnrichmentSource): Promise<EnrichmentResult> {
    const { enrichmentTimeoutMs } = this.configService.get('calendar', { infer: true });
    const fetchedAt = this.clock.now().toISOString();

    try {
      const response = await axios.get<string>(url, {
        timeout: enrichmentTimeoutMs,
        responseType: 'text',
        headers: {
          'User-Agent': 'Mozilla/5.0 (compatible; market-hours-api/1.0)',
          Accept: 'text/html',
        },
      });
      const body = typeof response.data === 'string' ? response.data : '';

      this.logger.log(`🌐 ${source}: HTTP ${response.status} (${body.length} bytes)`);
      return {
        source,
        url,
        success: true,
        httpStatus: response.status,
        bytes: body.length,
        fetchedAt,
      };
    } catch (error) {
      const message = axios.isAxiosError(error)
        ? `${error.code ?? 'HTTP'} ${error.response?.status ?? ''} ${error.message}`.replace(/\s+/g, ' ').trim()
        : error instanceof Error
          ? error.message
          : String(error);

      this.logger.warn(`⚠️ ${source}: no se pudo consultar (${message}), se usan las tablas estáticas`);
      return {
        source,
        url,
        success: false,
        httpStatus: axios.isAxiosError(error) ? error.response?.status : undefined,
        error: message,
        fetchedAt,
      };
    }
  }
}
