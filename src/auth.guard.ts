import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, ForbiddenException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { AppConfig } from './config/configuration';

export const API_KEY_HEADER = 'x-api-key';

/**
 * Autenticación opcional por API key (ENABLE_API_AUTH + API_KEYS).
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  canActivate(context: ExecutionContext): boolean {
    const { enabled, apiKeys } = this.configService.get('auth', { infer: true });
    if (!enabled) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();

    // Permitir siempre peticiones preflight OPTIONS para CORS
    if (request.method === 'OPTIONS') {
      return true;
    }

    const apiKey = this.extractApiKey(request);

    if (!apiKey) {
      throw new UnauthorizedException('API key required');
    }

    if (!apiKeys.includes(apiKey)) {
      throw new ForbiddenException('Invalid API key');
    }

    return true;
  }

  private extractApiKey(request: Request): string | undefined {
    const header = request.headers[API_KEY_HEADER];
    const value = Array.isArray(header) ? header[0] : header;
    return value && value.trim() !== '' ? value.trim() : undefined;
  }
}
