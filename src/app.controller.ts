import { Controller, Get } from '@nestjs/common';

export const SERVICE_NAME = 'US Market Hours Calendar API';
export const SERVICE_VERSION = '1.0.0';

@Controller()
export class AppController {
  @Get()
  getInfo() {
    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: 'operational',
    };
  }

  @Get('health')
  getHealth() {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
    };
  }
}
