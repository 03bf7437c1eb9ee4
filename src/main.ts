import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';
import { json, urlencoded } from 'express';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { API_KEY_HEADER } from './auth.guard';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);

  app.use(json());
  app.use(urlencoded({ extended: true }));

  // Configurar ValidationPipe global
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Elimina propiedades no decoradas
      transform: true, // Transforma los tipos automáticamente
      forbidNonWhitelisted: true, // Rechaza propiedades no permitidas
      transformOptions: {
        enableImplicitConversion: true, // Permite conversión implícita de tipos
      },
    }),
  );

  const isDevelopment = configService.get('isDevelopment', { infer: true });

  const corsOptions: CorsOptions = {
    origin: isDevelopment
      ? true // Permitir todos los orígenes en desarrollo
      : configService.get('corsOrigins', { infer: true }),
    methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With', API_KEY_HEADER],
    credentials: true,
    preflightContinue: false,
    optionsSuccessStatus: 204,
  };

  app.enableCors(corsOptions);

  // Configurar prefijo global
  app.setGlobalPrefix('api');

  app.enableShutdownHooks();

  const port = configService.get('port', { infer: true });
  await app.listen(port);
  Logger.log(`Application is running on: ${await app.getUrl()}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(`No se pudo arrancar la aplicación: ${error instanceof Error ? error.stack : String(error)}`, 'Bootstrap');
  process.exit(1);
});
