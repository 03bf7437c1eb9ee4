import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AppController } from './app.controller';
import { CalendarModule } from './calendar/calendar.module';
import configuration, { AppConfig } from './config/configuration';
import { MarketHoursModule } from './market-hours/market-hours.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [() => configuration()],
    }),
    ScheduleModule.forRoot(),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const database = configService.get('database', { infer: true });
        return {
          type: 'postgres' as const,
          host: database.host,
          port: database.port,
          username: database.username,
          password: database.password,
          database: database.database,
          autoLoadEntities: true,
          synchronize: database.synchronize, // Solo para desarrollo
          ssl: database.ssl ? { rejectUnauthorized: false } : false,
        };
      },
    }),
    CalendarModule,
    MarketHoursModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
