import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import appConfig from './config/app.config';
import throttlerConfig from './config/throttler.config';
import { AllConfigType } from './config/config.type';
import { PoliciesModule } from './policies/policies.module';
import { HomeModule } from './home/home.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, throttlerConfig],
      envFilePath: ['.env'],
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => ({
        throttlers: [
          {
            ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
            limit: configService.getOrThrow('throttler.limit', { infer: true }),
          },
        ],
      }),
    }),
    // Retained file cleanup job
    ScheduleModule.forRoot(),
    PoliciesModule,
    HomeModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
