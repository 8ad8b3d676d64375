import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HomeService } from './home.service';
import { HomeController } from './home.controller';
import { HealthService } from './health.service';
import { PoliciesModule } from '../policies/policies.module';

@Module({
  imports: [ConfigModule, PoliciesModule],
  controllers: [HomeController],
  providers: [HomeService, HealthService],
  exports: [HealthService],
})
export class HomeModule {}
