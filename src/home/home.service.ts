import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export const APP_VERSION = '1.0.0';

@Injectable()
export class HomeService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  appInfo(): { name: string; version: string } {
    return {
      name: this.configService.get('app.name', { infer: true }) ?? '',
      version: APP_VERSION,
    };
  }
}
