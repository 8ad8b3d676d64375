import { AppConfig } from './app-config.type';
import { ThrottlerConfig } from './throttler-config.type';
import { PoliciesConfig } from '../policies/config/policies-config.type';

export type AllConfigType = {
  app: AppConfig;
  throttler: ThrottlerConfig;
  policies: PoliciesConfig;
};
