import { Injectable } from '@nestjs/common';
import { PoliciesService } from '../policies/policies.service';

/**
 * Health Check Service
 *
 * Used by monitoring systems and load balancers. The store lives in
 * process memory, so being able to count its records is the whole check.
 */
@Injectable()
export class HealthService {
  constructor(private readonly policiesService: PoliciesService) {}

  async check(): Promise<{ status: 'ok'; policies: number }> {
    return {
      status: 'ok',
      policies: await this.policiesService.countPolicies(),
    };
  }
}
