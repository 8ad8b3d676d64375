import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export interface PolicyEventData {
  tenantId: string;
  event: PolicyEventType;
  policyId?: string;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, string | number | boolean | null>;
}

export enum PolicyEventType {
  POLICY_CREATED = 'POLICY_CREATED',
  POLICY_ACCESSED = 'POLICY_ACCESSED',
  POLICY_LISTED = 'POLICY_LISTED',
  POLICY_UPDATED = 'POLICY_UPDATED',
  POLICY_DELETED = 'POLICY_DELETED',
  POLICY_FILE_ACCESSED = 'POLICY_FILE_ACCESSED',
  POLICY_FILE_EXPIRED = 'POLICY_FILE_EXPIRED',
  POLICY_ACCESS_DENIED = 'POLICY_ACCESS_DENIED',
}

/**
 * Audit Service for policy analysis events
 *
 * Each entry carries tenant, event, outcome and record id. Field values,
 * citations and document bytes are never written.
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  logPolicyEvent(data: PolicyEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: 'policy-analysis-api',
      component: 'policies',
      tenantId: data.tenantId,
      event: data.event,
      policyId: data.policyId,
      success: data.success,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: data.metadata } : {}),
    };

    // Structured JSON, one line per event
    console.info(JSON.stringify(logEntry));
  }

  private sanitizeErrorMessage(error: string): string {
    return error
      .replace(
        /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
        '[EMAIL_REDACTED]',
      )
      .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
      .substring(0, 500);
  }
}
