import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { randomUUID } from 'crypto';
import policiesConfig from './config/policies.config';
import { PoliciesController } from './policies.controller';
import { PoliciesService } from './policies.service';
import { PolicyFileCleanupService } from './policy-file-cleanup.service';
import { PolicyStoreDomainService } from './domain/services/policy-store.domain.service';
import { PolicyAnalysisRepositoryPort } from './domain/ports/policy-analysis.repository.port';
import {
  POLICY_ID_GENERATOR,
  PolicyIdGenerator,
} from './domain/ports/policy-id-generator.port';
import { PolicyAnalysisInMemoryRepository } from './infrastructure/persistence/in-memory/policy-analysis.in-memory.repository';
import { InMemoryPolicyFileStorageAdapter } from './infrastructure/storage/in-memory-policy-file-storage.adapter';
import { PlaceholderFieldExtractionAdapter } from './infrastructure/extraction/placeholder-field-extraction.adapter';
import { TenantGuard } from '../tenancy/tenant.guard';
import { AuditModule } from '../audit/audit.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forFeature(policiesConfig),

    // Audit logging
    AuditModule,
  ],
  controllers: [PoliciesController],
  providers: [
    // Application layer
    PoliciesService,
    PolicyFileCleanupService,

    // Domain layer
    PolicyStoreDomainService,
    {
      provide: POLICY_ID_GENERATOR,
      useValue: (() => randomUUID()) satisfies PolicyIdGenerator,
    },

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: PolicyAnalysisRepositoryPort,
      useClass: PolicyAnalysisInMemoryRepository,
    },
    {
      provide: 'PolicyFileStoragePort',
      useClass: InMemoryPolicyFileStorageAdapter,
    },
    {
      provide: 'FieldExtractionServicePort',
      useClass: PlaceholderFieldExtractionAdapter,
    },

    TenantGuard,
  ],
  exports: [PoliciesService],
})
export class PoliciesModule {}
