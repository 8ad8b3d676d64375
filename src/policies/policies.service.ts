import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PolicyStoreDomainService } from './domain/services/policy-store.domain.service';
import { FieldExtractionServicePort } from './domain/ports/field-extraction.service.port';
import {
  PolicyFileStoragePort,
  StoredPolicyFile,
} from './domain/ports/policy-file-storage.port';
import { PolicyAnalysis } from './domain/entities/policy-analysis.entity';
import { PolicyFieldInput } from './domain/entities/policy-field.entity';
import { PolicyValidationError } from './domain/errors/policy-validation.error';
import { PolicyNotFoundError } from './domain/errors/policy-not-found.error';
import { CreatePolicyDto } from './dto/create-policy.dto';
import { UpdatePolicyDto } from './dto/update-policy.dto';
import { ListPoliciesQueryDto } from './dto/list-policies-query.dto';
import { PolicyResponseDto } from './dto/policy-response.dto';
import { PolicyAnalysisResponseDto } from './dto/policy-analysis-response.dto';
import { PolicyFieldResponseDto } from './dto/policy-field-response.dto';
import { AuditService, PolicyEventType } from '../audit/audit.service';
import { AllConfigType } from '../config/config.type';

const DEFAULT_FILE_NAME = 'policy-document';

export const POLICIES_API_VERSION = '1';

/**
 * Orchestration Service (Application Layer)
 *
 * Sits between the controller and PolicyStoreDomainService:
 * - turns uploads into fields through the extraction port
 * - keeps retained files next to their record
 * - maps domain records to response DTOs
 * - writes the audit trail
 */
@Injectable()
export class PoliciesService {
  private readonly logger = new Logger(PoliciesService.name);

  constructor(
    private readonly policyStore: PolicyStoreDomainService,
    @Inject('FieldExtractionServicePort')
    private readonly extractionService: FieldExtractionServicePort,
    @Inject('PolicyFileStoragePort')
    private readonly fileStorage: PolicyFileStoragePort,
    private readonly auditService: AuditService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  async createPolicy(
    tenantId: string,
    dto: CreatePolicyDto,
  ): Promise<PolicyResponseDto> {
    const retain = dto.retain ?? false;
    const document =
      dto.fileB64 !== undefined ? this.decodeDocument(dto.fileB64) : null;

    if (retain && !document) {
      throw new PolicyValidationError('retain', 'retain requires fileB64');
    }

    let fields: PolicyFieldInput[];
    if (dto.fields) {
      fields = dto.fields;
    } else if (document) {
      const extraction = await this.extractionService.extractFields({
        tenantId,
        document,
        fileName: dto.filename,
      });
      fields = extraction.fields;
    } else {
      throw new PolicyValidationError(
        'fields',
        'fields or fileB64 must be provided',
      );
    }

    const analysis = await this.policyStore.create(
      tenantId,
      dto.provider,
      dto.planType,
      fields,
      retain ? { retainForMs: this.retentionMs() } : {},
    );

    if (retain && document) {
      await this.fileStorage.store({
        tenantId,
        policyId: analysis.id,
        fileName: dto.filename ?? DEFAULT_FILE_NAME,
        content: document,
        storedAt: analysis.createdAt,
      });
    }

    this.auditService.logPolicyEvent({
      tenantId,
      event: PolicyEventType.POLICY_CREATED,
      policyId: analysis.id,
      success: true,
      metadata: {
        fieldCount: analysis.fields.length,
        extracted: !dto.fields,
        retained: retain,
      },
    });

    return this.toResponseDto(analysis, retain);
  }

  async getPolicy(tenantId: string, id: string): Promise<PolicyResponseDto> {
    const analysis = await this.withDeniedAudit(tenantId, id, () =>
      this.policyStore.get(tenantId, id),
    );

    this.auditService.logPolicyEvent({
      tenantId,
      event: PolicyEventType.POLICY_ACCESSED,
      policyId: id,
      success: true,
    });

    return this.toResponseDto(
      analysis,
      await this.fileStorage.exists(tenantId, id),
    );
  }

  async updatePolicy(
    tenantId: string,
    id: string,
    dto: UpdatePolicyDto,
  ): Promise<PolicyResponseDto> {
    const analysis = await this.withDeniedAudit(tenantId, id, () =>
      this.policyStore.update(tenantId, id, {
        provider: dto.provider,
        planType: dto.planType,
        fields: dto.fields,
      }),
    );

    this.auditService.logPolicyEvent({
      tenantId,
      event: PolicyEventType.POLICY_UPDATED,
      policyId: id,
      success: true,
      metadata: {
        providerChanged: dto.provider !== undefined,
        planTypeChanged: dto.planType !== undefined,
        fieldsReplaced: dto.fields !== undefined,
      },
    });

    return this.toResponseDto(
      analysis,
      await this.fileStorage.exists(tenantId, id),
    );
  }

  async listPolicies(
    tenantId: string,
    query: ListPoliciesQueryDto,
  ): Promise<PolicyResponseDto[]> {
    const analyses = await this.policyStore.list(tenantId, {
      provider: query.provider,
      planType: query.planType,
    });

    this.auditService.logPolicyEvent({
      tenantId,
      event: PolicyEventType.POLICY_LISTED,
      success: true,
      metadata: { resultCount: analyses.length },
    });

    return Promise.all(
      analyses.map(async (analysis) =>
        this.toResponseDto(
          analysis,
          await this.fileStorage.exists(tenantId, analysis.id),
        ),
      ),
    );
  }

  async deletePolicy(tenantId: string, id: string): Promise<void> {
    await this.withDeniedAudit(tenantId, id, () =>
      this.policyStore.delete(tenantId, id),
    );
    const fileDeleted = await this.fileStorage.delete(tenantId, id);

    this.auditService.logPolicyEvent({
      tenantId,
      event: PolicyEventType.POLICY_DELETED,
      policyId: id,
      success: true,
      metadata: { fileDeleted },
    });
  }

  async getPolicyFile(tenantId: string, id: string): Promise<StoredPolicyFile> {
    // Record must exist under this tenant before its file is considered
    await this.withDeniedAudit(tenantId, id, () =>
      this.policyStore.get(tenantId, id),
    );

    const file = await this.fileStorage.find(tenantId, id);
    if (!file) {
      throw new PolicyNotFoundError(id);
    }

    this.auditService.logPolicyEvent({
      tenantId,
      event: PolicyEventType.POLICY_FILE_ACCESSED,
      policyId: id,
      success: true,
    });

    return file;
  }

  /**
   * Drop retained files past their deadline and clear the deadline on the
   * record. Returns the number of records released.
   */
  async purgeExpiredFiles(now: Date = new Date()): Promise<number> {
    const expired = await this.policyStore.findExpired(now);
    let released = 0;

    for (const analysis of expired) {
      await this.fileStorage.delete(analysis.tenantId, analysis.id);
      try {
        await this.policyStore.releaseRetention(analysis.tenantId, analysis.id);
      } catch (error) {
        // Deleted between the scan and now: the file is gone either way
        if (error instanceof PolicyNotFoundError) {
          continue;
        }
        throw error;
      }
      released++;

      this.auditService.logPolicyEvent({
        tenantId: analysis.tenantId,
        event: PolicyEventType.POLICY_FILE_EXPIRED,
        policyId: analysis.id,
        success: true,
      });
    }

    return released;
  }

  async countPolicies(): Promise<number> {
    return this.policyStore.count();
  }

  toResponseDto(analysis: PolicyAnalysis, hasFile: boolean): PolicyResponseDto {
    const response = new PolicyResponseDto();
    response.analysis = this.toAnalysisResponseDto(analysis);
    response.fileUrl = hasFile ? this.fileUrl(analysis.id) : null;
    return response;
  }

  private toAnalysisResponseDto(
    analysis: PolicyAnalysis,
  ): PolicyAnalysisResponseDto {
    const dto = new PolicyAnalysisResponseDto();
    dto.id = analysis.id;
    dto.tenantId = analysis.tenantId;
    dto.provider = analysis.provider;
    dto.planType = analysis.planType;
    dto.fields = analysis.fields.map((field) => {
      const fieldDto = new PolicyFieldResponseDto();
      fieldDto.name = field.name;
      fieldDto.value = field.value;
      fieldDto.confidence = field.confidence;
      fieldDto.sourcePage = field.sourcePage;
      fieldDto.citation = field.citation;
      fieldDto.modelVersion = field.modelVersion;
      return fieldDto;
    });
    dto.createdAt = analysis.createdAt;
    dto.updatedAt = analysis.updatedAt;
    dto.expiresAt = analysis.expiresAt;
    return dto;
  }

  /**
   * Path of the download route, as served behind the global prefix
   */
  private fileUrl(id: string): string {
    const apiPrefix = this.configService.getOrThrow('app.apiPrefix', {
      infer: true,
    });
    return `/${apiPrefix}/v${POLICIES_API_VERSION}/policies/${id}/file`;
  }

  private decodeDocument(fileB64: string): Buffer {
    const document = Buffer.from(fileB64, 'base64');
    if (document.length === 0) {
      throw new PolicyValidationError('fileB64', 'document is empty');
    }

    const maxFileSizeMb = this.configService.getOrThrow(
      'policies.maxFileSizeMb',
      { infer: true },
    );
    if (document.length > maxFileSizeMb * 1024 * 1024) {
      throw new PolicyValidationError(
        'fileB64',
        `document exceeds ${maxFileSizeMb} MB`,
      );
    }
    return document;
  }

  private retentionMs(): number {
    const hours = this.configService.getOrThrow('policies.fileRetentionHours', {
      infer: true,
    });
    return hours * 60 * 60 * 1000;
  }

  /**
   * Record failed lookups (absent or foreign records) before rethrowing
   */
  private async withDeniedAudit<T>(
    tenantId: string,
    id: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof PolicyNotFoundError) {
        this.logger.warn(`[NOT FOUND] policyId=${id}, tenantId=${tenantId}`);
        this.auditService.logPolicyEvent({
          tenantId,
          event: PolicyEventType.POLICY_ACCESS_DENIED,
          policyId: id,
          success: false,
          errorMessage: error.message,
        });
      }
      throw error;
    }
  }
}
