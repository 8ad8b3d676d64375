import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { PoliciesService } from './policies.service';
import { PolicyStoreDomainService } from './domain/services/policy-store.domain.service';
import { PolicyAnalysisRepositoryPort } from './domain/ports/policy-analysis.repository.port';
import { POLICY_ID_GENERATOR } from './domain/ports/policy-id-generator.port';
import { FieldExtractionServicePort } from './domain/ports/field-extraction.service.port';
import { PolicyValidationError } from './domain/errors/policy-validation.error';
import { PolicyNotFoundError } from './domain/errors/policy-not-found.error';
import { PolicyAnalysisInMemoryRepository } from './infrastructure/persistence/in-memory/policy-analysis.in-memory.repository';
import { InMemoryPolicyFileStorageAdapter } from './infrastructure/storage/in-memory-policy-file-storage.adapter';
import { AuditService, PolicyEventType } from '../audit/audit.service';
import { AllConfigType } from '../config/config.type';

describe('PoliciesService', () => {
  let service: PoliciesService;
  let fileStorage: InMemoryPolicyFileStorageAdapter;
  let mockExtraction: jest.Mocked<FieldExtractionServicePort>;
  let mockAudit: { logPolicyEvent: jest.Mock };

  const sampleFile = Buffer.from('Sample policy document').toString('base64');

  const deductible = {
    name: 'deductible',
    value: '$500',
    confidence: 0.92,
    sourcePage: 3,
    citation: 'Deductible: $500',
    modelVersion: 'v1',
  };

  beforeEach(async () => {
    mockExtraction = {
      extractFields: jest.fn().mockResolvedValue({
        fields: [
          {
            name: 'example_field',
            value: 'This is a placeholder',
            confidence: 0.95,
            sourcePage: 1,
            citation: 'Sample citation',
            modelVersion: 'test-model',
          },
        ],
        pageCount: 1,
      }),
    };

    mockAudit = {
      logPolicyEvent: jest.fn(),
    };

    const configService = new ConfigService<AllConfigType>({
      app: { apiPrefix: 'api' },
      policies: {
        maxFileSizeMb: 1,
        fileRetentionHours: 24,
        extractionModelVersion: 'test-model',
      },
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PoliciesService,
        PolicyStoreDomainService,
        {
          provide: PolicyAnalysisRepositoryPort,
          useClass: PolicyAnalysisInMemoryRepository,
        },
        { provide: POLICY_ID_GENERATOR, useValue: () => randomUUID() },
        {
          provide: 'PolicyFileStoragePort',
          useClass: InMemoryPolicyFileStorageAdapter,
        },
        { provide: 'FieldExtractionServicePort', useValue: mockExtraction },
        { provide: AuditService, useValue: mockAudit },
        { provide: ConfigService, useValue: configService },
      ],
    }).compile();

    service = module.get<PoliciesService>(PoliciesService);
    fileStorage = module.get<InMemoryPolicyFileStorageAdapter>(
      'PolicyFileStoragePort',
    );
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.clearAllMocks();
  });

  describe('createPolicy', () => {
    it('should store the given fields without extraction', async () => {
      const response = await service.createPolicy('acme', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fields: [deductible],
      });

      expect(response.fileUrl).toBeNull();
      expect(response.analysis.fields).toEqual([deductible]);
      expect(mockExtraction.extractFields).not.toHaveBeenCalled();
      expect(mockAudit.logPolicyEvent).toHaveBeenCalledWith({
        tenantId: 'acme',
        event: PolicyEventType.POLICY_CREATED,
        policyId: response.analysis.id,
        success: true,
        metadata: { fieldCount: 1, extracted: false, retained: false },
      });
    });

    it('should extract fields from the decoded document', async () => {
      const response = await service.createPolicy('acme', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fileB64: sampleFile,
        filename: 'test_policy.pdf',
      });

      expect(mockExtraction.extractFields).toHaveBeenCalledWith({
        tenantId: 'acme',
        document: Buffer.from('Sample policy document'),
        fileName: 'test_policy.pdf',
      });
      expect(response.analysis.fields).toEqual([
        {
          name: 'example_field',
          value: 'This is a placeholder',
          confidence: 0.95,
          sourcePage: 1,
          citation: 'Sample citation',
          modelVersion: 'test-model',
        },
      ]);
      expect(response.fileUrl).toBeNull();
    });

    it('should keep a retained document and set its deadline', async () => {
      jest.useFakeTimers({ now: new Date('2026-03-01T00:00:00.000Z') });

      const response = await service.createPolicy('acme', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fileB64: sampleFile,
        filename: 'test_policy.pdf',
        retain: true,
      });

      expect(response.fileUrl).toBe(
        `/api/v1/policies/${response.analysis.id}/file`,
      );
      expect(response.analysis.expiresAt).toEqual(
        new Date('2026-03-02T00:00:00.000Z'),
      );
      const file = await service.getPolicyFile('acme', response.analysis.id);
      expect(file.fileName).toBe('test_policy.pdf');
      expect(file.content.toString()).toBe('Sample policy document');
    });

    it('should reject retain without a document', async () => {
      await expect(
        service.createPolicy('acme', {
          provider: 'Acme',
          planType: 'PPO',
          fields: [],
          retain: true,
        }),
      ).rejects.toThrow('retain: retain requires fileB64');
    });

    it('should reject a request with neither fields nor document', async () => {
      await expect(
        service.createPolicy('acme', { provider: 'Acme', planType: 'PPO' }),
      ).rejects.toThrow(PolicyValidationError);
    });

    it('should reject a document above the size limit', async () => {
      const oversized = Buffer.alloc(1024 * 1024 + 1).toString('base64');

      await expect(
        service.createPolicy('acme', {
          provider: 'Acme',
          planType: 'PPO',
          fileB64: oversized,
        }),
      ).rejects.toThrow('fileB64: document exceeds 1 MB');
      expect(mockExtraction.extractFields).not.toHaveBeenCalled();
    });
  });

  describe('getPolicy', () => {
    it('should audit a denied lookup from another tenant', async () => {
      const created = await service.createPolicy('acme', {
        provider: 'Acme',
        planType: 'PPO',
        fields: [],
      });

      await expect(
        service.getPolicy('globex', created.analysis.id),
      ).rejects.toThrow(PolicyNotFoundError);
      expect(mockAudit.logPolicyEvent).toHaveBeenLastCalledWith({
        tenantId: 'globex',
        event: PolicyEventType.POLICY_ACCESS_DENIED,
        policyId: created.analysis.id,
        success: false,
        errorMessage: 'Policy analysis not found',
      });
    });
  });

  describe('getPolicyFile', () => {
    it('should refuse a record that holds no file', async () => {
      const created = await service.createPolicy('acme', {
        provider: 'Acme',
        planType: 'PPO',
        fields: [],
      });

      await expect(
        service.getPolicyFile('acme', created.analysis.id),
      ).rejects.toThrow(PolicyNotFoundError);
    });

    it('should refuse another tenant', async () => {
      const created = await service.createPolicy('acme', {
        provider: 'Acme',
        planType: 'PPO',
        fileB64: sampleFile,
        retain: true,
      });

      await expect(
        service.getPolicyFile('globex', created.analysis.id),
      ).rejects.toThrow(PolicyNotFoundError);
    });
  });

  describe('listPolicies', () => {
    it('should report fileUrl per record', async () => {
      const plain = await service.createPolicy('acme', {
        provider: 'Acme',
        planType: 'PPO',
        fields: [],
      });
      const retained = await service.createPolicy('acme', {
        provider: 'Acme',
        planType: 'PPO',
        fileB64: sampleFile,
        retain: true,
      });

      const result = await service.listPolicies('acme', {});

      expect(result.map((entry) => entry.fileUrl)).toEqual([
        null,
        `/api/v1/policies/${retained.analysis.id}/file`,
      ]);
      expect(result[0].analysis.id).toBe(plain.analysis.id);
    });
  });

  describe('deletePolicy', () => {
    it('should remove the retained document with the record', async () => {
      const created = await service.createPolicy('acme', {
        provider: 'Acme',
        planType: 'PPO',
        fileB64: sampleFile,
        retain: true,
      });

      await service.deletePolicy('acme', created.analysis.id);

      await expect(
        fileStorage.exists('acme', created.analysis.id),
      ).resolves.toBe(false);
      expect(mockAudit.logPolicyEvent).toHaveBeenLastCalledWith({
        tenantId: 'acme',
        event: PolicyEventType.POLICY_DELETED,
        policyId: created.analysis.id,
        success: true,
        metadata: { fileDeleted: true },
      });
    });
  });

  describe('purgeExpiredFiles', () => {
    it('should drop documents once their deadline passes', async () => {
      jest.useFakeTimers({ now: new Date('2026-03-01T00:00:00.000Z') });
      const created = await service.createPolicy('acme', {
        provider: 'Acme',
        planType: 'PPO',
        fileB64: sampleFile,
        retain: true,
      });

      await expect(
        service.purgeExpiredFiles(new Date('2026-03-01T23:59:59.999Z')),
      ).resolves.toBe(0);
      await expect(
        service.purgeExpiredFiles(new Date('2026-03-02T00:00:00.000Z')),
      ).resolves.toBe(1);

      const after = await service.getPolicy('acme', created.analysis.id);
      expect(after.fileUrl).toBeNull();
      expect(after.analysis.expiresAt).toBeNull();
      await expect(
        service.purgeExpiredFiles(new Date('2026-03-03T00:00:00.000Z')),
      ).resolves.toBe(0);
    });
  });
});
