import { Inject, Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import { PolicyAnalysisRepositoryPort } from '../ports/policy-analysis.repository.port';
import {
  POLICY_ID_GENERATOR,
  PolicyIdGenerator,
} from '../ports/policy-id-generator.port';
import {
  PolicyAnalysis,
  PolicyAnalysisChanges,
  PolicyAnalysisFilters,
} from '../entities/policy-analysis.entity';
import {
  PolicyField,
  PolicyFieldInput,
  createPolicyField,
} from '../entities/policy-field.entity';
import { PolicyValidationError } from '../errors/policy-validation.error';
import { PolicyNotFoundError } from '../errors/policy-not-found.error';

const MAX_ID_ATTEMPTS = 5;

export type CreatePolicyOptions = {
  /**
   * Keep the source file for this many milliseconds (sets expiresAt)
   */
  retainForMs?: number;
};

export type UpdatePolicyInput = {
  provider?: string;
  planType?: string;
  fields?: PolicyFieldInput[];
};

/**
 * Policy Store Domain Service
 *
 * Authoritative set of PolicyAnalysis records for the process lifetime.
 *
 * Rules:
 * - tenantId is mandatory on every operation and is the only way in
 * - A record of another tenant is reported exactly like a missing one
 * - Mutations of one tenant are serialized; tenants do not block each other
 * - Callers only ever receive frozen snapshots
 *
 * Failures surface as PolicyValidationError / PolicyNotFoundError; nothing
 * is retried here.
 */
@Injectable()
export class PolicyStoreDomainService {
  private readonly logger = new Logger(PolicyStoreDomainService.name);
  // One single-slot queue per tenant with work queued or running
  private readonly tenantQueues = new Map<string, pLimit.Limit>();

  constructor(
    private readonly repository: PolicyAnalysisRepositoryPort,
    @Inject(POLICY_ID_GENERATOR)
    private readonly generateId: PolicyIdGenerator,
  ) {}

  async create(
    tenantId: string,
    provider: string,
    planType: string,
    fields: PolicyFieldInput[],
    options: CreatePolicyOptions = {},
  ): Promise<PolicyAnalysis> {
    this.assertTenant(tenantId);
    this.assertClassification('provider', provider);
    this.assertClassification('planType', planType);
    const validatedFields = this.buildFields(fields);

    if (
      options.retainForMs !== undefined &&
      (!Number.isFinite(options.retainForMs) || options.retainForMs <= 0)
    ) {
      throw new PolicyValidationError(
        'retainForMs',
        'retention must be a positive duration',
      );
    }

    return this.runExclusive(tenantId, async () => {
      const now = new Date();
      const expiresAt =
        options.retainForMs !== undefined
          ? new Date(now.getTime() + options.retainForMs)
          : null;

      for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
        const analysis: PolicyAnalysis = Object.freeze({
          id: this.generateId(),
          tenantId,
          provider,
          planType,
          fields: Object.freeze([...validatedFields]),
          createdAt: now,
          updatedAt: new Date(now.getTime()),
          expiresAt,
        });

        if (await this.repository.insert(analysis)) {
          this.logger.debug(
            `[CREATE] policyId=${analysis.id}, tenantId=${tenantId}, fields=${validatedFields.length}`,
          );
          return analysis;
        }

        this.logger.warn(
          `[CREATE] Identifier collision on attempt ${attempt}, drawing a new id`,
        );
      }

      throw new Error(
        `Could not allocate a unique policy id after ${MAX_ID_ATTEMPTS} attempts`,
      );
    });
  }

  async get(tenantId: string, id: string): Promise<PolicyAnalysis> {
    this.assertTenant(tenantId);

    const analysis = await this.repository.findByIdAndTenant(tenantId, id);
    if (!analysis) {
      throw new PolicyNotFoundError(id);
    }
    return analysis;
  }

  /**
   * Apply changes to provider, planType and fields only.
   * updatedAt always moves strictly forward, even within one clock tick.
   */
  async update(
    tenantId: string,
    id: string,
    changes: UpdatePolicyInput,
  ): Promise<PolicyAnalysis> {
    this.assertTenant(tenantId);
    if (changes.provider !== undefined) {
      this.assertClassification('provider', changes.provider);
    }
    if (changes.planType !== undefined) {
      this.assertClassification('planType', changes.planType);
    }
    const validatedFields =
      changes.fields !== undefined ? this.buildFields(changes.fields) : undefined;

    return this.runExclusive(tenantId, () =>
      this.applyChanges(tenantId, id, {
        provider: changes.provider,
        planType: changes.planType,
        fields: validatedFields,
      }),
    );
  }

  async list(
    tenantId: string,
    filters: PolicyAnalysisFilters = {},
  ): Promise<PolicyAnalysis[]> {
    this.assertTenant(tenantId);
    return this.repository.findByTenant(tenantId, filters);
  }

  async delete(tenantId: string, id: string): Promise<void> {
    this.assertTenant(tenantId);

    await this.runExclusive(tenantId, async () => {
      const deleted = await this.repository.deleteByIdAndTenant(tenantId, id);
      if (!deleted) {
        throw new PolicyNotFoundError(id);
      }
      this.logger.debug(`[DELETE] policyId=${id}, tenantId=${tenantId}`);
    });
  }

  /**
   * Clear the retention deadline once the source file is gone
   */
  async releaseRetention(tenantId: string, id: string): Promise<PolicyAnalysis> {
    this.assertTenant(tenantId);
    return this.runExclusive(tenantId, () =>
      this.applyChanges(tenantId, id, {}, null),
    );
  }

  async findExpired(now: Date = new Date()): Promise<PolicyAnalysis[]> {
    return this.repository.findExpired(now);
  }

  async count(): Promise<number> {
    return this.repository.count();
  }

  /**
   * Run a mutation after every earlier mutation of the same tenant
   */
  private runExclusive<T>(tenantId: string, task: () => Promise<T>): Promise<T> {
    let queue = this.tenantQueues.get(tenantId);
    if (!queue) {
      queue = pLimit(1);
      this.tenantQueues.set(tenantId, queue);
    }
    const limit = queue;

    return limit(task).finally(() => {
      if (
        limit.activeCount === 0 &&
        limit.pendingCount === 0 &&
        this.tenantQueues.get(tenantId) === limit
      ) {
        this.tenantQueues.delete(tenantId);
      }
    });
  }

  private async applyChanges(
    tenantId: string,
    id: string,
    changes: PolicyAnalysisChanges,
    expiresAt?: Date | null,
  ): Promise<PolicyAnalysis> {
    const current = await this.repository.findByIdAndTenant(tenantId, id);
    if (!current) {
      throw new PolicyNotFoundError(id);
    }

    const updated: PolicyAnalysis = Object.freeze({
      ...current,
      provider: changes.provider ?? current.provider,
      planType: changes.planType ?? current.planType,
      fields: changes.fields
        ? Object.freeze([...changes.fields])
        : current.fields,
      expiresAt: expiresAt === undefined ? current.expiresAt : expiresAt,
      updatedAt: new Date(
        Math.max(Date.now(), current.updatedAt.getTime() + 1),
      ),
    });

    if (!(await this.repository.replace(updated))) {
      throw new PolicyNotFoundError(id);
    }

    this.logger.debug(`[UPDATE] policyId=${id}, tenantId=${tenantId}`);
    return updated;
  }

  private buildFields(fields: PolicyFieldInput[]): PolicyField[] {
    if (!Array.isArray(fields)) {
      throw new PolicyValidationError('fields', 'fields must be an array');
    }
    return fields.map((field, index) =>
      createPolicyField(field, `fields[${index}]`),
    );
  }

  private assertTenant(tenantId: string): void {
    if (typeof tenantId !== 'string' || tenantId.trim().length === 0) {
      throw new PolicyValidationError('tenantId', 'tenantId must not be empty');
    }
  }

  private assertClassification(property: string, value: string): void {
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new PolicyValidationError(property, `${property} must not be empty`);
    }
  }
}
