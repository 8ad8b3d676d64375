import { Injectable } from '@nestjs/common';
import { PolicyAnalysisRepositoryPort } from '../../../domain/ports/policy-analysis.repository.port';
import {
  PolicyAnalysis,
  PolicyAnalysisFilters,
} from '../../../domain/entities/policy-analysis.entity';
import { NullableType } from '../../../../utils/types/nullable.type';
import { PolicyAnalysisMapper } from './policy-analysis.mapper';

/**
 * Process-memory adapter for PolicyAnalysisRepositoryPort.
 *
 * Records are partitioned per tenant in insertion-ordered maps. Each method
 * does all of its work synchronously before its promise settles, so a
 * single call is atomic with respect to every other call.
 *
 * Nothing survives a restart.
 */
@Injectable()
export class PolicyAnalysisInMemoryRepository
  implements PolicyAnalysisRepositoryPort
{
  private readonly partitions = new Map<string, Map<string, PolicyAnalysis>>();
  // id -> tenantId, spans all tenants so ids stay globally unique
  private readonly owners = new Map<string, string>();

  async insert(analysis: PolicyAnalysis): Promise<boolean> {
    if (this.owners.has(analysis.id)) {
      return false;
    }

    let partition = this.partitions.get(analysis.tenantId);
    if (!partition) {
      partition = new Map();
      this.partitions.set(analysis.tenantId, partition);
    }

    partition.set(analysis.id, PolicyAnalysisMapper.clone(analysis));
    this.owners.set(analysis.id, analysis.tenantId);
    return true;
  }

  async findByIdAndTenant(
    tenantId: string,
    id: string,
  ): Promise<NullableType<PolicyAnalysis>> {
    const stored = this.partitions.get(tenantId)?.get(id);
    return stored ? PolicyAnalysisMapper.clone(stored) : null;
  }

  async findByTenant(
    tenantId: string,
    filters: PolicyAnalysisFilters = {},
  ): Promise<PolicyAnalysis[]> {
    const partition = this.partitions.get(tenantId);
    if (!partition) {
      return [];
    }

    const result: PolicyAnalysis[] = [];
    for (const analysis of partition.values()) {
      if (
        filters.provider !== undefined &&
        analysis.provider !== filters.provider
      ) {
        continue;
      }
      if (
        filters.planType !== undefined &&
        analysis.planType !== filters.planType
      ) {
        continue;
      }
      result.push(PolicyAnalysisMapper.clone(analysis));
    }
    return result;
  }

  async replace(analysis: PolicyAnalysis): Promise<boolean> {
    const partition = this.partitions.get(analysis.tenantId);
    if (!partition?.has(analysis.id)) {
      return false;
    }

    // Map.set on an existing key keeps its insertion position
    partition.set(analysis.id, PolicyAnalysisMapper.clone(analysis));
    return true;
  }

  async deleteByIdAndTenant(tenantId: string, id: string): Promise<boolean> {
    const partition = this.partitions.get(tenantId);
    if (!partition?.delete(id)) {
      return false;
    }

    this.owners.delete(id);
    if (partition.size === 0) {
      this.partitions.delete(tenantId);
    }
    return true;
  }

  async findExpired(now: Date): Promise<PolicyAnalysis[]> {
    const result: PolicyAnalysis[] = [];
    for (const partition of this.partitions.values()) {
      for (const analysis of partition.values()) {
        if (analysis.expiresAt && analysis.expiresAt.getTime() <= now.getTime()) {
          result.push(PolicyAnalysisMapper.clone(analysis));
        }
      }
    }
    return result;
  }

  async count(): Promise<number> {
    return this.owners.size;
  }
}
