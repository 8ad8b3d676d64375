import { PolicyField } from './policy-field.entity';

/**
 * Domain entity for PolicyAnalysis
 *
 * A processed insurance policy document plus the fields extracted from it.
 * Instances handed out by the store are frozen snapshots; changes go
 * through PolicyStoreDomainService.update.
 *
 * Immutable after creation: id, tenantId, createdAt.
 */
export interface PolicyAnalysis {
  readonly id: string; // UUID
  readonly tenantId: string;

  // Classification
  readonly provider: string;
  readonly planType: string;

  // Extraction output, in pipeline order
  readonly fields: readonly PolicyField[];

  // Timestamps
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly expiresAt: Date | null; // Retained source file deadline
}

export type PolicyAnalysisFilters = {
  provider?: string;
  planType?: string;
};

export type PolicyAnalysisChanges = {
  provider?: string;
  planType?: string;
  fields?: readonly PolicyField[];
};
