import {
  PolicyAnalysis,
  PolicyAnalysisFilters,
} from '../entities/policy-analysis.entity';
import { NullableType } from '../../../utils/types/nullable.type';

/**
 * Repository Port for PolicyAnalysis (Hexagonal Architecture)
 *
 * Every lookup is tenant-scoped; there is no way to read a record without
 * naming its tenant. Implementations must return copies, never live
 * references to stored state.
 */
export abstract class PolicyAnalysisRepositoryPort {
  /**
   * Insert a new record
   * @returns false when the id is already taken (by any tenant)
   */
  abstract insert(analysis: PolicyAnalysis): Promise<boolean>;

  abstract findByIdAndTenant(
    tenantId: string,
    id: string,
  ): Promise<NullableType<PolicyAnalysis>>;

  /**
   * Records of one tenant, in insertion order, exact-match filtered
   */
  abstract findByTenant(
    tenantId: string,
    filters?: PolicyAnalysisFilters,
  ): Promise<PolicyAnalysis[]>;

  /**
   * Replace a stored record in place, keeping its position
   * @returns false when no record with that id exists for the tenant
   */
  abstract replace(analysis: PolicyAnalysis): Promise<boolean>;

  /**
   * @returns false when no record with that id exists for the tenant
   */
  abstract deleteByIdAndTenant(tenantId: string, id: string): Promise<boolean>;

  /**
   * Records whose expiresAt is at or before the given instant
   */
  abstract findExpired(now: Date): Promise<PolicyAnalysis[]>;

  abstract count(): Promise<number>;
}
