import { PolicyAnalysis } from '../../../domain/entities/policy-analysis.entity';

export class PolicyAnalysisMapper {
  /**
   * Deep, frozen copy. Dates are re-created so no caller can reach the
   * stored instances.
   */
  static clone(analysis: PolicyAnalysis): PolicyAnalysis {
    return Object.freeze({
      id: analysis.id,
      tenantId: analysis.tenantId,
      provider: analysis.provider,
      planType: analysis.planType,
      fields: Object.freeze(
        analysis.fields.map((field) => Object.freeze({ ...field })),
      ),
      createdAt: new Date(analysis.createdAt.getTime()),
      updatedAt: new Date(analysis.updatedAt.getTime()),
      expiresAt: analysis.expiresAt
        ? new Date(analysis.expiresAt.getTime())
        : null,
    });
  }
}
