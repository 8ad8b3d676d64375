/**
 * Raised when a policy analysis does not exist or belongs to another
 * tenant. Both cases share one message so callers cannot probe for
 * records outside their tenant.
 */
export class PolicyNotFoundError extends Error {
  static readonly MESSAGE = 'Policy analysis not found';

  readonly policyId: string;

  constructor(policyId: string) {
    super(PolicyNotFoundError.MESSAGE);
    this.name = 'PolicyNotFoundError';
    this.policyId = policyId;

    Object.setPrototypeOf(this, PolicyNotFoundError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      status: 404,
      message: this.message,
    };
  }
}
