/**
 * Raised when input to the policy store breaks a data-model constraint
 * (confidence out of range, missing required attribute, ...).
 */
export class PolicyValidationError extends Error {
  /**
   * Path of the offending property, e.g. "fields[0].confidence"
   */
  readonly property: string;

  readonly constraint: string;

  constructor(property: string, constraint: string) {
    super(`${property}: ${constraint}`);
    this.name = 'PolicyValidationError';
    this.property = property;
    this.constraint = constraint;

    Object.setPrototypeOf(this, PolicyValidationError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      status: 422,
      errors: { [this.property]: this.constraint },
    };
  }
}
