import { PolicyValidationError } from '../errors/policy-validation.error';

export interface PolicyField {
  readonly name: string; // e.g., "deductible", "out_of_pocket_max"
  readonly value: string;
  readonly confidence: number; // 0-1
  readonly sourcePage: number | null; // 1-based page of origin
  readonly citation: string; // Verbatim excerpt, may be empty
  readonly modelVersion: string;
}

export type PolicyFieldInput = {
  name: string;
  value: string;
  confidence: number;
  sourcePage?: number | null;
  citation?: string;
  modelVersion: string;
};

/**
 * Build a validated, frozen PolicyField.
 *
 * @param path - Property path reported in errors, e.g. "fields[2]"
 * @throws PolicyValidationError
 */
export function createPolicyField(
  input: PolicyFieldInput,
  path = 'field',
): PolicyField {
  if (typeof input.name !== 'string' || input.name.trim().length === 0) {
    throw new PolicyValidationError(`${path}.name`, 'name must not be empty');
  }

  if (typeof input.value !== 'string') {
    throw new PolicyValidationError(`${path}.value`, 'value must be a string');
  }

  if (
    typeof input.confidence !== 'number' ||
    !Number.isFinite(input.confidence) ||
    input.confidence < 0 ||
    input.confidence > 1
  ) {
    throw new PolicyValidationError(
      `${path}.confidence`,
      'confidence must be between 0 and 1',
    );
  }

  const sourcePage = input.sourcePage ?? null;
  if (
    sourcePage !== null &&
    (!Number.isInteger(sourcePage) || sourcePage < 1)
  ) {
    throw new PolicyValidationError(
      `${path}.sourcePage`,
      'sourcePage must be a positive integer or null',
    );
  }

  if (
    typeof input.modelVersion !== 'string' ||
    input.modelVersion.trim().length === 0
  ) {
    throw new PolicyValidationError(
      `${path}.modelVersion`,
      'modelVersion must not be empty',
    );
  }

  return Object.freeze({
    name: input.name,
    value: input.value,
    confidence: input.confidence,
    sourcePage,
    citation: input.citation ?? '',
    modelVersion: input.modelVersion,
  });
}
