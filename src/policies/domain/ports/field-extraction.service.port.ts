import { PolicyFieldInput } from '../entities/policy-field.entity';

export interface ExtractionRequest {
  tenantId: string;
  document: Buffer; // Decoded file bytes (never log)
  fileName?: string;
}

export interface ExtractionResult {
  fields: PolicyFieldInput[];
  pageCount?: number;
}

export interface FieldExtractionServicePort {
  /**
   * Derive named values, confidences and citations from a policy document
   */
  extractFields(request: ExtractionRequest): Promise<ExtractionResult>;
}
