import { NullableType } from '../../../utils/types/nullable.type';

export interface StoredPolicyFile {
  tenantId: string;
  policyId: string;
  fileName: string;
  content: Buffer;
  storedAt: Date;
}

export interface PolicyFileStoragePort {
  store(file: StoredPolicyFile): Promise<void>;

  find(tenantId: string, policyId: string): Promise<NullableType<StoredPolicyFile>>;

  exists(tenantId: string, policyId: string): Promise<boolean>;

  /**
   * @returns false when nothing was stored for the record
   */
  delete(tenantId: string, policyId: string): Promise<boolean>;
}
