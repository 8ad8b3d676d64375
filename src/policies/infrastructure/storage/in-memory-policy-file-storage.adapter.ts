import { Injectable, Logger } from '@nestjs/common';
import {
  PolicyFileStoragePort,
  StoredPolicyFile,
} from '../../domain/ports/policy-file-storage.port';
import { NullableType } from '../../../utils/types/nullable.type';

/**
 * Keeps retained policy files in process memory, keyed by tenant and
 * policy id. File contents are never logged.
 */
@Injectable()
export class InMemoryPolicyFileStorageAdapter implements PolicyFileStoragePort {
  private readonly logger = new Logger(InMemoryPolicyFileStorageAdapter.name);
  private readonly files = new Map<string, StoredPolicyFile>();

  async store(file: StoredPolicyFile): Promise<void> {
    this.files.set(this.key(file.tenantId, file.policyId), {
      ...file,
      content: Buffer.from(file.content),
    });
    this.logger.debug(
      `[STORE] policyId=${file.policyId}, bytes=${file.content.length}`,
    );
  }

  async find(
    tenantId: string,
    policyId: string,
  ): Promise<NullableType<StoredPolicyFile>> {
    const file = this.files.get(this.key(tenantId, policyId));
    return file ? { ...file, content: Buffer.from(file.content) } : null;
  }

  async exists(tenantId: string, policyId: string): Promise<boolean> {
    return this.files.has(this.key(tenantId, policyId));
  }

  async delete(tenantId: string, policyId: string): Promise<boolean> {
    return this.files.delete(this.key(tenantId, policyId));
  }

  private key(tenantId: string, policyId: string): string {
    return JSON.stringify([tenantId, policyId]);
  }
}
