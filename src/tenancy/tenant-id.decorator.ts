import {
  createParamDecorator,
  ExecutionContext,
  InternalServerErrorException,
} from '@nestjs/common';
import { TenantScopedRequest } from './tenant.guard';

/**
 * Tenant id resolved by TenantGuard. Using it on a route without the
 * guard is a wiring bug, hence the 500.
 */
export const TenantId = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string => {
    const request = context.switchToHttp().getRequest<TenantScopedRequest>();
    if (!request.tenantId) {
      throw new InternalServerErrorException('Tenant context not resolved');
    }
    return request.tenantId;
  },
);
