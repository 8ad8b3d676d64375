import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { AllConfigType } from '../config/config.type';

// Swagger security scheme carrying the configured tenant header
export const TENANT_SECURITY_SCHEME = 'tenant';

export type TenantScopedRequest = Request & { tenantId?: string };

const TENANT_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Resolves the tenant from the configured request header and pins it on
 * the request. Who may act for which tenant is decided upstream (gateway
 * or auth layer); this guard only refuses requests that carry no usable
 * tenant id.
 */
@Injectable()
export class TenantGuard implements CanActivate {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<TenantScopedRequest>();
    const headerName = this.configService.getOrThrow('app.tenantHeader', {
      infer: true,
    });
    const raw = request.headers[headerName];
    const tenantId = (Array.isArray(raw) ? raw[0] : raw)?.trim();

    if (!tenantId) {
      throw new UnauthorizedException('Missing tenant identifier');
    }

    if (!TENANT_ID_PATTERN.test(tenantId)) {
      throw new UnauthorizedException('Invalid tenant identifier');
    }

    request.tenantId = tenantId;
    return true;
  }
}
