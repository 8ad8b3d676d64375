import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  Param,
  Post,
  Put,
  Query,
  StreamableFile,
  UnprocessableEntityException,
  UseGuards,
} from '@nestjs/common';
import {
  ApiCreatedResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiSecurity,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { PoliciesService, POLICIES_API_VERSION } from './policies.service';
import { CreatePolicyDto } from './dto/create-policy.dto';
import { UpdatePolicyDto } from './dto/update-policy.dto';
import { ListPoliciesQueryDto } from './dto/list-policies-query.dto';
import { PolicyResponseDto } from './dto/policy-response.dto';
import { PolicyValidationError } from './domain/errors/policy-validation.error';
import { PolicyNotFoundError } from './domain/errors/policy-not-found.error';
import { TENANT_SECURITY_SCHEME, TenantGuard } from '../tenancy/tenant.guard';
import { TenantId } from '../tenancy/tenant-id.decorator';

/**
 * Policy Analysis Controller
 *
 * Every route is tenant-scoped through TenantGuard. A record owned by
 * another tenant answers 404, exactly like a missing one.
 */
@ApiTags('Policies')
@Controller({ path: 'policies', version: POLICIES_API_VERSION })
@UseGuards(TenantGuard)
@ApiSecurity(TENANT_SECURITY_SCHEME)
@ApiUnauthorizedResponse({ description: 'Missing or invalid tenant identifier' })
export class PoliciesController {
  private readonly logger = new Logger(PoliciesController.name);

  constructor(private readonly policiesService: PoliciesService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Create Policy Analysis',
    description:
      'Store a policy analysis. Fields are taken from the body, or extracted from fileB64 when no fields are sent.',
  })
  @ApiCreatedResponse({ type: PolicyResponseDto })
  @ApiUnprocessableEntityResponse({
    description: 'Invalid input (e.g. confidence outside 0..1)',
  })
  async createPolicy(
    @TenantId() tenantId: string,
    @Body() dto: CreatePolicyDto,
  ): Promise<PolicyResponseDto> {
    try {
      return await this.policiesService.createPolicy(tenantId, dto);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Get()
  @ApiOperation({
    summary: 'List Policy Analyses',
    description:
      "List the tenant's policy analyses in creation order. provider and planType are exact, case-sensitive filters.",
  })
  @ApiOkResponse({ type: [PolicyResponseDto] })
  async listPolicies(
    @TenantId() tenantId: string,
    @Query() query: ListPoliciesQueryDto,
  ): Promise<PolicyResponseDto[]> {
    try {
      return await this.policiesService.listPolicies(tenantId, query);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get Policy Analysis' })
  @ApiParam({ name: 'id', type: String, description: 'Policy analysis id' })
  @ApiOkResponse({ type: PolicyResponseDto })
  @ApiNotFoundResponse({ description: 'Policy analysis not found' })
  async getPolicy(
    @TenantId() tenantId: string,
    @Param('id') id: string,
  ): Promise<PolicyResponseDto> {
    try {
      return await this.policiesService.getPolicy(tenantId, id);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Get(':id/file')
  @ApiOperation({
    summary: 'Download Retained Policy Document',
    description: 'Available while the document is retained (see expiresAt).',
  })
  @ApiParam({ name: 'id', type: String, description: 'Policy analysis id' })
  @ApiOkResponse({ description: 'Document bytes' })
  @ApiNotFoundResponse({ description: 'Policy analysis or document not found' })
  async getPolicyFile(
    @TenantId() tenantId: string,
    @Param('id') id: string,
  ): Promise<StreamableFile> {
    try {
      const file = await this.policiesService.getPolicyFile(tenantId, id);
      return new StreamableFile(file.content, {
        type: 'application/octet-stream',
        disposition: `attachment; filename="${encodeURIComponent(file.fileName)}"`,
        length: file.content.length,
      });
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Put(':id')
  @ApiOperation({
    summary: 'Update Policy Analysis',
    description:
      'Change provider, planType and/or replace fields. id, tenantId and createdAt never change.',
  })
  @ApiParam({ name: 'id', type: String, description: 'Policy analysis id' })
  @ApiOkResponse({ type: PolicyResponseDto })
  @ApiNotFoundResponse({ description: 'Policy analysis not found' })
  @ApiUnprocessableEntityResponse({ description: 'Invalid input' })
  async updatePolicy(
    @TenantId() tenantId: string,
    @Param('id') id: string,
    @Body() dto: UpdatePolicyDto,
  ): Promise<PolicyResponseDto> {
    try {
      return await this.policiesService.updatePolicy(tenantId, id, dto);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete Policy Analysis' })
  @ApiParam({ name: 'id', type: String, description: 'Policy analysis id' })
  @ApiNoContentResponse({ description: 'Deleted' })
  @ApiNotFoundResponse({ description: 'Policy analysis not found' })
  async deletePolicy(
    @TenantId() tenantId: string,
    @Param('id') id: string,
  ): Promise<void> {
    try {
      await this.policiesService.deletePolicy(tenantId, id);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Convert domain errors to HttpException
   */
  private handleError(error: unknown): HttpException {
    if (error instanceof PolicyValidationError) {
      return new UnprocessableEntityException(error.toJSON());
    }

    if (error instanceof PolicyNotFoundError) {
      return new NotFoundException(error.message);
    }

    if (error instanceof HttpException) {
      return error;
    }

    this.logger.error(
      `Unexpected error: ${error instanceof Error ? error.message : 'Unknown'}`,
    );

    return new InternalServerErrorException('Internal server error');
  }
}
