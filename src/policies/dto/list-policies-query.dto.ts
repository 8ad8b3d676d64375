import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

/**
 * Exact, case-sensitive filters. Tenant comes from the request header,
 * never from the query string.
 */
export class ListPoliciesQueryDto {
  @ApiPropertyOptional({ example: 'Acme Insurance' })
  @IsOptional()
  @IsString()
  provider?: string;

  @ApiPropertyOptional({ example: 'PPO' })
  @IsOptional()
  @IsString()
  planType?: string;
}
