import { ApiProperty } from '@nestjs/swagger';
import { PolicyFieldResponseDto } from './policy-field-response.dto';

export class PolicyAnalysisResponseDto {
  @ApiProperty({ example: '123e4567-e89b-12d3-a456-426614174000' })
  id!: string;

  @ApiProperty({ example: 'acme' })
  tenantId!: string;

  @ApiProperty({ example: 'Acme Insurance' })
  provider!: string;

  @ApiProperty({ example: 'PPO' })
  planType!: string;

  @ApiProperty({ type: [PolicyFieldResponseDto] })
  fields!: PolicyFieldResponseDto[];

  @ApiProperty({ example: '2026-01-20T10:00:00Z' })
  createdAt!: Date;

  @ApiProperty({ example: '2026-01-20T10:30:00Z' })
  updatedAt!: Date;

  @ApiProperty({ type: Date, nullable: true })
  expiresAt!: Date | null;
}
