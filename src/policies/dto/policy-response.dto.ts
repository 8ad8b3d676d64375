import { ApiProperty } from '@nestjs/swagger';
import { PolicyAnalysisResponseDto } from './policy-analysis-response.dto';

export class PolicyResponseDto {
  @ApiProperty({ type: PolicyAnalysisResponseDto })
  analysis!: PolicyAnalysisResponseDto;

  @ApiProperty({
    type: String,
    nullable: true,
    description: 'Download path of the retained document, if any',
    example: '/policies/123e4567-e89b-12d3-a456-426614174000/file',
  })
  fileUrl!: string | null;
}
