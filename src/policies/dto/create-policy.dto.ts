import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsArray,
  IsBase64,
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { PolicyFieldDto } from './policy-field.dto';

export class CreatePolicyDto {
  @ApiProperty({ example: 'Acme Insurance' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  provider!: string;

  @ApiProperty({ example: 'PPO' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  planType!: string;

  @ApiPropertyOptional({
    type: [PolicyFieldDto],
    description:
      'Extracted fields in pipeline order. Required unless fileB64 is sent for extraction.',
  })
  @ValidateIf(
    (dto: CreatePolicyDto) =>
      dto.fileB64 === undefined || dto.fields !== undefined,
  )
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PolicyFieldDto)
  fields?: PolicyFieldDto[];

  @ApiPropertyOptional({
    description: 'Base64-encoded policy document, used when fields are not given',
  })
  @IsOptional()
  @IsBase64()
  fileB64?: string;

  @ApiPropertyOptional({ example: 'acme-ppo-2026.pdf' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  filename?: string;

  @ApiPropertyOptional({
    default: false,
    description: 'Keep the decoded document for later download',
  })
  @IsOptional()
  @IsBoolean()
  retain?: boolean;
}
