import { ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { PolicyFieldDto } from './policy-field.dto';

export class UpdatePolicyDto {
  @ApiPropertyOptional({ example: 'Acme Insurance' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  provider?: string;

  @ApiPropertyOptional({ example: 'HMO' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  planType?: string;

  @ApiPropertyOptional({
    type: [PolicyFieldDto],
    description: 'Replaces the whole field list when present',
  })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => PolicyFieldDto)
  fields?: PolicyFieldDto[];
}
