import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export class PolicyFieldDto {
  @ApiProperty({ example: 'deductible' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  name!: string;

  @ApiProperty({ example: '$500' })
  @IsString()
  value!: string;

  @ApiProperty({ minimum: 0, maximum: 1, example: 0.92 })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  confidence!: number;

  @ApiPropertyOptional({ minimum: 1, nullable: true, example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  sourcePage?: number | null;

  @ApiPropertyOptional({ example: 'Deductible: $500', default: '' })
  @IsOptional()
  @IsString()
  citation?: string;

  @ApiProperty({ example: 'v1' })
  @IsString()
  @IsNotEmpty()
  modelVersion!: string;
}
