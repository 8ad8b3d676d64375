import { ApiProperty } from '@nestjs/swagger';

export class PolicyFieldResponseDto {
  @ApiProperty()
  name!: string;

  @ApiProperty()
  value!: string;

  @ApiProperty({ minimum: 0, maximum: 1 })
  confidence!: number;

  @ApiProperty({ type: Number, nullable: true })
  sourcePage!: number | null;

  @ApiProperty()
  citation!: string;

  @ApiProperty()
  modelVersion!: string;
}
