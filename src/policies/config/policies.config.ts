import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { PoliciesConfig } from './policies-config.type';
import validateConfig from '../../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(1)
  @Max(100)
  @IsOptional()
  POLICY_MAX_FILE_SIZE_MB?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  POLICY_FILE_RETENTION_HOURS?: number;

  @IsString()
  @IsOptional()
  POLICY_EXTRACTION_MODEL_VERSION?: string;
}

export default registerAs<PoliciesConfig>('policies', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    maxFileSizeMb: process.env.POLICY_MAX_FILE_SIZE_MB
      ? parseInt(process.env.POLICY_MAX_FILE_SIZE_MB, 10)
      : 10,
    fileRetentionHours: process.env.POLICY_FILE_RETENTION_HOURS
      ? parseInt(process.env.POLICY_FILE_RETENTION_HOURS, 10)
      : 24,
    extractionModelVersion:
      process.env.POLICY_EXTRACTION_MODEL_VERSION || 'placeholder-v1',
  };
});
